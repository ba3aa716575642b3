/**
 * In-Memory Nonce Store
 *
 * Implements NonceStore for testing and development.
 *
 * Discipline: `lookup` returns the exact nonce the next request must be
 * signed with. `commit` consumes it and expects `used + 1` next time.
 */

import type { NonceStore } from '../../core/ports.js';
import type { NonceLookup } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeInMemoryNonceStoreOptions {
  /**
   * Known API keys and the nonce each must sign with first.
   * Key: API key, Value: expected nonce
   */
  initialNonces?: Map<string, bigint>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an in-memory nonce store.
 *
 * @example
 * const store = makeInMemoryNonceStore({ initialNonces: new Map([['k1', 42n]]) });
 *
 * store.lookup('k1');        // 42n
 * store.commit('k1', 42n);   // true
 * store.lookup('k1');        // 43n
 * store.commit('k1', 42n);   // false (replayed)
 */
export const makeInMemoryNonceStore = (
  options: MakeInMemoryNonceStoreOptions = {}
): NonceStore & { register(apiKey: string, nonce: bigint): void } => {
  const expected = new Map(options.initialNonces ?? []);

  return {
    lookup(apiKey: string): bigint | null {
      return expected.get(apiKey) ?? null;
    },

    commit(apiKey: string, usedNonce: bigint): boolean {
      const current = expected.get(apiKey);
      if (current !== usedNonce) {
        return false;
      }
      expected.set(apiKey, usedNonce + 1n);
      return true;
    },

    register(apiKey: string, nonce: bigint): void {
      expected.set(apiKey, nonce);
    },
  };
};

/**
 * Adapts a store to the lookup capability an API-key mode takes.
 */
export const toNonceLookup = (store: NonceStore): NonceLookup => {
  return (apiKey) => store.lookup(apiKey);
};
