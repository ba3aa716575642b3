/**
 * Tests for the in-memory nonce store and the frame authentication guard.
 */

import { compactVerify } from 'jose';
import { describe, expect, it, vi } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';
import {
  FrameAuthError,
  NO_AUTH_MODE,
  makeApiKeyMode,
  makeFrameAuthGuard,
  makeInMemoryNonceStore,
  makeJwtClaimVerifier,
  signApiKeyCandidate,
  toNonceLookup,
} from '@/modules/auth/index.js';

const SECRET = 'test-secret';
const SECRET_BYTES = new TextEncoder().encode(SECRET);

const logger = createLogger({ level: 'silent', pretty: false });
const claimVerifier = makeJwtClaimVerifier({ compactVerify });

const signFrame = (apiKey: string, nonce: bigint, data: { op: string }) => ({
  apikey: apiKey,
  sig: signApiKeyCandidate(SECRET_BYTES, { resourcePath: '/frames', nonce, payload: data }),
  data,
});

const setup = () => {
  const nonceStore = makeInMemoryNonceStore({ initialNonces: new Map([['k1', 42n]]) });
  const mode = makeApiKeyMode({
    fields: { keyOrToken: 'apikey', sign: 'sig', payload: 'data' },
    signingSecret: SECRET,
    resourcePath: '/frames',
    nonceLookup: toNonceLookup(nonceStore),
  });
  const guard = makeFrameAuthGuard({ mode, claimVerifier, logger, nonceStore });
  return { nonceStore, guard };
};

describe('makeInMemoryNonceStore', () => {
  it('returns null for an unknown key', () => {
    expect(makeInMemoryNonceStore().lookup('k1')).toBeNull();
  });

  it('advances the expected nonce on commit', () => {
    const store = makeInMemoryNonceStore({ initialNonces: new Map([['k1', 42n]]) });

    expect(store.commit('k1', 42n)).toBe(true);
    expect(store.lookup('k1')).toBe(43n);
  });

  it('refuses a stale commit', () => {
    const store = makeInMemoryNonceStore({ initialNonces: new Map([['k1', 42n]]) });
    store.commit('k1', 42n);

    expect(store.commit('k1', 42n)).toBe(false);
    expect(store.lookup('k1')).toBe(43n);
  });

  it('refuses a commit for an unknown key', () => {
    expect(makeInMemoryNonceStore().commit('k1', 0n)).toBe(false);
  });

  it('registers keys after creation', () => {
    const store = makeInMemoryNonceStore();
    store.register('k2', 5n);

    expect(toNonceLookup(store)('k2')).toBe(5n);
  });

  it('does not share state with the initial map', () => {
    const initial = new Map([['k1', 1n]]);
    const store = makeInMemoryNonceStore({ initialNonces: initial });
    store.commit('k1', 1n);

    expect(initial.get('k1')).toBe(1n);
  });
});

describe('makeFrameAuthGuard', () => {
  it('accepts a signed frame and consumes its nonce', async () => {
    const { nonceStore, guard } = setup();

    const result = await guard.authenticate(signFrame('k1', 42n, { op: 'read' }));

    expect(result._unsafeUnwrap()).toEqual({ kind: 'api-key', apiKey: 'k1', nonce: 42n });
    expect(nonceStore.lookup('k1')).toBe(43n);
  });

  it('rejects the same frame when it is sent again', async () => {
    const { guard } = setup();
    const frame = signFrame('k1', 42n, { op: 'read' });

    await guard.authenticate(frame);
    const replay = await guard.authenticate(frame);

    // The next expected nonce is 43, so the old signature no longer verifies
    expect(replay._unsafeUnwrapErr().type).toBe('InvalidSignatureError');
  });

  it('accepts the next frame signed with the advanced nonce', async () => {
    const { guard } = setup();

    await guard.authenticate(signFrame('k1', 42n, { op: 'read' }));
    const next = await guard.authenticate(signFrame('k1', 43n, { op: 'write' }));

    expect(next._unsafeUnwrap()).toEqual({ kind: 'api-key', apiKey: 'k1', nonce: 43n });
  });

  it('rejects a nonce committed by a concurrent request', async () => {
    const nonceStore = makeInMemoryNonceStore({ initialNonces: new Map([['k1', 42n]]) });
    const mode = makeApiKeyMode({
      fields: { keyOrToken: 'apikey', sign: 'sig', payload: 'data' },
      signingSecret: SECRET,
      resourcePath: '/frames',
      // Lookup still reports 42 after another request committed it
      nonceLookup: () => 42n,
    });
    const guard = makeFrameAuthGuard({ mode, claimVerifier, logger, nonceStore });
    nonceStore.commit('k1', 42n);

    const result = await guard.authenticate(signFrame('k1', 42n, { op: 'read' }));

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('ReplayedNonceError');
    expect(error.message).toBe('nonce 42 has already been used');
  });

  it('does not consume the nonce of a rejected frame', async () => {
    const { nonceStore, guard } = setup();
    const frame = { ...signFrame('k1', 42n, { op: 'read' }), data: { op: 'delete' } };

    await guard.authenticate(frame);

    expect(nonceStore.lookup('k1')).toBe(42n);
  });

  it('logs a failing nonce lookup through the logger', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const mode = makeApiKeyMode({
      fields: { keyOrToken: 'apikey', sign: 'sig', payload: 'data' },
      signingSecret: SECRET,
      resourcePath: '/frames',
      nonceLookup: () => {
        throw new Error('store offline');
      },
    });
    const guard = makeFrameAuthGuard({ mode, claimVerifier, logger });

    const result = await guard.authenticate(signFrame('k1', 42n, { op: 'read' }));

    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialError');
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  describe('withAuth', () => {
    it('runs the handler with the outcome of an accepted frame', async () => {
      const { guard } = setup();
      const handler = guard.withAuth(async (frame, auth) => ({ frame, auth }));
      const frame = signFrame('k1', 42n, { op: 'read' });

      const output = await handler(frame);

      expect(output.auth).toEqual({ kind: 'api-key', apiKey: 'k1', nonce: 42n });
      expect(output.frame).toBe(frame);
    });

    it('throws FrameAuthError without running the handler', async () => {
      const { guard } = setup();
      const inner = vi.fn();
      const handler = guard.withAuth(inner);

      await expect(handler({ apikey: 'k1' })).rejects.toThrow(
        "Authentication failed: Missing field 'sig'"
      );
      await expect(handler({ apikey: 'k1' })).rejects.toBeInstanceOf(FrameAuthError);
      expect(inner).not.toHaveBeenCalled();
    });

    it('passes every frame through in none mode', async () => {
      const guard = makeFrameAuthGuard({ mode: NO_AUTH_MODE, claimVerifier, logger });

      const auth = await guard.withAuth(async (_frame, outcome) => outcome)('anything');

      expect(auth).toEqual({ kind: 'anonymous' });
    });
  });
});
