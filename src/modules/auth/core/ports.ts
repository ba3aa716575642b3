/**
 * Authentication Module - Port Interfaces
 *
 * Defines the abstract contracts that shell layer must implement.
 * Core depends ONLY on these interfaces, never on concrete implementations.
 */

import type { ClaimSelector } from './claims.js';
import type { AuthError } from './errors.js';
import type { JwtClaims } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Claim Verifier Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Verifies a signed claim set against a shared secret.
 */
export interface ClaimVerifier {
  /**
   * Verify a compact JWT and enforce the selected claims.
   *
   * @param token - Raw token (boundary text already stripped)
   *
   * MUST:
   * - Verify the signature with the algorithm named in the token header
   * - Check only the claims enabled in the selector
   *
   * MUST NOT:
   * - Throw exceptions (return Result.err instead)
   *
   * Possible errors:
   * - InvalidSignatureError: Signature verification failed
   * - MalformedError: Token is not a compact JWS with a JSON object payload
   * - TokenExpiredError / TokenNotYetValidError / ClaimMismatchError
   */
  verifyClaims(
    secret: Uint8Array,
    token: string,
    selector: ClaimSelector
  ): Promise<Result<JwtClaims, AuthError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Nonce Store Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * External owner of per-key nonce state.
 *
 * The validator only ever calls `lookup`. Callers advance the store with
 * `commit` after a request has been accepted.
 */
export interface NonceStore {
  /** Nonce the key must sign its next request with, null for unknown keys */
  lookup(apiKey: string): bigint | null;
  /** Marks `usedNonce` as consumed. Returns false for stale or unknown commits. */
  commit(apiKey: string, usedNonce: bigint): boolean;
}
