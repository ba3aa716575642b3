/**
 * API-Key Signature Verification
 *
 * The signed message is the concatenation of:
 *   resourcePath ‖ decimal(nonce) ‖ canonicalJson(payload)
 * where canonicalJson sorts object keys recursively and emits no whitespace.
 * The MAC is HMAC-SHA256 over the UTF-8 bytes, hex encoded (lowercase).
 */

import { createHmac, timingSafeEqual } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidSignatureError,
  createMalformedError,
  type AuthError,
} from './errors.js';
import { isFrameObject, type FrameValue } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Data covered by an API-key signature. Built fresh per request.
 */
export interface ApiKeyCandidate {
  readonly resourcePath: string;
  /** Unsigned 64-bit */
  readonly nonce: bigint;
  readonly payload: FrameValue;
}

const MAX_NONCE = (1n << 64n) - 1n;
const HEX_SIGNATURE = /^[0-9a-fA-F]+$/;

// ─────────────────────────────────────────────────────────────────────────────
// Canonicalization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Recursively sorts all keys in an object for deterministic serialization.
 */
const sortObjectKeys = (value: FrameValue): FrameValue => {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (!isFrameObject(value)) {
    return value.map(sortObjectKeys);
  }

  const result: Record<string, FrameValue> = {};
  for (const key of Object.keys(value).sort()) {
    const child = value[key];
    if (child !== undefined) {
      // Plain assignment of "__proto__" would set the prototype and drop the key
      Object.defineProperty(result, key, {
        value: sortObjectKeys(child),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return result;
};

export const canonicalJson = (payload: FrameValue): string => {
  return JSON.stringify(sortObjectKeys(payload));
};

export const isValidNonce = (nonce: bigint): boolean => nonce >= 0n && nonce <= MAX_NONCE;

/**
 * Bytes the HMAC is computed over.
 */
export const canonicalMessage = (candidate: ApiKeyCandidate): Buffer => {
  const text =
    candidate.resourcePath + candidate.nonce.toString(10) + canonicalJson(candidate.payload);
  return Buffer.from(text, 'utf-8');
};

// ─────────────────────────────────────────────────────────────────────────────
// Sign / Verify
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Computes the hex signature a client must send for a candidate.
 */
export const signApiKeyCandidate = (secret: Uint8Array, candidate: ApiKeyCandidate): string => {
  return createHmac('sha256', secret).update(canonicalMessage(candidate)).digest('hex');
};

/**
 * Recomputes the MAC and compares it to the supplied hex signature.
 *
 * SECURITY: Uses crypto.timingSafeEqual() on the decoded digests.
 */
export const verifyApiKeySignature = (
  secret: Uint8Array,
  candidate: ApiKeyCandidate,
  suppliedSignature: string
): Result<void, AuthError> => {
  if (!isValidNonce(candidate.nonce)) {
    return err(
      createMalformedError(`nonce ${candidate.nonce.toString()} is not an unsigned 64-bit value`)
    );
  }

  const expected = createHmac('sha256', secret).update(canonicalMessage(candidate)).digest();

  if (suppliedSignature.length % 2 !== 0 || !HEX_SIGNATURE.test(suppliedSignature)) {
    return err(createInvalidSignatureError('Signature must be a hex-encoded HMAC-SHA256'));
  }

  const supplied = Buffer.from(suppliedSignature, 'hex');
  if (supplied.length !== expected.length) {
    // Compare against itself to keep the rejection path constant time
    timingSafeEqual(expected, expected);
    return err(createInvalidSignatureError());
  }

  if (!timingSafeEqual(expected, supplied)) {
    return err(createInvalidSignatureError());
  }

  return ok(undefined);
};
