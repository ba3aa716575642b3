/**
 * JWT Claim Verifier
 *
 * Shared-secret JWT verification using the `jose` library.
 *
 * Uses `compactVerify` rather than `jwtVerify` because `jwtVerify` always
 * enforces `exp`/`nbf` when present, while claim checks here are opt-in.
 */

import { ok, err, type Result } from 'neverthrow';

import { CLAIM_NAMES, Claim, isClaimSelected, type ClaimSelector } from '../../core/claims.js';
import {
  createClaimMismatchError,
  createInvalidSignatureError,
  createMalformedError,
  createTokenExpiredError,
  createTokenNotYetValidError,
  type AuthError,
} from '../../core/errors.js';

import type { ClaimVerifier } from '../../core/ports.js';
import type { JwtClaims } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subset of jose CompactVerifyResult we use.
 */
export interface CompactVerifyResult {
  payload: Uint8Array;
}

/**
 * Compact JWS verification function type (from jose library).
 * We accept this as a dependency to avoid direct import.
 */
export type CompactVerifyFn = (
  jws: string,
  key: Uint8Array,
  options?: { algorithms?: string[] }
) => Promise<CompactVerifyResult>;

export interface MakeJwtClaimVerifierOptions {
  /**
   * The compactVerify function from jose.
   * Import: import { compactVerify } from 'jose';
   */
  compactVerify: CompactVerifyFn;

  /**
   * Accepted signing algorithms.
   * @default ['HS256', 'HS384', 'HS512']
   */
  algorithms?: string[];

  /** Clock used for `exp`/`nbf` checks */
  now?: () => Date;
}

/** jose error codes that mean "the secret did not produce this signature" */
const SIGNATURE_ERROR_CODES = new Set([
  'ERR_JWS_SIGNATURE_VERIFICATION_FAILED',
  'ERR_JOSE_ALG_NOT_ALLOWED',
]);

const DEFAULT_ALGORITHMS = ['HS256', 'HS384', 'HS512'];

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const getErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

const decodeClaims = (payload: Uint8Array): Result<JwtClaims, AuthError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(payload));
  } catch (error) {
    return err(createMalformedError('Token payload is not valid JSON', error));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return err(createMalformedError('Token payload must be a JSON object'));
  }
  return ok({ ...parsed });
};

const tokenAudiences = (aud: unknown): string[] => {
  if (typeof aud === 'string') {
    return [aud];
  }
  if (Array.isArray(aud)) {
    return aud.filter((item): item is string => typeof item === 'string');
  }
  return [];
};

/**
 * Enforces the selected claims. Unselected claims are not read.
 */
export const checkSelectedClaims = (
  claims: JwtClaims,
  selector: ClaimSelector,
  now: Date
): Result<JwtClaims, AuthError> => {
  const nowSeconds = Math.floor(now.getTime() / 1000);
  const tolerance = selector.clockToleranceSeconds;

  if (isClaimSelected(selector, Claim.Expiry)) {
    const exp = claims['exp'];
    if (exp === undefined) {
      return err(createTokenExpiredError(null));
    }
    if (typeof exp !== 'number') {
      return err(createMalformedError('Token claim "exp" must be a number'));
    }
    if (exp <= nowSeconds - tolerance) {
      return err(createTokenExpiredError(new Date(exp * 1000)));
    }
  }

  if (isClaimSelected(selector, Claim.NotBefore)) {
    const nbf = claims['nbf'];
    if (typeof nbf === 'number') {
      if (nbf > nowSeconds + tolerance) {
        return err(createTokenNotYetValidError(new Date(nbf * 1000)));
      }
    } else if (nbf !== undefined) {
      return err(createMalformedError('Token claim "nbf" must be a number'));
    }
  }

  if (isClaimSelected(selector, Claim.Issuer) && claims['iss'] !== selector.issuer) {
    return err(createClaimMismatchError(CLAIM_NAMES[Claim.Issuer]));
  }

  if (isClaimSelected(selector, Claim.Audience)) {
    const expected = new Set(selector.audience);
    if (!tokenAudiences(claims['aud']).some((aud) => expected.has(aud))) {
      return err(createClaimMismatchError(CLAIM_NAMES[Claim.Audience]));
    }
  }

  if (isClaimSelected(selector, Claim.Subject) && claims['sub'] !== selector.subject) {
    return err(createClaimMismatchError(CLAIM_NAMES[Claim.Subject]));
  }

  return ok(claims);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a shared-secret JWT claim verifier.
 *
 * @example
 * import { compactVerify } from 'jose';
 *
 * const claimVerifier = makeJwtClaimVerifier({ compactVerify });
 * const result = await claimVerifier.verifyClaims(secret, token, disableAllClaims());
 */
export const makeJwtClaimVerifier = (options: MakeJwtClaimVerifierOptions): ClaimVerifier => {
  const { compactVerify, algorithms = DEFAULT_ALGORITHMS, now = () => new Date() } = options;

  return {
    async verifyClaims(
      secret: Uint8Array,
      token: string,
      selector: ClaimSelector
    ): Promise<Result<JwtClaims, AuthError>> {
      let payload: Uint8Array;
      try {
        ({ payload } = await compactVerify(token, secret, { algorithms }));
      } catch (error) {
        const code = getErrorCode(error);
        if (code !== undefined && SIGNATURE_ERROR_CODES.has(code)) {
          return err(createInvalidSignatureError('Token signature verification failed'));
        }

        const message = error instanceof Error ? error.message : 'Token could not be decoded';
        return err(createMalformedError(message, error));
      }

      return decodeClaims(payload).andThen((claims) =>
        checkSelectedClaims(claims, selector, now())
      );
    },
  };
};
