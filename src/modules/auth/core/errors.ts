/**
 * Authentication Module - Domain Errors
 *
 * All credential failures are discriminated unions with a 'type' field.
 * Follows neverthrow Result pattern - no thrown exceptions in core for
 * rejected requests. Misconfiguration is the only thing that throws.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Extraction Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Expected header or frame field is absent.
 */
export interface MissingFieldError {
  readonly type: 'MissingFieldError';
  readonly message: string;
  readonly field: string;
}

/**
 * Field is present but cannot be decoded as required.
 */
export interface MalformedError {
  readonly type: 'MalformedError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Structured request is not an object.
 */
export interface InvalidRequestShapeError {
  readonly type: 'InvalidRequestShapeError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Credential Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * JWT signature or API-key MAC did not match.
 */
export interface InvalidSignatureError {
  readonly type: 'InvalidSignatureError';
  readonly message: string;
}

/**
 * API key is not known to the nonce store.
 */
export interface InvalidCredentialError {
  readonly type: 'InvalidCredentialError';
  readonly message: string;
  readonly field: string;
}

/**
 * Nonce was consumed by an earlier request with the same key.
 */
export interface ReplayedNonceError {
  readonly type: 'ReplayedNonceError';
  readonly message: string;
  readonly nonce: bigint;
}

// ─────────────────────────────────────────────────────────────────────────────
// Claim Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface TokenExpiredError {
  readonly type: 'TokenExpiredError';
  readonly message: string;
  /** Null when the token carries no `exp` claim */
  readonly expiredAt: Date | null;
}

export interface TokenNotYetValidError {
  readonly type: 'TokenNotYetValidError';
  readonly message: string;
  readonly notBefore: Date;
}

export interface ClaimMismatchError {
  readonly type: 'ClaimMismatchError';
  readonly message: string;
  readonly claim: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible authentication failures.
 */
export type AuthError =
  | MissingFieldError
  | MalformedError
  | InvalidRequestShapeError
  | InvalidSignatureError
  | InvalidCredentialError
  | ReplayedNonceError
  | TokenExpiredError
  | TokenNotYetValidError
  | ClaimMismatchError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMissingFieldError = (field: string): MissingFieldError => ({
  type: 'MissingFieldError',
  message: `Missing field '${field}'`,
  field,
});

export const createMalformedError = (message: string, cause?: unknown): MalformedError => ({
  type: 'MalformedError',
  message,
  cause,
});

export const createInvalidRequestShapeError = (): InvalidRequestShapeError => ({
  type: 'InvalidRequestShapeError',
  message: 'request must be in type object',
});

export const createInvalidSignatureError = (
  message = 'Signature verification failed'
): InvalidSignatureError => ({
  type: 'InvalidSignatureError',
  message,
});

export const createInvalidCredentialError = (field: string): InvalidCredentialError => ({
  type: 'InvalidCredentialError',
  message: `invalid "${field}"`,
  field,
});

export const createReplayedNonceError = (nonce: bigint): ReplayedNonceError => ({
  type: 'ReplayedNonceError',
  message: `nonce ${nonce.toString()} has already been used`,
  nonce,
});

/** ISO timestamp, or null for a date outside the representable range */
const toIsoString = (date: Date): string | null => {
  return Number.isFinite(date.getTime()) ? date.toISOString() : null;
};

export const createTokenExpiredError = (expiredAt: Date | null): TokenExpiredError => {
  if (expiredAt === null) {
    return { type: 'TokenExpiredError', message: 'Token missing expiration (exp) claim', expiredAt };
  }
  const iso = toIsoString(expiredAt);
  return {
    type: 'TokenExpiredError',
    message: iso !== null ? `Token expired at ${iso}` : 'Token expired',
    expiredAt,
  };
};

export const createTokenNotYetValidError = (notBefore: Date): TokenNotYetValidError => {
  const iso = toIsoString(notBefore);
  return {
    type: 'TokenNotYetValidError',
    message: iso !== null ? `Token not valid before ${iso}` : 'Token not valid yet',
    notBefore,
  };
};

export const createClaimMismatchError = (claim: string): ClaimMismatchError => ({
  type: 'ClaimMismatchError',
  message: `Token claim "${claim}" does not match`,
  claim,
});

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Faults
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Programmer error: the auth mode was built from invalid settings, or a
 * transport handed the validator a request shape its mode cannot read.
 *
 * Never mapped to a 401. Let it reach the process error handler.
 */
export class AuthConfigurationError extends Error {
  override readonly name = 'AuthConfigurationError';

  constructor(message: string) {
    super(message);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping to HTTP Status
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps auth errors to HTTP status codes.
 * Used by shell layer for response generation.
 */
export const AUTH_ERROR_HTTP_STATUS: Record<AuthError['type'], number> = {
  MissingFieldError: 401,
  MalformedError: 401,
  InvalidRequestShapeError: 401,
  InvalidSignatureError: 401,
  InvalidCredentialError: 401,
  ReplayedNonceError: 401,
  TokenExpiredError: 401,
  TokenNotYetValidError: 401,
  ClaimMismatchError: 401,
} as const;
