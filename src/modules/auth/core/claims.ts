/**
 * Claim Selector
 *
 * Bit set of the registered JWT claims that must be enforced on top of the
 * signature check, plus the values the comparison claims are checked against.
 */

import { AuthConfigurationError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Flags
// ─────────────────────────────────────────────────────────────────────────────

export const Claim = {
  Expiry: 1 << 0,
  NotBefore: 1 << 1,
  Issuer: 1 << 2,
  Audience: 1 << 3,
  Subject: 1 << 4,
} as const;

export type ClaimFlag = (typeof Claim)[keyof typeof Claim];

/** Registered claim name for each flag */
export const CLAIM_NAMES: Record<ClaimFlag, string> = {
  [Claim.Expiry]: 'exp',
  [Claim.NotBefore]: 'nbf',
  [Claim.Issuer]: 'iss',
  [Claim.Audience]: 'aud',
  [Claim.Subject]: 'sub',
};

// ─────────────────────────────────────────────────────────────────────────────
// Selector
// ─────────────────────────────────────────────────────────────────────────────

export interface ClaimSelector {
  /** OR-ed ClaimFlag values */
  readonly flags: number;
  readonly issuer: string | null;
  /** Token must name at least one of these in `aud` */
  readonly audience: readonly string[];
  readonly subject: string | null;
  /** Leeway applied to `exp` and `nbf` */
  readonly clockToleranceSeconds: number;
}

export interface SelectClaimsOptions {
  expiry?: boolean;
  notBefore?: boolean;
  /** Enables the issuer check */
  issuer?: string;
  /** Enables the audience check */
  audience?: string | string[];
  /** Enables the subject check */
  subject?: string;
  clockToleranceSeconds?: number;
}

/**
 * Signature-only verification. This is the default.
 */
export const disableAllClaims = (): ClaimSelector =>
  Object.freeze({
    flags: 0,
    issuer: null,
    audience: [],
    subject: null,
    clockToleranceSeconds: 0,
  });

/**
 * Opts in to individual claim checks.
 *
 * @throws AuthConfigurationError on an empty expected value or a negative tolerance
 *
 * @example
 * const claims = selectClaims({ expiry: true, issuer: 'https://issuer.test' });
 * isClaimSelected(claims, Claim.Issuer); // true
 */
export const selectClaims = (options: SelectClaimsOptions): ClaimSelector => {
  let flags = 0;

  if (options.expiry === true) flags |= Claim.Expiry;
  if (options.notBefore === true) flags |= Claim.NotBefore;

  if (options.issuer !== undefined) {
    if (options.issuer === '') {
      throw new AuthConfigurationError('Expected issuer must not be empty');
    }
    flags |= Claim.Issuer;
  }

  const audience =
    options.audience === undefined
      ? []
      : Array.isArray(options.audience)
        ? options.audience
        : [options.audience];
  if (options.audience !== undefined) {
    if (audience.length === 0 || audience.some((a) => a === '')) {
      throw new AuthConfigurationError('Expected audience must not be empty');
    }
    flags |= Claim.Audience;
  }

  if (options.subject !== undefined) {
    if (options.subject === '') {
      throw new AuthConfigurationError('Expected subject must not be empty');
    }
    flags |= Claim.Subject;
  }

  const clockToleranceSeconds = options.clockToleranceSeconds ?? 0;
  if (!Number.isFinite(clockToleranceSeconds) || clockToleranceSeconds < 0) {
    throw new AuthConfigurationError('Clock tolerance must be a non-negative number of seconds');
  }

  return Object.freeze({
    flags,
    issuer: options.issuer ?? null,
    audience: Object.freeze([...audience]),
    subject: options.subject ?? null,
    clockToleranceSeconds,
  });
};

export const isClaimSelected = (selector: ClaimSelector, claim: ClaimFlag): boolean => {
  return (selector.flags & claim) !== 0;
};
