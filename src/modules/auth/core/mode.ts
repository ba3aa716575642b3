/**
 * Auth Mode Constructors
 *
 * Validate configuration once, at construction, and return frozen modes
 * that can be shared across concurrent validations.
 */

import { disableAllClaims, type ClaimSelector } from './claims.js';
import { AuthConfigurationError } from './errors.js';
import { makeApiKeyFields, makeHeaderLocation } from './location.js';
import {
  AUTH_HEADER,
  BEARER_TEMPLATE,
  type ApiKeyMode,
  type AuthField,
  type AuthLocation,
  type HeaderLocation,
  type JwtMode,
  type NoAuthMode,
  type NonceLookup,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Secrets
// ─────────────────────────────────────────────────────────────────────────────

export type SigningSecret = string | Uint8Array;

/**
 * Copies the secret so later mutation of the caller's buffer has no effect.
 */
const toSecretBytes = (secret: SigningSecret): Uint8Array => {
  const bytes =
    typeof secret === 'string' ? new TextEncoder().encode(secret) : Uint8Array.from(secret);
  if (bytes.length === 0) {
    throw new AuthConfigurationError('Signing secret must not be empty');
  }
  return bytes;
};

// ─────────────────────────────────────────────────────────────────────────────
// JWT
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeJwtModeOptions<L extends AuthLocation> {
  location: L;
  signingSecret: SigningSecret;
  /** @default disableAllClaims() */
  claims?: ClaimSelector;
}

export const makeJwtMode = <L extends AuthLocation>(options: MakeJwtModeOptions<L>): JwtMode<L> => {
  return Object.freeze({
    kind: 'jwt',
    location: options.location,
    signingSecret: toSecretBytes(options.signingSecret),
    claims: options.claims ?? disableAllClaims(),
  });
};

/**
 * `Authorization: Bearer <token>`, signature-only verification.
 */
export const defaultJwtMode = (signingSecret: SigningSecret): JwtMode<HeaderLocation> => {
  return makeJwtMode({
    location: makeHeaderLocation(AUTH_HEADER, BEARER_TEMPLATE),
    signingSecret,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// API Key
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeApiKeyModeOptions {
  fields: AuthField;
  signingSecret: SigningSecret;
  resourcePath: string;
  nonceLookup: NonceLookup;
}

export const makeApiKeyMode = (options: MakeApiKeyModeOptions): ApiKeyMode => {
  if (options.resourcePath === '') {
    throw new AuthConfigurationError('API-key resource path must not be empty');
  }

  return Object.freeze({
    kind: 'api-key',
    fields: makeApiKeyFields(options.fields),
    signingSecret: toSecretBytes(options.signingSecret),
    resourcePath: options.resourcePath,
    nonceLookup: options.nonceLookup,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// None
// ─────────────────────────────────────────────────────────────────────────────

export const NO_AUTH_MODE: NoAuthMode = Object.freeze({ kind: 'none' });

export const makeNoAuthMode = (): NoAuthMode => NO_AUTH_MODE;
