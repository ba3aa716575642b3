/**
 * Authentication Module - Domain Types
 *
 * Transport-agnostic types for request authentication.
 * Modes, locations and requests are closed unions keyed by `kind`.
 */

import type { ClaimSelector } from './claims.js';

// ─────────────────────────────────────────────────────────────────────────────
// Inbound Request Shapes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Generic key-indexed value tree produced by a JSON parser.
 */
export type FrameValue =
  | string
  | number
  | boolean
  | null
  | readonly FrameValue[]
  | { readonly [key: string]: FrameValue };

export type FrameObject = { readonly [key: string]: FrameValue };

/**
 * Single header value: text, repeated text, or raw bytes.
 */
export type HeaderValue = string | readonly string[] | Uint8Array | undefined;

/**
 * Header-name-indexed mapping. Compatible with Node's IncomingHttpHeaders.
 */
export type HeaderMap = Readonly<Record<string, HeaderValue>>;

export interface HttpHeaderRequest {
  readonly kind: 'http-header';
  readonly headers: HeaderMap;
}

export interface FrameRequest {
  readonly kind: 'frame';
  readonly frame: FrameValue;
}

/**
 * Request being authenticated. Built per validation call, never stored.
 */
export type AuthRequest = HttpHeaderRequest | FrameRequest;

export const fromHeaders = (headers: HeaderMap): HttpHeaderRequest => ({
  kind: 'http-header',
  headers,
});

export const fromFrame = (frame: FrameValue): FrameRequest => ({
  kind: 'frame',
  frame,
});

// ─────────────────────────────────────────────────────────────────────────────
// Credential Locations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Credential lives in a header, optionally wrapped by literal boundary text.
 * e.g. field `Authorization`, prefix `"Bearer "`.
 */
export interface HeaderLocation {
  readonly kind: 'header';
  readonly field: string;
  readonly prefix: string | null;
  readonly suffix: string | null;
}

/**
 * Credential lives in a top-level string field of a structured frame.
 */
export interface FrameLocation {
  readonly kind: 'frame';
  readonly field: string;
}

export type AuthLocation = HeaderLocation | FrameLocation;

/**
 * Frame field names used by API-key mode.
 */
export interface AuthField {
  /** Field holding the API key */
  readonly keyOrToken: string;
  /** Field holding the hex HMAC signature */
  readonly sign: string;
  /** Field holding the signed payload */
  readonly payload: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Nonce Capability
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolves the nonce an API key must sign with next.
 * Returns null for unknown keys. Owned by the external nonce store.
 */
export type NonceLookup = (apiKey: string) => bigint | null | Promise<bigint | null>;

// ─────────────────────────────────────────────────────────────────────────────
// Auth Modes
// ─────────────────────────────────────────────────────────────────────────────

export interface JwtMode<L extends AuthLocation = AuthLocation> {
  readonly kind: 'jwt';
  readonly location: L;
  readonly signingSecret: Uint8Array;
  readonly claims: ClaimSelector;
}

export interface ApiKeyMode {
  readonly kind: 'api-key';
  readonly fields: AuthField;
  readonly signingSecret: Uint8Array;
  /** Resource path prepended to every signed message */
  readonly resourcePath: string;
  readonly nonceLookup: NonceLookup;
}

export interface NoAuthMode {
  readonly kind: 'none';
}

export type AuthMode = JwtMode | ApiKeyMode | NoAuthMode;

/**
 * Request shape a mode can read.
 *
 * Resolves to a single shape when the mode's location is known statically,
 * so wiring a frame handler to a header-only mode fails to compile.
 */
export type AcceptedRequest<M extends AuthMode> =
  M extends JwtMode<infer L>
    ? [L] extends [HeaderLocation]
      ? HttpHeaderRequest
      : [L] extends [FrameLocation]
        ? FrameRequest
        : AuthRequest
    : M extends ApiKeyMode
      ? FrameRequest
      : AuthRequest;

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Verified JWT claim set (whatever the token carried).
 */
export type JwtClaims = Readonly<Record<string, unknown>>;

export type AuthOutcome =
  | { readonly kind: 'anonymous' }
  | { readonly kind: 'jwt'; readonly claims: JwtClaims }
  | { readonly kind: 'api-key'; readonly apiKey: string; readonly nonce: bigint };

export const ANONYMOUS_OUTCOME: AuthOutcome = { kind: 'anonymous' } as const;

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if a frame value is a plain object (not an array or null).
 */
export const isFrameObject = (value: FrameValue): value is FrameObject => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Check if a mode can authenticate header-only requests.
 */
export const acceptsHeaderRequests = (mode: AuthMode): boolean => {
  return mode.kind === 'none' || (mode.kind === 'jwt' && mode.location.kind === 'header');
};

/**
 * Check if a mode can authenticate structured frames.
 */
export const acceptsFrameRequests = (mode: AuthMode): boolean => {
  return mode.kind !== 'jwt' || mode.location.kind === 'frame';
};

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Placeholder marking the credential inside a header template */
export const TOKEN_MARKER = '{token}' as const;

/** Default header carrying the bearer token */
export const AUTH_HEADER = 'Authorization' as const;

/** Default bearer template */
export const BEARER_TEMPLATE = 'Bearer {token}' as const;
