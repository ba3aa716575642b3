/**
 * Authentication Module Public API
 *
 * Exports types, use cases, adapters, and middleware for request authentication.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AcceptedRequest,
  ApiKeyMode,
  AuthField,
  AuthLocation,
  AuthMode,
  AuthOutcome,
  AuthRequest,
  FrameLocation,
  FrameObject,
  FrameRequest,
  FrameValue,
  HeaderLocation,
  HeaderMap,
  HeaderValue,
  HttpHeaderRequest,
  JwtClaims,
  JwtMode,
  NoAuthMode,
  NonceLookup,
} from './core/types.js';

export type { AuthError } from './core/errors.js';

export type { ClaimVerifier, NonceStore } from './core/ports.js';

export type { ApiKeyCandidate } from './core/api-key.js';

export type { ClaimFlag, ClaimSelector, SelectClaimsOptions } from './core/claims.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export {
  ANONYMOUS_OUTCOME,
  AUTH_HEADER,
  BEARER_TEMPLATE,
  TOKEN_MARKER,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Constructors & Guards
// ─────────────────────────────────────────────────────────────────────────────

export {
  fromHeaders,
  fromFrame,
  isFrameObject,
  acceptsHeaderRequests,
  acceptsFrameRequests,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseHeaderTemplate,
  makeHeaderLocation,
  makeFrameLocation,
  makeApiKeyFields,
} from './core/location.js';

export {
  Claim,
  CLAIM_NAMES,
  disableAllClaims,
  selectClaims,
  isClaimSelected,
} from './core/claims.js';

export {
  makeJwtMode,
  defaultJwtMode,
  makeApiKeyMode,
  makeNoAuthMode,
  NO_AUTH_MODE,
  type MakeJwtModeOptions,
  type MakeApiKeyModeOptions,
  type SigningSecret,
} from './core/mode.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  AuthConfigurationError,
  AUTH_ERROR_HTTP_STATUS,
  createMissingFieldError,
  createMalformedError,
  createInvalidRequestShapeError,
  createInvalidSignatureError,
  createInvalidCredentialError,
  createReplayedNonceError,
  createTokenExpiredError,
  createTokenNotYetValidError,
  createClaimMismatchError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

export { extractFromHeader, stripBoundaries } from './core/extractors/header-extractor.js';

export {
  extractFromFrame,
  asFrameObject,
  readFrameField,
  readFrameString,
} from './core/extractors/frame-extractor.js';

// ─────────────────────────────────────────────────────────────────────────────
// API-Key Signatures
// ─────────────────────────────────────────────────────────────────────────────

export {
  canonicalJson,
  canonicalMessage,
  signApiKeyCandidate,
  verifyApiKeySignature,
} from './core/api-key.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  validateRequest,
  type ValidateRequestDeps,
} from './core/usecases/validate-request.js';

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

// JWT claim verifier (jose compactVerify)
export {
  makeJwtClaimVerifier,
  checkSelectedClaims,
  type MakeJwtClaimVerifierOptions,
  type CompactVerifyFn,
  type CompactVerifyResult,
} from './shell/adapters/jwt-claim-verifier.js';

// In-Memory nonce store (for testing and development)
export {
  makeInMemoryNonceStore,
  toNonceLookup,
  type MakeInMemoryNonceStoreOptions,
} from './shell/adapters/in-memory-nonce-store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Middleware (Fastify REST)
// ─────────────────────────────────────────────────────────────────────────────

export { makeHeaderAuthHook, type MakeHeaderAuthHookDeps } from './shell/middleware/fastify-auth.js';

// ─────────────────────────────────────────────────────────────────────────────
// Middleware (Structured Frames)
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeFrameAuthGuard,
  FrameAuthError,
  type FrameAuthGuard,
  type FrameHandler,
  type MakeFrameAuthGuardDeps,
} from './shell/middleware/frame-auth.js';
