/**
 * Fastify Authentication Middleware
 *
 * Provides preHandler hooks for header-authenticated REST routes.
 */

import { AUTH_ERROR_HTTP_STATUS } from '../../core/errors.js';
import {
  validateRequest,
  type ValidateRequestDeps,
} from '../../core/usecases/validate-request.js';
import { fromHeaders, type AuthMode, type AuthOutcome } from '../../core/types.js';

import type { FastifyReply, FastifyRequest, preHandlerHookHandler } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Request Decoration
// ─────────────────────────────────────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyRequest {
    /** Authentication outcome (set by auth middleware) */
    auth: AuthOutcome;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeHeaderAuthHookDeps extends ValidateRequestDeps {
  /** Mode whose credentials travel in headers (`none`, or `jwt` with a header location) */
  mode: AuthMode;
}

// ─────────────────────────────────────────────────────────────────────────────
// Hook
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates authentication middleware that:
 * 1. Validates the request headers against the configured mode
 * 2. Replies 401 with the rejection reason on failure
 * 3. Attaches the outcome to request.auth on success
 *
 * Configuration faults (e.g. an API-key mode on a header route) are thrown
 * and reach the application error handler as 500s.
 *
 * @example
 * const authHook = makeHeaderAuthHook({ mode: defaultJwtMode(secret), claimVerifier });
 *
 * app.get('/whoami', { preHandler: authHook }, async (request) => request.auth);
 */
export function makeHeaderAuthHook(deps: MakeHeaderAuthHookDeps): preHandlerHookHandler {
  const { mode, ...validateDeps } = deps;

  const handler = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const result = await validateRequest(
      {
        ...validateDeps,
        onNonceLookupFailure:
          validateDeps.onNonceLookupFailure ??
          ((apiKey, cause) => {
            request.log.warn({ err: cause, apiKey }, 'Nonce lookup failed');
          }),
      },
      mode,
      fromHeaders(request.headers)
    );

    if (result.isErr()) {
      const error = result.error;
      request.log.debug({ reason: error.type }, 'Request authentication rejected');

      await reply.status(AUTH_ERROR_HTTP_STATUS[error.type]).send({
        ok: false,
        error: error.type,
        message: error.message,
      });
      return;
    }

    request.auth = result.value;
  };

  // Type assertion needed for async preHandler hooks with strictFunctionTypes
  return handler as preHandlerHookHandler;
}
