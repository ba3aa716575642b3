/**
 * Structured Frame Authentication
 *
 * Authenticates message frames (websocket payloads, JSON bodies) and wraps
 * frame handlers so they only run for accepted frames.
 */

import { err, ok, type Result } from 'neverthrow';

import { createReplayedNonceError, type AuthError } from '../../core/errors.js';
import {
  validateRequest,
  type ValidateRequestDeps,
} from '../../core/usecases/validate-request.js';
import { fromFrame, type AuthMode, type AuthOutcome, type FrameValue } from '../../core/types.js';

import type { NonceStore } from '../../core/ports.js';
import type { BaseLogger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Thrown by `withAuth` wrappers when a frame is rejected.
 */
export class FrameAuthError extends Error {
  override readonly name = 'FrameAuthError';

  constructor(readonly authError: AuthError) {
    super(`Authentication failed: ${authError.message}`);
  }
}

export type FrameHandler<TOutput> = (frame: FrameValue, auth: AuthOutcome) => Promise<TOutput>;

export interface MakeFrameAuthGuardDeps extends ValidateRequestDeps {
  /** Mode whose credentials travel in frames (`none`, `api-key`, or `jwt` with a frame location) */
  mode: AuthMode;
  /** Any pino-compatible logger (a Fastify instance's `app.log` works) */
  logger: BaseLogger;
  /**
   * Nonce store to consume accepted API-key nonces from.
   * When set, a nonce that was already committed is rejected as a replay.
   */
  nonceStore?: NonceStore;
}

export interface FrameAuthGuard {
  /**
   * Authenticate a frame and, for API-key outcomes, consume its nonce.
   */
  authenticate(frame: FrameValue): Promise<Result<AuthOutcome, AuthError>>;

  /**
   * Wrap a frame handler with an authentication requirement.
   * Throws FrameAuthError if the frame is rejected.
   */
  withAuth<TOutput>(handler: FrameHandler<TOutput>): (frame: FrameValue) => Promise<TOutput>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a frame authentication guard.
 *
 * @example
 * const guard = makeFrameAuthGuard({ mode: apiKeyMode, claimVerifier, logger, nonceStore });
 *
 * socket.on('message', guard.withAuth(async (frame, auth) => {
 *   // auth.kind === 'api-key' here, and its nonce is already consumed
 *   return handleFrame(frame);
 * }));
 */
export const makeFrameAuthGuard = (deps: MakeFrameAuthGuardDeps): FrameAuthGuard => {
  const { mode, logger, nonceStore, ...validateDeps } = deps;
  const bindings = { component: 'frame-auth', mode: mode.kind };

  const onNonceLookupFailure =
    validateDeps.onNonceLookupFailure ??
    ((apiKey: string, cause: unknown) => {
      logger.warn({ ...bindings, err: cause, apiKey }, 'Nonce lookup failed');
    });

  const consumeNonce = (outcome: AuthOutcome): Result<AuthOutcome, AuthError> => {
    if (outcome.kind !== 'api-key' || nonceStore === undefined) {
      return ok(outcome);
    }
    if (!nonceStore.commit(outcome.apiKey, outcome.nonce)) {
      return err(createReplayedNonceError(outcome.nonce));
    }
    return ok(outcome);
  };

  const authenticate = async (frame: FrameValue): Promise<Result<AuthOutcome, AuthError>> => {
    const result = (
      await validateRequest(
        { claimVerifier: validateDeps.claimVerifier, onNonceLookupFailure },
        mode,
        fromFrame(frame)
      )
    ).andThen(consumeNonce);

    if (result.isErr()) {
      logger.debug({ ...bindings, reason: result.error.type }, 'Frame authentication rejected');
    }
    return result;
  };

  return {
    authenticate,

    withAuth<TOutput>(handler: FrameHandler<TOutput>) {
      return async (frame: FrameValue): Promise<TOutput> => {
        const result = await authenticate(frame);
        if (result.isErr()) {
          throw new FrameAuthError(result.error);
        }
        return handler(frame, result.value);
      };
    },
  };
};
