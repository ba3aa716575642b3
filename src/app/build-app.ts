/**
 * Fastify application factory
 * Wires the configured auth mode into header-authenticated and
 * frame-authenticated routes.
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';
import { compactVerify } from 'jose';

import {
  AUTH_ERROR_HTTP_STATUS,
  AuthConfigurationError,
  FrameAuthError,
  acceptsFrameRequests,
  acceptsHeaderRequests,
  makeFrameAuthGuard,
  makeHeaderAuthHook,
  makeJwtClaimVerifier,
  type AuthMode,
  type AuthOutcome,
  type ClaimVerifier,
  type FrameValue,
  type NonceStore,
} from '../modules/auth/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  mode: AuthMode;
  /** Defaults to the jose-backed verifier */
  claimVerifier?: ClaimVerifier;
  /** Consumes API-key nonces after accepted frames */
  nonceStore?: NonceStore;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * JSON-safe view of an outcome (nonces are u64 and travel as strings).
 */
export const describeOutcome = (outcome: AuthOutcome): Record<string, string | null> => {
  switch (outcome.kind) {
    case 'anonymous':
      return { kind: 'anonymous' };
    case 'jwt': {
      const sub = outcome.claims['sub'];
      return { kind: 'jwt', subject: typeof sub === 'string' ? sub : null };
    }
    case 'api-key':
      return { kind: 'api-key', apiKey: outcome.apiKey, nonce: outcome.nonce.toString() };
  }
};

/**
 * Creates and configures the Fastify application
 * This is the composition root where the auth module is wired in
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { mode } = deps;
  const claimVerifier = deps.claimVerifier ?? makeJwtClaimVerifier({ compactVerify });

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Liveness probe (public)
  app.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Header-authenticated routes
  if (acceptsHeaderRequests(mode)) {
    const authHook = makeHeaderAuthHook({ mode, claimVerifier });

    app.get('/whoami', { preHandler: authHook }, async (request, reply) => {
      return reply.status(200).send({ ok: true, auth: describeOutcome(request.auth) });
    });
  }

  // Frame-authenticated routes (JSON body is the frame)
  if (acceptsFrameRequests(mode)) {
    const guard = makeFrameAuthGuard({
      mode,
      claimVerifier,
      logger: app.log,
      ...(deps.nonceStore !== undefined && { nonceStore: deps.nonceStore }),
    });

    const handleFrame = guard.withAuth(async (frame, auth) => ({
      ok: true,
      auth: describeOutcome(auth),
      frame,
    }));

    app.post<{ Body: FrameValue }>('/frames', async (request, reply) => {
      const response = await handleFrame(request.body);
      return reply.status(200).send(response);
    });
  }

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof FrameAuthError) {
      return reply.status(AUTH_ERROR_HTTP_STATUS[error.authError.type]).send({
        ok: false,
        error: error.authError.type,
        message: error.authError.message,
      });
    }

    if (error instanceof AuthConfigurationError) {
      request.log.error({ err: error }, 'Auth configuration fault');
      return reply.status(500).send({
        error: error.name,
        message: 'Authentication is misconfigured',
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
