/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { buildAuthMode } from './app/build-auth-mode.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeInMemoryNonceStore, toNonceLookup, type NonceStore } from './modules/auth/index.js';

import type { Logger } from 'pino';

/**
 * Creates the nonce store for API-key mode.
 * Returns undefined for the other modes.
 */
const createNonceStore = (config: AppConfig, logger: Logger): NonceStore | undefined => {
  if (config.auth.mode !== 'api-key') {
    return undefined;
  }

  const store = makeInMemoryNonceStore();
  for (const apiKey of config.auth.apiKey.keys) {
    store.register(apiKey, 0n);
  }

  if (config.auth.apiKey.keys.length === 0) {
    logger.warn('AUTH_APIKEY_KEYS not configured - every API key will be rejected');
  }

  return store;
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, authMode: config.auth.mode } }, 'Starting API server');

  const nonceStore = createNonceStore(config, logger);
  const mode = buildAuthMode(
    config.auth,
    nonceStore !== undefined ? { nonceLookup: toNonceLookup(nonceStore) } : {}
  );

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        redact: ['req.headers.authorization'],
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
      disableRequestLogging: false,
    },
    deps: {
      mode,
      ...(nonceStore !== undefined && { nonceStore }),
    },
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
