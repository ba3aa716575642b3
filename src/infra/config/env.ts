/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Auth
  AUTH_MODE: Type.Union([Type.Literal('jwt'), Type.Literal('api-key'), Type.Literal('none')], {
    default: 'none',
  }),
  AUTH_SIGNING_SECRET: Type.Optional(Type.String({ minLength: 1 })),

  // Auth (JWT)
  AUTH_JWT_HEADER: Type.String({ default: 'Authorization', minLength: 1 }),
  AUTH_JWT_TEMPLATE: Type.String({ default: 'Bearer {token}' }),
  /** When set, the token is read from this frame field instead of a header */
  AUTH_JWT_FRAME_FIELD: Type.Optional(Type.String({ minLength: 1 })),
  /** Comma-separated subset of exp,nbf,iss,aud,sub */
  AUTH_JWT_CLAIMS: Type.Optional(Type.String({ pattern: '^((exp|nbf|iss|aud|sub)(,|$))*$' })),
  AUTH_JWT_ISSUER: Type.Optional(Type.String()),
  AUTH_JWT_AUDIENCE: Type.Optional(Type.String()),
  AUTH_JWT_SUBJECT: Type.Optional(Type.String()),
  AUTH_JWT_CLOCK_TOLERANCE: Type.Number({ default: 0, minimum: 0 }),

  // Auth (API key)
  AUTH_APIKEY_KEY_FIELD: Type.String({ default: 'apikey', minLength: 1 }),
  AUTH_APIKEY_SIGN_FIELD: Type.String({ default: 'sig', minLength: 1 }),
  AUTH_APIKEY_PAYLOAD_FIELD: Type.String({ default: 'data', minLength: 1 }),
  AUTH_APIKEY_RESOURCE_PATH: Type.String({ default: '/frames', minLength: 1 }),
  /** Comma-separated API keys registered at startup with nonce 0 */
  AUTH_APIKEY_KEYS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, fallback: number): number => {
  return value != null && value !== '' ? Number.parseInt(value, 10) : fallback;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseNumber(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    AUTH_MODE: env['AUTH_MODE'] ?? 'none',
    AUTH_SIGNING_SECRET: env['AUTH_SIGNING_SECRET'],
    AUTH_JWT_HEADER: env['AUTH_JWT_HEADER'] ?? 'Authorization',
    AUTH_JWT_TEMPLATE: env['AUTH_JWT_TEMPLATE'] ?? 'Bearer {token}',
    AUTH_JWT_FRAME_FIELD: env['AUTH_JWT_FRAME_FIELD'],
    AUTH_JWT_CLAIMS: env['AUTH_JWT_CLAIMS'],
    AUTH_JWT_ISSUER: env['AUTH_JWT_ISSUER'],
    AUTH_JWT_AUDIENCE: env['AUTH_JWT_AUDIENCE'],
    AUTH_JWT_SUBJECT: env['AUTH_JWT_SUBJECT'],
    AUTH_JWT_CLOCK_TOLERANCE: parseNumber(env['AUTH_JWT_CLOCK_TOLERANCE'], 0),
    AUTH_APIKEY_KEY_FIELD: env['AUTH_APIKEY_KEY_FIELD'] ?? 'apikey',
    AUTH_APIKEY_SIGN_FIELD: env['AUTH_APIKEY_SIGN_FIELD'] ?? 'sig',
    AUTH_APIKEY_PAYLOAD_FIELD: env['AUTH_APIKEY_PAYLOAD_FIELD'] ?? 'data',
    AUTH_APIKEY_RESOURCE_PATH: env['AUTH_APIKEY_RESOURCE_PATH'] ?? '/frames',
    AUTH_APIKEY_KEYS: env['AUTH_APIKEY_KEYS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.AUTH_MODE !== 'none' && rawEnv.AUTH_SIGNING_SECRET === undefined) {
    throw new Error(
      `Invalid environment configuration: AUTH_SIGNING_SECRET is required when AUTH_MODE=${rawEnv.AUTH_MODE}`
    );
  }

  return rawEnv;
};

const JWT_CLAIM_NAMES = ['exp', 'nbf', 'iss', 'aud', 'sub'] as const;
export type JwtClaimName = (typeof JWT_CLAIM_NAMES)[number];

const isJwtClaimName = (value: string): value is JwtClaimName => {
  return JWT_CLAIM_NAMES.some((name) => name === value);
};

const splitList = (value: string | undefined): string[] => {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  auth: {
    mode: env.AUTH_MODE,
    /** Shared secret for JWT HMAC signatures and API-key MACs */
    signingSecret: env.AUTH_SIGNING_SECRET,
    jwt: {
      header: env.AUTH_JWT_HEADER,
      template: env.AUTH_JWT_TEMPLATE,
      frameField: env.AUTH_JWT_FRAME_FIELD,
      claims: splitList(env.AUTH_JWT_CLAIMS).filter(isJwtClaimName),
      issuer: env.AUTH_JWT_ISSUER,
      audience: splitList(env.AUTH_JWT_AUDIENCE),
      subject: env.AUTH_JWT_SUBJECT,
      clockToleranceSeconds: env.AUTH_JWT_CLOCK_TOLERANCE,
    },
    apiKey: {
      keyField: env.AUTH_APIKEY_KEY_FIELD,
      signField: env.AUTH_APIKEY_SIGN_FIELD,
      payloadField: env.AUTH_APIKEY_PAYLOAD_FIELD,
      resourcePath: env.AUTH_APIKEY_RESOURCE_PATH,
      keys: splitList(env.AUTH_APIKEY_KEYS),
    },
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
