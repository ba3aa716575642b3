/**
 * Unit tests for the auth mode builder and app factory
 */

import { describe, expect, it } from 'vitest';

import { buildApp, describeOutcome } from '@/app/build-app.js';
import { buildAuthMode } from '@/app/build-auth-mode.js';
import { createConfig, parseEnv } from '@/infra/config/index.js';
import { AuthConfigurationError, Claim, NO_AUTH_MODE } from '@/modules/auth/index.js';

const authConfig = (env: NodeJS.ProcessEnv) => createConfig(parseEnv(env)).auth;

describe('buildAuthMode', () => {
  it('builds the no-auth mode by default', () => {
    expect(buildAuthMode(authConfig({}))).toBe(NO_AUTH_MODE);
  });

  it('builds a header JWT mode with the selected claims', () => {
    const mode = buildAuthMode(
      authConfig({
        AUTH_MODE: 'jwt',
        AUTH_SIGNING_SECRET: 'test-secret',
        AUTH_JWT_CLAIMS: 'exp,iss',
        AUTH_JWT_ISSUER: 'https://issuer.test',
      })
    );

    if (mode.kind !== 'jwt') {
      throw new Error(`expected a jwt mode, got ${mode.kind}`);
    }
    expect(mode.location).toEqual({
      kind: 'header',
      field: 'Authorization',
      prefix: 'Bearer ',
      suffix: null,
    });
    expect(mode.claims.flags).toBe(Claim.Expiry | Claim.Issuer);
    expect(mode.claims.issuer).toBe('https://issuer.test');
  });

  it('reads the token from a frame field when one is configured', () => {
    const mode = buildAuthMode(
      authConfig({
        AUTH_MODE: 'jwt',
        AUTH_SIGNING_SECRET: 'test-secret',
        AUTH_JWT_FRAME_FIELD: 'token',
      })
    );

    expect(mode.kind === 'jwt' && mode.location).toEqual({ kind: 'frame', field: 'token' });
  });

  it('requires an expected issuer when "iss" is checked', () => {
    const auth = authConfig({
      AUTH_MODE: 'jwt',
      AUTH_SIGNING_SECRET: 'test-secret',
      AUTH_JWT_CLAIMS: 'iss',
    });

    expect(() => buildAuthMode(auth)).toThrow('AUTH_JWT_ISSUER is required when checking "iss"');
  });

  it('requires a nonce lookup in API-key mode', () => {
    const auth = authConfig({ AUTH_MODE: 'api-key', AUTH_SIGNING_SECRET: 'test-secret' });

    expect(() => buildAuthMode(auth)).toThrow(AuthConfigurationError);
  });

  it('builds an API-key mode with the configured fields', () => {
    const mode = buildAuthMode(
      authConfig({
        AUTH_MODE: 'api-key',
        AUTH_SIGNING_SECRET: 'test-secret',
        AUTH_APIKEY_KEY_FIELD: 'key',
        AUTH_APIKEY_RESOURCE_PATH: '/ws',
      }),
      { nonceLookup: () => null }
    );

    if (mode.kind !== 'api-key') {
      throw new Error(`expected an api-key mode, got ${mode.kind}`);
    }
    expect(mode.fields).toEqual({ keyOrToken: 'key', sign: 'sig', payload: 'data' });
    expect(mode.resourcePath).toBe('/ws');
  });
});

describe('describeOutcome', () => {
  it('writes the nonce as a decimal string', () => {
    expect(
      describeOutcome({ kind: 'api-key', apiKey: 'k1', nonce: 18446744073709551615n })
    ).toEqual({ kind: 'api-key', apiKey: 'k1', nonce: '18446744073709551615' });
  });

  it('exposes only the subject of a JWT', () => {
    expect(describeOutcome({ kind: 'jwt', claims: { sub: 'user_123', role: 'x' } })).toEqual({
      kind: 'jwt',
      subject: 'user_123',
    });
    expect(describeOutcome({ kind: 'jwt', claims: {} })).toEqual({ kind: 'jwt', subject: null });
  });
});

describe('buildApp', () => {
  it('creates a Fastify instance', async () => {
    const app = await buildApp({
      fastifyOptions: { logger: false },
      deps: { mode: NO_AUTH_MODE },
    });

    expect(app.server).toBeDefined();

    await app.close();
  });
});
