/**
 * Builds the AuthMode described by the typed configuration.
 */

import {
  AuthConfigurationError,
  makeApiKeyMode,
  makeFrameLocation,
  makeHeaderLocation,
  makeJwtMode,
  makeNoAuthMode,
  selectClaims,
  type AuthMode,
  type NonceLookup,
  type SelectClaimsOptions,
} from '../modules/auth/index.js';

import type { AppConfig } from '../infra/config/index.js';

export interface BuildAuthModeDeps {
  /** Required when the mode is `api-key` */
  nonceLookup?: NonceLookup;
}

const toClaimOptions = (jwt: AppConfig['auth']['jwt']): SelectClaimsOptions => {
  const selected = new Set(jwt.claims);
  const options: SelectClaimsOptions = {
    expiry: selected.has('exp'),
    notBefore: selected.has('nbf'),
    clockToleranceSeconds: jwt.clockToleranceSeconds,
  };

  if (selected.has('iss')) {
    if (jwt.issuer === undefined) {
      throw new AuthConfigurationError('AUTH_JWT_ISSUER is required when checking "iss"');
    }
    options.issuer = jwt.issuer;
  }
  if (selected.has('aud')) {
    if (jwt.audience.length === 0) {
      throw new AuthConfigurationError('AUTH_JWT_AUDIENCE is required when checking "aud"');
    }
    options.audience = jwt.audience;
  }
  if (selected.has('sub')) {
    if (jwt.subject === undefined) {
      throw new AuthConfigurationError('AUTH_JWT_SUBJECT is required when checking "sub"');
    }
    options.subject = jwt.subject;
  }

  return options;
};

/**
 * @throws AuthConfigurationError when the configuration cannot describe a mode
 */
export const buildAuthMode = (auth: AppConfig['auth'], deps: BuildAuthModeDeps = {}): AuthMode => {
  if (auth.mode === 'none') {
    return makeNoAuthMode();
  }

  const { signingSecret } = auth;
  if (signingSecret === undefined) {
    throw new AuthConfigurationError(`A signing secret is required for ${auth.mode} mode`);
  }

  if (auth.mode === 'jwt') {
    const location =
      auth.jwt.frameField !== undefined
        ? makeFrameLocation(auth.jwt.frameField)
        : makeHeaderLocation(auth.jwt.header, auth.jwt.template);

    return makeJwtMode({
      location,
      signingSecret,
      claims: selectClaims(toClaimOptions(auth.jwt)),
    });
  }

  if (deps.nonceLookup === undefined) {
    throw new AuthConfigurationError('API-key mode requires a nonce lookup');
  }

  return makeApiKeyMode({
    fields: {
      keyOrToken: auth.apiKey.keyField,
      sign: auth.apiKey.signField,
      payload: auth.apiKey.payloadField,
    },
    signingSecret,
    resourcePath: auth.apiKey.resourcePath,
    nonceLookup: deps.nonceLookup,
  });
};
