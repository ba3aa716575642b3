/**
 * Header Credential Extractor
 *
 * Pulls the raw credential out of a header map using a header location.
 * No cryptography - validation is the claim verifier's job.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createMalformedError,
  createMissingFieldError,
  type AuthError,
} from '../errors.js';

import type { HeaderLocation, HeaderMap, HeaderValue } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Header names are case-insensitive. Node lowercases them, configs rarely do.
 */
const findHeader = (headers: HeaderMap, field: string): HeaderValue => {
  if (Object.prototype.hasOwnProperty.call(headers, field)) {
    const exact = headers[field];
    if (exact !== undefined) {
      return exact;
    }
  }

  const wanted = field.toLowerCase();
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
};

const headerToText = (value: string | readonly string[] | Uint8Array): Result<string, AuthError> => {
  if (typeof value === 'string') {
    return ok(value);
  }

  if (value instanceof Uint8Array) {
    try {
      return ok(utf8.decode(value));
    } catch (error) {
      return err(createMalformedError('Header value is not valid UTF-8 text', error));
    }
  }

  // Repeated header: the first occurrence wins
  const [first] = value;
  if (first === undefined) {
    return err(createMalformedError('Header value is empty'));
  }
  return ok(first);
};

/**
 * Strips every leading `prefix` and trailing `suffix`. Absent boundaries are
 * left alone.
 */
export const stripBoundaries = (
  text: string,
  prefix: string | null,
  suffix: string | null
): string => {
  let token = text;
  if (prefix !== null && prefix !== '') {
    while (token.startsWith(prefix)) {
      token = token.slice(prefix.length);
    }
  }
  if (suffix !== null && suffix !== '') {
    while (token.endsWith(suffix)) {
      token = token.slice(0, token.length - suffix.length);
    }
  }
  return token;
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts the credential from a header map.
 *
 * @example
 * const location = makeHeaderLocation('Authorization', 'Bearer {token}');
 * extractFromHeader(location, { authorization: 'Bearer eyJhbGciOi...' });
 * // ok('eyJhbGciOi...')
 *
 * extractFromHeader(location, {});
 * // err({ type: 'MissingFieldError', field: 'Authorization', ... })
 */
export const extractFromHeader = (
  location: HeaderLocation,
  headers: HeaderMap
): Result<string, AuthError> => {
  const value = findHeader(headers, location.field);
  if (value === undefined) {
    return err(createMissingFieldError(location.field));
  }

  return headerToText(value).map((text) =>
    stripBoundaries(text, location.prefix, location.suffix)
  );
};
