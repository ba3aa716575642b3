/**
 * Location Templates
 *
 * Parses where a credential lives: a header with literal boundary text
 * around the token, or named fields of a structured frame.
 * Pure functions - no I/O.
 */

import { AuthConfigurationError } from './errors.js';
import {
  TOKEN_MARKER,
  type AuthField,
  type FrameLocation,
  type HeaderLocation,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Header Templates
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Splits a boundary template around the `{token}` marker.
 *
 * @returns null when the marker is missing or appears more than once
 *
 * @example
 * parseHeaderTemplate('Authorization', 'Bearer {token}');
 * // { kind: 'header', field: 'Authorization', prefix: 'Bearer ', suffix: null }
 *
 * parseHeaderTemplate('Authorization', 'Bearer token');
 * // null
 */
export const parseHeaderTemplate = (field: string, template: string): HeaderLocation | null => {
  const parts = template.split(TOKEN_MARKER);
  if (parts.length !== 2) {
    return null;
  }

  const [prefix = '', suffix = ''] = parts;

  return Object.freeze({
    kind: 'header',
    field,
    prefix: prefix !== '' ? prefix : null,
    suffix: suffix !== '' ? suffix : null,
  });
};

/**
 * Same as parseHeaderTemplate but for construct-time configuration.
 *
 * @throws AuthConfigurationError on an empty field name or a bad template
 */
export const makeHeaderLocation = (field: string, template: string): HeaderLocation => {
  if (field.trim() === '') {
    throw new AuthConfigurationError('Header field name must not be empty');
  }

  const location = parseHeaderTemplate(field, template);
  if (location === null) {
    throw new AuthConfigurationError(
      `Header template "${template}" must contain ${TOKEN_MARKER} exactly once`
    );
  }
  return location;
};

// ─────────────────────────────────────────────────────────────────────────────
// Frame Fields
// ─────────────────────────────────────────────────────────────────────────────

export const makeFrameLocation = (field: string): FrameLocation => {
  if (field === '') {
    throw new AuthConfigurationError('Frame field name must not be empty');
  }
  return Object.freeze({ kind: 'frame', field });
};

/**
 * Field names for API-key frames. All three are required.
 *
 * @throws AuthConfigurationError when any name is empty
 */
export const makeApiKeyFields = (fields: AuthField): AuthField => {
  const roles: (keyof AuthField)[] = ['keyOrToken', 'sign', 'payload'];
  const empty = roles.filter((role) => fields[role] === '');
  if (empty.length > 0) {
    throw new AuthConfigurationError(`API-key field names must not be empty: ${empty.join(', ')}`);
  }

  return Object.freeze({
    keyOrToken: fields.keyOrToken,
    sign: fields.sign,
    payload: fields.payload,
  });
};
