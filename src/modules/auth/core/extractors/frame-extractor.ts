/**
 * Frame Field Extractor
 *
 * Reads named fields from a structured message frame (e.g. a parsed
 * websocket payload).
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidRequestShapeError,
  createMalformedError,
  createMissingFieldError,
  type AuthError,
} from '../errors.js';
import { isFrameObject, type FrameObject, type FrameValue } from '../types.js';

/**
 * Narrows a frame to an object.
 */
export const asFrameObject = (frame: FrameValue): Result<FrameObject, AuthError> => {
  return isFrameObject(frame) ? ok(frame) : err(createInvalidRequestShapeError());
};

/**
 * Reads a field of any JSON type. Only absence is an error.
 */
export const readFrameField = (frame: FrameObject, field: string): Result<FrameValue, AuthError> => {
  if (!Object.prototype.hasOwnProperty.call(frame, field)) {
    return err(createMissingFieldError(field));
  }
  const value = frame[field];
  return value === undefined ? err(createMissingFieldError(field)) : ok(value);
};

/**
 * Reads a field that must hold a string.
 */
export const readFrameString = (frame: FrameObject, field: string): Result<string, AuthError> => {
  return readFrameField(frame, field).andThen((value) =>
    typeof value === 'string'
      ? ok(value)
      : err(createMalformedError(`"${field}" must be a \`string\``))
  );
};

/**
 * Extracts a string credential from a frame.
 *
 * @example
 * extractFromFrame('token', { token: 'eyJ...' });   // ok('eyJ...')
 * extractFromFrame('token', ['eyJ...']);            // err(InvalidRequestShapeError)
 * extractFromFrame('token', { other: 1 });          // err(MissingFieldError)
 * extractFromFrame('token', { token: 42 });         // err(MalformedError)
 */
export const extractFromFrame = (field: string, frame: FrameValue): Result<string, AuthError> => {
  return asFrameObject(frame).andThen((object) => readFrameString(object, field));
};
