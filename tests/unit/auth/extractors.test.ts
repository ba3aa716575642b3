/**
 * Tests for header and frame credential extraction.
 */

import { describe, expect, it } from 'vitest';

import {
  extractFromFrame,
  extractFromHeader,
  makeHeaderLocation,
  stripBoundaries,
} from '@/modules/auth/index.js';

const bearer = makeHeaderLocation('Authorization', 'Bearer {token}');

describe('extractFromHeader', () => {
  it('strips the bearer prefix', () => {
    const result = extractFromHeader(bearer, { authorization: 'Bearer abc.def.ghi' });

    expect(result._unsafeUnwrap()).toBe('abc.def.ghi');
  });

  it('matches the header name case-insensitively', () => {
    const result = extractFromHeader(bearer, { AUTHORIZATION: 'Bearer abc' });

    expect(result._unsafeUnwrap()).toBe('abc');
  });

  it('returns the value unchanged when the prefix is absent', () => {
    const result = extractFromHeader(bearer, { authorization: 'abc' });

    expect(result._unsafeUnwrap()).toBe('abc');
  });

  it('strips a suffix', () => {
    const location = makeHeaderLocation('X-Auth', '{token} Key');

    expect(extractFromHeader(location, { 'x-auth': 'abc Key' })._unsafeUnwrap()).toBe('abc');
  });

  it('uses the first value of a repeated header', () => {
    const result = extractFromHeader(bearer, { authorization: ['Bearer first', 'Bearer second'] });

    expect(result._unsafeUnwrap()).toBe('first');
  });

  it('decodes byte values as UTF-8', () => {
    const result = extractFromHeader(bearer, {
      authorization: new TextEncoder().encode('Bearer abc'),
    });

    expect(result._unsafeUnwrap()).toBe('abc');
  });

  it('rejects bytes that are not UTF-8', () => {
    const result = extractFromHeader(bearer, { authorization: new Uint8Array([0xff, 0xfe]) });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MalformedError');
    expect(error.message).toBe('Header value is not valid UTF-8 text');
  });

  it('rejects an empty repeated header', () => {
    const result = extractFromHeader(bearer, { authorization: [] });

    expect(result._unsafeUnwrapErr().message).toBe('Header value is empty');
  });

  it('returns MissingFieldError when the header is absent', () => {
    const result = extractFromHeader(bearer, { 'x-other': 'Bearer abc' });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MissingFieldError');
    expect(error.message).toBe("Missing field 'Authorization'");
  });

  it('does not read inherited properties as headers', () => {
    const constructorLocation = makeHeaderLocation('constructor', '{token}');
    const toStringLocation = makeHeaderLocation('toString', '{token}');

    const first = extractFromHeader(constructorLocation, {})._unsafeUnwrapErr();
    const second = extractFromHeader(toStringLocation, {})._unsafeUnwrapErr();

    expect(first).toMatchObject({ type: 'MissingFieldError', message: "Missing field 'constructor'" });
    expect(second).toMatchObject({ type: 'MissingFieldError', message: "Missing field 'toString'" });
  });
});

describe('stripBoundaries', () => {
  it('strips repeated prefixes', () => {
    expect(stripBoundaries('Bearer Bearer abc', 'Bearer ', null)).toBe('abc');
  });

  it('strips repeated suffixes', () => {
    expect(stripBoundaries('abc>>', null, '>')).toBe('abc');
  });

  it('can strip a value down to nothing', () => {
    expect(stripBoundaries('Bearer ', 'Bearer ', null)).toBe('');
  });

  it('ignores empty boundaries', () => {
    expect(stripBoundaries('abc', '', '')).toBe('abc');
  });
});

describe('extractFromFrame', () => {
  it('reads a string field', () => {
    expect(extractFromFrame('token', { token: 'abc', other: 1 })._unsafeUnwrap()).toBe('abc');
  });

  it('rejects a frame that is not an object', () => {
    const error = extractFromFrame('token', ['abc'])._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidRequestShapeError');
    expect(error.message).toBe('request must be in type object');
  });

  it('rejects a null frame', () => {
    expect(extractFromFrame('token', null)._unsafeUnwrapErr().type).toBe(
      'InvalidRequestShapeError'
    );
  });

  it('returns MissingFieldError for an absent field', () => {
    const error = extractFromFrame('token', { other: 'abc' })._unsafeUnwrapErr();

    expect(error.type).toBe('MissingFieldError');
    expect(error.message).toBe("Missing field 'token'");
  });

  it('returns MalformedError for a non-string field', () => {
    const error = extractFromFrame('token', { token: 42 })._unsafeUnwrapErr();

    expect(error.type).toBe('MalformedError');
    expect(error.message).toBe('"token" must be a `string`');
  });

  it('does not read inherited properties', () => {
    expect(extractFromFrame('toString', {})._unsafeUnwrapErr().type).toBe('MissingFieldError');
  });
});
