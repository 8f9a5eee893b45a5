import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ForbiddenError,
  HttpStatusError,
  InvalidQueryError,
  NetworkError,
  NotFoundError,
  ODataError,
  ParseError,
  RateLimitedError,
  ResoError,
  ServerError,
  UnauthorizedError,
  errorFromStatus,
  parseErrorBody,
} from '../../src/errors.js';

describe('error classes', () => {
  it('InvalidQueryError has correct name and kind', () => {
    const err = new InvalidQueryError('bad query');
    expect(err.name).toBe('InvalidQueryError');
    expect(err.kind).toBe('invalid_query');
    expect(err.message).toBe('bad query');
  });

  it('is instanceof its class, ResoError and Error', () => {
    const err = new NetworkError('connection refused');
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toBeInstanceOf(ResoError);
    expect(err).toBeInstanceOf(Error);
  });

  it('status errors are instanceof HttpStatusError and carry statusCode', () => {
    const err = new ServerError('boom', 503);
    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toBeInstanceOf(ResoError);
    expect(err.statusCode).toBe(503);
    expect(err.kind).toBe('server_error');
    expect(err.name).toBe('ServerError');
  });

  it('non-status errors are not HttpStatusError', () => {
    expect(new ParseError('x')).not.toBeInstanceOf(HttpStatusError);
    expect(new ConfigError('x')).not.toBeInstanceOf(HttpStatusError);
  });

  it('cause is undefined when not provided', () => {
    expect(new ConfigError('RESO_TOKEN not set').cause).toBeUndefined();
  });

  it('stores the cause when provided', () => {
    const root = new TypeError('fetch failed');
    const err = new NetworkError('fetch failed', root);
    expect(err.cause).toBe(root);
  });

  it('has a stack trace', () => {
    expect(new ParseError('msg').stack).toBeDefined();
  });

  it('kind narrows the union', () => {
    const err = errorFromStatus(404, 'missing');
    expect(err.kind).toBe('not_found');
    if (err.kind === 'not_found') {
      expect(err.statusCode).toBe(404);
    }
  });
});

describe('parseErrorBody', () => {
  it('formats an envelope with a code as "message (code: code)"', () => {
    expect(parseErrorBody('{"error":{"code":"X","message":"Y"}}')).toBe('Y (code: X)');
  });

  it('returns the bare message when code is missing', () => {
    expect(parseErrorBody('{"error":{"message":"Token expired"}}')).toBe('Token expired');
  });

  it('returns the bare message when code is empty', () => {
    expect(parseErrorBody('{"error":{"code":"","message":"Token expired"}}')).toBe('Token expired');
  });

  it('returns the raw body when it is not JSON', () => {
    expect(parseErrorBody('Bad Request')).toBe('Bad Request');
  });

  it('returns the raw body when JSON has a different shape', () => {
    expect(parseErrorBody('{"message":"nope"}')).toBe('{"message":"nope"}');
  });

  it('returns an empty string for an empty body', () => {
    expect(parseErrorBody('')).toBe('');
  });

  it('keeps a body of exactly 500 characters intact', () => {
    const body = 'a'.repeat(500);
    expect(parseErrorBody(body)).toBe(body);
  });

  it('truncates a 600-character body to 500 characters plus suffix', () => {
    const body = 'b'.repeat(600);
    const message = parseErrorBody(body);
    expect(message).toBe(`${'b'.repeat(500)}... (truncated)`);
    expect(message).toHaveLength(515);
  });

  it('never splits a surrogate pair at the cut', () => {
    const body = `${'a'.repeat(499)}\u{1F600}${'b'.repeat(10)}`;
    expect(parseErrorBody(body)).toBe(`${'a'.repeat(499)}\u{1F600}... (truncated)`);
  });

  it('counts an astral character once toward the limit', () => {
    const body = `${'a'.repeat(499)}\u{1F600}`;
    expect(body).toHaveLength(501);
    expect(parseErrorBody(body)).toBe(body);
  });
});

describe('errorFromStatus', () => {
  it('maps 401 to UnauthorizedError with the envelope message', () => {
    const err = errorFromStatus(401, '{"error":{"code":"X","message":"Y"}}');
    expect(err).toBeInstanceOf(UnauthorizedError);
    expect(err.message).toBe('Y (code: X)');
    expect(err).toMatchObject({ statusCode: 401 });
  });

  it('maps 403 to ForbiddenError', () => {
    const err = errorFromStatus(403, 'Forbidden');
    expect(err).toBeInstanceOf(ForbiddenError);
    expect(err).toMatchObject({ statusCode: 403, message: 'Forbidden' });
  });

  it('maps 404 to NotFoundError', () => {
    expect(errorFromStatus(404, '')).toBeInstanceOf(NotFoundError);
  });

  it('maps 429 to RateLimitedError', () => {
    expect(errorFromStatus(429, 'slow down')).toBeInstanceOf(RateLimitedError);
  });

  it('maps 500 and 599 to ServerError', () => {
    expect(errorFromStatus(500, '')).toBeInstanceOf(ServerError);
    const err = errorFromStatus(599, '');
    expect(err).toBeInstanceOf(ServerError);
    expect(err).toMatchObject({ statusCode: 599 });
  });

  it('maps 400 with an unparseable body to ODataError with the raw body', () => {
    const err = errorFromStatus(400, 'The filter expression is invalid');
    expect(err).toBeInstanceOf(ODataError);
    expect(err).toMatchObject({ statusCode: 400, message: 'The filter expression is invalid' });
  });

  it('maps unlisted statuses to ODataError', () => {
    expect(errorFromStatus(405, '')).toBeInstanceOf(ODataError);
    expect(errorFromStatus(409, '')).toBeInstanceOf(ODataError);
    expect(errorFromStatus(600, '')).toBeInstanceOf(ODataError);
    expect(errorFromStatus(302, '')).toBeInstanceOf(ODataError);
  });

  it('truncates long raw bodies in the mapped error', () => {
    const err = errorFromStatus(502, 'x'.repeat(600));
    expect(err.message).toBe(`${'x'.repeat(500)}... (truncated)`);
  });
});
