import { z } from 'zod';

export type ResoErrorKind =
  | 'config'
  | 'network'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'rate_limited'
  | 'server_error'
  | 'odata_error'
  | 'parse'
  | 'invalid_query';

/**
 * Base class of every error this library raises. Narrow on `kind` or
 * with `instanceof` against the concrete subclasses.
 */
export abstract class ResoError extends Error {
  abstract readonly kind: ResoErrorKind;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends ResoError {
  override readonly name = 'ConfigError';
  readonly kind = 'config';
}

export class NetworkError extends ResoError {
  override readonly name = 'NetworkError';
  readonly kind = 'network';
}

export class ParseError extends ResoError {
  override readonly name = 'ParseError';
  readonly kind = 'parse';
}

export class InvalidQueryError extends ResoError {
  override readonly name = 'InvalidQueryError';
  readonly kind = 'invalid_query';
}

/** An error response from the server: carries the HTTP status it came with. */
export abstract class HttpStatusError extends ResoError {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
  }
}

export class UnauthorizedError extends HttpStatusError {
  override readonly name = 'UnauthorizedError';
  readonly kind = 'unauthorized';
}

export class ForbiddenError extends HttpStatusError {
  override readonly name = 'ForbiddenError';
  readonly kind = 'forbidden';
}

export class NotFoundError extends HttpStatusError {
  override readonly name = 'NotFoundError';
  readonly kind = 'not_found';
}

export class RateLimitedError extends HttpStatusError {
  override readonly name = 'RateLimitedError';
  readonly kind = 'rate_limited';
}

export class ServerError extends HttpStatusError {
  override readonly name = 'ServerError';
  readonly kind = 'server_error';
}

/** Any other non-success status (400, 405, 409, ...). */
export class ODataError extends HttpStatusError {
  override readonly name = 'ODataError';
  readonly kind = 'odata_error';
}

export type AnyResoError =
  | ConfigError
  | NetworkError
  | UnauthorizedError
  | ForbiddenError
  | NotFoundError
  | RateLimitedError
  | ServerError
  | ODataError
  | ParseError
  | InvalidQueryError;

const MAX_RAW_BODY_LENGTH = 500;

const ODataErrorEnvelope = z.object({
  error: z.object({
    code: z.string().default(''),
    message: z.string(),
  }),
});

function tryParseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Extracts a human-readable message from an error response body.
 * Structured `{ "error": { "code", "message" } }` bodies yield
 * `"message (code: code)"`; anything else is returned raw, cut to 500
 * characters.
 */
export function parseErrorBody(body: string): string {
  const envelope = ODataErrorEnvelope.safeParse(tryParseJson(body));
  if (envelope.success) {
    const { code, message } = envelope.data.error;
    return code.length > 0 ? `${message} (code: ${code})` : message;
  }

  // Cut on code points so a surrogate pair is never split.
  const chars = Array.from(body);
  if (chars.length > MAX_RAW_BODY_LENGTH) {
    return `${chars.slice(0, MAX_RAW_BODY_LENGTH).join('')}... (truncated)`;
  }
  return body;
}

/** Maps a non-success HTTP status and its body to the matching error class. */
export function errorFromStatus(statusCode: number, body: string): AnyResoError {
  const message = parseErrorBody(body);

  switch (statusCode) {
    case 401:
      return new UnauthorizedError(message, statusCode);
    case 403:
      return new ForbiddenError(message, statusCode);
    case 404:
      return new NotFoundError(message, statusCode);
    case 429:
      return new RateLimitedError(message, statusCode);
  }

  if (statusCode >= 500 && statusCode <= 599) {
    return new ServerError(message, statusCode);
  }
  return new ODataError(message, statusCode);
}
