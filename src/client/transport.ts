import type { Transport, TransportRequest, TransportResponse } from '../types.js';
import { NetworkError, ParseError } from '../errors.js';

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return 'Request timed out';
    }
    // undici reports the socket-level reason (ECONNREFUSED, ENOTFOUND) as the cause
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}

/** Transport over the global fetch of Node.js. */
export class FetchTransport implements Transport {
  async execute(request: TransportRequest): Promise<TransportResponse> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${request.token}`,
          Accept: request.accept,
        },
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(describeFailure(err), err);
    }

    // Headers stay readable after the one-shot body has been consumed.
    const headers = response.headers;
    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      // A failed status is still classified by its code, with no body to describe it.
      if (!response.ok) {
        body = '';
      } else {
        throw new ParseError(`Failed to read response: ${describeFailure(err)}`, err);
      }
    }

    return { status: response.status, headers, body };
  }
}
