import type { HttpResponse } from '../http/response.js';

/**
 * Coarse failure categories
 *
 * - "Request": the request could not be built (bad target or proxy URL, unencodable payload)
 * - "Network": transport failure that is not a timeout
 * - "Timeout": the call deadline fired or the transport reported a timeout
 * - "Status": the final response status is outside 2xx
 * - "Response": the body could not be read or decoded
 * - "NilResponse": body access on a response that has no body stream
 * - "NoContent": JSON decode attempted on an empty body
 */
export type ErrorCategory =
  | 'Request'
  | 'Network'
  | 'Timeout'
  | 'Status'
  | 'Response'
  | 'NilResponse'
  | 'NoContent';

/**
 * HttpClientError
 * Base class for every error raised by the client.
 * Callers branch on `category` (or `instanceof` a subclass); the underlying error is kept in `cause`.
 */
export class HttpClientError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, opts?: { cause?: unknown }) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'HttpClientError';
    this.category = category;
    if (opts && 'cause' in opts) {
      this.cause = opts.cause;
    }
  }
}

/**
 * RequestError
 * Raised before any network I/O when the request cannot be built
 */
export class RequestError extends HttpClientError {
  constructor(detail: string, opts?: { cause?: unknown }) {
    super(`request error: ${detail}`, 'Request', opts);
    this.name = 'RequestError';
  }
}

export class NetworkError extends HttpClientError {
  constructor(detail: string, opts?: { cause?: unknown }) {
    super(`network error: ${detail}`, 'Network', opts);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends HttpClientError {
  constructor(detail: string, opts?: { cause?: unknown }) {
    super(`timeout: ${detail}`, 'Timeout', opts);
    this.name = 'TimeoutError';
  }
}

/**
 * StatusError
 * Raised for a final response outside [200, 299].
 * The response is still readable, so API error payloads can be inspected.
 */
export class StatusError extends HttpClientError {
  readonly statusCode: number;
  readonly response: HttpResponse;

  constructor(statusCode: number, response: HttpResponse) {
    super(`unexpected status: ${statusCode}`, 'Status');
    this.name = 'StatusError';
    this.statusCode = statusCode;
    this.response = response;
  }
}

export class ResponseError extends HttpClientError {
  constructor(detail: string, opts?: { cause?: unknown }) {
    super(`response error: ${detail}`, 'Response', opts);
    this.name = 'ResponseError';
  }
}

export class NilResponseError extends HttpClientError {
  constructor() {
    super('nil response', 'NilResponse');
    this.name = 'NilResponseError';
  }
}

export class NoContentError extends HttpClientError {
  constructor() {
    super('empty response body', 'NoContent');
    this.name = 'NoContentError';
  }
}

/**
 * Check whether `err` was raised by the client, optionally narrowing to one category
 */
export function isHttpClientError(err: unknown, category?: ErrorCategory): err is HttpClientError {
  if (!(err instanceof HttpClientError)) return false;
  return category === undefined || err.category === category;
}

/**
 * Best-effort message extraction for wrapping foreign errors
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
