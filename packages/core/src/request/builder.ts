import { AxiosHeaders } from 'axios';
import type { Readable } from 'node:stream';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Request payload after option processing.
 * A stream is consumed by the first send and cannot be replayed.
 */
export type RequestBody = Buffer | Readable;

export interface Cookie {
  name: string;
  value: string;
}

/**
 * Option
 * Mutates a RequestBuilder in place. Options never throw: an option that
 * fails records the error on the builder via `fail()` and dispatch rejects it.
 */
export type Option = (req: RequestBuilder) => void;

const SUPPORTED_PROTOCOLS = ['http:', 'https:'];

/**
 * RequestBuilder
 * Per-call request state assembled by folding options.
 * Created for a single dispatch and discarded afterwards.
 */
export class RequestBuilder {
  readonly method: HttpMethod;
  readonly url: string;

  headers?: AxiosHeaders;
  query?: URLSearchParams;
  body?: RequestBody;
  timeoutMs = 0;
  cookies: Cookie[] = [];
  proxy?: URL;
  /** undefined = transport default policy, 0 = follow none, N = follow at most N */
  redirectMax?: number;
  decompressGzip = false;
  /** First configuration error; later failures are dropped */
  err?: Error;

  constructor(method: HttpMethod, url: string) {
    this.method = method;
    this.url = url;
  }

  fail(err: unknown): void {
    if (this.err !== undefined) return;
    this.err = err instanceof Error ? err : new Error(String(err));
  }

  ensureHeaders(): AxiosHeaders {
    if (!this.headers) this.headers = new AxiosHeaders();
    return this.headers;
  }

  ensureQuery(): URLSearchParams {
    if (!this.query) this.query = new URLSearchParams();
    return this.query;
  }

  /**
   * Compose the target URL with the additive query parameters.
   * Without additive parameters the target's query string is kept verbatim;
   * otherwise the merged set is re-encoded sorted by key.
   * Throws when the target is not an absolute http(s) URL.
   */
  buildURL(): URL {
    const url = new URL(this.url);
    if (!SUPPORTED_PROTOCOLS.includes(url.protocol)) {
      throw new Error(`unsupported protocol scheme "${url.protocol.replace(/:$/, '')}"`);
    }
    if (!this.query || isEmpty(this.query)) return url;

    const merged = new URLSearchParams(url.search);
    for (const [key, value] of this.query) {
      merged.append(key, value);
    }
    merged.sort();
    url.search = merged.toString();
    return url;
  }
}

function isEmpty(params: URLSearchParams): boolean {
  return params.keys().next().done === true;
}

/**
 * Fold options left to right over a fresh builder. Missing entries are skipped.
 */
export function newRequest(
  method: HttpMethod,
  url: string,
  options: ReadonlyArray<Option | null | undefined>
): RequestBuilder {
  const req = new RequestBuilder(method, url);
  for (const opt of options) {
    if (opt) opt(req);
  }
  return req;
}
