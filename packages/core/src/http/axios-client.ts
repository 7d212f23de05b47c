import { Readable } from 'node:stream';
import axios, {
  AxiosError,
  AxiosHeaders,
  type AxiosInstance,
  type AxiosProxyConfig,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';
import type { HttpClient } from '../interfaces/http-client.js';
import type { Logger } from '../interfaces/logger.js';
import {
  HttpClientError,
  NetworkError,
  RequestError,
  StatusError,
  TimeoutError,
  describeError,
} from '../errors/index.js';
import {
  newRequest,
  type HttpMethod,
  type Option,
  type RequestBody,
  type RequestBuilder,
} from '../request/builder.js';
import { errorToLog, sanitizeHeadersForLog, sanitizeUrlForLog, truncateString } from '../utils/logging.js';
import { HttpResponse } from './response.js';

export interface AxiosHttpClientOptions {
  /** Instance to dispatch through; a fresh `axios.create()` by default */
  axiosInstance?: AxiosInstance;
  /** Log request/response traces; defaults to HTTP_DEBUG=1 */
  debug?: boolean;
  logger?: Logger;
}

type StreamResponse = AxiosResponse<Readable>;

/** One request on the wire; a redirect chain is a sequence of hops */
interface Hop {
  method: HttpMethod;
  url: URL;
  headers: AxiosHeaders;
  body?: RequestBody;
}

interface Deadline {
  signal?: AbortSignal;
  expired(): boolean;
  clear(): void;
  describe(): string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const UNDEFAULTED_HEADERS = ['Content-Type', 'Accept'];

function defaultLogger(): Logger {
  return {
    debug: (m: string, meta?: Record<string, unknown>) => console.debug('[http][debug]', m, meta),
    info: (m: string, meta?: Record<string, unknown>) => console.info('[http][info]', m, meta),
    warn: (m: string, meta?: Record<string, unknown>) => console.warn('[http][warn]', m, meta),
    error: (m: string, meta?: Record<string, unknown>) => console.error('[http][error]', m, meta),
  };
}

/**
 * Create a HttpClient backed by Axios.
 * - Options are folded per call; transport settings (timeout, proxy, redirect cap,
 *   decompression) live in that call's request config only.
 * - Failures are classified into the HttpClientError taxonomy.
 * - Bodies are left unread as streams until the HttpResponse is materialized.
 */
export function createAxiosHttpClient(opts: AxiosHttpClientOptions = {}): HttpClient {
  const instance: AxiosInstance = opts.axiosInstance ?? axios.create();
  const resolvedDebug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const log = opts.logger ?? defaultLogger();

  function send(hop: Hop, base: AxiosRequestConfig, deadline: Deadline): Promise<StreamResponse> {
    const config: AxiosRequestConfig = {
      ...base,
      method: hop.method,
      url: hop.url.toString(),
      headers: wireHeaders(hop.headers),
      data: hop.body,
    };
    if (deadline.signal) config.signal = deadline.signal;
    return instance.request<Readable>(config);
  }

  async function followRedirects(
    first: Hop,
    res: StreamResponse,
    max: number,
    base: AxiosRequestConfig,
    deadline: Deadline
  ): Promise<StreamResponse> {
    let hop = first;
    let current = res;
    let followed = 0;
    while (followed < max && REDIRECT_STATUSES.has(current.status)) {
      let next: Hop | undefined;
      try {
        next = nextHop(hop, current);
      } catch (err) {
        current.data.destroy();
        throw err;
      }
      if (!next) break;
      current.data.destroy();
      if (resolvedDebug) {
        log.debug('redirect', {
          status: current.status,
          from: urlForLog(hop.url),
          to: urlForLog(next.url),
        });
      }
      hop = next;
      followed++;
      current = await send(hop, base, deadline);
    }
    return current;
  }

  async function request(method: HttpMethod, url: string, ...options: Option[]): Promise<HttpResponse> {
    const req = newRequest(method, url, options);
    if (req.err) {
      throw new RequestError(describeError(req.err), { cause: req.err });
    }

    let target: URL;
    try {
      target = req.buildURL();
    } catch (err) {
      throw new RequestError(describeError(err), { cause: err });
    }

    const first: Hop = { method: req.method, url: target, headers: outboundHeaders(req), body: req.body };
    const base = transportConfig(req, first.headers);

    if (resolvedDebug) {
      log.debug('request', {
        method,
        url: urlForLog(target),
        headers: sanitizeHeadersForLog(first.headers.toJSON()),
        bodyLength: Buffer.isBuffer(req.body) ? req.body.length : undefined,
      });
    }

    const deadline = startDeadline(req.timeoutMs);
    let res: StreamResponse;
    try {
      res = await send(first, base, deadline);
      if (req.redirectMax !== undefined) {
        res = await followRedirects(first, res, req.redirectMax, base, deadline);
      }
    } catch (err) {
      const classified = classifyError(err, deadline);
      if (resolvedDebug) log.debug('error', errorToLog(classified));
      throw classified;
    } finally {
      deadline.clear();
    }

    const response = HttpResponse.fromAxios(res);
    if (resolvedDebug) {
      log.debug('response', {
        status: response.status,
        statusText: response.statusText,
        headers: sanitizeHeadersForLog(response.headers),
      });
    }
    if (response.status < 200 || response.status >= 300) {
      throw new StatusError(response.status, response);
    }
    return response;
  }

  return {
    request,
    get: (url, ...o) => request('GET', url, ...o),
    post: (url, ...o) => request('POST', url, ...o),
    put: (url, ...o) => request('PUT', url, ...o),
    patch: (url, ...o) => request('PATCH', url, ...o),
    delete: (url, ...o) => request('DELETE', url, ...o),
    head: (url, ...o) => request('HEAD', url, ...o),
    options: (url, ...o) => request('OPTIONS', url, ...o),
  };
}

/**
 * Copy the folded headers and render cookies after any caller-supplied Cookie header
 */
function outboundHeaders(req: RequestBuilder): AxiosHeaders {
  const headers = new AxiosHeaders(req.headers);
  if (req.cookies.length > 0) {
    const rendered = req.cookies.map((c) => `${c.name}=${c.value}`).join('; ');
    const existing = headers.get('Cookie');
    headers.set('Cookie', existing ? `${String(existing)}; ${rendered}` : rendered);
  }
  return headers;
}

/**
 * Headers as sent for one hop. Content-Type and Accept the caller left unset are
 * pinned to `false` so axios does not fill in its form/JSON defaults.
 */
function wireHeaders(headers: AxiosHeaders): AxiosHeaders {
  const wire = new AxiosHeaders(headers);
  for (const name of UNDEFAULTED_HEADERS) {
    if (!wire.has(name)) wire.set(name, false);
  }
  return wire;
}

function urlForLog(url: URL): string {
  return truncateString(sanitizeUrlForLog(url));
}

function transportConfig(req: RequestBuilder, headers: AxiosHeaders): AxiosRequestConfig {
  const config: AxiosRequestConfig = {
    responseType: 'stream',
    validateStatus: () => true,
    // A caller-chosen Accept-Encoding means the caller decodes, unless it opted in explicitly.
    decompress: req.decompressGzip || !headers.has('Accept-Encoding'),
  };
  if (req.timeoutMs > 0) config.timeout = req.timeoutMs;
  if (req.proxy) config.proxy = toAxiosProxy(req.proxy);
  if (req.redirectMax !== undefined) config.maxRedirects = 0;
  return config;
}

function toAxiosProxy(proxy: URL): AxiosProxyConfig {
  const secure = proxy.protocol === 'https:';
  const config: AxiosProxyConfig = {
    protocol: proxy.protocol.replace(/:$/, ''),
    host: proxy.hostname,
    port: proxy.port ? Number(proxy.port) : secure ? 443 : 80,
  };
  if (proxy.username) {
    config.auth = {
      username: decodeURIComponent(proxy.username),
      password: decodeURIComponent(proxy.password),
    };
  }
  return config;
}

/**
 * Work out the request a redirect response points at, or undefined when it cannot be followed.
 * 301/302/303 turn non-GET/HEAD requests into a bodyless GET; 307/308 replay method and body.
 */
function nextHop(hop: Hop, res: StreamResponse): Hop | undefined {
  const location = res.headers['location'];
  if (typeof location !== 'string' || location === '') return undefined;

  const url = new URL(location, hop.url);
  const headers = new AxiosHeaders(hop.headers);
  if (url.host !== hop.url.host) {
    headers.delete('Authorization');
    headers.delete('Cookie');
  }

  if (res.status === 307 || res.status === 308) {
    // a consumed stream cannot be sent again
    if (hop.body instanceof Readable) return undefined;
    return { method: hop.method, url, headers, body: hop.body };
  }

  if (hop.body !== undefined) {
    headers.delete('Content-Type');
    headers.delete('Content-Length');
  }
  const method: HttpMethod = hop.method === 'HEAD' ? 'HEAD' : 'GET';
  return { method, url, headers };
}

/**
 * Call-wide deadline spanning every redirect hop up to the final response headers
 */
function startDeadline(ms: number): Deadline {
  if (ms <= 0) {
    return { expired: () => false, clear: () => undefined, describe: () => 'no deadline' };
  }
  const controller = new AbortController();
  let fired = false;
  const timer = setTimeout(() => {
    fired = true;
    controller.abort();
  }, ms);
  return {
    signal: controller.signal,
    expired: () => fired,
    clear: () => clearTimeout(timer),
    describe: () => `deadline of ${ms}ms exceeded`,
  };
}

function classifyError(err: unknown, deadline: Deadline): HttpClientError {
  if (err instanceof HttpClientError) return err;
  if (deadline.expired()) {
    return new TimeoutError(deadline.describe(), { cause: err });
  }
  if (isTransportTimeout(err)) {
    return new TimeoutError(describeError(err), { cause: err });
  }
  return new NetworkError(describeError(err), { cause: err });
}

function isTransportTimeout(err: unknown): boolean {
  if (axios.isAxiosError(err)) {
    if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) return true;
    return hasTimeoutCode(err.cause);
  }
  return hasTimeoutCode(err);
}

function hasTimeoutCode(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ETIMEDOUT';
}

export default createAxiosHttpClient;
