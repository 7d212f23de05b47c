import type { HttpClient } from './interfaces/http-client.js';
import type { HttpResponse } from './http/response.js';
import type { HttpMethod, Option } from './request/builder.js';
import { defaultClient } from './client.js';

/**
 * Session
 * Reuses a fixed list of default options across calls.
 *
 * Defaults are applied before per-call options, so a per-call option for the
 * same key (a header, the timeout, the redirect cap...) overrides the default.
 * The list is copied at construction and never changes, which makes a session
 * safe to share between concurrent callers.
 */
export class Session implements HttpClient {
  private readonly defaults: readonly Option[];
  private readonly client: HttpClient;

  constructor(defaults: readonly Option[] = [], client: HttpClient = defaultClient) {
    this.defaults = [...defaults];
    this.client = client;
  }

  request(method: HttpMethod, url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.client.request(method, url, ...this.defaults, ...opts);
  }

  get(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('GET', url, ...opts);
  }

  post(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('POST', url, ...opts);
  }

  put(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('PUT', url, ...opts);
  }

  patch(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('PATCH', url, ...opts);
  }

  delete(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('DELETE', url, ...opts);
  }

  head(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('HEAD', url, ...opts);
  }

  options(url: string, ...opts: Option[]): Promise<HttpResponse> {
    return this.request('OPTIONS', url, ...opts);
  }
}

export function createSession(...defaults: Option[]): Session {
  return new Session(defaults);
}
