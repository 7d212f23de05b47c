import type { HttpResponse } from '../http/response.js';
import type { HttpMethod, Option } from '../request/builder.js';

/**
 * HttpClient
 * Verb-per-method surface shared by the axios-backed client and Session.
 *
 * Every method resolves with the wrapped response for 2xx statuses and rejects
 * with an HttpClientError otherwise; a StatusError still carries the response.
 */
export interface HttpClient {
  request(method: HttpMethod, url: string, ...opts: Option[]): Promise<HttpResponse>;

  get(url: string, ...opts: Option[]): Promise<HttpResponse>;
  post(url: string, ...opts: Option[]): Promise<HttpResponse>;
  put(url: string, ...opts: Option[]): Promise<HttpResponse>;
  patch(url: string, ...opts: Option[]): Promise<HttpResponse>;
  delete(url: string, ...opts: Option[]): Promise<HttpResponse>;
  head(url: string, ...opts: Option[]): Promise<HttpResponse>;
  options(url: string, ...opts: Option[]): Promise<HttpResponse>;
}
