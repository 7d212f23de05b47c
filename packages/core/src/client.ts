import type { HttpClient } from './interfaces/http-client.js';
import type { HttpResponse } from './http/response.js';
import type { Option } from './request/builder.js';
import { createAxiosHttpClient } from './http/axios-client.js';

/** Process-wide client behind the top-level verb functions and sessions created without one */
export const defaultClient: HttpClient = createAxiosHttpClient();

export function get(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.get(url, ...opts);
}

export function post(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.post(url, ...opts);
}

export function put(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.put(url, ...opts);
}

export function patch(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.patch(url, ...opts);
}

/** DELETE; also exported as `delete` */
export function del(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.delete(url, ...opts);
}

export function head(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.head(url, ...opts);
}

export function options(url: string, ...opts: Option[]): Promise<HttpResponse> {
  return defaultClient.options(url, ...opts);
}

export { del as delete };
