// Request building
export { RequestBuilder, newRequest } from './request/builder.js';
export type { Cookie, HttpMethod, Option, RequestBody } from './request/builder.js';
export {
  withBody,
  withCookies,
  withDecompressGzip,
  withForm,
  withHeader,
  withHeaders,
  withJSON,
  withProxy,
  withQuery,
  withRedirect,
  withTimeout,
} from './request/options.js';
export type { QueryValue } from './request/options.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  HttpClientError,
  NetworkError,
  NilResponseError,
  NoContentError,
  RequestError,
  ResponseError,
  StatusError,
  TimeoutError,
  isHttpClientError,
} from './errors/index.js';
export type { ErrorCategory } from './errors/index.js';

// Http client and responses
export { createAxiosHttpClient } from './http/axios-client.js';
export type { AxiosHttpClientOptions } from './http/axios-client.js';
export { HttpResponse } from './http/response.js';
export type { HttpResponseInit, ResponseHeaders } from './http/response.js';
export { Session, createSession } from './session.js';
export { defaultClient, get, post, put, patch, del, head, options } from './client.js';
export { del as delete } from './client.js';

// Utilities
export { serializeForLog, truncateString, sanitizeHeadersForLog, sanitizeUrlForLog, errorToLog } from './utils/index.js';
