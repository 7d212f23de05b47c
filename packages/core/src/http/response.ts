import { buffer } from 'node:stream/consumers';
import type { Readable } from 'node:stream';
import type { AxiosResponse } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  NilResponseError,
  NoContentError,
  ResponseError,
  describeError,
} from '../errors/index.js';

export type ResponseHeaders = Record<string, string | string[]>;

export interface HttpResponseInit {
  status: number;
  statusText?: string;
  headers?: ResponseHeaders;
  /** Owned body stream; omitted for a response without a body handle */
  body?: Readable | null;
}

/**
 * HttpResponse
 * Wraps a received response and owns its body stream.
 *
 * The body is read at most once: the first call to bytes()/text()/json() drains
 * and destroys the stream, and every call (including concurrent ones) observes
 * the same bytes or the same error.
 */
export class HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: ResponseHeaders;
  readonly raw?: Readable;

  private materialized?: Promise<Buffer>;

  constructor(init: HttpResponseInit) {
    this.status = init.status;
    this.statusText = init.statusText ?? '';
    this.headers = normalizeHeaders(init.headers ?? {});
    this.raw = init.body ?? undefined;
  }

  static fromAxios(res: AxiosResponse<Readable>): HttpResponse {
    return new HttpResponse({
      status: res.status,
      statusText: res.statusText,
      headers: normalizeHeaders(res.headers),
      body: res.data,
    });
  }

  /**
   * First value of a header, case-insensitive
   */
  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  bytes(): Promise<Buffer> {
    const body = this.raw;
    if (!body) return Promise.reject(new NilResponseError());
    if (!this.materialized) {
      this.materialized = readAll(body);
    }
    return this.materialized;
  }

  async text(): Promise<string> {
    const data = await this.bytes();
    return data.toString('utf8');
  }

  /**
   * Decode the body as JSON, optionally validating it against a zod schema.
   * Rejects with NoContentError on an empty body without attempting to parse.
   */
  async json<T = unknown>(schema?: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const data = await this.bytes();
    if (data.length === 0) throw new NoContentError();

    let parsed: T;
    try {
      parsed = JSON.parse(data.toString('utf8'));
    } catch (err) {
      throw new ResponseError(`decoding json: ${describeError(err)}`, { cause: err });
    }
    if (!schema) return parsed;

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ResponseError(`body does not match schema: ${result.error.message}`, { cause: result.error });
    }
    return result.data;
  }
}

async function readAll(body: Readable): Promise<Buffer> {
  try {
    return await buffer(body);
  } catch (err) {
    throw new ResponseError(`reading body: ${describeError(err)}`, { cause: err });
  } finally {
    body.destroy();
  }
}

function normalizeHeaders(headers: object): ResponseHeaders {
  const out: ResponseHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.map(String);
    } else if (typeof value !== 'function') {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}
