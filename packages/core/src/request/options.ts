import { Readable } from 'node:stream';
import type { Cookie, Option } from './builder.js';

export type QueryValue = string | number | boolean;

const CONTENT_TYPE = 'Content-Type';
const PROXY_PROTOCOLS = ['http:', 'https:'];
// RFC 6265 token and cookie-octet
const COOKIE_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const COOKIE_VALUE = /^(?:"[\x21\x23-\x2b\x2d-\x3a\x3c-\x5b\x5d-\x7e]*"|[\x21\x23-\x2b\x2d-\x3a\x3c-\x5b\x5d-\x7e]*)$/;

/**
 * Set a single header, replacing any earlier value for the same name
 */
export function withHeader(key: string, value: string): Option {
  return (req) => {
    req.ensureHeaders().set(key, value);
  };
}

/**
 * Set several headers, replacing earlier values key by key
 */
export function withHeaders(headers: Record<string, string>): Option {
  return (req) => {
    const target = req.ensureHeaders();
    for (const [key, value] of Object.entries(headers)) {
      target.set(key, value);
    }
  };
}

/**
 * Append query parameters. Repeating a key adds another value rather than replacing it.
 */
export function withQuery(params: Record<string, QueryValue>): Option {
  return (req) => {
    const query = req.ensureQuery();
    for (const [key, value] of Object.entries(params)) {
      query.append(key, String(value));
    }
  };
}

/**
 * Bound the whole call (connect through response headers) to `ms` milliseconds. 0 leaves it unset.
 */
export function withTimeout(ms: number): Option {
  return (req) => {
    req.timeoutMs = ms;
  };
}

/**
 * Decode gzip-encoded response bodies even when the caller negotiated Accept-Encoding itself
 */
export function withDecompressGzip(): Option {
  return (req) => {
    req.decompressGzip = true;
  };
}

/**
 * Encode `value` as the JSON body.
 * Content-Type is set to application/json only when the caller has not set one.
 */
export function withJSON(value: unknown): Option {
  return (req) => {
    if (req.err) return;
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value);
    } catch (err) {
      req.fail(err);
      return;
    }
    if (encoded === undefined) {
      req.fail(new TypeError(`json: unsupported value of type ${typeof value}`));
      return;
    }
    req.body = Buffer.from(encoded, 'utf8');
    const headers = req.ensureHeaders();
    if (!headers.get(CONTENT_TYPE)) {
      headers.set(CONTENT_TYPE, 'application/json');
    }
  };
}

/**
 * Encode `values` as an urlencoded form body.
 * Unlike withJSON, this always replaces the Content-Type header.
 */
export function withForm(values: Record<string, string>): Option {
  return (req) => {
    if (req.err) return;
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(values)) {
      form.set(key, value);
    }
    form.sort();
    req.body = Buffer.from(form.toString(), 'utf8');
    req.ensureHeaders().set(CONTENT_TYPE, 'application/x-www-form-urlencoded');
  };
}

/**
 * Use a raw body. A stream is read once by the send and must not be shared between concurrent calls.
 */
export function withBody(body: Readable | Buffer | Uint8Array | string): Option {
  return (req) => {
    if (body instanceof Readable || Buffer.isBuffer(body)) {
      req.body = body;
    } else if (typeof body === 'string') {
      req.body = Buffer.from(body, 'utf8');
    } else {
      req.body = Buffer.from(body);
    }
  };
}

/**
 * Append cookies to the Cookie header. Names must be tokens and values cookie-octets
 * (optionally double-quoted); anything else records an error instead of being sent.
 */
export function withCookies(...cookies: Cookie[]): Option {
  return (req) => {
    for (const cookie of cookies) {
      if (!COOKIE_NAME.test(cookie.name)) {
        req.fail(new Error(`cookie: invalid name ${JSON.stringify(cookie.name)}`));
        return;
      }
      if (!COOKIE_VALUE.test(cookie.value)) {
        req.fail(new Error(`cookie: invalid value for ${JSON.stringify(cookie.name)}`));
        return;
      }
    }
    req.cookies.push(...cookies);
  };
}

/**
 * Route this call through an HTTP(S) forward proxy
 */
export function withProxy(rawURL: string): Option {
  return (req) => {
    if (req.err) return;
    let proxy: URL;
    try {
      proxy = new URL(rawURL);
    } catch (err) {
      req.fail(err);
      return;
    }
    if (!PROXY_PROTOCOLS.includes(proxy.protocol)) {
      req.fail(new Error(`proxy: unsupported scheme in "${rawURL}"`));
      return;
    }
    req.proxy = proxy;
  };
}

/**
 * Cap redirect following: 0 follows none, N follows at most N hops.
 * The first redirect beyond the cap is returned as the response.
 */
export function withRedirect(max: number): Option {
  return (req) => {
    req.redirectMax = max;
  };
}
