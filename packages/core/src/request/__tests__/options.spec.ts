import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { newRequest } from '../builder.js';
import {
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
} from '../options.js';

const URL_ = 'http://api.test/';

describe('header options', () => {
  it('overwrites a header case-insensitively', () => {
    const req = newRequest('GET', URL_, [withHeader('x-key', 'a'), withHeader('X-Key', 'b')]);

    expect(req.headers?.get('X-Key')).toBe('b');
    expect(Object.keys(req.headers?.toJSON() ?? {})).toHaveLength(1);
  });

  it('sets several headers, replacing existing keys', () => {
    const req = newRequest('GET', URL_, [
      withHeader('Accept', 'text/html'),
      withHeaders({ Accept: 'application/json', 'X-Trace': 't1' }),
    ]);

    expect(req.headers?.get('Accept')).toBe('application/json');
    expect(req.headers?.get('X-Trace')).toBe('t1');
  });
});

describe('withQuery', () => {
  it('adds repeated keys instead of replacing them', () => {
    const req = newRequest('GET', URL_, [withQuery({ tag: 'a' }), withQuery({ tag: 'b' })]);
    expect(req.query?.getAll('tag')).toEqual(['a', 'b']);
  });
});

describe('withJSON', () => {
  it('encodes the body and sets application/json', () => {
    const req = newRequest('POST', URL_, [withJSON({ name: 'alice' })]);

    expect(Buffer.isBuffer(req.body) && req.body.toString()).toBe('{"name":"alice"}');
    expect(req.headers?.get('Content-Type')).toBe('application/json');
  });

  it('keeps a Content-Type the caller already set', () => {
    const req = newRequest('POST', URL_, [withHeader('Content-Type', 'text/plain'), withJSON({ a: 1 })]);
    expect(req.headers?.get('Content-Type')).toBe('text/plain');
  });

  it('records an error for values JSON cannot encode', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const bigint = newRequest('POST', URL_, [withJSON(10n)]);
    const cycle = newRequest('POST', URL_, [withJSON(cyclic)]);
    const nothing = newRequest('POST', URL_, [withJSON(undefined)]);

    expect(bigint.err).toBeInstanceOf(TypeError);
    expect(bigint.body).toBeUndefined();
    expect(cycle.err).toBeInstanceOf(TypeError);
    expect(nothing.err?.message).toBe('json: unsupported value of type undefined');
  });

  it('does nothing once an earlier option failed', () => {
    const req = newRequest('POST', URL_, [withProxy('://bad'), withJSON({ a: 1 })]);
    expect(req.body).toBeUndefined();
    expect(req.headers).toBeUndefined();
  });
});

describe('withForm', () => {
  it('encodes fields sorted by key', () => {
    const req = newRequest('POST', URL_, [withForm({ b: 'two words', a: '1' })]);

    expect(Buffer.isBuffer(req.body) && req.body.toString()).toBe('a=1&b=two+words');
    expect(req.headers?.get('Content-Type')).toBe('application/x-www-form-urlencoded');
  });

  it('always replaces the Content-Type header', () => {
    const req = newRequest('POST', URL_, [withHeader('Content-Type', 'text/plain'), withForm({ a: '1' })]);
    expect(req.headers?.get('Content-Type')).toBe('application/x-www-form-urlencoded');
  });
});

describe('withBody', () => {
  it('converts strings and byte arrays to buffers', () => {
    const fromString = newRequest('POST', URL_, [withBody('raw')]);
    const fromBytes = newRequest('POST', URL_, [withBody(new Uint8Array([104, 105]))]);

    expect(Buffer.isBuffer(fromString.body) && fromString.body.toString()).toBe('raw');
    expect(Buffer.isBuffer(fromBytes.body) && fromBytes.body.toString()).toBe('hi');
  });

  it('uses a stream as-is', () => {
    const stream = Readable.from(['chunk']);
    const req = newRequest('POST', URL_, [withBody(stream)]);
    expect(req.body).toBe(stream);
  });

  it('is replaced by a later payload option', () => {
    const req = newRequest('POST', URL_, [withBody('raw'), withJSON([1, 2])]);
    expect(Buffer.isBuffer(req.body) && req.body.toString()).toBe('[1,2]');
  });
});

describe('withCookies', () => {
  it('appends cookies in order', () => {
    const req = newRequest('GET', URL_, [
      withCookies({ name: 'a', value: '1' }),
      withCookies({ name: 'b', value: '2' }, { name: 'a', value: '3' }),
    ]);

    expect(req.cookies).toEqual([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
      { name: 'a', value: '3' },
    ]);
  });
});

describe('withCookies validation', () => {
  it('accepts quoted values', () => {
    const req = newRequest('GET', URL_, [withCookies({ name: 'pref', value: '"dark"' })]);
    expect(req.err).toBeUndefined();
    expect(req.cookies).toEqual([{ name: 'pref', value: '"dark"' }]);
  });

  it.each([
    ['a; admin=1'],
    ['two words'],
    ['x,y'],
    ['line\nbreak'],
  ])('rejects the value %j', (value) => {
    const req = newRequest('GET', URL_, [withCookies({ name: 'sid', value })]);
    expect(req.err?.message).toBe('cookie: invalid value for "sid"');
    expect(req.cookies).toEqual([]);
  });

  it('rejects names that are not tokens', () => {
    const req = newRequest('GET', URL_, [withCookies({ name: 'a=b', value: '1' })]);
    expect(req.err?.message).toBe('cookie: invalid name "a=b"');
  });

  it('adds none of a batch that holds an invalid cookie', () => {
    const req = newRequest('GET', URL_, [
      withCookies({ name: 'ok', value: '1' }, { name: 'bad', value: 'a;b' }),
    ]);
    expect(req.cookies).toEqual([]);
    expect(req.err?.message).toBe('cookie: invalid value for "bad"');
  });
});

describe('withProxy', () => {
  it('parses the proxy URL', () => {
    const req = newRequest('GET', URL_, [withProxy('http://proxy.local:3128')]);
    expect(req.proxy?.host).toBe('proxy.local:3128');
    expect(req.err).toBeUndefined();
  });

  it('records an error for a malformed URL', () => {
    const req = newRequest('GET', URL_, [withProxy('://invalid')]);
    expect(req.err).toBeInstanceOf(TypeError);
    expect(req.proxy).toBeUndefined();
  });

  it('records an error for an unsupported scheme', () => {
    const req = newRequest('GET', URL_, [withProxy('socks5://proxy.local:1080')]);
    expect(req.err?.message).toBe('proxy: unsupported scheme in "socks5://proxy.local:1080"');
  });
});

describe('transport options', () => {
  it('sets timeout, redirect cap and decompression', () => {
    const req = newRequest('GET', URL_, [withTimeout(1500), withRedirect(0), withDecompressGzip()]);

    expect(req.timeoutMs).toBe(1500);
    expect(req.redirectMax).toBe(0);
    expect(req.decompressGzip).toBe(true);
  });

  it('leaves defaults untouched without options', () => {
    const req = newRequest('GET', URL_, []);

    expect(req.timeoutMs).toBe(0);
    expect(req.redirectMax).toBeUndefined();
    expect(req.decompressGzip).toBe(false);
    expect(req.cookies).toEqual([]);
  });
});
