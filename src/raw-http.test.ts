/**
 * Tests for raw HTTP text helpers
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from './errors.js';
import {
  encodeBody,
  foldHeaderValue,
  normalizeLineEndings,
  parseExtraHeaders,
  parseTarget,
  serializeRequest,
} from './raw-http.js';
import type { SynthesizedRequest } from './types/request.js';

describe('normalizeLineEndings', () => {
  it('converts every line break style to CRLF', () => {
    expect(normalizeLineEndings('a\nb\rc\r\nd')).toBe('a\r\nb\r\nc\r\nd');
  });

  it('leaves text without breaks unchanged', () => {
    expect(normalizeLineEndings('plain')).toBe('plain');
  });
});

describe('foldHeaderValue', () => {
  it('drops leading and trailing line breaks', () => {
    expect(foldHeaderValue('\r\nBearer abc\n')).toBe('Bearer abc');
  });

  it('folds interior line breaks into one continuation', () => {
    expect(foldHeaderValue('a\n\nb')).toBe('a\r\n b');
    expect(foldHeaderValue('a \r\n\t b')).toBe('a\r\n b');
  });

  it('is stable on folded values', () => {
    expect(foldHeaderValue('a\r\n b')).toBe('a\r\n b');
    expect(foldHeaderValue('plain value')).toBe('plain value');
  });
});

describe('serializeRequest', () => {
  const request: SynthesizedRequest = {
    requestLine: 'POST /notes HTTP/1.1',
    headers: [
      { name: 'Host', value: 'api.example.com' },
      { name: 'Content-Type', value: 'text/plain' },
      { name: 'Content-Length', value: '5' },
    ],
    body: encodeBody('hello'),
    target: { host: 'api.example.com', port: 443, secure: true },
  };

  it('writes request line, headers, a blank line and the body', () => {
    expect(serializeRequest(request)).toBe(
      'POST /notes HTTP/1.1\r\n' +
      'Host: api.example.com\r\n' +
      'Content-Type: text/plain\r\n' +
      'Content-Length: 5\r\n' +
      '\r\n' +
      'hello'
    );
  });

  it('never writes a blank line inside the headers', () => {
    const raw = serializeRequest({
      ...request,
      headers: [{ name: 'Host', value: 'h\n' }, { name: 'X-Note', value: 'a\n\nb' }],
      body: encodeBody(''),
    });

    expect(raw).toBe('POST /notes HTTP/1.1\r\nHost: h\r\nX-Note: a\r\n b\r\n\r\n');
  });

  it('ends with the blank line when there is no body', () => {
    const raw = serializeRequest({ ...request, headers: [{ name: 'Host', value: 'h' }], body: encodeBody('') });

    expect(raw).toBe('POST /notes HTTP/1.1\r\nHost: h\r\n\r\n');
  });
});

describe('parseTarget', () => {
  it('uses the default port of the scheme', () => {
    expect(parseTarget('example.com', 'https')).toEqual({
      host: 'example.com',
      port: 443,
      secure: true,
      hostHeader: 'example.com',
    });
    expect(parseTarget('example.com', 'http')).toMatchObject({ port: 80, secure: false });
  });

  it('reads an explicit port', () => {
    expect(parseTarget('example.com:8080', 'http')).toEqual({
      host: 'example.com',
      port: 8080,
      secure: false,
      hostHeader: 'example.com:8080',
    });
  });

  it('handles bracketed IPv6 addresses', () => {
    expect(parseTarget('[::1]:8080', 'http')).toEqual({
      host: '::1',
      port: 8080,
      secure: false,
      hostHeader: '[::1]:8080',
    });
    expect(parseTarget('[::1]', 'https')).toMatchObject({ host: '::1', port: 443 });
  });

  it('drops scheme, credentials and path from URLs', () => {
    expect(parseTarget('http://user:pw@example.com/api?x=1', 'https')).toEqual({
      host: 'example.com',
      port: 443,
      secure: true,
      hostHeader: 'example.com',
    });
  });

  it('rejects empty hosts', () => {
    expect(() => parseTarget('', 'https')).toThrow(ConfigurationError);
    expect(() => parseTarget(':8080', 'https')).toThrow('Target host is empty');
  });

  it.each(['0', '70000', 'abc', ''])('rejects port %j', port => {
    expect(() => parseTarget(`example.com:${port}`, 'https')).toThrow(`Invalid target port: ${port}`);
  });
});

describe('parseExtraHeaders', () => {
  it('parses one header per line in order', () => {
    expect(parseExtraHeaders('X-Test: 1\r\nX-Other:two\nX-Test: 3')).toEqual([
      { name: 'X-Test', value: '1' },
      { name: 'X-Other', value: 'two' },
      { name: 'X-Test', value: '3' },
    ]);
  });

  it('keeps colons inside values', () => {
    expect(parseExtraHeaders('Referer: https://example.com:8443/')).toEqual([
      { name: 'Referer', value: 'https://example.com:8443/' },
    ]);
  });

  it('skips blank lines, comments and malformed lines', () => {
    expect(parseExtraHeaders('\n# comment\nno colon here\n: empty name\nX-Ok: yes\n')).toEqual([
      { name: 'X-Ok', value: 'yes' },
    ]);
  });

  it('returns nothing for missing input', () => {
    expect(parseExtraHeaders(undefined)).toEqual([]);
    expect(parseExtraHeaders('')).toEqual([]);
  });
});
