/**
 * Raw HTTP/1.1 text helpers
 *
 * Wire-format details live here: line endings, the request layout, and the
 * parsing of user-typed targets and header lists.
 */

import { CRLF, DEFAULT_PORTS } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { HeaderField, RequestTarget, Scheme, SynthesizedRequest } from './types/request.js';

export interface ParsedTarget extends RequestTarget {
  /** Value for the Host header: host plus the port if one was typed */
  hostHeader: string;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Convert every line break (CRLF, lone CR, lone LF) to CRLF
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n|\r|\n/g, CRLF);
}

export function encodeBody(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Make a header value safe to write on one header line
 *
 * Leading and trailing line breaks are dropped. An interior line break
 * becomes CRLF plus one space (a folded continuation), so a value can
 * never produce an empty line inside the header block.
 */
export function foldHeaderValue(value: string): string {
  return value
    .replace(/^[\r\n]+|[\r\n]+$/g, '')
    .replace(/[ \t]*(?:\r\n|\r|\n)+[ \t]*/g, `${CRLF} `);
}

/**
 * Serialize a request: request line, headers, one blank line, body.
 * Nothing follows the body.
 */
export function serializeRequest(request: SynthesizedRequest): string {
  const head = [
    request.requestLine,
    ...request.headers.map(header => `${header.name}: ${foldHeaderValue(header.value)}`),
  ].map(normalizeLineEndings);

  return head.map(line => `${line}${CRLF}`).join('') + CRLF + decoder.decode(request.body);
}

/**
 * Parse a typed target into host, port and Host header value
 *
 * Accepts `example.com`, `example.com:8443`, `[::1]:8080` and full URLs
 * (`https://example.com:444/api`). Scheme and path of a URL are dropped:
 * the `scheme` argument decides TLS and the default port.
 */
export function parseTarget(input: string, scheme: Scheme): ParsedTarget {
  let rest = input.trim().replace(/^https?:\/\//i, '');
  rest = rest.split(/[/?#]/)[0] ?? '';
  rest = rest.slice(rest.lastIndexOf('@') + 1);

  if (!rest) {
    throw new ConfigurationError('Target host is empty', { target: input });
  }

  let host = rest;
  let portText: string | undefined;

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(rest);
  if (bracketed) {
    host = bracketed[1] ?? '';
    portText = bracketed[2];
  } else {
    const colon = rest.indexOf(':');
    if (colon >= 0) {
      host = rest.slice(0, colon);
      portText = rest.slice(colon + 1);
    }
  }

  if (!host) {
    throw new ConfigurationError('Target host is empty', { target: input });
  }

  let port: number = DEFAULT_PORTS[scheme];
  if (portText !== undefined) {
    const parsed = /^\d+$/.test(portText) ? Number(portText) : NaN;
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
      throw new ConfigurationError(`Invalid target port: ${portText}`, { target: input });
    }
    port = parsed;
  }

  return {
    host,
    port,
    secure: scheme === 'https',
    hostHeader: rest,
  };
}

/**
 * Parse free-text headers, one `Name: value` per line
 *
 * Blank lines, `#` comments and lines without a colon are skipped. Order and
 * repeated names are preserved.
 */
export function parseExtraHeaders(text: string | undefined): HeaderField[] {
  const headers: HeaderField[] = [];
  if (!text) return headers;

  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const colon = line.indexOf(':');
    if (colon < 0) continue;

    const name = line.slice(0, colon).trim();
    if (!name) continue;
    headers.push({ name, value: line.slice(colon + 1).trim() });
  }

  return headers;
}
