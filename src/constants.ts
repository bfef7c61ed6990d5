/**
 * Application constants
 */

/**
 * Recursion bound for example synthesis. Schemas nested deeper than this
 * produce `null`.
 */
export const MAX_SCHEMA_DEPTH = 10;

export const HTTP_VERSION = 'HTTP/1.1';

export const CRLF = '\r\n';

/**
 * Operation verbs in the order operations of one path are emitted
 */
export const OPERATION_METHODS = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options', 'trace'] as const;

export const DEFAULT_PORTS = {
  http: 80,
  https: 443,
} as const;

/**
 * Canonical values for schema types without an example
 */
export const CANONICAL_VALUES = {
  STRING: 'string',
  INTEGER: 0,
  NUMBER: 0.0,
  BOOLEAN: true,
} as const;

/**
 * Example values for well-known string formats
 */
export const FORMAT_EXAMPLES: Readonly<Record<string, string>> = {
  'date-time': '2024-01-01T00:00:00Z',
  date: '2024-01-01',
  time: '00:00:00Z',
  email: 'user@example.com',
  uuid: '00000000-0000-0000-0000-000000000000',
  uri: 'https://example.com',
  url: 'https://example.com',
  hostname: 'example.com',
  ipv4: '127.0.0.1',
  ipv6: '::1',
  byte: 'c3RyaW5n',
  password: 'password',
};

export const REDACTED = '[REDACTED]';
