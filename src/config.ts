/**
 * CLI configuration from environment variables
 *
 * Why env: Mirrors how the tool is run in CI and from shell scripts. A
 * `.env` file is loaded by the entry point through dotenv. Positional
 * arguments (`[specPath] [operation]`) override the matching variables.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ConsoleLogger, JsonLogger, LogLevel, parseLogLevel, type Logger } from './logger.js';
import { parseExtraHeaders } from './raw-http.js';
import type { ArrayFormat, HeaderField, Scheme } from './types/request.js';

export interface CliConfig {
  specPath: string;
  /** Operation key (`GET /users/{id}`), operationId, or `all`; absent lists operations */
  operation?: string;
  target?: string;
  scheme: Scheme;
  bearerToken?: string;
  extraHeaders: HeaderField[];
  arrayFormat: ArrayFormat;
  logLevel: LogLevel;
  logFormat: 'console' | 'json';
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const lowerCase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  OPENAPI_SPEC_PATH: optionalText,
  RAW_HTTP_OPERATION: optionalText,
  RAW_HTTP_TARGET: optionalText,
  RAW_HTTP_SCHEME: z.preprocess(
    value => lowerCase(blankToUndefined(value)),
    z.enum(['http', 'https']).default('https')
  ),
  RAW_HTTP_BEARER_TOKEN: optionalText,
  RAW_HTTP_EXTRA_HEADERS: z.preprocess(blankToUndefined, z.string().optional()),
  RAW_HTTP_ARRAY_FORMAT: z.preprocess(
    value => lowerCase(blankToUndefined(value)),
    z.enum(['repeat', 'brackets', 'indices', 'comma']).default('repeat')
  ),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.string()
      .refine(value => parseLogLevel(value) !== undefined, 'expected DEBUG, INFO, WARN, ERROR or SILENT')
      .optional()
  ),
  LOG_FORMAT: z.preprocess(
    value => lowerCase(blankToUndefined(value)),
    z.enum(['console', 'json']).default('console')
  ),
});

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: string[] = []
): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const vars = result.data;
  const [specArg, operationArg] = argv;
  const specPath = specArg ?? vars.OPENAPI_SPEC_PATH;
  if (!specPath) {
    throw new ConfigurationError('OPENAPI_SPEC_PATH environment variable or a spec path argument is required');
  }

  // Single-line env values may carry literal "\n" between headers
  const headerText = vars.RAW_HTTP_EXTRA_HEADERS?.replace(/\\n/g, '\n');

  return {
    specPath,
    operation: operationArg ?? vars.RAW_HTTP_OPERATION,
    target: vars.RAW_HTTP_TARGET,
    scheme: vars.RAW_HTTP_SCHEME,
    bearerToken: vars.RAW_HTTP_BEARER_TOKEN,
    extraHeaders: parseExtraHeaders(headerText),
    arrayFormat: vars.RAW_HTTP_ARRAY_FORMAT,
    logLevel: parseLogLevel(vars.LOG_LEVEL) ?? LogLevel.INFO,
    logFormat: vars.LOG_FORMAT,
  };
}

/**
 * Create the logger selected by LOG_FORMAT, redacting the bearer token
 */
export function createLogger(config: CliConfig): Logger {
  const secrets = config.bearerToken ? [config.bearerToken] : [];
  return config.logFormat === 'json'
    ? new JsonLogger(config.logLevel, secrets)
    : new ConsoleLogger(config.logLevel, secrets);
}
