/**
 * CLI command logic
 *
 * Lists the operations of a document, or prints raw requests for the
 * selected operation(s) on stdout. Kept apart from the entry point so it can
 * run in tests with an injected loader and output sink.
 */

import { CRLF } from './constants.js';
import type { CliConfig } from './config.js';
import { isRawRequestError } from './errors.js';
import type { Logger } from './logger.js';
import { parseTarget, serializeRequest } from './raw-http.js';
import { RequestSynthesizer } from './request-synthesizer.js';
import { loadDocument } from './spec-loader.js';
import { SpecWalker } from './spec-walker.js';
import type { OpenApiDocument, OperationDescriptor } from './types/openapi.js';
import type { RuntimeOptions } from './types/request.js';

export const EXIT_CODES = {
  OK: 0,
  CONFIGURATION_ERROR: 1,
  PARTIAL_FAILURE: 2,
} as const;

export const REQUEST_SEPARATOR = `${CRLF}###${CRLF}`;

export interface CliIo {
  stdout: (text: string) => void;
  logger: Logger;
  loadDocument?: (specPath: string) => Promise<OpenApiDocument>;
}

/**
 * Match `GET /users/{id}` (method case-insensitive) or an operationId
 */
export function matchesOperation(operation: OperationDescriptor, selector: string): boolean {
  if (operation.operationId === selector) return true;

  const space = selector.indexOf(' ');
  if (space < 0) return false;
  const method = selector.slice(0, space).toUpperCase();
  const path = selector.slice(space + 1).trim();
  return operation.method === method && operation.path === path;
}

export function formatOperationList(operations: OperationDescriptor[]): string {
  return operations
    .map(op => `${op.method.padEnd(7)} ${op.path}${op.operationId ? `  ${op.operationId}` : ''}\n`)
    .join('');
}

export async function runCli(config: CliConfig, io: CliIo): Promise<number> {
  const { logger } = io;
  const load = io.loadDocument ?? loadDocument;

  let document: OpenApiDocument;
  try {
    document = await load(config.specPath);
  } catch (error) {
    if (!isRawRequestError(error)) throw error;
    logger.error('Failed to load OpenAPI document', error, { specPath: config.specPath });
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  const { operations, failures } = new SpecWalker(logger).walkDocument(document);
  logger.info(`Found ${operations.length} operations`, { skipped: failures.length });

  if (!config.operation) {
    io.stdout(formatOperationList(operations));
    return failures.length > 0 ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.OK;
  }

  if (!config.target) {
    logger.error('RAW_HTTP_TARGET is required to render requests');
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  try {
    parseTarget(config.target, config.scheme);
  } catch (error) {
    if (!isRawRequestError(error)) throw error;
    logger.error('Invalid target', error, { target: config.target });
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  const renderAll = config.operation === 'all';
  const selector = config.operation;
  const selected = renderAll ? operations : operations.filter(op => matchesOperation(op, selector));
  if (selected.length === 0) {
    logger.error('Operation not found', undefined, { operation: selector });
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  const options: RuntimeOptions = {
    host: config.target,
    scheme: config.scheme,
    bearerToken: config.bearerToken,
    extraHeaders: config.extraHeaders,
    arrayFormat: config.arrayFormat,
  };

  const synthesizer = new RequestSynthesizer(logger);
  const rendered: string[] = [];
  let failed = renderAll && failures.length > 0;

  for (const operation of selected) {
    try {
      rendered.push(serializeRequest(synthesizer.synthesizeWithFallback(operation, options)));
    } catch (error) {
      if (!isRawRequestError(error)) throw error;
      logger.error('Failed to synthesize request', error, { operation: operation.key });
      failed = true;
    }
  }

  io.stdout(rendered.join(REQUEST_SEPARATOR));
  return failed ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.OK;
}
