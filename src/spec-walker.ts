/**
 * OpenAPI document walker
 *
 * Flattens the path/operation tree into OperationDescriptor records with
 * parameters merged and every schema reference resolved. Walking has no
 * side effects besides logging: each call builds fresh descriptors.
 */

import { OPERATION_METHODS } from './constants.js';
import { RawRequestError, getErrorDetails } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { SchemaResolver } from './schema-resolver.js';
import type {
  HttpMethod,
  OpenApiDocument,
  OperationDescriptor,
  OperationFailure,
  ParameterLocation,
  ParameterSpec,
  SecurityRequirement,
  WalkResult,
} from './types/openapi.js';
import { isRecord, stringArray } from './validation-utils.js';

type OperationMethod = (typeof OPERATION_METHODS)[number];

const METHOD_NAMES: Record<OperationMethod, HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
  head: 'HEAD',
  options: 'OPTIONS',
  trace: 'TRACE',
};

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header', 'cookie'];

const PREFERRED_CONTENT_TYPE = 'application/json';

export function operationKey(method: HttpMethod, path: string): string {
  return `${method} ${path}`;
}

export class SpecWalker {
  constructor(private readonly logger: Logger = silentLogger()) {}

  /**
   * Enumerate testable operations in declared-path, canonical-method order
   */
  walk(document: OpenApiDocument): OperationDescriptor[] {
    return this.walkDocument(document).operations;
  }

  /**
   * Like walk(), but also reports the operations that were skipped.
   * An unresolvable reference only drops its own operation.
   */
  walkDocument(document: OpenApiDocument): WalkResult {
    const operations: OperationDescriptor[] = [];
    const failures: OperationFailure[] = [];
    const resolver = new SchemaResolver(document);

    const paths: unknown = document.paths;
    if (!isRecord(paths)) {
      this.logger.warn('OpenAPI document has no paths');
      return { operations, failures };
    }

    for (const [path, rawPathItem] of Object.entries(paths)) {
      let pathItem: Record<string, unknown> | undefined;
      try {
        pathItem = resolver.resolveObject(rawPathItem);
      } catch (error) {
        if (!(error instanceof RawRequestError)) throw error;
        failures.push({ path, error });
        this.logger.warn('Skipping path item', { path, ...getErrorDetails(error) });
        continue;
      }

      if (!pathItem) {
        this.logger.debug('Skipping non-object path item', { path });
        continue;
      }

      for (const verb of OPERATION_METHODS) {
        const operation = pathItem[verb];
        if (operation === undefined) continue;

        const method = METHOD_NAMES[verb];
        if (!isRecord(operation)) {
          this.logger.debug('Skipping malformed operation', { operation: operationKey(method, path) });
          continue;
        }

        try {
          operations.push(this.describeOperation(resolver, document, path, method, pathItem, operation));
        } catch (error) {
          if (!(error instanceof RawRequestError)) throw error;
          failures.push({ method, path, error });
          this.logger.warn('Skipping operation', {
            operation: operationKey(method, path),
            ...getErrorDetails(error),
          });
        }
      }
    }

    this.logger.debug('Walked OpenAPI document', {
      operations: operations.length,
      failures: failures.length,
    });

    return { operations, failures };
  }

  private describeOperation(
    resolver: SchemaResolver,
    document: OpenApiDocument,
    path: string,
    method: HttpMethod,
    pathItem: Record<string, unknown>,
    operation: Record<string, unknown>
  ): OperationDescriptor {
    const descriptor: OperationDescriptor = {
      key: operationKey(method, path),
      method,
      path,
      tags: stringArray(operation.tags),
      parameters: this.mergeParameters(resolver, pathItem.parameters, operation.parameters),
      requestBodyRequired: false,
      security: normalizeSecurity(operation.security ?? document.security),
    };

    if (typeof operation.operationId === 'string') descriptor.operationId = operation.operationId;
    if (typeof operation.summary === 'string') descriptor.summary = operation.summary;

    const requestBody = resolver.resolveObject(operation.requestBody);
    if (requestBody) {
      descriptor.requestBodyRequired = requestBody.required === true;
      const content = isRecord(requestBody.content) ? requestBody.content : {};
      const contentTypes = Object.keys(content);
      const contentType = contentTypes.includes(PREFERRED_CONTENT_TYPE)
        ? PREFERRED_CONTENT_TYPE
        : contentTypes[0];

      if (contentType !== undefined) {
        descriptor.contentType = contentType;
        const media = content[contentType];
        if (isRecord(media)) {
          if (media.schema !== undefined) {
            descriptor.requestBodySchema = resolver.extractSchema(media.schema);
          }
          const example = exampleOf(resolver, media);
          if (example !== undefined) descriptor.requestBodyExample = example;
        }
      }
    }

    return descriptor;
  }

  /**
   * Merge path-level and operation-level parameters
   *
   * Operation-level entries replace path-level entries with the same
   * (location, name) pair.
   */
  private mergeParameters(
    resolver: SchemaResolver,
    pathParams: unknown,
    opParams: unknown
  ): ParameterSpec[] {
    const merged = new Map<string, ParameterSpec>();

    for (const raw of [...asArray(pathParams), ...asArray(opParams)]) {
      const param = this.toParameterSpec(resolver, raw);
      if (!param) continue;
      merged.set(`${param.in}:${param.name}`, param);
    }

    return [...merged.values()];
  }

  private toParameterSpec(resolver: SchemaResolver, raw: unknown): ParameterSpec | undefined {
    const param = resolver.resolveObject(raw);
    if (!param) return undefined;

    const location = PARAMETER_LOCATIONS.find(loc => loc === param.in);
    if (!location || typeof param.name !== 'string' || !param.name) return undefined;

    const spec: ParameterSpec = {
      name: param.name,
      in: location,
      required: location === 'path' || param.required === true,
      schema: resolver.extractSchema(parameterSchema(param)),
    };

    const example = exampleOf(resolver, param);
    if (example !== undefined) spec.example = example;
    if (typeof param.description === 'string') spec.description = param.description;

    return spec;
  }
}

/**
 * Parameters declare their schema either directly or through `content`
 */
function parameterSchema(param: Record<string, unknown>): unknown {
  if (param.schema !== undefined) return param.schema;
  if (isRecord(param.content)) {
    const [media] = Object.values(param.content);
    if (isRecord(media)) return media.schema;
  }
  return undefined;
}

/**
 * Explicit `example`, else the value of the first entry in `examples`
 */
function exampleOf(resolver: SchemaResolver, node: Record<string, unknown>): unknown {
  if ('example' in node) return node.example;
  if (!isRecord(node.examples)) return undefined;

  const [first] = Object.values(node.examples);
  const example = resolver.resolveObject(first);
  return example?.value;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function normalizeSecurity(value: unknown): SecurityRequirement[] {
  const requirements: SecurityRequirement[] = [];
  for (const entry of asArray(value)) {
    if (!isRecord(entry)) continue;
    const requirement: SecurityRequirement = {};
    for (const [scheme, scopes] of Object.entries(entry)) {
      requirement[scheme] = stringArray(scopes);
    }
    requirements.push(requirement);
  }
  return requirements;
}
