/**
 * Operational types for request synthesis
 *
 * Why simplified: Synthesis only needs the shape of an operation (verb, path
 * template, parameters, body schema). The walker reads the document as
 * untyped JSON, so the document type only names the top-level sections it
 * looks at. Any OpenAPIV3.Document from openapi-types is assignable to it.
 */

import type { OpenAPIV3 } from 'openapi-types';

export interface OpenApiDocument {
  openapi: string;
  paths?: object;
  components?: object;
  security?: readonly object[];
}

export type SecurityRequirement = OpenAPIV3.SecurityRequirementObject;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'TRACE';

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export interface OperationDescriptor {
  /** `"<METHOD> <path>"`, unique within a walk */
  key: string;
  method: HttpMethod;
  path: string;
  operationId?: string;
  summary?: string;
  tags: string[];
  parameters: ParameterSpec[];
  requestBodySchema?: SchemaInfo;
  requestBodyExample?: unknown;
  contentType?: string;
  requestBodyRequired: boolean;
  security: SecurityRequirement[];
}

export interface ParameterSpec {
  name: string;
  in: ParameterLocation;
  required: boolean;
  schema: SchemaInfo;
  example?: unknown;
  description?: string;
}

export interface SchemaInfo {
  type?: string;
  format?: string;
  enum?: unknown[];
  items?: SchemaInfo;
  properties?: Record<string, SchemaInfo>;
  required?: string[];
  example?: unknown;
  default?: unknown;
  nullable?: boolean;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  ref?: string;
  circular?: boolean;
  anyOf?: SchemaInfo[];
  oneOf?: SchemaInfo[];
}

export interface OperationFailure {
  /** Absent when the whole path item could not be resolved */
  method?: HttpMethod;
  path: string;
  error: Error;
}

export interface WalkResult {
  operations: OperationDescriptor[];
  failures: OperationFailure[];
}
