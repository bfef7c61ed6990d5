/**
 * Library exports for programmatic usage
 */
export { SpecWalker, operationKey } from './spec-walker.js';
export { SchemaResolver } from './schema-resolver.js';
export { RequestSynthesizer, classifyContentType, parameterExample, shouldIncludeParameter } from './request-synthesizer.js';
export { exampleFromSchema, hasExplicitExample } from './example-values.js';
export { normalizeLineEndings, parseExtraHeaders, parseTarget, serializeRequest } from './raw-http.js';
export { loadDocument, parseDocument } from './spec-loader.js';
export {
  RawRequestError,
  SchemaResolutionError,
  MissingParameterError,
  UnsupportedContentTypeError,
  ConfigurationError,
  isRawRequestError,
  getErrorDetails,
} from './errors.js';
export { ConsoleLogger, JsonLogger, LogLevel } from './logger.js';
export type { Logger } from './logger.js';
export type { ParsedTarget } from './raw-http.js';
export type {
  HttpMethod,
  OpenApiDocument,
  OperationDescriptor,
  OperationFailure,
  ParameterLocation,
  ParameterSpec,
  SchemaInfo,
  WalkResult,
} from './types/openapi.js';
export type { ArrayFormat, HeaderField, RequestTarget, RuntimeOptions, Scheme, SynthesizedRequest } from './types/request.js';
