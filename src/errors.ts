/**
 * Structured error types
 *
 * Every error carries a machine-readable code and the offending identifier
 * in `details`, so a host can show a message for one operation and keep
 * going with the rest.
 */

export class RawRequestError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RawRequestError';
  }
}

export class SchemaResolutionError extends RawRequestError {
  constructor(public ref: string, reason: string = 'target not found') {
    super(
      `Cannot resolve reference '${ref}': ${reason}`,
      'SCHEMA_RESOLUTION_ERROR',
      { ref, reason }
    );
    this.name = 'SchemaResolutionError';
  }
}

export class MissingParameterError extends RawRequestError {
  constructor(public paramName: string, path?: string) {
    super(
      `Missing path parameter: ${paramName}`,
      'MISSING_PARAMETER',
      path ? { paramName, path } : { paramName }
    );
    this.name = 'MissingParameterError';
  }
}

export class UnsupportedContentTypeError extends RawRequestError {
  constructor(public contentType: string) {
    super(
      `Unsupported content type: ${contentType}`,
      'UNSUPPORTED_CONTENT_TYPE',
      { contentType }
    );
    this.name = 'UnsupportedContentTypeError';
  }
}

export class ConfigurationError extends RawRequestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper function to check if an error is a RawRequestError
 */
export function isRawRequestError(error: unknown): error is RawRequestError {
  return error instanceof RawRequestError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isRawRequestError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
