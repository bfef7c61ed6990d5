/**
 * Request synthesizer
 *
 * Builds a raw HTTP/1.1 request for one operation from example values.
 * synthesize() depends only on its arguments; the logger is used by the
 * fallback path alone.
 */

import { HTTP_VERSION } from './constants.js';
import { MissingParameterError, UnsupportedContentTypeError } from './errors.js';
import { exampleFromSchema, hasExplicitExample } from './example-values.js';
import { silentLogger, type Logger } from './logger.js';
import { encodeBody, foldHeaderValue, normalizeLineEndings, parseTarget } from './raw-http.js';
import type { OperationDescriptor, ParameterSpec } from './types/openapi.js';
import type { ArrayFormat, HeaderField, RuntimeOptions, SynthesizedRequest } from './types/request.js';
import { isRecord } from './validation-utils.js';

type BodyKind = 'json' | 'form' | 'text';

/**
 * Header parameters never sent as declared. OpenAPI ignores Accept,
 * Content-Type and Authorization; the rest are written by the synthesizer.
 */
const IGNORED_HEADER_PARAMETERS: ReadonlySet<string> = new Set([
  'accept',
  'content-type',
  'authorization',
  'host',
  'content-length',
  'cookie',
]);

interface SynthesizedBody {
  contentType: string;
  text: string;
}

/**
 * Map a declared content type onto the supported body encodings.
 * Media type parameters (`; charset=utf-8`) are ignored.
 */
export function classifyContentType(contentType: string): BodyKind | undefined {
  const mediaType = (contentType.split(';')[0] ?? '').trim().toLowerCase();
  if (mediaType === 'application/json' || mediaType.endsWith('+json')) return 'json';
  if (mediaType === 'application/x-www-form-urlencoded') return 'form';
  if (mediaType === 'text/plain') return 'text';
  return undefined;
}

/**
 * Example value for a parameter: its own example, else the schema's
 */
export function parameterExample(param: ParameterSpec): unknown {
  return param.example !== undefined ? param.example : exampleFromSchema(param.schema);
}

/**
 * Optional parameters are sent only when the document names a value for them
 */
export function shouldIncludeParameter(param: ParameterSpec): boolean {
  return param.required || param.example !== undefined || hasExplicitExample(param.schema);
}

export class RequestSynthesizer {
  constructor(private readonly logger: Logger = silentLogger()) {}

  synthesize(descriptor: OperationDescriptor, options: RuntimeOptions): SynthesizedRequest {
    const target = parseTarget(options.host, options.scheme);
    const path = this.substitutePath(descriptor);
    const query = this.buildQuery(descriptor.parameters, options.arrayFormat ?? 'repeat');
    const requestLine = `${descriptor.method} ${path}${query ? `?${query}` : ''} ${HTTP_VERSION}`;

    const body = this.buildBody(descriptor);
    const bodyBytes = encodeBody(body?.text ?? '');

    const headers: HeaderField[] = [{ name: 'Host', value: target.hostHeader }];
    if (body) {
      headers.push(
        { name: 'Content-Type', value: body.contentType },
        { name: 'Content-Length', value: String(bodyBytes.byteLength) }
      );
    }
    if (options.bearerToken) {
      headers.push({ name: 'Authorization', value: `Bearer ${options.bearerToken}` });
    }
    headers.push(...this.buildParameterHeaders(descriptor.parameters));

    const finalHeaders = this.applyExtraHeaders(headers, options.extraHeaders ?? []);

    return Object.freeze({
      requestLine: normalizeLineEndings(requestLine),
      headers: Object.freeze(finalHeaders.map(header => Object.freeze({
        name: header.name,
        value: foldHeaderValue(header.value),
      }))),
      body: bodyBytes,
      target: Object.freeze({ host: target.host, port: target.port, secure: target.secure }),
    });
  }

  /**
   * Synthesize, sending an empty body when the content type is unsupported.
   * Logs a warning for the operation in that case.
   */
  synthesizeWithFallback(descriptor: OperationDescriptor, options: RuntimeOptions): SynthesizedRequest {
    try {
      return this.synthesize(descriptor, options);
    } catch (error) {
      if (!(error instanceof UnsupportedContentTypeError)) throw error;

      this.logger.warn('Unsupported request content type, sending an empty body', {
        operation: descriptor.key,
        contentType: error.contentType,
      });
      return this.synthesize(
        { ...descriptor, requestBodySchema: undefined, requestBodyExample: undefined },
        options
      );
    }
  }

  private substitutePath(descriptor: OperationDescriptor): string {
    return descriptor.path.replace(/\{([^}]+)\}/g, (_, name: string) => {
      const param = descriptor.parameters.find(p => p.in === 'path' && p.name === name);
      if (!param) {
        throw new MissingParameterError(name, descriptor.path);
      }

      const value = parameterExample(param);
      const parts = Array.isArray(value) ? value.map(formatScalar) : [formatScalar(value)];
      return parts.map(encodeURIComponent).join(',');
    });
  }

  /**
   * Form-style query string. Objects are exploded into their own pairs.
   */
  private buildQuery(parameters: ParameterSpec[], arrayFormat: ArrayFormat): string {
    const searchParams = new URLSearchParams();

    for (const param of parameters) {
      if (param.in !== 'query' || !shouldIncludeParameter(param)) continue;

      const value = parameterExample(param);
      if (Array.isArray(value)) {
        const items = value.map(formatScalar);
        switch (arrayFormat) {
          case 'brackets':
            items.forEach(item => searchParams.append(`${param.name}[]`, item));
            break;
          case 'indices':
            items.forEach((item, i) => searchParams.append(`${param.name}[${i}]`, item));
            break;
          case 'comma':
            searchParams.append(param.name, items.join(','));
            break;
          case 'repeat':
            items.forEach(item => searchParams.append(param.name, item));
            break;
        }
      } else if (isRecord(value)) {
        for (const [key, entry] of Object.entries(value)) {
          searchParams.append(key, formatScalar(entry));
        }
      } else {
        searchParams.append(param.name, formatScalar(value));
      }
    }

    return searchParams.toString();
  }

  /**
   * Header parameters as headers, cookie parameters folded into one Cookie header
   */
  private buildParameterHeaders(parameters: ParameterSpec[]): HeaderField[] {
    const headers: HeaderField[] = [];
    const cookies: string[] = [];

    for (const param of parameters) {
      if (!shouldIncludeParameter(param)) continue;

      const value = parameterExample(param);
      const text = Array.isArray(value) ? value.map(formatScalar).join(',') : formatScalar(value);

      if (param.in === 'header') {
        if (IGNORED_HEADER_PARAMETERS.has(param.name.toLowerCase())) continue;
        headers.push({ name: param.name, value: text });
      } else if (param.in === 'cookie') {
        cookies.push(`${param.name}=${encodeURIComponent(text)}`);
      }
    }

    if (cookies.length > 0) {
      headers.push({ name: 'Cookie', value: cookies.join('; ') });
    }

    return headers;
  }

  private buildBody(descriptor: OperationDescriptor): SynthesizedBody | undefined {
    const { contentType } = descriptor;
    if (!contentType) return undefined;
    if (descriptor.requestBodyExample === undefined && !descriptor.requestBodySchema) return undefined;

    const kind = classifyContentType(contentType);
    if (!kind) {
      throw new UnsupportedContentTypeError(contentType);
    }

    const value = descriptor.requestBodyExample !== undefined
      ? descriptor.requestBodyExample
      : exampleFromSchema(descriptor.requestBodySchema);

    return {
      contentType,
      text: normalizeLineEndings(serializeBody(kind, value)),
    };
  }

  /**
   * Generated headers keep their position; an extra header with the same
   * name (case-insensitive) replaces the value instead of adding a line.
   */
  private applyExtraHeaders(generated: HeaderField[], extras: HeaderField[]): HeaderField[] {
    const headers = generated.map(header => ({ ...header }));
    const generatedCount = headers.length;

    for (const extra of extras) {
      const name = extra.name.trim();
      const index = headers
        .slice(0, generatedCount)
        .findIndex(header => header.name.toLowerCase() === name.toLowerCase());

      const existing = headers[index];
      if (index >= 0 && existing) {
        headers[index] = { name: existing.name, value: extra.value };
      } else {
        headers.push({ name, value: extra.value });
      }
    }

    return headers;
  }
}

function serializeBody(kind: BodyKind, value: unknown): string {
  switch (kind) {
    case 'json':
      return JSON.stringify(value) ?? 'null';
    case 'form': {
      if (!isRecord(value)) return formatScalar(value);
      const form = new URLSearchParams();
      for (const [key, entry] of Object.entries(value)) {
        const items = Array.isArray(entry) ? entry : [entry];
        items.forEach(item => form.append(key, formatScalar(item)));
      }
      return form.toString();
    }
    case 'text':
      return typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  }
}

/**
 * Text form of an example value for URLs and headers
 */
function formatScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}
