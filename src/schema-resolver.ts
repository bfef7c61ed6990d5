/**
 * Reference resolution and schema extraction
 *
 * Turns raw OpenAPI schema nodes into SchemaInfo trees with `$ref`s inlined.
 * One resolver is created per walk. Each referenced schema is extracted once
 * per walk and shared by every place that references it, so the result
 * stays proportional to the document even when schemas reference each
 * other densely. Shared SchemaInfo objects are never mutated.
 */

import { SchemaResolutionError } from './errors.js';
import type { SchemaInfo } from './types/openapi.js';
import { finiteNumber, isRecord, stringArray } from './validation-utils.js';

export class SchemaResolver {
  private readonly extracted = new Map<string, SchemaInfo>();
  private readonly inProgress = new Set<string>();

  constructor(private readonly root: unknown) {}

  /**
   * Resolve a local JSON pointer reference (`#/components/schemas/Pet`)
   */
  resolvePointer(ref: string): unknown {
    if (ref === '#') return this.root;
    if (!ref.startsWith('#/')) {
      throw new SchemaResolutionError(ref, 'only local references are supported');
    }

    let current: unknown = this.root;
    for (const segment of ref.slice(2).split('/').map(decodePointerSegment)) {
      if (Array.isArray(current) && /^\d+$/.test(segment)) {
        current = current[Number(segment)];
      } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
        current = current[segment];
      } else {
        throw new SchemaResolutionError(ref);
      }
    }

    if (current === undefined) throw new SchemaResolutionError(ref);
    return current;
  }

  /**
   * Follow `$ref` chains for non-schema components (parameters, request bodies)
   */
  resolveObject(node: unknown, visiting: ReadonlySet<string> = new Set()): Record<string, unknown> | undefined {
    if (!isRecord(node)) return undefined;
    if (typeof node.$ref !== 'string') return node;

    const ref = node.$ref;
    if (visiting.has(ref)) {
      throw new SchemaResolutionError(ref, 'circular reference');
    }
    return this.resolveObject(this.resolvePointer(ref), new Set([...visiting, ref]));
  }

  /**
   * Extract a schema with references inlined
   *
   * A reference that is still being extracted (it is on the current
   * resolution path) yields a `{ ref, circular: true }` placeholder.
   * A reference extracted earlier in the walk reuses that result.
   */
  extractSchema(node: unknown): SchemaInfo {
    if (!isRecord(node)) return {};

    if (typeof node.$ref === 'string') {
      return { ...this.extractReference(node.$ref), ref: node.$ref };
    }

    const result: SchemaInfo = {};

    if (typeof node.type === 'string') {
      result.type = node.type;
    } else if (Array.isArray(node.type)) {
      // OpenAPI 3.1: type: ['string', 'null']
      const types = stringArray(node.type);
      result.type = types.find(t => t !== 'null') ?? types[0];
      if (types.includes('null')) result.nullable = true;
    }

    if (typeof node.format === 'string') result.format = node.format;
    if (Array.isArray(node.enum)) result.enum = [...node.enum];
    if ('example' in node) {
      result.example = node.example;
    } else if (Array.isArray(node.examples) && node.examples.length > 0) {
      result.example = node.examples[0];
    }
    if ('default' in node) result.default = node.default;
    if (node.nullable === true) result.nullable = true;

    const minimum = finiteNumber(node.minimum);
    const maximum = finiteNumber(node.maximum);
    const minLength = finiteNumber(node.minLength);
    const maxLength = finiteNumber(node.maxLength);
    if (minimum !== undefined) result.minimum = minimum;
    if (maximum !== undefined) result.maximum = maximum;
    if (minLength !== undefined) result.minLength = minLength;
    if (maxLength !== undefined) result.maxLength = maxLength;

    if (node.items !== undefined) {
      result.items = this.extractSchema(node.items);
    }

    if (isRecord(node.properties)) {
      result.properties = {};
      for (const [key, propSchema] of Object.entries(node.properties)) {
        result.properties[key] = this.extractSchema(propSchema);
      }
    }

    const required = stringArray(node.required);
    if (required.length > 0) result.required = required;

    if (Array.isArray(node.allOf) && node.allOf.length > 0) {
      for (const member of node.allOf) {
        this.mergeSchemaInfo(result, this.extractSchema(member));
      }
    }

    if (Array.isArray(node.anyOf) && node.anyOf.length > 0) {
      result.anyOf = node.anyOf.map(member => this.extractSchema(member));
    }

    if (Array.isArray(node.oneOf) && node.oneOf.length > 0) {
      result.oneOf = node.oneOf.map(member => this.extractSchema(member));
    }

    return result;
  }

  private extractReference(ref: string): SchemaInfo {
    if (this.inProgress.has(ref)) {
      return { ref, circular: true };
    }

    const cached = this.extracted.get(ref);
    if (cached) return cached;

    this.inProgress.add(ref);
    try {
      const schema = this.extractSchema(this.resolvePointer(ref));
      this.extracted.set(ref, schema);
      return schema;
    } finally {
      this.inProgress.delete(ref);
    }
  }

  /**
   * Merge `source` into `target`. Only `target` and objects created here
   * are written to; `source` subtrees may be shared.
   */
  private mergeSchemaInfo(target: SchemaInfo, source: SchemaInfo): void {
    if (!target.type && source.type) target.type = source.type;
    if (!target.format && source.format) target.format = source.format;
    if (!target.enum && source.enum) target.enum = source.enum;
    if (target.example === undefined && source.example !== undefined) target.example = source.example;
    if (target.default === undefined && source.default !== undefined) target.default = source.default;
    if (source.nullable) target.nullable = true;

    if (source.required) {
      target.required = Array.from(new Set([...(target.required ?? []), ...source.required]));
    }

    if (source.properties) {
      target.properties = target.properties ?? {};
      for (const [key, value] of Object.entries(source.properties)) {
        const existing = target.properties[key];
        if (existing) {
          const merged: SchemaInfo = { ...existing };
          if (existing.properties) merged.properties = { ...existing.properties };
          this.mergeSchemaInfo(merged, value);
          target.properties[key] = merged;
        } else {
          target.properties[key] = value;
        }
      }
    }

    if (source.items) {
      target.items = target.items ?? source.items;
    }

    if (source.anyOf && !target.anyOf) target.anyOf = source.anyOf;
    if (source.oneOf && !target.oneOf) target.oneOf = source.oneOf;
  }
}

function decodePointerSegment(segment: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = segment;
  }
  return decoded.replace(/~1/g, '/').replace(/~0/g, '~');
}
