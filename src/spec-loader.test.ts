/**
 * Tests for OpenAPI document loading
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from './errors.js';
import { loadDocument, parseDocument } from './spec-loader.js';
import { SpecWalker } from './spec-walker.js';
import { petStoreDocument } from './testing/fixtures.js';

describe('parseDocument', () => {
  it('returns the document parts the walker reads', () => {
    const document = parseDocument(JSON.stringify(petStoreDocument));

    expect(document.openapi).toBe('3.0.3');
    expect(Object.keys(document.paths ?? {})).toEqual([
      '/pets',
      '/pets/{petId}',
      '/pets/{petId}/photo',
      '/categories/{categoryId}/tree',
    ]);
    expect(document.security).toEqual([{ bearerAuth: [] }]);
  });

  it('keeps extension sections that references point into', () => {
    const document = parseDocument(JSON.stringify({
      openapi: '3.0.3',
      paths: {
        '/search': {
          get: {
            parameters: [{ name: 'q', in: 'query', required: true, schema: { $ref: '#/x-shared/Query' } }],
          },
        },
      },
      'x-shared': { Query: { type: 'string', example: 'shared' } },
    }));

    expect(document).toHaveProperty('x-shared');

    const result = new SpecWalker().walkDocument(document);
    expect(result.failures).toEqual([]);
    expect(result.operations[0]?.parameters[0]?.schema).toEqual({
      type: 'string',
      example: 'shared',
      ref: '#/x-shared/Query',
    });
  });

  it('accepts OpenAPI 3.1 documents', () => {
    expect(parseDocument('{"openapi":"3.1.0","paths":{}}').openapi).toBe('3.1.0');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseDocument('{"openapi":', 'api.json')).toThrow(ConfigurationError);
    expect(() => parseDocument('{"openapi":', 'api.json')).toThrow('Invalid JSON in api.json');
  });

  it('rejects Swagger 2.0 documents', () => {
    expect(() => parseDocument('{"swagger":"2.0","paths":{}}', 'legacy.json')).toThrow(
      'Swagger 2.0 documents are not supported; convert legacy.json to OpenAPI 3 first'
    );
  });

  it('rejects documents without an OpenAPI 3 version', () => {
    expect(() => parseDocument('{"paths":{}}', 'api.json')).toThrow(
      'api.json is not an OpenAPI 3 document: openapi: Required'
    );
    expect(() => parseDocument('{"openapi":"2.5"}')).toThrow(
      '<input> is not an OpenAPI 3 document: openapi: only OpenAPI 3.x documents are supported'
    );
  });

  it('rejects non-object roots', () => {
    expect(() => parseDocument('[]')).toThrow(
      '<input> is not an OpenAPI 3 document: (root): Expected object, received array'
    );
  });
});

describe('loadDocument', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raw-requests-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a JSON document from disk', async () => {
    const file = path.join(dir, 'petstore.json');
    await fs.writeFile(file, JSON.stringify(petStoreDocument), 'utf-8');

    const document = await loadDocument(file);
    expect(document.openapi).toBe('3.0.3');
  });

  it('rejects YAML files by extension', async () => {
    await expect(loadDocument('api.yaml')).rejects.toThrow(
      'YAML input is not supported; convert api.yaml to JSON first'
    );
    await expect(loadDocument('API.YML')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('wraps read failures', async () => {
    const missing = path.join(dir, 'missing.json');

    await expect(loadDocument(missing)).rejects.toThrow(`Cannot read OpenAPI document ${missing}`);
  });

  it('names the file in parse errors', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{', 'utf-8');

    await expect(loadDocument(file)).rejects.toThrow(`Invalid JSON in ${file}`);
  });
});
