/**
 * OpenAPI documents used across tests
 *
 * A small pet store covering the shapes the walker and synthesizer handle:
 * path-level parameters, shared component parameters, referenced bodies,
 * composition and a self-referencing schema.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { OpenApiDocument } from '../types/openapi.js';

export const petStoreDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Pet Store', version: '1.0.0' },
  security: [{ bearerAuth: [] }],
  paths: {
    '/pets': {
      post: {
        operationId: 'createPet',
        requestBody: { $ref: '#/components/requestBodies/NewPet' },
        responses: { '201': { description: 'Created' } },
      },
      get: {
        operationId: 'listPets',
        tags: ['pets'],
        parameters: [
          { name: 'limit', in: 'query', required: true, schema: { type: 'integer', minimum: 1 } },
          { name: 'status', in: 'query', schema: { type: 'string', enum: ['available', 'sold'] } },
          { name: 'sort', in: 'query', schema: { type: 'string', default: 'name' } },
        ],
        responses: { '200': { description: 'OK' } },
      },
    },
    '/pets/{petId}': {
      parameters: [
        { name: 'petId', in: 'path', required: true, schema: { type: 'integer' } },
        { name: 'X-Trace', in: 'header', schema: { type: 'string' } },
      ],
      summary: 'Single pet',
      delete: {
        operationId: 'deletePet',
        security: [],
        responses: { '204': { description: 'Deleted' } },
      },
      get: {
        operationId: 'getPet',
        parameters: [
          { name: 'X-Trace', in: 'header', required: true, schema: { type: 'string', example: 'trace-1' } },
          { $ref: '#/components/parameters/Verbose' },
        ],
        responses: { '200': { description: 'OK' } },
      },
      patch: {
        operationId: 'updatePet',
        requestBody: {
          content: {
            'application/x-www-form-urlencoded': {
              schema: { $ref: '#/components/schemas/PetUpdate' },
            },
            'application/json': {
              schema: { $ref: '#/components/schemas/PetUpdate' },
            },
          },
        },
        responses: { '200': { description: 'OK' } },
      },
    },
    '/pets/{petId}/photo': {
      put: {
        operationId: 'uploadPhoto',
        parameters: [
          { name: 'petId', in: 'path', required: true, schema: { type: 'integer' } },
        ],
        requestBody: {
          content: {
            'multipart/form-data': {
              schema: { type: 'object', properties: { file: { type: 'string', format: 'binary' } } },
            },
          },
        },
        responses: { '200': { description: 'OK' } },
      },
    },
    '/categories/{categoryId}/tree': {
      get: {
        operationId: 'getCategoryTree',
        parameters: [
          { name: 'categoryId', in: 'path', required: true, schema: { type: 'string', format: 'uuid' } },
          { name: 'session', in: 'cookie', required: true, schema: { type: 'string', example: 'abc' } },
        ],
        requestBody: {
          content: {
            'application/json': { schema: { $ref: '#/components/schemas/TreeNode' } },
          },
        },
        responses: { '200': { description: 'OK' } },
      },
    },
  },
  components: {
    securitySchemes: {
      bearerAuth: { type: 'http', scheme: 'bearer' },
    },
    parameters: {
      Verbose: { name: 'verbose', in: 'query', schema: { type: 'boolean', example: true } },
    },
    requestBodies: {
      NewPet: {
        required: true,
        content: {
          'application/json': { schema: { $ref: '#/components/schemas/NewPet' } },
        },
      },
    },
    schemas: {
      Category: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string' },
          parent: { type: 'integer' },
        },
      },
      NewPet: {
        type: 'object',
        required: ['name', 'tags', 'category'],
        properties: {
          name: { type: 'string' },
          nickname: { type: 'string' },
          category: { $ref: '#/components/schemas/Category' },
          tags: { type: 'array', items: { type: 'string', format: 'email' } },
          born: { type: 'string', format: 'date' },
        },
      },
      PetUpdate: {
        allOf: [
          { $ref: '#/components/schemas/Category' },
          {
            type: 'object',
            required: ['status'],
            properties: {
              status: { type: 'string', enum: ['available', 'sold'] },
            },
          },
        ],
      },
      TreeNode: {
        type: 'object',
        required: ['label', 'children'],
        properties: {
          label: { type: 'string' },
          children: { type: 'array', items: { $ref: '#/components/schemas/TreeNode' } },
        },
      },
    },
  },
};

/**
 * Document with one operation that references a missing schema
 */
export const brokenReferenceDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Broken', version: '1.0.0' },
  paths: {
    '/orders': {
      get: {
        operationId: 'listOrders',
        responses: { '200': { description: 'OK' } },
      },
      post: {
        operationId: 'createOrder',
        requestBody: {
          content: {
            'application/json': { schema: { $ref: '#/components/schemas/Order' } },
          },
        },
        responses: { '201': { description: 'Created' } },
      },
    },
    '/invoices': {
      get: {
        operationId: 'listInvoices',
        responses: { '200': { description: 'OK' } },
      },
    },
  },
  components: { schemas: {} },
};

/**
 * `size` object schemas S0..S{size-1}, each requiring a reference to every
 * other one. `POST /graph` sends S0.
 */
export function denseGraphDocument(size: number): OpenApiDocument {
  const names = Array.from({ length: size }, (_, i) => `S${i}`);
  const schemas = Object.fromEntries(names.map(name => {
    const others = names.filter(other => other !== name);
    return [name, {
      type: 'object',
      required: others,
      properties: Object.fromEntries(others.map(other => [other, { $ref: `#/components/schemas/${other}` }])),
    }];
  }));

  return {
    openapi: '3.0.3',
    paths: {
      '/graph': {
        post: {
          requestBody: {
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/S0' } },
            },
          },
        },
      },
    },
    components: { schemas },
  };
}
