/**
 * OpenAPI document loader
 *
 * Host-side I/O: reads a JSON file and checks it is an OpenAPI 3.x
 * document. YAML and Swagger 2.0 input are rejected with a message telling
 * the user what to convert.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, toError } from './errors.js';
import type { OpenApiDocument } from './types/openapi.js';
import { isRecord } from './validation-utils.js';

const documentSchema = z.object({
  openapi: z.string().regex(/^3\.\d+/, 'only OpenAPI 3.x documents are supported'),
  paths: z.record(z.unknown()).optional(),
  components: z.record(z.unknown()).optional(),
  security: z.array(z.record(z.array(z.string()))).optional(),
}).passthrough();

export function parseDocument(text: string, source = '<input>'): OpenApiDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in ${source}: ${toError(error).message}`,
      { source }
    );
  }

  if (isRecord(json) && typeof json.swagger === 'string') {
    throw new ConfigurationError(
      `Swagger ${json.swagger} documents are not supported; convert ${source} to OpenAPI 3 first`,
      { source, swagger: json.swagger }
    );
  }

  const result = documentSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(
      `${source} is not an OpenAPI 3 document: ${issues.join('; ')}`,
      { source, issues }
    );
  }

  return result.data;
}

export async function loadDocument(specPath: string): Promise<OpenApiDocument> {
  const extension = path.extname(specPath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    throw new ConfigurationError(
      `YAML input is not supported; convert ${specPath} to JSON first`,
      { specPath }
    );
  }

  let content: string;
  try {
    content = await fs.readFile(specPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read OpenAPI document ${specPath}: ${toError(error).message}`,
      { specPath }
    );
  }

  return parseDocument(content, specPath);
}
