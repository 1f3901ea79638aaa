/**
 * @module openapi/spec-loader
 * Parse, dereference and extract an OpenAPI 3.x contract.
 *
 * Uses `@readme/openapi-parser` for full $ref resolution (including
 * circular and cross-file references). Extracts the read-only
 * {@link Contract} consumed by the route builder, verifier and selector.
 */

import { dereference } from '@readme/openapi-parser';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ContractLoadError } from '../errors.js';
import {
  HTTP_METHODS,
  type ApiKeyLocation,
  type Contract,
  type ContractOperation,
  type ContractParameter,
  type ContractResponse,
  type HttpMethod,
  type MediaTypeExamples,
  type ParameterLocation,
  type PathItem,
  type SecurityRequirement,
  type SecurityScheme,
} from './types.js';

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header', 'cookie'];
const API_KEY_LOCATIONS: readonly ApiKeyLocation[] = ['query', 'header', 'cookie'];

/**
 * Convert OpenAPI `{param}` path syntax to Fastify `:param` syntax.
 *
 * Example: `/users/{userId}/orders/{orderId}` → `/users/:userId/orders/:orderId`
 */
export function convertOpenApiPath(openApiPath: string): string {
  return openApiPath.replace(/\{([^}]+)\}/g, ':$1');
}

/**
 * Load, dereference and extract an OpenAPI 3.x contract file.
 *
 * @param specPath - Path to the spec file (resolved to absolute)
 * @throws ContractLoadError on a missing file, a parse failure or a
 *   document that is not an OpenAPI 3.x object
 */
export async function loadContract(specPath: string): Promise<Contract> {
  const absolutePath = path.resolve(specPath);

  try {
    await fs.access(absolutePath);
  } catch {
    throw new ContractLoadError('SPEC_NOT_FOUND', `OpenAPI spec file not found: ${absolutePath}`, {
      specPath: absolutePath,
    });
  }

  let document: unknown;
  try {
    document = await dereference(absolutePath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ContractLoadError('SPEC_PARSE_FAILED', `Failed to parse OpenAPI spec: ${message}`, {
      specPath: absolutePath,
    });
  }

  return parseContract(document, absolutePath);
}

/**
 * Extract a {@link Contract} from an already dereferenced document.
 *
 * @throws ContractLoadError (`SPEC_INVALID`) when the document is not an
 *   OpenAPI 3.x object
 */
export function parseContract(document: unknown, specPath: string): Contract {
  if (!isRecord(document)) {
    throw new ContractLoadError('SPEC_INVALID', `OpenAPI spec is not an object: ${specPath}`, { specPath });
  }

  const openApiVersion = document['openapi'];
  if (typeof openApiVersion !== 'string' || !openApiVersion.startsWith('3.')) {
    throw new ContractLoadError(
      'SPEC_INVALID',
      `OpenAPI spec has no OpenAPI 3.x version field: ${specPath}`,
      { specPath, openapi: openApiVersion },
    );
  }

  const rawPaths = document['paths'] ?? {};
  if (!isRecord(rawPaths)) {
    throw new ContractLoadError('SPEC_INVALID', `OpenAPI spec \`paths\` is not an object: ${specPath}`, { specPath });
  }

  const info = recordOrEmpty(document['info']);
  const components = recordOrEmpty(document['components']);

  const paths = new Map<string, PathItem>();
  for (const [openApiPath, rawPathItem] of Object.entries(rawPaths)) {
    if (!isRecord(rawPathItem)) continue;
    paths.set(openApiPath, Object.freeze(extractPathItem(openApiPath, rawPathItem)));
  }

  return Object.freeze({
    specPath,
    openApiVersion,
    title: stringOrUndefined(info['title']) ?? 'Untitled',
    version: stringOrUndefined(info['version']) ?? '',
    paths,
    securitySchemes: extractSecuritySchemes(components['securitySchemes']),
    parsedAt: Date.now(),
  });
}

// =====================================================================
// Extraction internals
// =====================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordOrEmpty(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === 'string' && allowed.some((candidate) => candidate === value);
}

/** `null` counts as absent, like a missing key. */
function presentOrUndefined(value: unknown): unknown {
  return value === null ? undefined : value;
}

function extractPathItem(
  openApiPath: string,
  pathItem: Record<string, unknown>,
): PathItem {
  const pathLevelParams = extractParameters(pathItem['parameters']);
  const item: Partial<Record<HttpMethod, ContractOperation>> = {};

  for (const method of HTTP_METHODS) {
    const operation = pathItem[method.toLowerCase()];
    if (!isRecord(operation)) continue;

    const rawBody = operation['requestBody'];
    const requestBody = isRecord(rawBody) ? { required: rawBody['required'] === true } : undefined;

    item[method] = Object.freeze({
      method,
      path: openApiPath,
      operationId: stringOrUndefined(operation['operationId']),
      parameters: Object.freeze(mergeParameters(pathLevelParams, extractParameters(operation['parameters']))),
      requestBody,
      // Only the operation's own list counts; document-level security is not inherited
      security: extractSecurity(operation['security']),
      responses: extractResponses(operation['responses']),
    });
  }

  return item;
}

function extractParameters(raw: unknown): ContractParameter[] {
  if (!Array.isArray(raw)) return [];

  const params: ContractParameter[] = [];
  for (const p of raw) {
    if (!isRecord(p)) continue;
    const name = p['name'];
    const location = p['in'];
    if (typeof name !== 'string' || !isOneOf(location, PARAMETER_LOCATIONS)) continue;

    const values = recordOrEmpty(p['schema'])['enum'];
    params.push({
      name,
      in: location,
      required: location === 'path' || p['required'] === true,
      enum: Array.isArray(values) ? Object.freeze(values.map((v) => String(v))) : undefined,
    });
  }
  return params;
}

/** Operation-level parameters replace path-level ones with the same name and location. */
function mergeParameters(
  pathLevel: ContractParameter[],
  operationLevel: ContractParameter[],
): ContractParameter[] {
  const overridden = (p: ContractParameter) =>
    operationLevel.some((o) => o.name === p.name && o.in === p.in);
  return [...pathLevel.filter((p) => !overridden(p)), ...operationLevel];
}

function extractSecurity(raw: unknown): SecurityRequirement[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  return raw
    .filter(isRecord)
    .map((requirement) => Object.freeze(Object.keys(requirement)));
}

function extractSecuritySchemes(raw: unknown): ReadonlyMap<string, SecurityScheme> {
  const schemes = new Map<string, SecurityScheme>();
  if (!isRecord(raw)) return schemes;

  for (const [name, scheme] of Object.entries(raw)) {
    if (!isRecord(scheme)) continue;
    schemes.set(name, Object.freeze(extractSecurityScheme(scheme)));
  }
  return schemes;
}

function extractSecurityScheme(scheme: Record<string, unknown>): SecurityScheme {
  const type = scheme['type'];

  if (type === 'apiKey') {
    const location = scheme['in'];
    const name = scheme['name'];
    if (isOneOf(location, API_KEY_LOCATIONS) && typeof name === 'string') {
      return { type: 'apiKey', in: location, name };
    }
    return { type: 'unsupported', declaredType: 'apiKey', detail: `apiKey location "${String(location)}"` };
  }

  if (type === 'http') {
    const httpScheme = (stringOrUndefined(scheme['scheme']) ?? '').toLowerCase();
    if (httpScheme === 'basic' || httpScheme === 'bearer') {
      return { type: 'http', scheme: httpScheme };
    }
    return { type: 'unsupported', declaredType: 'http', detail: `http scheme "${httpScheme}"` };
  }

  return { type: 'unsupported', declaredType: String(type), detail: `scheme type "${String(type)}"` };
}

function extractResponses(raw: unknown): ReadonlyMap<number, ContractResponse> {
  const responses = new Map<number, ContractResponse>();
  if (!isRecord(raw)) return responses;

  for (const [code, response] of Object.entries(raw)) {
    if (!/^\d{3}$/.test(code) || !isRecord(response)) continue;
    const status = parseInt(code, 10);

    const content = new Map<string, MediaTypeExamples>();
    const rawContent = response['content'];
    if (isRecord(rawContent)) {
      for (const [contentType, media] of Object.entries(rawContent)) {
        if (!isRecord(media)) continue;
        content.set(contentType, extractMediaType(media));
      }
    }

    responses.set(status, Object.freeze({
      status,
      description: stringOrUndefined(response['description']) ?? '',
      content,
    }));
  }

  return responses;
}

function extractMediaType(media: Record<string, unknown>): MediaTypeExamples {
  const schema = recordOrEmpty(media['schema']);

  const examples = new Map<string, unknown>();
  const rawExamples = media['examples'];
  if (isRecord(rawExamples)) {
    for (const [name, example] of Object.entries(rawExamples)) {
      examples.set(name, isRecord(example) ? presentOrUndefined(example['value']) : undefined);
    }
  }

  return Object.freeze({
    schemaExample: presentOrUndefined(schema['example']),
    example: presentOrUndefined(media['example']),
    examples,
  });
}
