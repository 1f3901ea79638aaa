/**
 * Shared builders for contract-model unit tests.
 */

import type {
  ContractOperation,
  ContractResponse,
  MediaTypeExamples,
  MockRequestView,
  SecurityScheme,
} from '../../../src/openapi/types.js';

export function makeMedia(overrides: Partial<MediaTypeExamples> = {}): MediaTypeExamples {
  return { examples: new Map(), ...overrides };
}

export function makeResponse(
  status: number,
  content: Record<string, MediaTypeExamples>,
): ContractResponse {
  return { status, description: '', content: new Map(Object.entries(content)) };
}

export function makeOperation(overrides: Partial<ContractOperation> = {}): ContractOperation {
  return {
    method: 'GET',
    path: '/items',
    operationId: 'listItems',
    parameters: [],
    responses: new Map([
      [200, makeResponse(200, { 'application/json': makeMedia({ example: { ok: true } }) })],
    ]),
    ...overrides,
  };
}

export const SCHEMES: ReadonlyMap<string, SecurityScheme> = new Map<string, SecurityScheme>([
  ['apiKeyQuery', { type: 'apiKey', in: 'query', name: 'key' }],
  ['apiKeyHeader', { type: 'apiKey', in: 'header', name: 'X-API-Key' }],
  ['sessionCookie', { type: 'apiKey', in: 'cookie', name: 'session' }],
  ['basicAuth', { type: 'http', scheme: 'basic' }],
  ['bearerAuth', { type: 'http', scheme: 'bearer' }],
  ['oauth', { type: 'unsupported', declaredType: 'oauth2', detail: 'scheme type "oauth2"' }],
]);

export interface FakeRequestInit {
  params?: Record<string, string>;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  body?: string;
}

/** In-memory request view; header names match case-insensitively like Node's. */
export function makeRequest(init: FakeRequestInit = {}): MockRequestView {
  const headers = new Map(
    Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value]),
  );
  return {
    pathParam: (name) => init.params?.[name],
    query: (name) => init.query?.[name],
    header: (name) => headers.get(name.toLowerCase()),
    cookie: (name) => init.cookies?.[name],
    body: init.body ?? '',
  };
}

/** Run `fn` and return what it threw, or `undefined` when it returned. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
