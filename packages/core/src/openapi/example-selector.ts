/**
 * @module openapi/example-selector
 * Resolve the canned response body for an operation and status code.
 *
 * Priorities (no explicit name): `schema.example` → media type `example`
 * → first entry of media type `examples`. An explicit name bypasses the
 * chain and must exist. Nothing is ever synthesized: an unresolvable body
 * is a {@link MockConfigurationError}.
 */

import { MockConfigurationError } from '../errors.js';
import type {
  ContractOperation,
  ContractResponse,
  MediaTypeExamples,
  SelectedExample,
} from './types.js';

export const JSON_MEDIA_TYPE = 'application/json';

/**
 * Select the example body for `status`.
 *
 * @param operation - Operation the request was bound to
 * @param status - Status code whose response supplies the example
 * @param exampleName - Name from X-Mock-Response-Example, if any
 * @throws MockConfigurationError when the contract does not define the
 *   response, its JSON content, or any usable example
 */
export function selectExample(
  operation: ContractOperation,
  status: number,
  exampleName?: string,
): SelectedExample {
  const response = operation.responses.get(status);
  if (!response) {
    throw new MockConfigurationError(
      'RESPONSE_NOT_DEFINED',
      `The contract defines no ${status} response for ${describe(operation)}`,
      { ...where(operation), status },
    );
  }

  const json = findJsonMediaType(response);
  if (!json) {
    throw new MockConfigurationError(
      'JSON_CONTENT_MISSING',
      `The ${status} response of ${describe(operation)} has no JSON content`,
      { ...where(operation), status, contentTypes: [...response.content.keys()] },
    );
  }
  const [contentType, media] = json;

  if (exampleName !== undefined) {
    const value = media.examples.get(exampleName);
    if (value === undefined) {
      throw new MockConfigurationError(
        'NAMED_EXAMPLE_NOT_FOUND',
        `The ${status} response of ${describe(operation)} has no example named "${exampleName}"`,
        { ...where(operation), status, exampleName, available: [...media.examples.keys()] },
      );
    }
    return { body: renderExample(value), contentType, source: 'named' };
  }

  if (media.schemaExample !== undefined) {
    return { body: renderExample(media.schemaExample), contentType, source: 'schema' };
  }
  if (media.example !== undefined) {
    return { body: renderExample(media.example), contentType, source: 'mediaType' };
  }
  const first = firstNamedExample(media);
  if (first !== undefined) {
    return { body: renderExample(first), contentType, source: 'firstNamed' };
  }

  throw new MockConfigurationError(
    'EXAMPLE_NOT_FOUND',
    `The ${status} response of ${describe(operation)} has no example`,
    { ...where(operation), status },
  );
}

/**
 * Find the JSON media type of a response: `application/json` itself, else
 * the first declared `application/json; ...` or `+json` type.
 */
export function findJsonMediaType(
  response: ContractResponse,
): [contentType: string, media: MediaTypeExamples] | undefined {
  const exact = response.content.get(JSON_MEDIA_TYPE);
  if (exact) return [JSON_MEDIA_TYPE, exact];

  for (const [contentType, media] of response.content) {
    const essence = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
    if (essence === JSON_MEDIA_TYPE || essence.endsWith('+json')) {
      return [contentType, media];
    }
  }
  return undefined;
}

/** Strings go out verbatim; everything else as JSON. */
export function renderExample(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// Only the first declared entry counts; later ones are never tried.
function firstNamedExample(media: MediaTypeExamples): unknown {
  for (const value of media.examples.values()) {
    return value;
  }
  return undefined;
}

function describe(operation: ContractOperation): string {
  return `${operation.method} ${operation.path}`;
}

function where(operation: ContractOperation): Record<string, unknown> {
  return {
    method: operation.method,
    path: operation.path,
    operationId: operation.operationId,
  };
}
