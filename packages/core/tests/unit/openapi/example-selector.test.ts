/**
 * Unit tests for openapi/example-selector module.
 */

import { describe, it, expect } from 'vitest';
import { MockConfigurationError } from '../../../src/errors.js';
import {
  findJsonMediaType,
  renderExample,
  selectExample,
} from '../../../src/openapi/example-selector.js';
import { captureError, makeMedia, makeOperation, makeResponse } from './helpers.js';

function operationWith(media: ReturnType<typeof makeMedia>, contentType = 'application/json') {
  return makeOperation({
    responses: new Map([[200, makeResponse(200, { [contentType]: media })]]),
  });
}

function errorCode(fn: () => unknown): string | undefined {
  const error = captureError(fn);
  return error instanceof MockConfigurationError ? error.code : undefined;
}

describe('example-selector', () => {
  describe('selectExample', () => {
    it('should prefer the schema example over every other source', () => {
      const operation = operationWith(makeMedia({
        schemaExample: { source: 'schema' },
        example: { source: 'media' },
        examples: new Map([['first', { source: 'named' }]]),
      }));
      expect(selectExample(operation, 200)).toEqual({
        body: '{"source":"schema"}',
        contentType: 'application/json',
        source: 'schema',
      });
    });

    it('should fall back to the media type example', () => {
      const operation = operationWith(makeMedia({
        example: { source: 'media' },
        examples: new Map([['first', { source: 'named' }]]),
      }));
      const selected = selectExample(operation, 200);
      expect(selected.body).toBe('{"source":"media"}');
      expect(selected.source).toBe('mediaType');
    });

    it('should fall back to the first named example', () => {
      const operation = operationWith(makeMedia({
        examples: new Map<string, unknown>([['first', [1, 2]], ['second', [3]]]),
      }));
      expect(selectExample(operation, 200)).toMatchObject({ body: '[1,2]', source: 'firstNamed' });
    });

    it('should answer an explicit name with that example only', () => {
      const operation = operationWith(makeMedia({
        schemaExample: { source: 'schema' },
        examples: new Map([['first', { n: 1 }], ['second', { n: 2 }]]),
      }));
      expect(selectExample(operation, 200, 'second')).toMatchObject({ body: '{"n":2}', source: 'named' });
    });

    it('should not fall back when the named example is missing', () => {
      const operation = operationWith(makeMedia({ schemaExample: { source: 'schema' } }));
      expect(errorCode(() => selectExample(operation, 200, 'nope'))).toBe('NAMED_EXAMPLE_NOT_FOUND');
    });

    it('should fail when the status is not declared', () => {
      const operation = operationWith(makeMedia({ example: {} }));
      expect(() => selectExample(operation, 401))
        .toThrow('The contract defines no 401 response for GET /items');
      expect(errorCode(() => selectExample(operation, 401))).toBe('RESPONSE_NOT_DEFINED');
    });

    it('should fail when the response has no JSON content', () => {
      const operation = operationWith(makeMedia({ example: 'up' }), 'text/plain');
      expect(errorCode(() => selectExample(operation, 200))).toBe('JSON_CONTENT_MISSING');
    });

    it('should fail when the JSON content has no example', () => {
      expect(errorCode(() => selectExample(operationWith(makeMedia()), 200))).toBe('EXAMPLE_NOT_FOUND');
    });

    it('should return the same body on every call', () => {
      const operation = operationWith(makeMedia({ example: { id: 1 } }));
      expect(selectExample(operation, 200)).toEqual(selectExample(operation, 200));
    });
  });

  describe('findJsonMediaType', () => {
    it('should prefer the exact application/json entry', () => {
      const response = makeResponse(200, {
        'application/problem+json': makeMedia({ example: 1 }),
        'application/json': makeMedia({ example: 2 }),
      });
      expect(findJsonMediaType(response)?.[0]).toBe('application/json');
    });

    it('should accept parameterized and +json types', () => {
      const withCharset = makeResponse(200, { 'application/json; charset=utf-8': makeMedia() });
      const problem = makeResponse(200, { 'text/plain': makeMedia(), 'application/problem+json': makeMedia() });
      expect(findJsonMediaType(withCharset)?.[0]).toBe('application/json; charset=utf-8');
      expect(findJsonMediaType(problem)?.[0]).toBe('application/problem+json');
    });

    it('should return undefined without a JSON type', () => {
      expect(findJsonMediaType(makeResponse(200, { 'text/html': makeMedia() }))).toBeUndefined();
    });
  });

  describe('renderExample', () => {
    it('should send strings verbatim and everything else as JSON', () => {
      expect(renderExample('up')).toBe('up');
      expect(renderExample(42)).toBe('42');
      expect(renderExample(false)).toBe('false');
      expect(renderExample({ a: [1] })).toBe('{"a":[1]}');
    });
  });
});
