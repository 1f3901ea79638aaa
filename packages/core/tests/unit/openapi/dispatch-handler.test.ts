/**
 * Unit tests for openapi/dispatch-handler module.
 */

import { describe, it, expect } from 'vitest';
import { MockConfigurationError } from '../../../src/errors.js';
import { dispatchRequest } from '../../../src/openapi/dispatch-handler.js';
import { makeMedia, makeOperation, makeRequest, makeResponse, SCHEMES } from './helpers.js';

const contract = { securitySchemes: SCHEMES };

const operation = makeOperation({
  method: 'POST',
  path: '/orders',
  operationId: 'createOrder',
  security: [['bearerAuth']],
  requestBody: { required: true },
  responses: new Map([
    [200, makeResponse(200, {
      'application/json': makeMedia({
        examples: new Map<string, unknown>([['placed', { id: 1 }], ['queued', { id: 2, queued: true }]]),
      }),
    })],
    [400, makeResponse(400, { 'application/json': makeMedia({ example: { error: 'empty body' } }) })],
    [401, makeResponse(401, {
      'application/json': makeMedia({
        example: { error: 'unauthorized' },
        examples: new Map([['expired', { error: 'token expired' }]]),
      }),
    })],
  ]),
});

const authorized = { Authorization: 'Bearer test-token' };

describe('dispatch-handler', () => {
  it('should answer a valid request with the 200 example', () => {
    const { response, outcome } = dispatchRequest(contract, operation, makeRequest({ headers: authorized, body: '{}' }));
    expect(outcome.passed).toBe(true);
    expect(response).toEqual({ status: 200, body: '{"id":1}', contentType: 'application/json' });
  });

  it('should honor X-Mock-Response-Example on success', () => {
    const request = makeRequest({
      headers: { ...authorized, 'X-Mock-Response-Example': 'queued' },
      body: '{}',
    });
    expect(dispatchRequest(contract, operation, request).response.body).toBe('{"id":2,"queued":true}');
  });

  it('should answer an unauthenticated request with the 401 example', () => {
    const { response, outcome } = dispatchRequest(contract, operation, makeRequest({ body: '{}' }));
    expect(outcome).toMatchObject({ passed: false, step: 'authentication' });
    expect(response).toEqual({ status: 401, body: '{"error":"unauthorized"}', contentType: 'application/json' });
  });

  it('should honor X-Mock-Response-Example on failure', () => {
    const request = makeRequest({ headers: { 'X-Mock-Response-Example': 'expired' }, body: '{}' });
    expect(dispatchRequest(contract, operation, request).response.body).toBe('{"error":"token expired"}');
  });

  it('should answer a missing body with the 400 example', () => {
    const { response } = dispatchRequest(contract, operation, makeRequest({ headers: authorized }));
    expect(response.status).toBe(400);
    expect(response.body).toBe('{"error":"empty body"}');
  });

  it('should throw when the failing status has no such named example', () => {
    const request = makeRequest({ headers: { 'X-Mock-Response-Example': 'queued' }, body: '{}' });
    expect(() => dispatchRequest(contract, operation, request)).toThrow(MockConfigurationError);
  });

  it('should produce identical results for identical requests', () => {
    const request = makeRequest({ headers: authorized, body: '{"item":"a"}' });
    const first = dispatchRequest(contract, operation, request);
    const second = dispatchRequest(contract, operation, request);
    expect(second).toEqual(first);
  });
});
