/**
 * @module openapi/dispatch-handler
 * Per-request composition: verify, then answer with the contract's example.
 */

import { selectExample } from './example-selector.js';
import { requestedExampleName, verifyRequest } from './request-verifier.js';
import type {
  Contract,
  ContractOperation,
  MockRequestView,
  MockResponse,
  VerificationOutcome,
} from './types.js';

export interface DispatchResult {
  response: MockResponse;
  outcome: VerificationOutcome;
}

/**
 * Produce the response for one request bound to `operation`.
 *
 * A passing request gets the 200 example; a failing one gets the example of
 * the failing status (400 or 401). X-Mock-Response-Example applies to both.
 *
 * @throws MockConfigurationError when the contract cannot answer
 */
export function dispatchRequest(
  contract: Pick<Contract, 'securitySchemes'>,
  operation: ContractOperation,
  request: MockRequestView,
): DispatchResult {
  const outcome = verifyRequest(contract, operation, request);

  const status = outcome.passed ? 200 : outcome.status;
  const exampleName = outcome.passed ? requestedExampleName(request) : outcome.exampleName;
  const selected = selectExample(operation, status, exampleName);

  return {
    response: { status, body: selected.body, contentType: selected.contentType },
    outcome,
  };
}
