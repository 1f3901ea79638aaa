/**
 * @module openapi/request-verifier
 * Verify an incoming request against the operation it was routed to.
 *
 * Three checks in fixed order, first failure wins:
 * 1. authentication → 401
 * 2. parameters (declaration order) → 400
 * 3. required body presence → 400
 *
 * Failures are returned as values. Only contract gaps (unknown or
 * unsupported security schemes) throw.
 */

import { MockConfigurationError } from '../errors.js';
import type {
  Contract,
  ContractOperation,
  ContractParameter,
  MockRequestView,
  SecurityRequirement,
  SecurityScheme,
  VerificationFailed,
  VerificationOutcome,
} from './types.js';

/** Request header naming the example to answer with. */
export const EXAMPLE_HEADER = 'X-Mock-Response-Example';

const AUTHORIZATION_HEADER = 'Authorization';

const PASSED: VerificationOutcome = Object.freeze({ passed: true });

/**
 * Run the authentication, parameter and body checks.
 *
 * @param contract - Supplies the security scheme definitions
 * @param operation - Operation bound to the matched route
 * @param request - Read-only view of the in-flight request
 */
export function verifyRequest(
  contract: Pick<Contract, 'securitySchemes'>,
  operation: ContractOperation,
  request: MockRequestView,
): VerificationOutcome {
  if (!verifyAuthentication(contract, operation, request)) {
    return fail(request, 401, 'authentication', 'no security requirement is satisfied');
  }

  for (const parameter of operation.parameters) {
    if (!verifyParameter(parameter, request)) {
      return fail(request, 400, 'parameter', `${parameter.in} parameter "${parameter.name}" is missing or invalid`);
    }
  }

  if (!verifyBody(operation, request)) {
    return fail(request, 400, 'body', 'required request body is empty');
  }

  return PASSED;
}

/** Non-blank value of X-Mock-Response-Example, if sent. */
export function requestedExampleName(request: MockRequestView): string | undefined {
  const value = request.header(EXAMPLE_HEADER);
  return value === undefined || isBlank(value) ? undefined : value;
}

// =====================================================================
// Authentication
// =====================================================================

/**
 * True when no credentials are needed: no security list, an empty list, or
 * a list holding an empty requirement.
 *
 * An empty requirement makes auth optional even when non-empty requirements
 * sit beside it; the non-empty ones are then never evaluated.
 */
export function isAuthenticationOptional(
  security: readonly SecurityRequirement[] | undefined,
): boolean {
  return !security || security.length === 0 || security.some((requirement) => requirement.length === 0);
}

/** OR across requirements, AND within each one. */
export function verifyAuthentication(
  contract: Pick<Contract, 'securitySchemes'>,
  operation: ContractOperation,
  request: MockRequestView,
): boolean {
  if (isAuthenticationOptional(operation.security)) return true;

  return (operation.security ?? []).some((requirement) =>
    requirement.every((schemeName) => {
      const scheme = contract.securitySchemes.get(schemeName);
      if (!scheme) {
        throw new MockConfigurationError(
          'SECURITY_SCHEME_NOT_DEFINED',
          `The contract has no security scheme component named "${schemeName}"`,
          { method: operation.method, path: operation.path, scheme: schemeName },
        );
      }
      return verifySecurityScheme(schemeName, scheme, request);
    }),
  );
}

/**
 * Check one scheme against the request.
 *
 * @throws MockConfigurationError for scheme types the mock cannot check
 */
export function verifySecurityScheme(
  schemeName: string,
  scheme: SecurityScheme,
  request: MockRequestView,
): boolean {
  switch (scheme.type) {
    case 'apiKey':
      return !isBlank(readLocation(request, scheme.in, scheme.name));
    case 'http': {
      const authorization = request.header(AUTHORIZATION_HEADER);
      const prefix = scheme.scheme === 'basic' ? 'Basic' : 'Bearer';
      return authorization?.startsWith(prefix) ?? false;
    }
    case 'unsupported':
      throw new MockConfigurationError(
        'UNSUPPORTED_SECURITY_SCHEME',
        `Security scheme "${schemeName}" uses an unsupported ${scheme.detail}; only apiKey and http basic/bearer are supported`,
        { scheme: schemeName, declaredType: scheme.declaredType },
      );
    default:
      return assertNever(scheme);
  }
}

// =====================================================================
// Parameters & body
// =====================================================================

/**
 * Path parameters must be present; other locations only when required.
 * Present values must belong to the enum, when the contract declares one.
 */
export function verifyParameter(parameter: ContractParameter, request: MockRequestView): boolean {
  const value = readLocation(request, parameter.in, parameter.name);

  if (value === undefined || isBlank(value)) {
    return parameter.in === 'path' ? false : !parameter.required;
  }
  if (parameter.enum && !parameter.enum.includes(value)) {
    return false;
  }
  return true;
}

/** Only presence is checked; the content is never parsed. */
export function verifyBody(operation: ContractOperation, request: MockRequestView): boolean {
  if (!operation.requestBody?.required) return true;
  return !isBlank(request.body);
}

// =====================================================================
// Internals
// =====================================================================

function readLocation(
  request: MockRequestView,
  location: ContractParameter['in'],
  name: string,
): string | undefined {
  switch (location) {
    case 'path':
      return request.pathParam(name);
    case 'query':
      return request.query(name);
    case 'header':
      return request.header(name);
    case 'cookie':
      return request.cookie(name);
    default:
      return assertNever(location);
  }
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function fail(
  request: MockRequestView,
  status: VerificationFailed['status'],
  step: VerificationFailed['step'],
  detail: string,
): VerificationFailed {
  return { passed: false, status, step, detail, exampleName: requestedExampleName(request) };
}

function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
