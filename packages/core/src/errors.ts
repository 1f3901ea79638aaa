/**
 * @module errors
 * Structured error types and error code registry for specmock.
 *
 * Separates startup failures (the contract or configuration file cannot be
 * loaded) from request-time contract gaps (the contract does not say enough
 * to answer the request that was actually made). Client-visible verification
 * failures are not errors: they are answered with the contract's own 400/401
 * examples.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known specmock error codes. */
export type MockErrorCode =
  | 'SPEC_NOT_FOUND'
  | 'SPEC_PARSE_FAILED'
  | 'SPEC_INVALID'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'RESPONSE_NOT_DEFINED'
  | 'JSON_CONTENT_MISSING'
  | 'EXAMPLE_NOT_FOUND'
  | 'NAMED_EXAMPLE_NOT_FOUND'
  | 'SECURITY_SCHEME_NOT_DEFINED'
  | 'UNSUPPORTED_SECURITY_SCHEME';

/** Where the problem lives. */
export type ErrorCategory = 'startup' | 'contract';

/** `fatal` aborts startup; `request` aborts only the request being served. */
export type ErrorSeverity = 'fatal' | 'request';

/** Machine-readable error payload. */
export interface StructuredError {
  code: MockErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  severity: ErrorSeverity;
  suggestedActions: string[];
}

/** Classification and recovery hints for every error code. */
export const ERROR_METADATA: ReadonlyMap<MockErrorCode, ErrorMetadataEntry> = new Map<MockErrorCode, ErrorMetadataEntry>([
  ['SPEC_NOT_FOUND', {
    category: 'startup',
    severity: 'fatal',
    suggestedActions: ['Check the path to the contract file', 'Run from the directory the relative path is based on'],
  }],
  ['SPEC_PARSE_FAILED', {
    category: 'startup',
    severity: 'fatal',
    suggestedActions: ['Check the contract for YAML/JSON syntax errors', 'Check that every $ref target exists'],
  }],
  ['SPEC_INVALID', {
    category: 'startup',
    severity: 'fatal',
    suggestedActions: ['Make sure the document is an OpenAPI 3.x object with an `openapi` version field'],
  }],
  ['CONFIG_NOT_FOUND', {
    category: 'startup',
    severity: 'fatal',
    suggestedActions: ['Create specmock.yaml', 'Pass the contract path directly: specmock serve <spec>'],
  }],
  ['CONFIG_INVALID', {
    category: 'startup',
    severity: 'fatal',
    suggestedActions: ['Fix the listed configuration keys', 'Check the YAML syntax of the configuration file'],
  }],
  ['RESPONSE_NOT_DEFINED', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Declare a response for this status code on the operation'],
  }],
  ['JSON_CONTENT_MISSING', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Add an application/json content entry to the response'],
  }],
  ['EXAMPLE_NOT_FOUND', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Add a schema example, a media type example or a named example to the response'],
  }],
  ['NAMED_EXAMPLE_NOT_FOUND', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Check the X-Mock-Response-Example header value', 'Declare the named example under `examples` for this status'],
  }],
  ['SECURITY_SCHEME_NOT_DEFINED', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Declare the scheme under components.securitySchemes'],
  }],
  ['UNSUPPORTED_SECURITY_SCHEME', {
    category: 'contract',
    severity: 'request',
    suggestedActions: ['Use an apiKey scheme or an http scheme with basic or bearer'],
  }],
]);

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code.
 *
 * @param code - specmock error code
 * @param message - Human-readable error message
 * @param details - Additional contextual data
 */
export function createStructuredError(
  code: MockErrorCode,
  message: string,
  details: Record<string, unknown> = {},
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'contract',
    severity: metadata?.severity ?? 'request',
    message,
    details,
    suggestedActions: metadata ? [...metadata.suggestedActions] : [],
    timestamp: Date.now(),
  };
}

// =====================================================================
// Error Classes
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 */
export class MockServerError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: MockErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'MockServerError';
    this.structuredError = createStructuredError(code, message, details);
  }

  /** Serialize the structured error payload for JSON transport. */
  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): MockErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }

  get details(): Record<string, unknown> {
    return this.structuredError.details;
  }
}

/** The contract document could not be loaded; startup must abort. */
export class ContractLoadError extends MockServerError {
  constructor(
    code: 'SPEC_NOT_FOUND' | 'SPEC_PARSE_FAILED' | 'SPEC_INVALID',
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details);
    this.name = 'ContractLoadError';
  }
}

/** The configuration file could not be loaded or validated. */
export class ConfigFileError extends MockServerError {
  constructor(
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID',
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details);
    this.name = 'ConfigFileError';
  }
}

/**
 * The contract is incomplete for the request being served. Fatal to that
 * request only; never downgraded to a client error.
 */
export class MockConfigurationError extends MockServerError {
  public readonly statusCode = 500;

  constructor(
    code:
      | 'RESPONSE_NOT_DEFINED'
      | 'JSON_CONTENT_MISSING'
      | 'EXAMPLE_NOT_FOUND'
      | 'NAMED_EXAMPLE_NOT_FOUND'
      | 'SECURITY_SCHEME_NOT_DEFINED'
      | 'UNSUPPORTED_SECURITY_SCHEME',
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details);
    this.name = 'MockConfigurationError';
  }
}
