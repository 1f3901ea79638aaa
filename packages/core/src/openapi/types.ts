/**
 * @module openapi/types
 * Contract model type definitions.
 *
 * Covers: the read-only Contract extracted from an OpenAPI document, the
 * route table, the request view handed in by the transport, and the
 * verification / dispatch results.
 */

// =====================================================================
// Contract
// =====================================================================

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'TRACE' | 'OPTIONS' | 'PATCH';

/** Every method a contract may bind, in registration order. */
export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'TRACE',
  'OPTIONS',
  'PATCH',
];

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export interface ContractParameter {
  name: string;
  in: ParameterLocation;
  /** Always true for path parameters */
  required: boolean;
  /** Allowed values, stringified */
  enum?: readonly string[];
}

export interface ContractRequestBody {
  required: boolean;
}

/** Scheme names that must all be satisfied together. */
export type SecurityRequirement = readonly string[];

export type ApiKeyLocation = 'query' | 'header' | 'cookie';

export interface ApiKeyScheme {
  type: 'apiKey';
  in: ApiKeyLocation;
  name: string;
}

export interface HttpAuthScheme {
  type: 'http';
  scheme: 'basic' | 'bearer';
}

/** Declared in the contract but not something the mock can check. */
export interface UnsupportedScheme {
  type: 'unsupported';
  declaredType: string;
  detail: string;
}

export type SecurityScheme = ApiKeyScheme | HttpAuthScheme | UnsupportedScheme;

export interface MediaTypeExamples {
  /** `schema.example` */
  schemaExample?: unknown;
  /** Media type `example` */
  example?: unknown;
  /** Media type `examples`, name → example value, in declaration order */
  examples: ReadonlyMap<string, unknown>;
}

export interface ContractResponse {
  status: number;
  description: string;
  /** Content type → examples */
  content: ReadonlyMap<string, MediaTypeExamples>;
}

export interface ContractOperation {
  method: HttpMethod;
  /** OpenAPI path template, e.g. "/pets/{petId}" */
  path: string;
  operationId?: string;
  parameters: readonly ContractParameter[];
  requestBody?: ContractRequestBody;
  /** Effective security: the operation's own, else the document's */
  security?: readonly SecurityRequirement[];
  responses: ReadonlyMap<number, ContractResponse>;
}

export type PathItem = Readonly<Partial<Record<HttpMethod, ContractOperation>>>;

export interface Contract {
  /** Contract file path (resolved to absolute) */
  specPath: string;
  /** OpenAPI version string ("3.0.3", "3.1.0", etc.) */
  openApiVersion: string;
  /** info.title */
  title: string;
  /** info.version */
  version: string;
  paths: ReadonlyMap<string, PathItem>;
  securitySchemes: ReadonlyMap<string, SecurityScheme>;
  parsedAt: number;
}

// =====================================================================
// Route Table
// =====================================================================

export interface RouteEntry {
  readonly method: HttpMethod;
  /** OpenAPI path template */
  readonly path: string;
  /** Fastify-compatible path, e.g. "/pets/:petId" */
  readonly routerPath: string;
  readonly operation: ContractOperation;
}

export type RouteTable = readonly RouteEntry[];

// =====================================================================
// Request / Verification / Dispatch
// =====================================================================

/**
 * Read-only view of an in-flight request. Absent values are `undefined`.
 */
export interface MockRequestView {
  pathParam(name: string): string | undefined;
  query(name: string): string | undefined;
  header(name: string): string | undefined;
  cookie(name: string): string | undefined;
  /** Raw body text, empty when there is none */
  readonly body: string;
}

export type VerificationStep = 'authentication' | 'parameter' | 'body';

export interface VerificationPassed {
  passed: true;
}

export interface VerificationFailed {
  passed: false;
  status: 400 | 401;
  step: VerificationStep;
  /** Human-readable reason, for logs only */
  detail: string;
  /** Example requested through X-Mock-Response-Example */
  exampleName?: string;
}

export type VerificationOutcome = VerificationPassed | VerificationFailed;

export type ExampleSource = 'named' | 'schema' | 'mediaType' | 'firstNamed';

export interface SelectedExample {
  body: string;
  contentType: string;
  source: ExampleSource;
}

export interface MockResponse {
  status: number;
  body: string;
  contentType: string;
}
