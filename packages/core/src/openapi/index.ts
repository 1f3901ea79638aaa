// Contract-driven mock: public API surface

export type {
  HttpMethod,
  ParameterLocation,
  ContractParameter,
  ContractRequestBody,
  SecurityRequirement,
  ApiKeyLocation,
  ApiKeyScheme,
  HttpAuthScheme,
  UnsupportedScheme,
  SecurityScheme,
  MediaTypeExamples,
  ContractResponse,
  ContractOperation,
  PathItem,
  Contract,
  RouteEntry,
  RouteTable,
  MockRequestView,
  VerificationStep,
  VerificationPassed,
  VerificationFailed,
  VerificationOutcome,
  ExampleSource,
  SelectedExample,
  MockResponse,
} from './types.js';
export { HTTP_METHODS } from './types.js';

export { loadContract, parseContract, convertOpenApiPath } from './spec-loader.js';
export { buildRouteTable, buildOpenAPIRoutes, registerContractRoutes, createRequestView } from './route-builder.js';
export {
  EXAMPLE_HEADER,
  verifyRequest,
  verifyAuthentication,
  verifySecurityScheme,
  verifyParameter,
  verifyBody,
  isAuthenticationOptional,
  requestedExampleName,
} from './request-verifier.js';
export { JSON_MEDIA_TYPE, selectExample, findJsonMediaType, renderExample } from './example-selector.js';
export { dispatchRequest } from './dispatch-handler.js';
export type { DispatchResult } from './dispatch-handler.js';
