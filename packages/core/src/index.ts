// specmock-core - contract-driven mock server engine

// Contract model, route table, verification & example selection
export * from './openapi/index.js';

// Config Loader
export {
  loadConfig,
  findConfigFile,
  resolveEnvPlaceholders,
  MockServerConfigSchema,
  LOG_LEVELS,
  DEFAULT_CONFIG_FILES,
} from './config-loader.js';
export type { MockServerConfig, LogLevel } from './config-loader.js';

// Mock Server
export { createMockServer, startMockServer, describeRoutes, HEALTH_URL, ROUTES_URL } from './mock-server.js';
export type { CreateMockServerOptions, RunningMockServer } from './mock-server.js';

// Errors
export {
  ERROR_METADATA,
  createStructuredError,
  MockServerError,
  ContractLoadError,
  ConfigFileError,
  MockConfigurationError,
} from './errors.js';
export type { MockErrorCode, ErrorCategory, ErrorSeverity, StructuredError } from './errors.js';
