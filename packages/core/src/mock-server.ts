/**
 * @module mock-server
 * Contract-driven Fastify mock server.
 *
 * Builds a Fastify app from a loaded {@link Contract}: one route per
 * contract operation, an error handler that keeps contract gaps apart
 * from client errors, and diagnostic helper endpoints under `/_mock/`.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { MockServerConfig, LogLevel } from './config-loader.js';
import { MockConfigurationError } from './errors.js';
import { registerContractRoutes, buildRouteTable } from './openapi/route-builder.js';
import { loadContract } from './openapi/spec-loader.js';
import type { Contract, RouteTable } from './openapi/types.js';

// =====================================================================
// Mock Server Factory
// =====================================================================

export const HEALTH_URL = '/_mock/health';
export const ROUTES_URL = '/_mock/routes';

/** Options for mock server creation. */
export interface CreateMockServerOptions {
  /** `false` disables logging; otherwise the pino level to log at */
  logger?: false | { level: LogLevel };
  /** Expose `/_mock/health` and `/_mock/routes` (default: true) */
  diagnostics?: boolean;
}

/**
 * Create a Fastify mock server from a loaded contract.
 *
 * The server includes:
 * - One route per (method, path) pair of the contract
 * - `GET /_mock/health` – Health check
 * - `GET /_mock/routes` – The route table
 *
 * The helper endpoints are skipped where the contract declares the same path.
 *
 * @param contract - Contract from {@link loadContract}
 * @param options - Logging and diagnostics options
 * @returns A configured (but not yet started) Fastify instance
 */
export async function createMockServer(
  contract: Contract,
  options: CreateMockServerOptions = {},
): Promise<FastifyInstance> {
  const startTime = Date.now();
  const app = Fastify({
    logger: options.logger ?? false,
    // HEAD is only routed where the contract declares it
    exposeHeadRoutes: false,
  });
  const table = buildRouteTable(contract);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof MockConfigurationError) {
      request.log.error(
        { code: error.code, details: error.details },
        `mock configuration error: ${error.message}`,
      );
      return reply.status(error.statusCode).send({
        error: 'Mock configuration error',
        code: error.code,
        message: error.message,
        details: error.details,
        suggestedActions: error.structuredError.suggestedActions,
      });
    }
    // Anything else keeps Fastify's default handling
    return reply.send(error);
  });

  // ── Contract routes ─────────────────────────────────────────────────

  await registerContractRoutes(app, contract, table);
  app.log.info({ title: contract.title, routeCount: table.length }, 'contract routes registered');

  // ── Mock helper endpoints ───────────────────────────────────────────

  // A contract route on the same method and path takes precedence
  const declaredByContract = (url: string) =>
    table.some((entry) => entry.method === 'GET' && entry.routerPath === url);

  if (options.diagnostics ?? true) {
    if (!declaredByContract(HEALTH_URL)) {
      app.get(HEALTH_URL, async () => {
        return {
          status: 'ok',
          title: contract.title,
          uptime: (Date.now() - startTime) / 1000,
          routeCount: table.length,
        };
      });
    }

    if (!declaredByContract(ROUTES_URL)) {
      app.get(ROUTES_URL, async () => {
        return { routes: describeRoutes(table) };
      });
    }
  }

  return app;
}

/** Route table as plain JSON-friendly rows. */
export function describeRoutes(
  table: RouteTable,
): Array<{ method: string; path: string; operationId?: string }> {
  return table.map((entry) => ({
    method: entry.method,
    path: entry.path,
    operationId: entry.operation.operationId,
  }));
}

// =====================================================================
// Lifecycle
// =====================================================================

export interface RunningMockServer {
  app: FastifyInstance;
  contract: Contract;
  /** Base URL the server listens on */
  url: string;
  /** Bound port (the assigned one when configured with 0) */
  port: number;
  close(): Promise<void>;
}

/**
 * Load the contract, build the server and start listening.
 *
 * @throws ContractLoadError when the contract cannot be loaded; nothing is
 *   started in that case
 */
export async function startMockServer(config: MockServerConfig): Promise<RunningMockServer> {
  const contract = await loadContract(config.spec);
  const app = await createMockServer(contract, {
    logger: config.logLevel === 'silent' ? false : { level: config.logLevel },
    diagnostics: config.diagnostics,
  });

  await app.listen({ port: config.port, host: config.host });

  const address = app.server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;
  const url = `http://${config.host}:${port}`;

  app.log.info(
    { url, title: contract.title, specPath: contract.specPath },
    'mock server listening',
  );

  return {
    app,
    contract,
    url,
    port,
    close: () => app.close(),
  };
}
