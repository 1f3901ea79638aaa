/**
 * @module openapi/route-builder
 * Bind contract operations to Fastify routes.
 *
 * The route table is built once from the {@link Contract} and frozen; each
 * Fastify handler closes over one table entry and delegates to
 * {@link dispatchRequest}. No request state is kept between calls.
 */

import fastifyCookie from '@fastify/cookie';
import type { FastifyInstance, FastifyReply, FastifyRequest, RouteOptions } from 'fastify';
import { dispatchRequest } from './dispatch-handler.js';
import { convertOpenApiPath } from './spec-loader.js';
import {
  HTTP_METHODS,
  type Contract,
  type MockRequestView,
  type RouteEntry,
  type RouteTable,
} from './types.js';

/**
 * Build the route table: one entry per (method, path) pair in the contract,
 * in path declaration order, then GET, HEAD, POST, PUT, DELETE, TRACE,
 * OPTIONS, PATCH.
 */
export function buildRouteTable(contract: Contract): RouteTable {
  const entries: RouteEntry[] = [];

  for (const [openApiPath, pathItem] of contract.paths) {
    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (!operation) continue;
      entries.push(Object.freeze({
        method,
        path: openApiPath,
        routerPath: convertOpenApiPath(openApiPath),
        operation,
      }));
    }
  }

  return Object.freeze(entries);
}

/**
 * Build Fastify route options from a route table.
 *
 * @param contract - Supplies security schemes to the verifier
 * @param table - Route table from {@link buildRouteTable}
 */
export function buildOpenAPIRoutes(contract: Contract, table: RouteTable): RouteOptions[] {
  return table.map((entry) => buildRouteOption(contract, entry));
}

/**
 * Register the contract's routes on `app`, along with the cookie parser and
 * a raw-text body parser for every content type.
 *
 * @returns The route table the routes were built from
 */
export async function registerContractRoutes(
  app: FastifyInstance,
  contract: Contract,
  table: RouteTable = buildRouteTable(contract),
): Promise<RouteTable> {
  await app.register(fastifyCookie);

  // Bodies are only checked for presence, so keep them as text.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  for (const route of buildOpenAPIRoutes(contract, table)) {
    app.route(route);
  }
  return table;
}

/**
 * Adapt a Fastify request to the read-only view the verifier works on.
 * Header names are matched case-insensitively; repeated values resolve to
 * the first one.
 */
export function createRequestView(req: FastifyRequest): MockRequestView {
  const params = recordOf(req.params);
  const query = recordOf(req.query);
  const cookies = req.cookies ?? {};

  return {
    pathParam: (name) => firstString(params[name]),
    query: (name) => firstString(query[name]),
    header: (name) => firstString(req.headers[name.toLowerCase()]),
    cookie: (name) => cookies[name],
    body: typeof req.body === 'string' ? req.body : '',
  };
}

function buildRouteOption(contract: Contract, entry: RouteEntry): RouteOptions {
  const { operation } = entry;

  return {
    method: entry.method,
    url: entry.routerPath,
    handler: async (req: FastifyRequest, reply: FastifyReply) => {
      const { response, outcome } = dispatchRequest(contract, operation, createRequestView(req));

      if (!outcome.passed) {
        req.log.debug({
          method: operation.method,
          path: operation.path,
          operationId: operation.operationId,
          status: outcome.status,
          step: outcome.step,
          detail: outcome.detail,
        }, 'request failed contract verification');
      }

      return reply
        .status(response.status)
        .header('content-type', response.contentType)
        .send(response.body);
    },
  };
}

function recordOf(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}
