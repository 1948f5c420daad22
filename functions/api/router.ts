// ============================================================================
// BENCHMARK REPORT API - ROUTER
// ============================================================================
//
// Request Flow:
// 1. Request ID generation
// 2. Route matching
// 3. Input validation (in handlers)
// 4. Catalog lookup
// 5. Response formatting
//
// ============================================================================

import type { MetricCatalog } from '../_shared/benchmark_catalog/catalog.ts';
import { logger as defaultLogger, type RequestLogger } from '../_shared/logger.ts';
import { handleHealth } from './handlers/health.ts';
import { handleListBenchmarks, handleListMetrics } from './handlers/benchmarks.ts';
import { getOrGenerateRequestId } from './middleware/request-id.ts';
import { toAppError } from './utils/errors.ts';
import { errorResponse, internalErrorResponse, jsonResponse } from './utils/responses.ts';

// ============================================================================
// TYPES
// ============================================================================

export type MetricCatalogView = Pick<
  MetricCatalog,
  'status' | 'size' | 'fetch' | 'query' | 'headerWithUnit' | 'listAllMetrics'
>;

export interface RouteContext {
  catalog: MetricCatalogView;
  requestId: string;
}

type RouteHandler = (request: Request, context: RouteContext) => Promise<Response>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
}

export interface RouterDependencies {
  catalog: MetricCatalogView;
  logger?: RequestLogger;
}

// ============================================================================
// ROUTE DEFINITIONS
// ============================================================================

const routes: Route[] = [
  {
    method: 'GET',
    pattern: /^\/health$/,
    handler: handleHealth,
  },
  {
    method: 'GET',
    pattern: /^\/v1\/benchmarks$/,
    handler: handleListBenchmarks,
  },
  {
    method: 'GET',
    pattern: /^\/v1\/metrics$/,
    handler: handleListMetrics,
  },
];

function findRoute(method: string, pathname: string): Route | null {
  for (const route of routes) {
    if (route.method === method && route.pattern.test(pathname)) {
      return route;
    }
  }
  return null;
}

// ============================================================================
// MAIN REQUEST HANDLER
// ============================================================================

export function createRequestHandler(deps: RouterDependencies): (request: Request) => Promise<Response> {
  const log = deps.logger ?? defaultLogger;

  return async function handleRequest(request: Request): Promise<Response> {
    const startTime = performance.now();
    const requestId = getOrGenerateRequestId(request);
    const pathname = new URL(request.url).pathname.replace(/\/+$/, '') || '/';

    let response: Response;

    try {
      const route = findRoute(request.method, pathname);
      if (!route) {
        response = jsonResponse({
          error: {
            code: 'NOT_FOUND',
            message: `No route matches ${request.method} ${pathname}`,
          },
          request_id: requestId,
          timestamp: new Date().toISOString(),
        }, 404);
      } else {
        response = await route.handler(request, { catalog: deps.catalog, requestId });
      }
    } catch (error) {
      const appError = toAppError(error);
      if (appError) {
        if (appError.statusCode >= 500) {
          log.error(appError.message, { request_id: requestId, code: appError.code });
        }
        response = errorResponse(appError, requestId);
      } else {
        // Unknown error - log and return generic message
        log.error('Unhandled error', {
          request_id: requestId,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        response = internalErrorResponse(requestId);
      }
    }

    response = addResponseHeaders(response, requestId);

    const duration = performance.now() - startTime;
    log.request(request, response, {
      request_id: requestId,
      duration_ms: Math.round(duration * 100) / 100,
    });

    return response;
  };
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

function addResponseHeaders(response: Response, requestId: string): Response {
  const newHeaders = new Headers(response.headers);

  newHeaders.set('X-Request-Id', requestId);
  newHeaders.set('X-Content-Type-Options', 'nosniff');

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers: newHeaders,
  });
}
