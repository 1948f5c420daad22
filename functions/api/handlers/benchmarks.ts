// ============================================================================
// BENCHMARK REPORT HANDLERS
// ============================================================================

import { benchmarksQuerySchema } from '../schemas/benchmarks.ts';
import { validateQuery } from '../utils/validate.ts';
import { jsonResponse } from '../utils/responses.ts';
import type { RouteContext } from '../router.ts';

// ============================================================================
// GET /v1/benchmarks?type=<type> - Normalized rows for one benchmark type
// ============================================================================

export async function handleListBenchmarks(
  request: Request,
  context: RouteContext
): Promise<Response> {
  const url = new URL(request.url);
  const query = validateQuery(benchmarksQuerySchema, url);
  const { catalog } = context;

  if (query.refresh) {
    await catalog.fetch();
  }

  const { benchmarks, headers } = await catalog.query(query.type);

  return jsonResponse({
    data: {
      type: query.type,
      headers,
      columns: headers.map((header) => catalog.headerWithUnit(header)),
      benchmarks,
    },
    meta: {
      total: benchmarks.length,
      status: catalog.status,
    },
  });
}

// ============================================================================
// GET /v1/metrics - Every metric name the backend knows under the namespace
// ============================================================================

export async function handleListMetrics(
  _request: Request,
  context: RouteContext
): Promise<Response> {
  const metrics = await context.catalog.listAllMetrics();

  return jsonResponse({
    data: metrics,
    meta: {
      total: metrics.length,
    },
  });
}
