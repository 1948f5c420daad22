// ============================================================================
// HEALTH CHECK HANDLER
// ============================================================================

import { jsonResponse } from '../utils/responses.ts';
import type { RouteContext } from '../router.ts';

export const API_VERSION = '1.0.0';

/**
 * GET /health
 *
 * Reports the catalog lifecycle without touching the metrics backend.
 */
export async function handleHealth(
  _request: Request,
  context: RouteContext
): Promise<Response> {
  return jsonResponse({
    status: 'healthy',
    version: API_VERSION,
    timestamp: new Date().toISOString(),
    checks: {
      catalog: context.catalog.status,
      benchmarks: context.catalog.size,
    },
  });
}
