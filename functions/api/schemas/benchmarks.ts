// ============================================================================
// BENCHMARK QUERY SCHEMAS
// ============================================================================

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'], {
    errorMap: () => ({ message: "Must be 'true' or 'false'" }),
  })
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const benchmarksQuerySchema = z.object({
  type: z
    .string({ required_error: 'Benchmark type is required' })
    .trim()
    .min(1, 'Benchmark type is required'),
  refresh: booleanFlag,
});

export type BenchmarksQuery = z.infer<typeof benchmarksQuerySchema>;
