import { promises as fs } from 'node:fs';
import { parse } from 'yaml';
import { z, ZodError } from 'zod';

import { ConfigError } from './errors.ts';
import type { BenchmarkSpec } from './types.ts';

const configValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const benchmarkEntrySchema = z
  .object({
    Type: z.string().min(1, 'Cannot be empty'),
    'Metric Prefix': z.string().min(1, 'Cannot be empty'),
    'Metric Suffix': z.string().min(1, 'Cannot be empty'),
  })
  .catchall(configValueSchema);

const benchmarksDocumentSchema = z.object({
  benchmarks: z.array(benchmarkEntrySchema),
});

export type BenchmarkConfigLoader = () => Promise<BenchmarkSpec[]>;

/**
 * Reads and validates the benchmarks YAML document at `filePath`.
 * Entries keep their configuration order; nothing beyond the parsed specs is retained.
 */
export async function loadBenchmarkSpecsFromFile(filePath: string): Promise<BenchmarkSpec[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read benchmark configuration ${filePath}`, [reason]);
  }
  return parseBenchmarkSpecs(raw, filePath);
}

export function parseBenchmarkSpecs(raw: string, source = 'benchmark configuration'): BenchmarkSpec[] {
  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Malformed YAML in ${source}`, [reason]);
  }

  try {
    const parsed = benchmarksDocumentSchema.parse(document);
    return parsed.benchmarks.map((entry) => ({
      type: entry.Type,
      metric_prefix: entry['Metric Prefix'],
      metric_suffix: entry['Metric Suffix'],
      values: { ...entry },
    }));
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map(
        (issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`
      );
      throw new ConfigError(`Invalid structure in ${source}`, issues);
    }
    throw error;
  }
}

export function createFileConfigLoader(filePath: string): BenchmarkConfigLoader {
  return () => loadBenchmarkSpecsFromFile(filePath);
}
