import type { BenchmarkType, HeaderClass } from './types.ts';

export const BENCHMARK_HEADERS: Readonly<Record<BenchmarkType, readonly string[]>> = Object.freeze({
  'Training CV': Object.freeze([
    'Framework',
    'Framework Desc',
    'Model',
    'Precision',
    'Benchmark Desc',
    'Instance Type',
    'Top 1 Val Acc',
    'Top 1 Train Acc',
    'Throughput',
    'Time to Train',
    'CPU Memory',
    'GPU Memory Mean',
    'GPU Memory Max',
    'Uptime',
  ]),
  Inference: Object.freeze([
    'Framework',
    'Framework Desc',
    'Model',
    'Precision',
    'Benchmark Desc',
    'Instance Type',
    'Throughput',
    'Latency',
    'P50 Latency',
    'P90 Latency',
    'P99 Latency',
    'Error Rate',
    'CPU Memory',
    'GPU Memory',
    'Uptime',
  ]),
});

export const HEADER_UNITS: Readonly<Record<string, string>> = Object.freeze({
  Latency: 'ms',
  'P50 Latency': 'ms',
  'P90 Latency': 'ms',
  'P99 Latency': 'ms',
  Throughput: '/s',
  'Error Rate': '%',
  'CPU Memory': 'mb',
  'GPU Memory': 'mb',
  'GPU Memory Max': 'mb',
  'GPU Memory Mean': 'mb',
  'Time to Train': 's',
  Uptime: 's',
});

// Used when a configuration entry does not name the metric key for a header.
export const DEFAULT_METRIC_KEYS: Readonly<Record<string, string>> = Object.freeze({
  Throughput: 'throughput',
  'CPU Memory': 'cpu_memory_usage',
  'GPU Memory Max': 'gpu_memory_usage_max',
  'GPU Memory Mean': 'gpu_memory_usage_mean',
  'Time to Train': 'time_to_train',
  Uptime: 'uptime_in_seconds',
});

export const CATEGORICAL_HEADERS: ReadonlySet<string> = new Set([
  'Metric Prefix',
  'Metric Suffix',
  'Test',
  'Framework',
  'Framework Desc',
  'Model',
  'Benchmark Desc',
  'Instance Type',
  'Num Instances',
  'Precision',
]);

export const META_INFO_HEADERS: readonly string[] = Object.freeze(['Type', 'DashboardUri']);

const metaInfoHeaders: ReadonlySet<string> = new Set(META_INFO_HEADERS);

export const BENCHMARK_TYPES: readonly BenchmarkType[] = ['Training CV', 'Inference'];

export function isBenchmarkType(value: string): value is BenchmarkType {
  return Object.prototype.hasOwnProperty.call(BENCHMARK_HEADERS, value);
}

export function classifyHeader(header: string): HeaderClass {
  if (metaInfoHeaders.has(header)) {
    return 'meta';
  }
  if (CATEGORICAL_HEADERS.has(header)) {
    return 'categorical';
  }
  return 'measurable';
}

export function defaultMetricKey(header: string): string | null {
  return Object.prototype.hasOwnProperty.call(DEFAULT_METRIC_KEYS, header)
    ? DEFAULT_METRIC_KEYS[header]
    : null;
}

/**
 * Appends the display unit to a header, e.g. `Throughput` becomes `Throughput (/s)`.
 * Dimensionless headers are returned unchanged.
 */
export function headerWithUnit(header: string): string {
  if (!Object.prototype.hasOwnProperty.call(HEADER_UNITS, header)) {
    return header;
  }
  return `${header} (${HEADER_UNITS[header]})`;
}
