export type BenchmarkType = 'Training CV' | 'Inference';

export type HeaderClass = 'meta' | 'categorical' | 'measurable';

export type ConfigValue = string | number | boolean | null;

/** The empty placeholder stored for missing data. */
export type EmptyCell = '';

export type CellValue = string | number | boolean;

export interface BenchmarkSpec {
  type: string;
  metric_prefix: string;
  metric_suffix: string;
  /** The configuration entry as written, keyed by header name. */
  values: Record<string, ConfigValue>;
}

export type BenchmarkRecord = Record<string, CellValue> & { Type: string };

export type AlarmIndex = Record<string, string[]>;

export interface CatalogEntry {
  record: BenchmarkRecord;
  alarms: AlarmIndex;
}

export interface BenchmarkQueryResult {
  benchmarks: CatalogEntry[];
  headers: readonly string[];
}

export type CatalogStatus = 'empty' | 'fetched';

export type HeaderResolution =
  | { kind: 'literal'; value: CellValue }
  | { kind: 'metric'; key: string }
  | { kind: 'unset' };

export type Statistic = 'Average' | 'Sum' | 'Minimum' | 'Maximum' | 'SampleCount';

export interface StatisticsRequest {
  namespace: string;
  metricName: string;
  startTime: Date;
  endTime: Date;
  periodSeconds: number;
  statistic: Statistic;
}

export interface Datapoint {
  value: number;
  timestamp: Date;
}

export interface AlarmSummary {
  name: string;
  /** Raw CloudWatch state value, e.g. `ALARM`, `OK` or `INSUFFICIENT_DATA`. */
  state: string;
}

export interface MetricsBackend {
  getStatistics(request: StatisticsRequest): Promise<Datapoint[]>;
  getAlarmsForMetric(namespace: string, metricName: string): Promise<AlarmSummary[]>;
  /** Every metric name under the namespace; pages are followed internally. */
  listMetrics(namespace: string): Promise<string[]>;
}
