import type { Logger } from '../logger.ts';
import type { BenchmarkConfigLoader } from './config_loader.ts';
import { UnknownTypeRequested } from './errors.ts';
import { composeMetricName, resolveHeader } from './resolution.ts';
import { BENCHMARK_HEADERS, META_INFO_HEADERS, headerWithUnit, isBenchmarkType } from './schema.ts';
import type {
  AlarmIndex,
  BenchmarkQueryResult,
  BenchmarkRecord,
  BenchmarkSpec,
  CatalogEntry,
  CatalogStatus,
  CellValue,
  EmptyCell,
  MetricsBackend,
} from './types.ts';

const SECONDS_PER_DAY = 86400;
const FIRING_STATE = 'ALARM';
const EMPTY: EmptyCell = '';

export interface MetricCatalogDependencies {
  backend: MetricsBackend;
  loadConfig: BenchmarkConfigLoader;
  logger: Logger;
  namespace: string;
  alarmConsoleRegion: string;
  lookbackDays?: number;
  now?: () => Date;
}

export interface MetricCatalogOptions {
  fetchMetrics?: boolean;
}

export function buildAlarmUri(region: string, alarmName: string): string {
  return (
    `https://console.aws.amazon.com/cloudwatch/home?region=${encodeURIComponent(region)}` +
    `#alarm:alarmFilter=ANY;name=${encodeURIComponent(alarmName)}`
  );
}

/**
 * Benchmark metrics pulled from the metrics backend and shaped by the static header schema.
 *
 * The catalog starts `empty`. The first `query()` fetches once; after that the cached entries
 * are served until `fetch()` is called again explicitly.
 */
export class MetricCatalog {
  private entries: CatalogEntry[] = [];
  private currentStatus: CatalogStatus = 'empty';
  private pendingFetch: Promise<void> | null = null;
  private readonly lookbackDays: number;
  private readonly now: () => Date;

  constructor(private deps: MetricCatalogDependencies) {
    this.lookbackDays = deps.lookbackDays ?? 7;
    this.now = deps.now ?? (() => new Date());
  }

  static async create(
    deps: MetricCatalogDependencies,
    options: MetricCatalogOptions = {}
  ): Promise<MetricCatalog> {
    const catalog = new MetricCatalog(deps);
    if (options.fetchMetrics ?? true) {
      await catalog.fetch();
    }
    return catalog;
  }

  get status(): CatalogStatus {
    return this.currentStatus;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Reloads the configuration and rebuilds every entry. On failure the previous entries and
   * status are left untouched.
   */
  fetch(): Promise<void> {
    if (!this.pendingFetch) {
      this.pendingFetch = this.fetchEntries()
        .then((entries) => {
          this.entries = entries;
          this.currentStatus = 'fetched';
        })
        .finally(() => {
          this.pendingFetch = null;
        });
    }
    return this.pendingFetch;
  }

  async query(type: string): Promise<BenchmarkQueryResult> {
    if (!isBenchmarkType(type)) {
      throw new UnknownTypeRequested(type);
    }
    if (this.currentStatus === 'empty') {
      await this.fetch();
    }
    return {
      benchmarks: this.entries.filter((entry) => entry.record.Type === type),
      headers: BENCHMARK_HEADERS[type],
    };
  }

  headerWithUnit(header: string): string {
    return headerWithUnit(header);
  }

  listAllMetrics(): Promise<string[]> {
    return this.deps.backend.listMetrics(this.deps.namespace);
  }

  private async fetchEntries(): Promise<CatalogEntry[]> {
    const specs = await this.deps.loadConfig();
    const entries: CatalogEntry[] = [];

    for (const spec of specs) {
      if (!isBenchmarkType(spec.type)) {
        this.deps.logger.error(`Skipping benchmark with invalid type ${spec.type}`, {
          code: 'UnknownBenchmarkType',
          benchmark_type: spec.type,
          metric_prefix: spec.metric_prefix,
        });
        continue;
      }
      entries.push(await this.buildEntry(spec, BENCHMARK_HEADERS[spec.type]));
    }

    this.deps.logger.info('Benchmark metrics fetched', {
      configured: specs.length,
      fetched: entries.length,
    });
    return entries;
  }

  private async buildEntry(spec: BenchmarkSpec, headers: readonly string[]): Promise<CatalogEntry> {
    const values: Record<string, CellValue> = {};
    const alarms: AlarmIndex = {};

    for (const header of [...META_INFO_HEADERS, ...headers]) {
      const resolution = resolveHeader(header, spec);
      if (resolution.kind === 'literal') {
        values[header] = resolution.value;
      } else if (resolution.kind === 'metric') {
        const metric = composeMetricName(spec.metric_prefix, resolution.key, spec.metric_suffix);
        values[header] = await this.fetchMetricValue(metric);
        alarms[header] = await this.fetchFiringAlarmUris(metric);
      }
    }

    for (const header of headers) {
      if (!Object.prototype.hasOwnProperty.call(values, header)) {
        values[header] = EMPTY;
      }
    }

    const record: BenchmarkRecord = { ...values, Type: spec.type };
    return { record, alarms };
  }

  private async fetchMetricValue(metric: string): Promise<number | EmptyCell> {
    this.deps.logger.debug(`Requesting data for metric ${metric}`, { metric });

    const endTime = this.now();
    const periodSeconds = this.lookbackDays * SECONDS_PER_DAY;
    const points = await this.deps.backend.getStatistics({
      namespace: this.deps.namespace,
      metricName: metric,
      startTime: new Date(endTime.getTime() - periodSeconds * 1000),
      endTime,
      periodSeconds,
      statistic: 'Average',
    });

    if (points.length === 0) {
      this.deps.logger.warn(`Metric ${metric} has no datapoints`, {
        code: 'MetricUnavailable',
        metric,
      });
      return EMPTY;
    }
    if (points.length > 1) {
      this.deps.logger.warn(`More than one datapoint (${points.length}) returned for metric ${metric}`, {
        metric,
        datapoints: points.length,
      });
    }
    return roundToHundredths(points[0].value);
  }

  private async fetchFiringAlarmUris(metric: string): Promise<string[]> {
    this.deps.logger.debug(`Requesting alarms for metric ${metric}`, { metric });

    const alarms = await this.deps.backend.getAlarmsForMetric(this.deps.namespace, metric);
    return alarms
      .filter((alarm) => alarm.state === FIRING_STATE)
      .map((alarm) => buildAlarmUri(this.deps.alarmConsoleRegion, alarm.name));
  }
}

function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}
