import {
  CloudWatchClient,
  DescribeAlarmsForMetricCommand,
  GetMetricStatisticsCommand,
  paginateListMetrics,
  type Datapoint as CloudWatchDatapoint,
} from '@aws-sdk/client-cloudwatch';

import { BackendError, ConfigError } from './errors.ts';
import type {
  AlarmSummary,
  Datapoint,
  MetricsBackend,
  Statistic,
  StatisticsRequest,
} from './types.ts';

export interface CloudWatchBackendSettings {
  region: string | null;
  requestTimeoutMs: number;
  maxAttempts: number;
}

export class CloudWatchMetricsBackend implements MetricsBackend {
  constructor(private client: CloudWatchClient) {}

  async getStatistics(request: StatisticsRequest): Promise<Datapoint[]> {
    try {
      const response = await this.client.send(
        new GetMetricStatisticsCommand({
          Namespace: request.namespace,
          MetricName: request.metricName,
          StartTime: request.startTime,
          EndTime: request.endTime,
          Period: request.periodSeconds,
          Statistics: [request.statistic],
        })
      );
      return (response.Datapoints ?? [])
        .map((point) => toDatapoint(point, request.statistic))
        .filter((point): point is Datapoint => point !== null);
    } catch (error) {
      throw new BackendError('getStatistics', error, request.metricName);
    }
  }

  async getAlarmsForMetric(namespace: string, metricName: string): Promise<AlarmSummary[]> {
    try {
      const response = await this.client.send(
        new DescribeAlarmsForMetricCommand({
          Namespace: namespace,
          MetricName: metricName,
        })
      );
      return (response.MetricAlarms ?? []).map((alarm) => ({
        name: alarm.AlarmName ?? '',
        state: alarm.StateValue ?? '',
      }));
    } catch (error) {
      throw new BackendError('getAlarmsForMetric', error, metricName);
    }
  }

  async listMetrics(namespace: string): Promise<string[]> {
    const names: string[] = [];
    try {
      for await (const page of paginateListMetrics({ client: this.client }, { Namespace: namespace })) {
        for (const metric of page.Metrics ?? []) {
          if (metric.MetricName) {
            names.push(metric.MetricName);
          }
        }
      }
    } catch (error) {
      throw new BackendError('listMetrics', error);
    }
    return names;
  }
}

/**
 * Builds the CloudWatch-backed capability. Throws `ConfigError` when no region is configured.
 */
export function createCloudWatchBackend(settings: CloudWatchBackendSettings): CloudWatchMetricsBackend {
  if (!settings.region) {
    throw new ConfigError('Missing metrics backend configuration', [
      'AWS_REGION: a region is required to reach CloudWatch',
    ]);
  }

  const client = new CloudWatchClient({
    region: settings.region,
    maxAttempts: settings.maxAttempts,
    requestHandler: {
      connectionTimeout: settings.requestTimeoutMs,
      requestTimeout: settings.requestTimeoutMs,
    },
  });
  return new CloudWatchMetricsBackend(client);
}

function toDatapoint(point: CloudWatchDatapoint, statistic: Statistic): Datapoint | null {
  const value = point[statistic];
  if (typeof value !== 'number') {
    return null;
  }
  return { value, timestamp: point.Timestamp ?? new Date(0) };
}
