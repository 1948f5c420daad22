import { beforeEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';

import { MetricCatalog } from '../../functions/_shared/benchmark_catalog/catalog.ts';
import { createFileConfigLoader } from '../../functions/_shared/benchmark_catalog/config_loader.ts';
import { createRequestHandler } from '../../functions/api/router.ts';
import { FakeMetricsBackend, createTestLogger } from '../fixtures/backend.ts';

const configPath = path.join(process.cwd(), 'tests', 'fixtures', 'configs', 'mixed.yaml');

interface ErrorPayload {
  error: {
    code: string;
    message: string;
    errors?: Array<{ field: string; message: string; code: string }>;
    [key: string]: unknown;
  };
  request_id: string;
}

function setup(failingMetrics: string[] = []) {
  const backend = new FakeMetricsBackend({
    statistics: {
      'mxnet.throughput.resnet.serving': [512.3456],
      'mxnet.latency_mean.resnet.serving': [7.125],
    },
    metricPages: [['mxnet.throughput.resnet.serving'], ['mxnet.latency_mean.resnet.serving']],
    failingMetrics,
  });
  const loadConfig = vi.fn(createFileConfigLoader(configPath));
  const catalog = new MetricCatalog({
    backend,
    loadConfig,
    logger: createTestLogger(),
    namespace: 'benchmarkai-metrics-prod',
    alarmConsoleRegion: 'us-east-1',
  });
  const logger = createTestLogger();
  const handleRequest = createRequestHandler({ catalog, logger });
  return { catalog, loadConfig, logger, handleRequest };
}

function get(pathAndQuery: string): Request {
  return new Request(`http://localhost${pathAndQuery}`, { method: 'GET' });
}

describe('benchmark report API', () => {
  let context: ReturnType<typeof setup>;

  beforeEach(() => {
    context = setup();
  });

  it('returns the normalized rows and display columns for a type', async () => {
    const response = await context.handleRequest(get('/v1/benchmarks?type=Inference'));

    expect(response.status).toBe(200);
    expect(response.headers.get('X-Request-Id')).toMatch(/^req_[0-9a-f-]{36}$/);
    const payload = (await response.json()) as {
      data: {
        type: string;
        columns: string[];
        benchmarks: Array<{ record: Record<string, unknown>; alarms: Record<string, string[]> }>;
      };
      meta: { total: number; status: string };
    };
    expect(payload.data.type).toBe('Inference');
    expect(payload.data.columns).toEqual([
      'Framework',
      'Framework Desc',
      'Model',
      'Precision',
      'Benchmark Desc',
      'Instance Type',
      'Throughput (/s)',
      'Latency (ms)',
      'P50 Latency (ms)',
      'P90 Latency (ms)',
      'P99 Latency (ms)',
      'Error Rate (%)',
      'CPU Memory (mb)',
      'GPU Memory (mb)',
      'Uptime (s)',
    ]);
    expect(payload.data.benchmarks).toHaveLength(1);
    expect(payload.data.benchmarks[0].record.Latency).toBe(7.13);
    expect(payload.data.benchmarks[0].alarms.Latency).toEqual([]);
    expect(payload.meta).toEqual({ total: 1, status: 'fetched' });
  });

  it('requires a type', async () => {
    const response = await context.handleRequest(get('/v1/benchmarks'));

    expect(response.status).toBe(400);
    const payload = (await response.json()) as ErrorPayload;
    expect(payload.error.code).toBe('VALIDATION_ERROR');
    expect(payload.error.errors).toEqual([
      { field: 'type', message: 'Benchmark type is required', code: 'type_error' },
    ]);
  });

  it('reports unknown types as a distinct error', async () => {
    const response = await context.handleRequest(get('/v1/benchmarks?type=NoSuchType'));

    expect(response.status).toBe(404);
    const payload = (await response.json()) as ErrorPayload;
    expect(payload.error.code).toBe('UNKNOWN_BENCHMARK_TYPE');
    expect(payload.error.type).toBe('NoSuchType');
    expect(context.loadConfig).not.toHaveBeenCalled();
  });

  it('refetches when refresh is requested', async () => {
    await context.handleRequest(get('/v1/benchmarks?type=Inference'));
    await context.handleRequest(get('/v1/benchmarks?type=Inference'));
    expect(context.loadConfig).toHaveBeenCalledTimes(1);

    const response = await context.handleRequest(get('/v1/benchmarks?type=Inference&refresh=true'));

    expect(response.status).toBe(200);
    expect(context.loadConfig).toHaveBeenCalledTimes(2);
  });

  it('rejects an invalid refresh flag', async () => {
    const response = await context.handleRequest(get('/v1/benchmarks?type=Inference&refresh=yes'));

    expect(response.status).toBe(400);
    const payload = (await response.json()) as ErrorPayload;
    expect(payload.error.errors?.[0].field).toBe('refresh');
  });

  it('surfaces backend failures as a bad gateway', async () => {
    const failing = setup(['mxnet.latency_mean.resnet.serving']);

    const response = await failing.handleRequest(get('/v1/benchmarks?type=Inference'));

    expect(response.status).toBe(502);
    const payload = (await response.json()) as ErrorPayload;
    expect(payload.error.code).toBe('BACKEND_ERROR');
    expect(payload.error.operation).toBe('getStatistics');
    expect(payload.error.metric).toBe('mxnet.latency_mean.resnet.serving');
    expect(failing.catalog.status).toBe('empty');
  });

  it('lists all metrics', async () => {
    const response = await context.handleRequest(get('/v1/metrics'));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      data: ['mxnet.throughput.resnet.serving', 'mxnet.latency_mean.resnet.serving'],
      meta: { total: 2 },
    });
  });

  it('reports catalog health without fetching', async () => {
    const response = await context.handleRequest(get('/health'));

    const payload = (await response.json()) as { status: string; checks: Record<string, unknown> };
    expect(payload.status).toBe('healthy');
    expect(payload.checks).toEqual({ catalog: 'empty', benchmarks: 0 });
    expect(context.loadConfig).not.toHaveBeenCalled();
  });

  it('returns 404 for unknown routes', async () => {
    const response = await context.handleRequest(get('/v1/dashboards'));

    expect(response.status).toBe(404);
    const payload = (await response.json()) as ErrorPayload;
    expect(payload.error.code).toBe('NOT_FOUND');
    expect(payload.error.message).toBe('No route matches GET /v1/dashboards');
  });

  it('logs every request', async () => {
    await context.handleRequest(get('/health'));

    expect(context.logger.request).toHaveBeenCalledTimes(1);
    expect(context.logger.request).toHaveBeenCalledWith(
      expect.any(Request),
      expect.any(Response),
      expect.objectContaining({ request_id: expect.stringMatching(/^req_/) })
    );
  });
});
