import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../functions/_shared/benchmark_catalog/errors.ts';
import { readCatalogSettings } from '../../functions/_shared/benchmark_catalog/settings.ts';

describe('readCatalogSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(readCatalogSettings({})).toEqual({
      configPath: 'config/benchmarks.yaml',
      namespace: 'benchmarkai-metrics-prod',
      region: null,
      alarmConsoleRegion: 'us-east-1',
      lookbackDays: 7,
      requestTimeoutMs: 10000,
      maxAttempts: 3,
      port: 8080,
      logLevel: 'info',
    });
  });

  it('prefers AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(readCatalogSettings({ AWS_DEFAULT_REGION: 'eu-west-1' }).region).toBe('eu-west-1');
    expect(
      readCatalogSettings({ AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'eu-west-1' }).region
    ).toBe('us-west-2');
  });

  it('reads overrides', () => {
    const settings = readCatalogSettings({
      BENCHMARK_CONFIG_PATH: '/etc/benchmarks.yaml',
      BENCHMARK_ALARM_CONSOLE_REGION: 'ap-southeast-2',
      BENCHMARK_LOOKBACK_DAYS: '14',
      BENCHMARK_MAX_ATTEMPTS: '5',
      LOG_LEVEL: 'WARN',
    });

    expect(settings.configPath).toBe('/etc/benchmarks.yaml');
    expect(settings.alarmConsoleRegion).toBe('ap-southeast-2');
    expect(settings.lookbackDays).toBe(14);
    expect(settings.maxAttempts).toBe(5);
    expect(settings.logLevel).toBe('warn');
  });

  it('treats blank values as unset', () => {
    const settings = readCatalogSettings({ AWS_REGION: '  ', BENCHMARK_LOOKBACK_DAYS: '' });

    expect(settings.region).toBeNull();
    expect(settings.lookbackDays).toBe(7);
  });

  it('rejects non-numeric and non-positive numbers', () => {
    expect(() => readCatalogSettings({ BENCHMARK_LOOKBACK_DAYS: 'weekly' })).toThrow(ConfigError);
    expect(() => readCatalogSettings({ BENCHMARK_REQUEST_TIMEOUT_MS: '0' })).toThrow(ConfigError);
  });
});
