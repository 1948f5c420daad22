export class ConfigError extends Error {
  issues: string[];

  constructor(message = 'Invalid benchmark configuration', issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type BackendOperation = 'getStatistics' | 'getAlarmsForMetric' | 'listMetrics';

export class BackendError extends Error {
  operation: BackendOperation;
  metricName?: string;

  constructor(operation: BackendOperation, cause: unknown, metricName?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = metricName ? ` for ${metricName}` : '';
    super(`Metrics backend ${operation} failed${target}: ${reason}`, { cause });
    this.name = 'BackendError';
    this.operation = operation;
    this.metricName = metricName;
  }
}

export class UnknownTypeRequested extends Error {
  type: string;

  constructor(type: string) {
    super(`Unknown benchmark type: ${type}`);
    this.name = 'UnknownTypeRequested';
    this.type = type;
  }
}
