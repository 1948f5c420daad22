import { classifyHeader, defaultMetricKey } from './schema.ts';
import type { BenchmarkSpec, HeaderResolution } from './types.ts';

type ResolutionStep = (header: string, spec: BenchmarkSpec) => HeaderResolution | null;

// Order matters: an explicit assignment beats classification, and classification beats the
// default-key table. A categorical header never becomes a backend query unless configured so.
const resolutionChain: ResolutionStep[] = [
  explicitAssignment,
  unassignedLiteral,
  schemaDefaultKey,
];

export function resolveHeader(header: string, spec: BenchmarkSpec): HeaderResolution {
  for (const step of resolutionChain) {
    const resolution = step(header, spec);
    if (resolution) {
      return resolution;
    }
  }
  return { kind: 'unset' };
}

export function composeMetricName(prefix: string, key: string, suffix: string): string {
  return `${prefix}.${key}.${suffix}`;
}

function explicitAssignment(header: string, spec: BenchmarkSpec): HeaderResolution | null {
  if (!Object.prototype.hasOwnProperty.call(spec.values, header)) {
    return null;
  }
  const value = spec.values[header];
  if (value === null) {
    return { kind: 'unset' };
  }
  if (classifyHeader(header) === 'measurable') {
    return { kind: 'metric', key: String(value) };
  }
  return { kind: 'literal', value };
}

function unassignedLiteral(header: string): HeaderResolution | null {
  return classifyHeader(header) === 'measurable' ? null : { kind: 'unset' };
}

function schemaDefaultKey(header: string): HeaderResolution | null {
  const key = defaultMetricKey(header);
  return key === null ? null : { kind: 'metric', key };
}
