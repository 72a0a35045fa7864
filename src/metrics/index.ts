import {
  RunMetricSchema,
  RunMetricsReportSchema,
  type RunMetric,
  type RunMetricsReport,
} from '../contracts/index.js';

const DEFAULT_MODULE_ID = 'usage-attribution';
const DEFAULT_SCHEMA_VERSION = '1.0.0';

export interface RunMetricsOptions {
  moduleId?: string;
  schemaVersion?: string;
  generatedAt?: string;
}

export function metric(
  name: string,
  value: number,
  unit: RunMetric['unit'],
  extra: { sourceId?: string; labels?: Record<string, string> } = {},
): RunMetric {
  return {
    name,
    value,
    unit,
    ...(extra.sourceId && { source_id: extra.sourceId }),
    labels: extra.labels ?? {},
  };
}

export function buildRunMetricsReport(
  runId: string,
  metrics: RunMetric[],
  options: RunMetricsOptions = {},
): RunMetricsReport {
  const report: RunMetricsReport = {
    module_id: options.moduleId ?? DEFAULT_MODULE_ID,
    schema_version: options.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
    run_id: runId,
    generated_at: options.generatedAt ?? new Date().toISOString(),
    metrics,
  };

  return RunMetricsReportSchema.parse(report);
}

export function validateRunMetric(value: unknown): RunMetric {
  return RunMetricSchema.parse(value);
}

/** Sum of a metric's values across sources, or 0 when absent. */
export function totalOf(report: RunMetricsReport, name: string): number {
  return report.metrics.filter((m) => m.name === name).reduce((sum, m) => sum + m.value, 0);
}

export function serializeRunMetricsReport(report: RunMetricsReport): string {
  return JSON.stringify(report, null, 2);
}

export type { RunMetric, RunMetricsReport };
