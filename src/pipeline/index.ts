/**
 * Daily attribution run
 *
 * Per-source pure stages (normalize, resolve, classify, delta, build)
 * run concurrently. Facts are then merged one source at a time, which is
 * the only point where persistent state changes; an abort between
 * sources leaves every committed source intact. Reconciliation and
 * anomaly detection run over what the store holds afterwards.
 */

import type {
  Anomaly,
  ClassifiedRecord,
  CumulativeObservation,
  Fact,
  FetchWindow,
  GroundTruthTotal,
  Profile,
  RawRecord,
  ReconciliationReport,
  ResolvedIdentity,
  RunMetric,
  RunMetricsReport,
  SourceId,
} from '../contracts/index.js';
import { detectAnomalies } from '../anomalies/index.js';
import { entityKeyOf, normalizeCumulative, selectBaselines } from '../billing-delta/index.js';
import { classifyRecord, compilePatterns, type ClassifyOptions } from '../classify/index.js';
import type { SourceInput } from '../config/index.js';
import { addDays, factDateOf } from '../contracts/time.js';
import { buildFactBatches } from '../facts/index.js';
import {
  identityOptionsFromProfile,
  resolve,
  summarizeAttribution,
  type AttributionSummary,
  type IdentityMappingView,
} from '../identity/index.js';
import { FactMerger, type FactStore } from '../merge/index.js';
import { buildRunMetricsReport, metric } from '../metrics/index.js';
import {
  isDiagnostic,
  normalize,
  summarizeNormalization,
  type NormalizeStats,
  type ParserRegistry,
} from '../normalize/index.js';
import { retryPolicyOf } from '../profiles/index.js';
import { reconcile, reconciledFactKeys } from '../reconcile/index.js';
import { generateRunId, type ArtifactWriter } from '../runner/artifacts.js';
import {
  countIssues,
  createIssue,
  EXIT_DEPENDENCY,
  EXIT_PARTIAL,
  EXIT_SUCCESS,
  PipelineError,
  wrapError,
  type IssueCategory,
  type RunIssue,
  type RunnerErrorEnvelope,
} from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';

export interface PipelineInputs {
  sources: readonly SourceInput[];
  profile: Profile;
  mapping: IdentityMappingView;
  groundTruth?: readonly GroundTruthTotal[];
}

export interface PipelineDeps {
  store: FactStore;
  logger: StructuredLogger;
  artifacts?: ArtifactWriter;
  signal?: AbortSignal;
  registry?: ParserRegistry;
  runId?: string;
  now?: () => Date;
  /** Merge back-off sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export type SourceStatus = 'ok' | 'degraded' | 'failed' | 'skipped';
export type RunStatus = 'success' | 'partial' | 'failed' | 'aborted';

export interface SourceOutcome {
  source_id: SourceId;
  status: SourceStatus;
  error?: string;
  records: NormalizeStats;
  out_of_window: number;
  identity_unresolved: number;
  cycle_boundaries: number;
  cycle_anomalies: number;
  held_snapshots: number;
  facts: { usage: number; cost: number; suppressed_records: number };
  merge?: { inserted: number; replaced: number; unchanged: number; attempts: number };
  warnings: string[];
}

export interface RunSummary {
  run_id: string;
  status: RunStatus;
  exit_code: number;
  sources: SourceOutcome[];
  issues: RunIssue[];
  issue_counts: Record<IssueCategory, number>;
  attribution: AttributionSummary;
  reconciliation: ReconciliationReport[];
  anomalies: Anomaly[];
  metrics: RunMetricsReport;
  fatal_error?: RunnerErrorEnvelope;
}

interface PreparedSource {
  index: number;
  input: SourceInput;
  outcome: SourceOutcome;
  log: StructuredLogger;
  issues: RunIssue[];
  /** Records that feed fact building: non-cumulative records plus billing deltas. */
  factInputs: ClassifiedRecord[];
  facts: Fact[];
  observations: CumulativeObservation[];
  identities: ResolvedIdentity[];
  usable: RawRecord[];
}

const EMPTY_STATS: NormalizeStats = { total: 0, parsed: 0, unparseable: 0, byKind: {} };

function emptyOutcome(sourceId: SourceId): SourceOutcome {
  return {
    source_id: sourceId,
    status: 'ok',
    records: EMPTY_STATS,
    out_of_window: 0,
    identity_unresolved: 0,
    cycle_boundaries: 0,
    cycle_anomalies: 0,
    held_snapshots: 0,
    facts: { usage: 0, cost: 0, suppressed_records: 0 },
    warnings: [],
  };
}

/** Records are kept when their observation time falls in `(start, end]`. */
export function inFetchWindow(record: RawRecord, window: FetchWindow): boolean {
  const end = Date.parse(record.bucket_end);
  return end > Date.parse(window.start) && end <= Date.parse(window.end);
}

function isAborted(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}

/**
 * Pure per-source stages up to fact inputs. Only reads from the store (baselines).
 */
async function prepareSource(
  index: number,
  input: SourceInput,
  inputs: PipelineInputs,
  deps: PipelineDeps,
  classifyOptions: ClassifyOptions,
): Promise<PreparedSource> {
  const log = deps.logger.child(input.source_id);
  const outcome = emptyOutcome(input.source_id);
  const prepared: PreparedSource = {
    index,
    input,
    outcome,
    log,
    issues: [],
    factInputs: [],
    facts: [],
    observations: [],
    identities: [],
    usable: [],
  };

  if (input.error !== undefined) {
    outcome.status = 'failed';
    outcome.error = input.error;
    prepared.issues.push(createIssue('SOURCE_UNAVAILABLE', input.error, { sourceId: input.source_id }));
    log.error('source.unavailable', 'Source adapter reported an error', { error: input.error });
    return prepared;
  }

  deps.artifacts?.archiveRaw(`${String(index).padStart(2, '0')}-${input.source_id}`, input.response);

  const normalized = normalize(input.source_id, input.response, input.fetch_window, { registry: deps.registry });
  const inWindow = normalized.filter((r) => inFetchWindow(r, input.fetch_window));
  outcome.out_of_window = normalized.length - inWindow.length;
  outcome.records = summarizeNormalization(inWindow);

  if (outcome.records.unparseable > 0) {
    const diagnostics = inWindow
      .filter(isDiagnostic)
      .flatMap((r) => r.raw_payload.diagnostics)
      .slice(0, 5);
    prepared.issues.push(
      createIssue('SOURCE_UNPARSEABLE', `${outcome.records.unparseable} unparseable record(s)`, {
        sourceId: input.source_id,
        context: { count: outcome.records.unparseable, sample: diagnostics },
      }),
    );
    log.warn('source.unparseable', 'Unparseable records in source response', {
      count: outcome.records.unparseable,
      sample: diagnostics,
    });
    if (outcome.records.parsed === 0) {
      outcome.status = 'failed';
      outcome.error = diagnostics[0] ?? 'response could not be parsed';
      return prepared;
    }
    outcome.status = 'degraded';
  }

  const usable = inWindow.filter((r) => !isDiagnostic(r));
  const identityOptions = identityOptionsFromProfile(inputs.profile);
  const classified = usable.map((record) => {
    const identity = resolve(record, inputs.mapping, identityOptions);
    return classifyRecord(record, identity, classifyOptions);
  });
  prepared.usable = usable;
  prepared.identities = classified.map((c) => c.identity);

  outcome.identity_unresolved = classified.filter((c) => c.identity.method === 'unresolved').length;
  if (outcome.identity_unresolved > 0) {
    prepared.issues.push(
      createIssue('IDENTITY_UNRESOLVED', `${outcome.identity_unresolved} record(s) could not be attributed`, {
        sourceId: input.source_id,
        context: { count: outcome.identity_unresolved },
      }),
    );
  }
  for (const warning of new Set(classified.flatMap((c) => c.identity.warnings))) {
    outcome.warnings.push(warning);
  }

  // Cumulative records become deltas; each delta inherits its entity's classification.
  const cumulative = usable.filter((r) => r.is_cumulative);
  let deltaClassified: ClassifiedRecord[] = [];
  if (cumulative.length > 0) {
    const history = await deps.store.readObservations(input.source_id);
    const batch = normalizeCumulative(cumulative, {
      inferRolloverOnDrop: inputs.profile.infer_rollover_on_drop,
      baselines: selectBaselines(history, cumulative),
    });

    const byEntity = new Map<string, ClassifiedRecord>();
    for (const c of classified) {
      if (c.record.is_cumulative && !byEntity.has(entityKeyOf(c.record))) byEntity.set(entityKeyOf(c.record), c);
    }
    deltaClassified = batch.deltas.flatMap((delta) => {
      const template = byEntity.get(entityKeyOf(delta));
      return template ? [{ ...template, record: delta }] : [];
    });

    prepared.observations = batch.observations;
    outcome.cycle_boundaries = batch.boundaries.length;
    outcome.cycle_anomalies = batch.anomalies.length;
    outcome.held_snapshots = batch.held.length;
    outcome.warnings.push(...batch.warnings);

    for (const boundary of batch.boundaries) {
      log.info('delta.boundary', 'Billing cycle boundary', {
        previous_cycle_start: boundary.previous_cycle_start,
        new_cycle_start: boundary.new_cycle_start,
        inferred: boundary.inferred,
      });
    }
    for (const anomaly of batch.anomalies) {
      prepared.issues.push(
        createIssue('CYCLE_BOUNDARY_ANOMALY', `Cumulative snapshot excluded: ${anomaly.reason}`, {
          sourceId: input.source_id,
          context: { reason: anomaly.reason, observed_at: anomaly.observed_at },
        }),
      );
      log.warn('delta.anomaly', 'Cumulative snapshot excluded', {
        reason: anomaly.reason,
        observed_at: anomaly.observed_at,
        previous_observed_at: anomaly.previous_observed_at,
      });
    }
    if (batch.anomalies.length > 0) outcome.status = 'degraded';
  }

  prepared.factInputs = [...classified.filter((c) => !c.record.is_cumulative), ...deltaClassified];
  return prepared;
}

/**
 * Build each source's facts. Cost scopes are compared across every source
 * of the run, so one source's estimate yields to another's breakdown.
 */
function buildSourceFacts(prepared: readonly PreparedSource[]): void {
  const built = buildFactBatches(prepared.map((p) => p.factInputs));
  prepared.forEach((p, i) => {
    const result = built[i];
    if (!result) return;
    p.facts = [...result.usage, ...result.cost];
    p.outcome.facts = {
      usage: result.usage.length,
      cost: result.cost.length,
      suppressed_records: result.stats.suppressed_records,
    };
    if (result.suppressed.length > 0) {
      p.log.info('facts.suppressed', 'Suppressed overlapping cost scopes', { groups: result.suppressed });
    }
    p.log.info('source.prepared', `Prepared ${p.facts.length} fact(s)`, {
      records: p.outcome.records.total,
      out_of_window: p.outcome.out_of_window,
      usage_facts: p.outcome.facts.usage,
      cost_facts: p.outcome.facts.cost,
      identity_unresolved: p.outcome.identity_unresolved,
    });
  });
}

function runStatusOf(outcomes: readonly SourceOutcome[]): RunStatus {
  if (outcomes.length > 0 && outcomes.every((o) => o.status === 'failed')) return 'failed';
  if (outcomes.some((o) => o.status !== 'ok')) return 'partial';
  return 'success';
}

export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case 'success':
      return EXIT_SUCCESS;
    case 'partial':
      return EXIT_PARTIAL;
    case 'failed':
    case 'aborted':
      return EXIT_DEPENDENCY;
  }
}

function sourceMetrics(outcome: SourceOutcome): RunMetric[] {
  const sourceId = outcome.source_id;
  const m = (name: string, value: number): RunMetric => metric(name, value, 'count', { sourceId });
  return [
    m('records_total', outcome.records.total),
    m('records_parsed', outcome.records.parsed),
    m('records_unparseable', outcome.records.unparseable),
    m('records_out_of_window', outcome.out_of_window),
    m('identity_unresolved', outcome.identity_unresolved),
    m('facts_usage', outcome.facts.usage),
    m('facts_cost', outcome.facts.cost),
    m('facts_inserted', outcome.merge?.inserted ?? 0),
    m('facts_replaced', outcome.merge?.replaced ?? 0),
    m('facts_unchanged', outcome.merge?.unchanged ?? 0),
    m('cycle_boundaries', outcome.cycle_boundaries),
    m('cycle_anomalies', outcome.cycle_anomalies),
  ];
}

/** Date span `[start, end)` covered by the run's fetch windows. */
function runDateSpan(sources: readonly SourceInput[]): { start: string; end: string } | undefined {
  if (sources.length === 0) return undefined;
  const starts = sources.map((s) => s.fetch_window.start.slice(0, 10)).sort();
  const ends = sources.map((s) => addDays(factDateOf(s.fetch_window.end), 1)).sort();
  return { start: starts[0], end: ends[ends.length - 1] };
}

/**
 * Run the full pipeline.
 */
export async function runPipeline(inputs: PipelineInputs, deps: PipelineDeps): Promise<RunSummary> {
  const runId = deps.runId ?? deps.artifacts?.runId ?? generateRunId();
  const log = deps.logger;
  const now = deps.now ?? (() => new Date());
  const merger = new FactMerger(deps.store, {
    retry: retryPolicyOf(inputs.profile),
    logger: log,
    sleep: deps.sleep,
  });
  const classifyOptions: ClassifyOptions = {
    mapping: inputs.mapping,
    patterns: compilePatterns(inputs.profile.identifier_patterns),
  };

  const issues: RunIssue[] = [];
  const reports: ReconciliationReport[] = [];
  let anomalies: Anomaly[] = [];
  let fatal: RunnerErrorEnvelope | undefined;
  let aborted = false;
  let prepared: PreparedSource[] = [];

  log.info('run.start', `Starting run with ${inputs.sources.length} source(s)`, {
    profile: inputs.profile.profile_id,
    mapping_version: inputs.mapping.version,
    sources: inputs.sources.map((s) => s.source_id),
  });

  try {
    if (isAborted(deps.signal)) throw new PipelineError('ABORTED', 'Run aborted before start');

    prepared = await Promise.all(
      inputs.sources.map((input, index) => prepareSource(index, input, inputs, deps, classifyOptions)),
    );
    for (const p of prepared) issues.push(...p.issues);
    buildSourceFacts(prepared.filter((p) => p.outcome.status !== 'failed'));

    for (const p of prepared) {
      if (p.outcome.status === 'failed') continue;
      if (isAborted(deps.signal)) {
        aborted = true;
        p.outcome.status = 'skipped';
        continue;
      }
      const [result] = p.facts.length > 0 ? await merger.upsert(p.facts) : [];
      if (result) {
        p.outcome.merge = {
          inserted: result.inserted,
          replaced: result.replaced,
          unchanged: result.unchanged,
          attempts: result.attempts,
        };
        if (result.audit.length > 0) {
          deps.artifacts?.writeEvidence(`merge-audit-${p.input.source_id}`, result.audit);
        }
      }
      await merger.saveObservations(p.input.source_id, p.observations);
    }

    if (aborted || isAborted(deps.signal)) {
      aborted = true;
    } else {
      for (const truth of inputs.groundTruth ?? []) {
        const facts = await deps.store.readFacts({
          fact_type: 'cost',
          start_date: truth.period_start,
          end_date: truth.period_end,
        });
        const report = reconcile(truth, facts, truth, {
          tolerancePercent: inputs.profile.variance_tolerance_pct,
          now,
        });
        reports.push(report);
        await merger.annotateReconciliation(reconciledFactKeys(facts, truth), report.status);
        if (report.status === 'variance_flagged') {
          issues.push(
            createIssue(
              'RECONCILIATION_VARIANCE',
              `${truth.label}: variance ${report.variance_percent}% exceeds ${report.tolerance_percent}%`,
              { context: { report_id: report.report_id, variance_minor_units: report.variance_minor_units } },
            ),
          );
        }
        log.info('reconcile.report', `Reconciled ${truth.label}`, {
          report_id: report.report_id,
          status: report.status,
          variance_percent: report.variance_percent,
        });
      }

      const span = runDateSpan(inputs.sources);
      if (span) {
        const lookback = inputs.profile.anomaly_thresholds.cost_spike_lookback_days;
        const costFacts = (await deps.store.readFacts({
          fact_type: 'cost',
          start_date: addDays(span.start, -lookback),
          end_date: span.end,
        })).flatMap((f) => (f.fact_type === 'cost' ? [f] : []));
        anomalies = detectAnomalies(costFacts, reports, { profile: inputs.profile, now }).anomalies
          .filter((a) => !a.fact_date || a.fact_date >= span.start);
      } else {
        anomalies = detectAnomalies([], reports, { profile: inputs.profile, now }).anomalies;
      }
    }
  } catch (err) {
    if (!(err instanceof PipelineError)) throw err;
    fatal = wrapError(err);
    if (err.code === 'ABORTED') {
      aborted = true;
    } else if (err.code === 'MERGE_CONFLICT' || err.code === 'STORAGE_UNAVAILABLE') {
      issues.push(createIssue(err.code, err.message, { context: err.context }));
    }
    log.fatal('run.fatal', err.message, { code: err.code });
  }

  const outcomes: SourceOutcome[] = inputs.sources.map(
    (input, i) => prepared[i]?.outcome ?? { ...emptyOutcome(input.source_id), status: 'skipped' },
  );

  const status: RunStatus = aborted ? 'aborted' : fatal ? 'failed' : runStatusOf(outcomes);
  const attribution = summarizeAttribution(
    prepared.flatMap((p) => p.identities),
    prepared.flatMap((p) => p.usable),
  );

  const metrics = buildRunMetricsReport(
    runId,
    [
      ...outcomes.flatMap(sourceMetrics),
      metric('attribution_rate', attribution.attribution_rate, 'ratio'),
      metric('sources_failed', outcomes.filter((o) => o.status === 'failed').length, 'count'),
      metric('anomalies', anomalies.length, 'count'),
      metric('reconciliation_flagged', reports.filter((r) => r.status === 'variance_flagged').length, 'count'),
    ],
    { generatedAt: now().toISOString() },
  );

  const summary: RunSummary = {
    run_id: runId,
    status,
    exit_code: exitCodeForStatus(status),
    sources: outcomes,
    issues,
    issue_counts: countIssues(issues),
    attribution,
    reconciliation: reports,
    anomalies,
    metrics,
    ...(fatal && { fatal_error: fatal }),
  };

  if (deps.artifacts) {
    if (reports.length > 0) deps.artifacts.writeEvidence('reconciliation', reports);
    if (anomalies.length > 0) deps.artifacts.writeEvidence('anomalies', anomalies);
    deps.artifacts.writeEvidence('metrics', metrics);
  }

  log.info('run.complete', `Run ${status}`, {
    exit_code: summary.exit_code,
    issue_counts: summary.issue_counts,
  });

  return summary;
}
