/**
 * Cost reconciliation
 *
 * Compares aggregated cost facts with a ground-truth total (an invoice)
 * over a half-open date period. Reports are advisory: annotating the
 * facts with the verdict is the merger's job.
 */

import type {
  CostFact,
  Fact,
  GroundTruthTotal,
  PlatformBreakdown,
  PlatformCategory,
  ReconciliationReport,
} from '../contracts/index.js';
import { GroundTruthFileSchema, ReconciliationReportSchema } from '../contracts/index.js';
import { hashCanonical, shortHash } from '../runner/canonical.js';

export const DEFAULT_TOLERANCE_PCT = 5;

export interface ReconcilePeriod {
  /** Inclusive `YYYY-MM-DD`. */
  period_start: string;
  /** Exclusive `YYYY-MM-DD`. */
  period_end: string;
}

export interface ReconcileOptions {
  tolerancePercent?: number;
  now?: () => Date;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Parse a ground-truth file body: `{ "totals": [...] }`.
 */
export function parseGroundTruth(raw: unknown): GroundTruthTotal[] {
  const result = GroundTruthFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid ground truth: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
    );
  }
  return result.data.totals;
}

/** Variance as a percentage of the ground truth. A zero truth is 0% only when nothing was aggregated. */
export function variancePercent(aggregated: number, truth: number): number {
  if (truth === 0) return aggregated === 0 ? 0 : 100;
  return round4((Math.abs(aggregated - truth) * 100) / truth);
}

/**
 * Cost facts inside the period (and source filter) of a ground-truth
 * total, in any currency.
 */
export function factsInScope(
  facts: readonly Fact[],
  period: ReconcilePeriod,
  sourceIds?: readonly string[],
): CostFact[] {
  const sources = sourceIds && sourceIds.length > 0 ? new Set(sourceIds) : undefined;
  return facts.filter((f): f is CostFact =>
    f.fact_type === 'cost'
    && f.fact_date >= period.period_start
    && f.fact_date < period.period_end
    && (!sources || sources.has(f.source_id)),
  );
}

function supersessionKey(fact: CostFact): string | undefined {
  return fact.cost_group ? `${fact.cost_group}|${fact.fact_date}|${fact.currency}` : undefined;
}

/**
 * Split facts into those that count toward a total and estimates already
 * covered by an actual amount of the same cost group, day and currency.
 */
export function withoutSupersededEstimates(facts: readonly CostFact[]): {
  counted: CostFact[];
  superseded: CostFact[];
} {
  const actual = new Set<string>();
  for (const fact of facts) {
    const key = supersessionKey(fact);
    if (key && !fact.is_estimated) actual.add(key);
  }
  const counted: CostFact[] = [];
  const superseded: CostFact[] = [];
  for (const fact of facts) {
    const key = supersessionKey(fact);
    if (fact.is_estimated && key && actual.has(key)) superseded.push(fact);
    else counted.push(fact);
  }
  return { counted, superseded };
}

/** Natural keys of the facts a report covered, for annotation. */
export function reconciledFactKeys(facts: readonly Fact[], truth: GroundTruthTotal): string[] {
  return withoutSupersededEstimates(
    factsInScope(facts, truth, truth.source_ids).filter((f) => f.currency === truth.currency),
  ).counted
    .map((f) => f.natural_key)
    .sort();
}

/**
 * Reconcile cost facts against one ground-truth total over a period.
 */
export function reconcile(
  period: ReconcilePeriod,
  facts: readonly Fact[],
  groundTruth: Pick<GroundTruthTotal, 'label' | 'amount_minor_units' | 'currency' | 'source_ids'>,
  options: ReconcileOptions = {},
): ReconciliationReport {
  const tolerance = options.tolerancePercent ?? DEFAULT_TOLERANCE_PCT;
  const inScope = factsInScope(facts, period, groundTruth.source_ids);
  const { counted: matching, superseded } = withoutSupersededEstimates(
    inScope.filter((f) => f.currency === groundTruth.currency),
  );

  const platforms = new Map<PlatformCategory, PlatformBreakdown>();
  let aggregated = 0;
  let estimated = 0;
  for (const fact of matching) {
    aggregated += fact.amount_minor_units;
    if (fact.is_estimated) estimated += fact.amount_minor_units;
    const entry = platforms.get(fact.platform_category) ?? {
      platform_category: fact.platform_category,
      amount_minor_units: 0,
      fact_count: 0,
    };
    entry.amount_minor_units += fact.amount_minor_units;
    entry.fact_count += 1;
    platforms.set(fact.platform_category, entry);
  }

  const variance = aggregated - groundTruth.amount_minor_units;
  const percent = variancePercent(aggregated, groundTruth.amount_minor_units);
  const sourceIds = [...(groundTruth.source_ids ?? [])].sort();
  const breakdown = [...platforms.values()].sort((a, b) =>
    a.platform_category.localeCompare(b.platform_category),
  );

  const content = {
    label: groundTruth.label,
    period_start: period.period_start,
    period_end: period.period_end,
    currency: groundTruth.currency,
    source_ids: sourceIds,
    aggregated_minor_units: aggregated,
    ground_truth_minor_units: groundTruth.amount_minor_units,
    variance_minor_units: variance,
    variance_absolute: Math.abs(variance),
    variance_percent: percent,
    tolerance_percent: tolerance,
    status: percent <= tolerance ? ('matched' as const) : ('variance_flagged' as const),
    fact_count: matching.length,
    estimated_minor_units: estimated,
    excluded_currency_count: inScope.length - matching.length - superseded.length,
    superseded_estimate_count: superseded.length,
    breakdown,
  };

  const report: ReconciliationReport = {
    report_id: `recon-${period.period_start}-${period.period_end}-${shortHash({
      label: groundTruth.label,
      currency: groundTruth.currency,
      source_ids: sourceIds,
    }, 8)}`,
    generated_at: (options.now?.() ?? new Date()).toISOString(),
    ...content,
    report_hash: hashCanonical(content),
    version: '1.0.0',
  };

  const validated = ReconciliationReportSchema.safeParse(report);
  if (!validated.success) {
    throw new Error(`Reconciliation report validation failed: ${validated.error.errors.map((e) => e.message).join(', ')}`);
  }

  return validated.data;
}

/**
 * Reconcile every ground-truth total against the facts.
 */
export function reconcileAll(
  facts: readonly Fact[],
  totals: readonly GroundTruthTotal[],
  options: ReconcileOptions = {},
): ReconciliationReport[] {
  return totals.map((truth) => reconcile(truth, facts, truth, options));
}
