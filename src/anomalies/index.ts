/**
 * Anomaly Detection
 *
 * Flags per-user cost spikes, days with a large unattributed cost share
 * and reconciliation reports outside tolerance.
 */

import type {
  Anomaly,
  AnomalySeverity,
  AnomalyThreshold,
  AnomalyType,
  CostFact,
  Profile,
  ReconciliationReport,
} from '../contracts/index.js';
import { AnomalyThresholdSchema, UNATTRIBUTED } from '../contracts/index.js';
import { addDays } from '../contracts/time.js';
import { shortHash } from '../runner/canonical.js';

export interface AnomalyOptions {
  profile?: Profile;
  thresholds?: AnomalyThreshold;
  now?: () => Date;
}

export interface AnomalyResult {
  anomalies: Anomaly[];
  stats: {
    total: number;
    bySeverity: Record<AnomalySeverity, number>;
    byType: Record<AnomalyType, number>;
  };
}

/**
 * Detect anomalies in cost facts and reconciliation reports.
 */
export function detectAnomalies(
  costFacts: readonly CostFact[],
  reports: readonly ReconciliationReport[],
  options: AnomalyOptions = {},
): AnomalyResult {
  const thresholds = options.thresholds ?? options.profile?.anomaly_thresholds ?? getDefaultThresholds();
  const detectedAt = (options.now?.() ?? new Date()).toISOString();
  const anomalies: Anomaly[] = [];

  anomalies.push(...detectCostSpikes(costFacts, thresholds, detectedAt));
  anomalies.push(...detectAttributionGaps(costFacts, thresholds, detectedAt));
  anomalies.push(...detectReconciliationVariance(reports, detectedAt));

  const bySeverity: Record<AnomalySeverity, number> = {
    low: 0,
    medium: 0,
    high: 0,
    critical: 0,
  };

  const byType: Record<AnomalyType, number> = {
    cost_spike: 0,
    attribution_gap: 0,
    reconciliation_variance: 0,
  };

  for (const anomaly of anomalies) {
    bySeverity[anomaly.severity]++;
    byType[anomaly.anomaly_type]++;
  }

  return {
    anomalies,
    stats: {
      total: anomalies.length,
      bySeverity,
      byType,
    },
  };
}

function getDefaultThresholds(): AnomalyThreshold {
  return AnomalyThresholdSchema.parse({});
}

function generateAnomalyId(type: AnomalyType, reference: unknown): string {
  return `anomaly-${type}-${shortHash(reference)}`;
}

interface DailyTotal {
  amount: number;
  minConfidence: number;
}

/** `user|currency` → date → total. */
function dailyTotalsByUser(facts: readonly CostFact[]): Map<string, Map<string, DailyTotal>> {
  const totals = new Map<string, Map<string, DailyTotal>>();
  for (const fact of facts) {
    if (fact.canonical_user_id === UNATTRIBUTED) continue;
    const key = `${fact.canonical_user_id}|${fact.currency}`;
    const byDate = totals.get(key) ?? new Map<string, DailyTotal>();
    const day = byDate.get(fact.fact_date) ?? { amount: 0, minConfidence: 1 };
    day.amount += fact.amount_minor_units;
    day.minConfidence = Math.min(day.minConfidence, fact.attribution_confidence);
    byDate.set(fact.fact_date, day);
    totals.set(key, byDate);
  }
  return totals;
}

/**
 * A user's daily cost above `multiplier` times the mean of their days
 * with cost in the trailing lookback window.
 */
function detectCostSpikes(
  facts: readonly CostFact[],
  thresholds: AnomalyThreshold,
  detectedAt: string,
): Anomaly[] {
  const anomalies: Anomaly[] = [];

  for (const [key, byDate] of dailyTotalsByUser(facts)) {
    const separator = key.lastIndexOf('|');
    const userId = key.slice(0, separator);
    const currency = key.slice(separator + 1);

    for (const date of [...byDate.keys()].sort()) {
      const today = byDate.get(date);
      if (!today || today.amount < thresholds.cost_spike_min_minor_units) continue;

      const trailing: number[] = [];
      for (let i = 1; i <= thresholds.cost_spike_lookback_days; i++) {
        const prior = byDate.get(addDays(date, -i));
        if (prior) trailing.push(prior.amount);
      }
      if (trailing.length === 0) continue;

      const mean = trailing.reduce((sum, v) => sum + v, 0) / trailing.length;
      if (mean <= 0 || today.amount <= thresholds.cost_spike_multiplier * mean) continue;

      const ratio = today.amount / mean;
      anomalies.push({
        anomaly_id: generateAnomalyId('cost_spike', { userId, currency, date }),
        anomaly_type: 'cost_spike',
        severity: ratio >= thresholds.cost_spike_multiplier * 2 ? 'high' : 'medium',
        detected_at: detectedAt,
        fact_date: date,
        canonical_user_id: userId,
        description: `Daily cost ${today.amount} ${currency} is ${Math.round(ratio * 100) / 100}x the trailing mean`,
        expected_value: Math.round(mean),
        observed_value: today.amount,
        difference: Math.round(today.amount - mean),
        confidence: today.minConfidence,
        recommended_action: 'Review the user\'s usage for the day',
        metadata: { currency, lookback_days_with_cost: trailing.length },
      });
    }
  }

  return anomalies;
}

/**
 * Days where the unattributed share of cost exceeds the threshold.
 */
function detectAttributionGaps(
  facts: readonly CostFact[],
  thresholds: AnomalyThreshold,
  detectedAt: string,
): Anomaly[] {
  const days = new Map<string, { total: number; unattributed: number }>();
  for (const fact of facts) {
    const key = `${fact.fact_date}|${fact.currency}`;
    const day = days.get(key) ?? { total: 0, unattributed: 0 };
    day.total += fact.amount_minor_units;
    if (fact.canonical_user_id === UNATTRIBUTED) day.unattributed += fact.amount_minor_units;
    days.set(key, day);
  }

  const anomalies: Anomaly[] = [];
  for (const key of [...days.keys()].sort()) {
    const day = days.get(key);
    if (!day || day.total <= 0) continue;
    const sharePct = (day.unattributed * 100) / day.total;
    if (sharePct <= thresholds.attribution_gap_threshold_pct) continue;

    const [date, currency] = key.split('|');
    anomalies.push({
      anomaly_id: generateAnomalyId('attribution_gap', { date, currency }),
      anomaly_type: 'attribution_gap',
      severity: sharePct > 50 ? 'high' : 'medium',
      detected_at: detectedAt,
      fact_date: date,
      description: `${Math.round(sharePct * 100) / 100}% of ${currency} cost on ${date} is unattributed`,
      expected_value: thresholds.attribution_gap_threshold_pct,
      observed_value: Math.round(sharePct * 100) / 100,
      difference: day.unattributed,
      confidence: 1,
      recommended_action: 'Extend the identity mapping to cover the unmapped keys and workspaces',
      metadata: { currency, unattributed_minor_units: day.unattributed, total_minor_units: day.total },
    });
  }
  return anomalies;
}

function detectReconciliationVariance(
  reports: readonly ReconciliationReport[],
  detectedAt: string,
): Anomaly[] {
  return reports
    .filter((r) => r.status === 'variance_flagged')
    .map((report): Anomaly => {
      const ratio = report.tolerance_percent > 0
        ? report.variance_percent / report.tolerance_percent
        : Number.POSITIVE_INFINITY;
      const severity: AnomalySeverity = ratio > 4 ? 'critical' : ratio > 2 ? 'high' : 'medium';
      return {
        anomaly_id: generateAnomalyId('reconciliation_variance', { report_id: report.report_id }),
        anomaly_type: 'reconciliation_variance',
        severity,
        detected_at: detectedAt,
        description: `${report.label}: aggregated cost differs from ground truth by ${report.variance_percent}% (tolerance ${report.tolerance_percent}%)`,
        expected_value: report.ground_truth_minor_units,
        observed_value: report.aggregated_minor_units,
        difference: report.variance_minor_units,
        confidence: 1,
        recommended_action: report.variance_minor_units < 0
          ? 'Check for missing sources or unparseable records in the period'
          : 'Check for overlapping cost scopes or duplicated sources',
        metadata: { report_id: report.report_id, currency: report.currency },
      };
    });
}
