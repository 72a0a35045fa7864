/**
 * Billing delta normalization
 *
 * Converts cumulative billing-cycle snapshots (running totals since the
 * cycle start) into non-overlapping deltas. Each delta covers the exact
 * range between two observations so summing deltas never double counts.
 *
 * Observation time is the snapshot's `bucket_end`; `bucket_start` is the
 * start of the window the snapshot was observed over.
 */

import type { CumulativeObservation, RawRecord } from '../contracts/index.js';
import { laterOf } from '../contracts/time.js';

export interface CycleBoundaryEvent {
  entity_key: string;
  previous_cycle_start: string;
  new_cycle_start: string;
  /** Observation time of the last snapshot in the closed cycle. */
  closed_at: string;
  closing_values: Record<string, number>;
  /** True when the boundary was inferred from a value drop, not a cycle-start change. */
  inferred: boolean;
}

export type CycleBoundaryAnomalyReason = 'decrease_within_cycle' | 'cycle_start_regressed';

export interface CycleBoundaryAnomaly {
  entity_key: string;
  reason: CycleBoundaryAnomalyReason;
  observed_at: string;
  previous_observed_at: string;
  previous_values: Record<string, number>;
  current_values: Record<string, number>;
}

export interface DeltaOptions {
  /**
   * A same-cycle value drop is an unannounced rollover (the default).
   * When false the dropped snapshot is excluded as an anomaly.
   */
  inferRolloverOnDrop?: boolean;
  /** Last stored observation strictly before these snapshots. */
  baseline?: CumulativeObservation;
}

export interface DeltaResult {
  deltas: RawRecord[];
  boundaries: CycleBoundaryEvent[];
  anomalies: CycleBoundaryAnomaly[];
  /** Snapshots kept only as a baseline because their starting point is unknown. */
  held: RawRecord[];
  warnings: string[];
  /** Latest accepted observation, to persist as the next run's baseline. */
  last?: CumulativeObservation;
}

export interface DeltaBatchOptions {
  inferRolloverOnDrop?: boolean;
  baselines?: ReadonlyMap<string, CumulativeObservation>;
}

export interface DeltaBatchResult extends Omit<DeltaResult, 'last'> {
  /** Non-cumulative input records followed by the computed deltas. */
  records: RawRecord[];
  observations: CumulativeObservation[];
}

/**
 * Stable key for the entity a cumulative counter belongs to: the source,
 * its identity hints and its dimension attributes.
 */
export function entityKeyOf(record: RawRecord): string {
  const h = record.identity_hints;
  const attrs = Object.keys(record.attributes)
    .sort()
    .filter((k) => record.attributes[k] != null)
    .map((k) => `${k}=${record.attributes[k]}`)
    .join(',');
  return [
    record.source_id,
    `email=${h.email ?? ''}`,
    `key=${h.opaque_key_id ?? ''}`,
    `name=${h.key_name ?? ''}`,
    `ws=${h.workspace_id ?? ''}`,
    attrs,
  ].join('|');
}

/** Group cumulative records by entity, preserving input order within each group. */
export function groupSnapshots(records: readonly RawRecord[]): Map<string, RawRecord[]> {
  const groups = new Map<string, RawRecord[]>();
  for (const record of records) {
    if (!record.is_cumulative) continue;
    const key = entityKeyOf(record);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return groups;
}

function observationOf(record: RawRecord, entityKey: string, cycleStart: string): CumulativeObservation {
  return {
    entity_key: entityKey,
    source_id: record.source_id,
    observed_at: record.bucket_end,
    billing_cycle_start: cycleStart,
    metric_fields: { ...record.metric_fields },
  };
}

function deltaRecord(
  snapshot: RawRecord,
  bucketStart: string,
  metrics: Record<string, number>,
): RawRecord {
  return {
    ...snapshot,
    bucket_start: bucketStart,
    metric_fields: metrics,
    is_cumulative: false,
  };
}

function hasDecrease(previous: Record<string, number>, current: Record<string, number>): boolean {
  return Object.keys(current).some((metric) => {
    const before = previous[metric];
    return before !== undefined && current[metric] < before;
  });
}

function ms(iso: string): number {
  return Date.parse(iso);
}

/**
 * Turn one entity's cumulative snapshots into deltas.
 */
export function toDeltas(snapshots: readonly RawRecord[], options: DeltaOptions = {}): DeltaResult {
  const result: DeltaResult = { deltas: [], boundaries: [], anomalies: [], held: [], warnings: [] };
  if (snapshots.length === 0) {
    return { ...result, last: options.baseline };
  }

  const entityKey = options.baseline?.entity_key ?? entityKeyOf(snapshots[0]);
  const inferRollover = options.inferRolloverOnDrop ?? true;
  const sorted = [...snapshots].sort((a, b) => ms(a.bucket_end) - ms(b.bucket_end));
  let prev = options.baseline;

  for (const snap of sorted) {
    const cycleStart = snap.billing_cycle_start;
    if (!snap.is_cumulative || !cycleStart) {
      result.warnings.push(`${entityKey}: snapshot at ${snap.bucket_end} is not cumulative; skipped`);
      continue;
    }
    const observed = snap.bucket_end;
    const current = observationOf(snap, entityKey, cycleStart);

    if (!prev) {
      // Only a cycle that began inside the snapshot's own window proves nothing was spent before it.
      if (ms(snap.bucket_start) <= ms(cycleStart)) {
        result.deltas.push(deltaRecord(snap, laterOf(cycleStart, snap.bucket_start), { ...snap.metric_fields }));
      } else {
        result.held.push(snap);
        result.warnings.push(
          `${entityKey}: first snapshot at ${observed} has no baseline and its cycle started before ${snap.bucket_start}; held as baseline`,
        );
      }
      prev = current;
      continue;
    }

    if (ms(observed) <= ms(prev.observed_at)) {
      result.warnings.push(`${entityKey}: snapshot at ${observed} is not after ${prev.observed_at}; skipped`);
      continue;
    }

    const cycleMs = ms(cycleStart);
    const prevCycleMs = ms(prev.billing_cycle_start);

    if (cycleMs < prevCycleMs) {
      result.anomalies.push({
        entity_key: entityKey,
        reason: 'cycle_start_regressed',
        observed_at: observed,
        previous_observed_at: prev.observed_at,
        previous_values: prev.metric_fields,
        current_values: snap.metric_fields,
      });
      continue;
    }

    if (cycleMs > prevCycleMs) {
      result.boundaries.push({
        entity_key: entityKey,
        previous_cycle_start: prev.billing_cycle_start,
        new_cycle_start: cycleStart,
        closed_at: prev.observed_at,
        closing_values: prev.metric_fields,
        inferred: false,
      });
      let start = laterOf(cycleStart, prev.observed_at);
      if (ms(start) >= ms(observed)) start = prev.observed_at;
      result.deltas.push(deltaRecord(snap, start, { ...snap.metric_fields }));
      prev = current;
      continue;
    }

    if (hasDecrease(prev.metric_fields, snap.metric_fields)) {
      if (inferRollover) {
        result.boundaries.push({
          entity_key: entityKey,
          previous_cycle_start: prev.billing_cycle_start,
          new_cycle_start: cycleStart,
          closed_at: prev.observed_at,
          closing_values: prev.metric_fields,
          inferred: true,
        });
        result.deltas.push(deltaRecord(snap, prev.observed_at, { ...snap.metric_fields }));
        prev = current;
      } else {
        result.anomalies.push({
          entity_key: entityKey,
          reason: 'decrease_within_cycle',
          observed_at: observed,
          previous_observed_at: prev.observed_at,
          previous_values: prev.metric_fields,
          current_values: snap.metric_fields,
        });
      }
      continue;
    }

    const delta: Record<string, number> = {};
    for (const [metric, value] of Object.entries(snap.metric_fields)) {
      delta[metric] = Math.max(0, value - (prev.metric_fields[metric] ?? 0));
    }
    result.deltas.push(deltaRecord(snap, prev.observed_at, delta));
    prev = current;
  }

  return { ...result, last: prev };
}

/**
 * Pick, per entity, the latest stored observation strictly before that
 * entity's earliest snapshot in `records`. Rerunning a window therefore
 * differences against the same baseline as the first run did.
 */
export function selectBaselines(
  history: readonly CumulativeObservation[],
  records: readonly RawRecord[],
): Map<string, CumulativeObservation> {
  const earliest = new Map<string, number>();
  for (const [entityKey, snapshots] of groupSnapshots(records)) {
    earliest.set(entityKey, Math.min(...snapshots.map((s) => ms(s.bucket_end))));
  }

  const baselines = new Map<string, CumulativeObservation>();
  for (const observation of history) {
    const cutoff = earliest.get(observation.entity_key);
    if (cutoff === undefined || ms(observation.observed_at) >= cutoff) continue;
    const current = baselines.get(observation.entity_key);
    if (!current || ms(observation.observed_at) > ms(current.observed_at)) {
      baselines.set(observation.entity_key, observation);
    }
  }
  return baselines;
}

/**
 * Normalize a mixed batch: cumulative records are grouped by entity and
 * differenced, everything else passes through unchanged.
 */
export function normalizeCumulative(
  records: readonly RawRecord[],
  options: DeltaBatchOptions = {},
): DeltaBatchResult {
  const batch: DeltaBatchResult = {
    records: records.filter((r) => !r.is_cumulative),
    deltas: [],
    boundaries: [],
    anomalies: [],
    held: [],
    warnings: [],
    observations: [],
  };

  for (const [entityKey, snapshots] of groupSnapshots(records)) {
    const result = toDeltas(snapshots, {
      inferRolloverOnDrop: options.inferRolloverOnDrop,
      baseline: options.baselines?.get(entityKey),
    });
    batch.deltas.push(...result.deltas);
    batch.boundaries.push(...result.boundaries);
    batch.anomalies.push(...result.anomalies);
    batch.held.push(...result.held);
    batch.warnings.push(...result.warnings);
    if (result.last) batch.observations.push(result.last);
  }

  batch.records.push(...batch.deltas);
  return batch;
}
