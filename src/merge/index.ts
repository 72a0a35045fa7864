/**
 * Fact merging
 *
 * The single write path into the fact store. Upserts are keyed by
 * natural key: an identical row is left alone (its reconciliation status
 * survives), a differing row replaces the stored one and the prior value
 * is kept for audit. Writes to overlapping (source_id, date range)
 * partitions are serialized in-process; store-level contention is
 * retried with back-off.
 */

import type {
  CumulativeObservation,
  Fact,
  ReconciliationStatus,
  SourceId,
} from '../contracts/index.js';
import { addDays } from '../contracts/time.js';
import { hashCanonical, shortHash } from '../runner/canonical.js';
import type { StructuredLogger } from '../runner/logger.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../runner/retry.js';
import {
  MergeConflictError,
  StorageUnavailableError,
  storeKey,
  type DateRange,
  type FactStore,
} from './store.js';

export interface MergeOptions {
  retry?: RetryPolicy;
  logger?: StructuredLogger;
  /** Back-off sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export interface ReplacedFact {
  /** Row id that survives redaction of the e-mail inside the natural key. */
  fact_id: string;
  natural_key: string;
  fact_date: string;
  source_id: SourceId;
  fact_type: Fact['fact_type'];
  prior: Fact;
  next: Fact;
}

export interface UpsertResult {
  source_id: SourceId;
  inserted: number;
  replaced: number;
  unchanged: number;
  attempts: number;
  audit: ReplacedFact[];
}

/**
 * In-process lock over (source_id, inclusive date range). Overlapping
 * ranges for the same source wait for each other; disjoint ranges and
 * other sources proceed.
 */
export class PartitionLock {
  private readonly held: Array<{ sourceId: string; start: string; end: string; released: Promise<void> }> = [];

  async acquire(sourceId: string, start: string, end: string): Promise<() => void> {
    for (;;) {
      const blocker = this.held.find(
        (h) => h.sourceId === sourceId && h.start <= end && start <= h.end,
      );
      if (!blocker) break;
      await blocker.released;
    }

    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const entry = { sourceId, start, end, released };
    this.held.push(entry);

    return () => {
      const index = this.held.indexOf(entry);
      if (index >= 0) this.held.splice(index, 1);
      release();
    };
  }

  get size(): number {
    return this.held.length;
  }
}

/** Short id of a stored row, derived from its type and natural key. */
export function factIdOf(fact: Pick<Fact, 'fact_type' | 'natural_key'>): string {
  return shortHash({ fact_type: fact.fact_type, natural_key: fact.natural_key });
}

/** A fact's value for equality: everything except the reconciliation annotation. */
export function factValueHash(fact: Fact): string {
  if (fact.fact_type === 'cost') {
    const { reconciliation_status: _status, ...value } = fact;
    return hashCanonical(value);
  }
  return hashCanonical(fact);
}

function dateSpan(facts: readonly Fact[]): { start: string; end: string } {
  let start = facts[0].fact_date;
  let end = facts[0].fact_date;
  for (const fact of facts) {
    if (fact.fact_date < start) start = fact.fact_date;
    if (fact.fact_date > end) end = fact.fact_date;
  }
  return { start, end };
}

export class FactMerger {
  private readonly lock = new PartitionLock();
  private readonly policy: RetryPolicy;

  constructor(
    private readonly store: FactStore,
    private readonly options: MergeOptions = {},
  ) {
    this.policy = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Run a store mutation with conflict retry. Storage unavailability is
   * rethrown immediately; exhausted conflicts become a MergeConflictError.
   */
  private async mutate<T>(
    action: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<{ value: T; attempts: number }> {
    const result = await withRetry<T>(fn, this.policy, {
      isRetryable: (err) => err instanceof MergeConflictError,
      sleep: this.options.sleep,
      onRetry: (attempt, delayMs, err) => {
        this.options.logger?.warn(`${action}.retry`, `Storage conflict, retrying in ${delayMs}ms`, {
          ...context,
          attempt,
          error: err instanceof Error ? err.message : String(err),
        });
      },
    });

    if (result.success && result.value !== undefined) {
      return { value: result.value, attempts: result.attempts };
    }

    if (result.lastError instanceof StorageUnavailableError) throw result.lastError;
    if (result.lastError instanceof MergeConflictError) {
      throw new MergeConflictError(
        `${action} failed after ${result.attempts} attempt(s): ${result.errors.join('; ')}`,
        { ...context, attempts: result.attempts },
      );
    }
    throw result.lastError instanceof Error ? result.lastError : new Error(result.errors.join('; '));
  }

  /**
   * Upsert facts. Facts are partitioned by source and each partition is
   * written under its lock.
   */
  async upsert(facts: readonly Fact[]): Promise<UpsertResult[]> {
    const bySource = new Map<SourceId, Fact[]>();
    for (const fact of facts) {
      const group = bySource.get(fact.source_id) ?? [];
      group.push(fact);
      bySource.set(fact.source_id, group);
    }

    const results: UpsertResult[] = [];
    for (const [sourceId, group] of [...bySource.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      results.push(await this.upsertPartition(sourceId, group));
    }
    return results;
  }

  private async upsertPartition(sourceId: SourceId, facts: readonly Fact[]): Promise<UpsertResult> {
    const span = dateSpan(facts);
    const release = await this.lock.acquire(sourceId, span.start, span.end);
    try {
      const { value, attempts } = await this.mutate(
        'merge.upsert',
        { source_id: sourceId, start_date: span.start, end_date: span.end },
        async () => {
          const stored = await this.store.readFacts({
            source_id: sourceId,
            start_date: span.start,
            end_date: addDays(span.end, 1),
          });
          const existing = new Map(stored.map((f) => [storeKey(f), f]));

          const writes: Fact[] = [];
          const audit: ReplacedFact[] = [];
          let inserted = 0;
          let unchanged = 0;

          for (const fact of facts) {
            const prior = existing.get(storeKey(fact));
            if (!prior) {
              inserted += 1;
              writes.push(fact);
            } else if (factValueHash(prior) === factValueHash(fact)) {
              unchanged += 1;
            } else {
              const next: Fact = fact.fact_type === 'cost'
                ? { ...fact, reconciliation_status: 'pending' }
                : fact;
              writes.push(next);
              audit.push({
                fact_id: factIdOf(fact),
                natural_key: fact.natural_key,
                fact_date: fact.fact_date,
                source_id: fact.source_id,
                fact_type: fact.fact_type,
                prior,
                next,
              });
            }
          }

          await this.store.upsertFacts(sourceId, writes);
          return { inserted, unchanged, audit };
        },
      );

      for (const entry of value.audit) {
        this.options.logger?.info('merge.replace', `Replaced ${entry.fact_type} fact ${entry.fact_id}`, {
          fact_id: entry.fact_id,
          fact_date: entry.fact_date,
          natural_key: entry.natural_key,
          prior_hash: factValueHash(entry.prior),
          next_hash: factValueHash(entry.next),
          prior: entry.prior,
        });
      }
      this.options.logger?.info('merge.upsert', `Merged ${facts.length} fact(s) for ${sourceId}`, {
        source_id: sourceId,
        inserted: value.inserted,
        replaced: value.audit.length,
        unchanged: value.unchanged,
        attempts,
      });

      return {
        source_id: sourceId,
        inserted: value.inserted,
        replaced: value.audit.length,
        unchanged: value.unchanged,
        attempts,
        audit: value.audit,
      };
    } finally {
      release();
    }
  }

  /** Set the reconciliation status of cost facts by natural key. */
  async annotateReconciliation(keys: readonly string[], status: ReconciliationStatus): Promise<number> {
    if (keys.length === 0) return 0;
    const { value } = await this.mutate('merge.annotate', { status, keys: keys.length }, () =>
      this.store.setReconciliationStatus(keys, status),
    );
    this.options.logger?.info('merge.annotate', `Marked ${value} cost fact(s) ${status}`, { status, updated: value });
    return value;
  }

  /** Persist cumulative observations used as baselines by later runs. */
  async saveObservations(sourceId: SourceId, observations: readonly CumulativeObservation[]): Promise<number> {
    if (observations.length === 0) return 0;
    await this.mutate('merge.observations', { source_id: sourceId }, async () => {
      await this.store.writeObservations(sourceId, observations);
      return true;
    });
    return observations.length;
  }

  /**
   * Delete a source's facts in `[start_date, end_date)` so the range can
   * be rebuilt. The only deleting operation.
   */
  async backfill(sourceId: SourceId, range: DateRange): Promise<number> {
    const release = await this.lock.acquire(sourceId, range.start_date, addDays(range.end_date, -1));
    try {
      const { value } = await this.mutate('merge.backfill', { source_id: sourceId, ...range }, () =>
        this.store.deleteFacts(sourceId, range),
      );
      this.options.logger?.warn('merge.backfill', `Deleted ${value} fact(s) for ${sourceId}`, {
        source_id: sourceId,
        start_date: range.start_date,
        end_date: range.end_date,
        deleted: value,
      });
      return value;
    } finally {
      release();
    }
  }
}

export {
  InMemoryFactStore,
  JsonFileFactStore,
  MergeConflictError,
  StorageUnavailableError,
  matchesQuery,
  storeKey,
  type DateRange,
  type FactQuery,
  type FactStore,
} from './store.js';
