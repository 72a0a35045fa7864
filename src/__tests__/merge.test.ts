import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CumulativeObservation, Fact, SourceId } from '../contracts/index.js';
import {
  factIdOf,
  FactMerger,
  factValueHash,
  InMemoryFactStore,
  JsonFileFactStore,
  MergeConflictError,
  PartitionLock,
  StorageUnavailableError,
} from '../merge/index.js';
import { redact } from '../runner/redact.js';
import { costFact, noSleep, silentLogger, usageFact } from './fixtures.js';

const fastRetry = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, backoffFactor: 1 };

/** Fails the first `failures` writes with a conflict. */
class ContendedStore extends InMemoryFactStore {
  writes = 0;

  constructor(private failures: number) {
    super();
  }

  override async upsertFacts(sourceId: SourceId, facts: readonly Fact[]): Promise<void> {
    this.writes += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new MergeConflictError(`partition ${sourceId} busy`);
    }
    await super.upsertFacts(sourceId, facts);
  }
}

class BrokenStore extends InMemoryFactStore {
  reads = 0;

  override async readFacts(): Promise<Fact[]> {
    this.reads += 1;
    throw new StorageUnavailableError('disk unavailable');
  }
}

describe('FactMerger.upsert', () => {
  it('inserts new facts and leaves identical ones unchanged', async () => {
    const store = new InMemoryFactStore();
    const merger = new FactMerger(store, { logger: silentLogger('merge') });
    const facts = [
      costFact({ fact_date: '2026-03-01', amount_minor_units: 500 }),
      usageFact({ bucket_end: '2026-03-02T00:00:00.000Z', source_id: 'anthropic.cost_report' }),
    ];

    const first = await merger.upsert(facts);
    expect(first).toEqual([
      { source_id: 'anthropic.cost_report', inserted: 2, replaced: 0, unchanged: 0, attempts: 1, audit: [] },
    ]);

    const second = await merger.upsert(facts);
    expect(second[0]).toMatchObject({ inserted: 0, replaced: 0, unchanged: 2 });
    expect(await store.readFacts()).toHaveLength(2);
  });

  it('keeps the reconciliation status of unchanged cost facts', async () => {
    const store = new InMemoryFactStore();
    const merger = new FactMerger(store);
    const fact = costFact({ fact_date: '2026-03-01', amount_minor_units: 500 });
    await merger.upsert([fact]);
    expect(await merger.annotateReconciliation([fact.natural_key], 'matched')).toBe(1);

    const result = await merger.upsert([fact]);
    expect(result[0].unchanged).toBe(1);
    const [stored] = await store.readFacts({ fact_type: 'cost' });
    expect(stored.fact_type === 'cost' && stored.reconciliation_status).toBe('matched');
  });

  it('replaces a differing fact, resets its status and records the prior value', async () => {
    const store = new InMemoryFactStore();
    const merger = new FactMerger(store);
    const original = costFact({ fact_date: '2026-03-01', amount_minor_units: 500 });
    await merger.upsert([original]);
    await merger.annotateReconciliation([original.natural_key], 'matched');

    const revised = costFact({ fact_date: '2026-03-01', amount_minor_units: 620 });
    const [result] = await merger.upsert([revised]);
    expect(result.replaced).toBe(1);
    expect(result.audit).toHaveLength(1);
    expect(result.audit[0].prior).toMatchObject({ amount_minor_units: 500, reconciliation_status: 'matched' });

    const [stored] = await store.readFacts();
    expect(stored).toMatchObject({ amount_minor_units: 620, reconciliation_status: 'pending' });
  });

  it('identifies a replaced row in the audit after e-mail redaction', async () => {
    const merger = new FactMerger(new InMemoryFactStore());
    const original = costFact({ fact_date: '2026-03-01', amount_minor_units: 500 });
    await merger.upsert([original]);
    const [result] = await merger.upsert([{ ...original, amount_minor_units: 620 }]);

    const entry = result.audit[0];
    expect(entry.fact_id).toBe(factIdOf(original));
    expect(entry.fact_id).toMatch(/^[0-9a-f]{16}$/);
    expect(redact(entry)).toMatchObject({
      fact_id: factIdOf(original),
      fact_date: '2026-03-01',
      source_id: 'anthropic.cost_report',
      natural_key: '[REDACTED]',
      prior: { amount_minor_units: 500 },
      next: { amount_minor_units: 620 },
    });
  });

  it('partitions facts by source in a stable order', async () => {
    const merger = new FactMerger(new InMemoryFactStore());
    const results = await merger.upsert([
      costFact({ fact_date: '2026-03-01', amount_minor_units: 1, source_id: 'cursor.spend' }),
      costFact({ fact_date: '2026-03-01', amount_minor_units: 2 }),
    ]);
    expect(results.map((r) => r.source_id)).toEqual(['anthropic.cost_report', 'cursor.spend']);
  });

  it('retries storage conflicts with back-off', async () => {
    const store = new ContendedStore(2);
    const merger = new FactMerger(store, { retry: fastRetry, sleep: noSleep });
    const [result] = await merger.upsert([costFact({ fact_date: '2026-03-01', amount_minor_units: 500 })]);
    expect(result.attempts).toBe(3);
    expect(result.inserted).toBe(1);
    expect(store.writes).toBe(3);
  });

  it('gives up after the last attempt with a merge conflict', async () => {
    const merger = new FactMerger(new ContendedStore(5), { retry: fastRetry, sleep: noSleep });
    const failure = merger.upsert([costFact({ fact_date: '2026-03-01', amount_minor_units: 500 })]);
    await expect(failure).rejects.toBeInstanceOf(MergeConflictError);
    await expect(
      new FactMerger(new ContendedStore(5), { retry: fastRetry, sleep: noSleep }).upsert([
        costFact({ fact_date: '2026-03-01', amount_minor_units: 500 }),
      ]),
    ).rejects.toThrow(
      'merge.upsert failed after 3 attempt(s): attempt 1: partition anthropic.cost_report busy; '
        + 'attempt 2: partition anthropic.cost_report busy; attempt 3: partition anthropic.cost_report busy',
    );
  });

  it('does not retry an unavailable store', async () => {
    const store = new BrokenStore();
    const merger = new FactMerger(store, { retry: fastRetry, sleep: noSleep });
    await expect(
      merger.upsert([costFact({ fact_date: '2026-03-01', amount_minor_units: 500 })]),
    ).rejects.toThrow(StorageUnavailableError);
    expect(store.reads).toBe(1);
  });
});

describe('FactMerger.backfill', () => {
  it('deletes only the source and range requested', async () => {
    const store = new InMemoryFactStore();
    const merger = new FactMerger(store);
    await merger.upsert([
      costFact({ fact_date: '2026-03-01', amount_minor_units: 1 }),
      costFact({ fact_date: '2026-03-02', amount_minor_units: 2 }),
      costFact({ fact_date: '2026-03-03', amount_minor_units: 3 }),
      costFact({ fact_date: '2026-03-02', amount_minor_units: 4, source_id: 'cursor.spend' }),
    ]);

    const deleted = await merger.backfill('anthropic.cost_report', { start_date: '2026-03-01', end_date: '2026-03-03' });
    expect(deleted).toBe(2);
    const remaining = await store.readFacts();
    expect(remaining.map((f) => `${f.source_id}@${f.fact_date}`)).toEqual([
      'cursor.spend@2026-03-02',
      'anthropic.cost_report@2026-03-03',
    ]);
  });
});

describe('factValueHash', () => {
  it('ignores the reconciliation status', () => {
    const fact = costFact({ fact_date: '2026-03-01', amount_minor_units: 500 });
    expect(factValueHash({ ...fact, reconciliation_status: 'variance_flagged' })).toBe(factValueHash(fact));
    expect(factValueHash({ ...fact, amount_minor_units: 501 })).not.toBe(factValueHash(fact));
  });
});

describe('PartitionLock', () => {
  it('serializes overlapping ranges of the same source', async () => {
    const lock = new PartitionLock();
    const order: string[] = [];

    const releaseFirst = await lock.acquire('cursor.spend', '2026-03-01', '2026-03-03');
    const second = lock.acquire('cursor.spend', '2026-03-03', '2026-03-04').then((release) => {
      order.push('second');
      release();
    });
    const other = await lock.acquire('anthropic.cost_report', '2026-03-01', '2026-03-03');
    const disjoint = await lock.acquire('cursor.spend', '2026-03-05', '2026-03-06');
    order.push('independent');
    other();
    disjoint();

    expect(lock.size).toBe(1);
    order.push('first');
    releaseFirst();
    await second;

    expect(order).toEqual(['independent', 'first', 'second']);
    expect(lock.size).toBe(0);
  });
});

describe('JsonFileFactStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'attribution-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists facts per source and reads them back with a query', async () => {
    const store = new JsonFileFactStore(dir);
    await store.upsertFacts('anthropic.cost_report', [
      costFact({ fact_date: '2026-03-02', amount_minor_units: 2 }),
      costFact({ fact_date: '2026-03-01', amount_minor_units: 1 }),
    ]);

    const reopened = new JsonFileFactStore(dir);
    const facts = await reopened.readFacts({ start_date: '2026-03-02' });
    expect(facts.map((f) => f.fact_date)).toEqual(['2026-03-02']);

    const file = JSON.parse(readFileSync(join(dir, 'facts', 'anthropic.cost_report.json'), 'utf-8'));
    expect(Array.isArray(file) && file.length).toBe(2);
  });

  it('updates reconciliation status by natural key', async () => {
    const store = new JsonFileFactStore(dir);
    const fact = costFact({ fact_date: '2026-03-01', amount_minor_units: 1 });
    await store.upsertFacts('anthropic.cost_report', [fact]);

    expect(await store.setReconciliationStatus([fact.natural_key, 'malformed'], 'variance_flagged')).toBe(1);
    const [stored] = await store.readFacts();
    expect(stored).toMatchObject({ reconciliation_status: 'variance_flagged' });
  });

  it('upserts observations by entity and time', async () => {
    const store = new JsonFileFactStore(dir);
    const observation: CumulativeObservation = {
      entity_key: 'cursor|dana@example.com',
      source_id: 'cursor.spend',
      observed_at: '2026-03-02T00:00:00.000Z',
      billing_cycle_start: '2026-02-15T00:00:00.000Z',
      metric_fields: { amount_minor_units: 4150 },
    };
    await store.writeObservations('cursor.spend', [observation]);
    await store.writeObservations('cursor.spend', [{ ...observation, metric_fields: { amount_minor_units: 4200 } }]);

    const stored = await store.readObservations('cursor.spend');
    expect(stored).toHaveLength(1);
    expect(stored[0].metric_fields).toEqual({ amount_minor_units: 4200 });
    expect(await store.readObservations('anthropic.cost_report')).toEqual([]);
  });

  it('reports a held partition lock as a conflict', async () => {
    mkdirSync(join(dir, '.locks'), { recursive: true });
    writeFileSync(join(dir, '.locks', 'anthropic.cost_report.lock'), '');
    const store = new JsonFileFactStore(dir);
    const merger = new FactMerger(store, { retry: { ...fastRetry, maxAttempts: 2 }, sleep: noSleep });

    await expect(
      merger.upsert([costFact({ fact_date: '2026-03-01', amount_minor_units: 1 })]),
    ).rejects.toThrow(/^merge\.upsert failed after 2 attempt\(s\): attempt 1: Partition anthropic\.cost_report is locked/);
  });

  it('treats a corrupt file as unavailable storage', async () => {
    mkdirSync(join(dir, 'facts'), { recursive: true });
    writeFileSync(join(dir, 'facts', 'cursor.spend.json'), '[{"fact_type":"cost"}]');
    const store = new JsonFileFactStore(dir);
    await expect(store.readFacts()).rejects.toThrow(StorageUnavailableError);
    await expect(store.readFacts()).rejects.toThrow(/^Corrupt store file /);
  });
});
