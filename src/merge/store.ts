/**
 * Fact storage port and its implementations.
 *
 * The merger is the only caller. Stores do no merging of their own:
 * `upsertFacts` replaces rows by (fact_type, natural_key) and the merger
 * decides which rows to hand over.
 */

import {
  existsSync,
  mkdirSync,
  openSync,
  closeSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type {
  CumulativeObservation,
  Fact,
  ReconciliationStatus,
  SourceId,
} from '../contracts/index.js';
import { CumulativeObservationSchema, FactSchema } from '../contracts/index.js';
import { PipelineError } from '../runner/errors.js';

// ============================================================================
// Errors
// ============================================================================

/** Another writer holds the partition. Retryable. */
export class MergeConflictError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('MERGE_CONFLICT', message, context);
    this.name = 'MergeConflictError';
  }
}

/** The store cannot be read or written at all. Run-fatal, never retried. */
export class StorageUnavailableError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('STORAGE_UNAVAILABLE', message, context);
    this.name = 'StorageUnavailableError';
  }
}

// ============================================================================
// Port
// ============================================================================

export interface FactQuery {
  source_id?: SourceId;
  fact_type?: Fact['fact_type'];
  /** Inclusive. */
  start_date?: string;
  /** Exclusive. */
  end_date?: string;
}

export interface DateRange {
  /** Inclusive. */
  start_date: string;
  /** Exclusive. */
  end_date: string;
}

export interface FactStore {
  readFacts(query?: FactQuery): Promise<Fact[]>;
  upsertFacts(sourceId: SourceId, facts: readonly Fact[]): Promise<void>;
  /** Delete a source's facts in a date range; returns the number removed. */
  deleteFacts(sourceId: SourceId, range: DateRange): Promise<number>;
  /** Set the status on cost facts with the given natural keys; returns the number updated. */
  setReconciliationStatus(keys: readonly string[], status: ReconciliationStatus): Promise<number>;
  readObservations(sourceId: SourceId): Promise<CumulativeObservation[]>;
  /** Upsert observations by (entity_key, observed_at). */
  writeObservations(sourceId: SourceId, observations: readonly CumulativeObservation[]): Promise<void>;
}

export function storeKey(fact: Fact): string {
  return `${fact.fact_type}:${fact.natural_key}`;
}

function observationKey(o: CumulativeObservation): string {
  return `${o.entity_key}@${o.observed_at}`;
}

export function matchesQuery(fact: Fact, query: FactQuery = {}): boolean {
  if (query.source_id && fact.source_id !== query.source_id) return false;
  if (query.fact_type && fact.fact_type !== query.fact_type) return false;
  if (query.start_date && fact.fact_date < query.start_date) return false;
  if (query.end_date && fact.fact_date >= query.end_date) return false;
  return true;
}

function inRange(fact: Fact, range: DateRange): boolean {
  return fact.fact_date >= range.start_date && fact.fact_date < range.end_date;
}

function sortFacts(facts: Fact[]): Fact[] {
  return facts.sort((a, b) => storeKey(a).localeCompare(storeKey(b)));
}

function sortObservations(observations: CumulativeObservation[]): CumulativeObservation[] {
  return observations.sort((a, b) => observationKey(a).localeCompare(observationKey(b)));
}

// ============================================================================
// In-memory store
// ============================================================================

export class InMemoryFactStore implements FactStore {
  private readonly facts = new Map<string, Fact>();
  private readonly observations = new Map<string, Map<string, CumulativeObservation>>();

  async readFacts(query: FactQuery = {}): Promise<Fact[]> {
    return sortFacts([...this.facts.values()].filter((f) => matchesQuery(f, query)).map((f) => ({ ...f })));
  }

  async upsertFacts(_sourceId: SourceId, facts: readonly Fact[]): Promise<void> {
    for (const fact of facts) this.facts.set(storeKey(fact), { ...fact });
  }

  async deleteFacts(sourceId: SourceId, range: DateRange): Promise<number> {
    let removed = 0;
    for (const [key, fact] of this.facts) {
      if (fact.source_id === sourceId && inRange(fact, range)) {
        this.facts.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async setReconciliationStatus(keys: readonly string[], status: ReconciliationStatus): Promise<number> {
    let updated = 0;
    for (const key of keys) {
      const fact = this.facts.get(`cost:${key}`);
      if (fact && fact.fact_type === 'cost') {
        this.facts.set(`cost:${key}`, { ...fact, reconciliation_status: status });
        updated += 1;
      }
    }
    return updated;
  }

  async readObservations(sourceId: SourceId): Promise<CumulativeObservation[]> {
    return sortObservations([...(this.observations.get(sourceId)?.values() ?? [])]);
  }

  async writeObservations(sourceId: SourceId, observations: readonly CumulativeObservation[]): Promise<void> {
    const bySource = this.observations.get(sourceId) ?? new Map<string, CumulativeObservation>();
    for (const o of observations) bySource.set(observationKey(o), { ...o });
    this.observations.set(sourceId, bySource);
  }
}

// ============================================================================
// JSON file store
// ============================================================================

const FactFileSchema = z.array(FactSchema);
const ObservationFileSchema = z.array(CumulativeObservationSchema);

function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Per-source JSON files under a store directory:
 *
 *   <dir>/facts/<source_id>.json
 *   <dir>/observations/<source_id>.json
 *   <dir>/.locks/<source_id>.lock
 *
 * Writes go to a temp file and are renamed into place. A write takes the
 * source's lock file exclusively; if another process holds it the write
 * fails with MergeConflictError.
 */
export class JsonFileFactStore implements FactStore {
  constructor(private readonly dir: string) {}

  private factsPath(sourceId: SourceId): string {
    return join(this.dir, 'facts', `${sourceId}.json`);
  }

  private observationsPath(sourceId: SourceId): string {
    return join(this.dir, 'observations', `${sourceId}.json`);
  }

  private readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (!existsSync(path)) return undefined;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageUnavailableError(`Cannot read ${path}: ${message}`);
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StorageUnavailableError(
        `Corrupt store file ${path}: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
      );
    }
    return result.data;
  }

  private writeJson(path: string, data: unknown): void {
    const tmp = `${path}.${process.pid}.tmp`;
    try {
      mkdirSync(join(path, '..'), { recursive: true });
      writeFileSync(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      renameSync(tmp, path);
    } catch (err) {
      rmSync(tmp, { force: true });
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageUnavailableError(`Cannot write ${path}: ${message}`);
    }
  }

  private withLock<T>(sourceId: SourceId, fn: () => T): T {
    const lockDir = join(this.dir, '.locks');
    const lockPath = join(lockDir, `${sourceId}.lock`);
    let fd: number;
    try {
      mkdirSync(lockDir, { recursive: true });
      fd = openSync(lockPath, 'wx');
    } catch (err) {
      if (errnoOf(err) === 'EEXIST') {
        throw new MergeConflictError(`Partition ${sourceId} is locked by another writer`, { lock: lockPath });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageUnavailableError(`Cannot create lock ${lockPath}: ${message}`);
    }
    try {
      return fn();
    } finally {
      closeSync(fd);
      rmSync(lockPath, { force: true });
    }
  }

  private readSourceFacts(sourceId: SourceId): Fact[] {
    return this.readJson(this.factsPath(sourceId), FactFileSchema) ?? [];
  }

  private listSources(): SourceId[] {
    const factsDir = join(this.dir, 'facts');
    if (!existsSync(factsDir)) return [];
    return readdirSync(factsDir)
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  async readFacts(query: FactQuery = {}): Promise<Fact[]> {
    const sources = query.source_id ? [query.source_id] : this.listSources();
    const facts: Fact[] = [];
    for (const sourceId of sources) {
      facts.push(...this.readSourceFacts(sourceId).filter((f) => matchesQuery(f, query)));
    }
    return sortFacts(facts);
  }

  async upsertFacts(sourceId: SourceId, facts: readonly Fact[]): Promise<void> {
    if (facts.length === 0) return;
    this.withLock(sourceId, () => {
      const rows = new Map(this.readSourceFacts(sourceId).map((f) => [storeKey(f), f]));
      for (const fact of facts) rows.set(storeKey(fact), fact);
      this.writeJson(this.factsPath(sourceId), sortFacts([...rows.values()]));
    });
  }

  async deleteFacts(sourceId: SourceId, range: DateRange): Promise<number> {
    return this.withLock(sourceId, () => {
      const existing = this.readSourceFacts(sourceId);
      const kept = existing.filter((f) => !inRange(f, range));
      if (kept.length !== existing.length) {
        this.writeJson(this.factsPath(sourceId), kept);
      }
      return existing.length - kept.length;
    });
  }

  async setReconciliationStatus(keys: readonly string[], status: ReconciliationStatus): Promise<number> {
    const bySource = new Map<SourceId, Set<string>>();
    for (const key of keys) {
      // natural keys are `fact_date|source_id|...`
      const sourceId = key.split('|')[1];
      if (!sourceId) continue;
      const set = bySource.get(sourceId) ?? new Set<string>();
      set.add(key);
      bySource.set(sourceId, set);
    }

    let updated = 0;
    for (const [sourceId, sourceKeys] of bySource) {
      if (!existsSync(this.factsPath(sourceId))) continue;
      updated += this.withLock(sourceId, () => {
        let count = 0;
        const rows = this.readSourceFacts(sourceId).map((f): Fact => {
          if (f.fact_type !== 'cost' || !sourceKeys.has(f.natural_key)) return f;
          count += 1;
          return { ...f, reconciliation_status: status };
        });
        if (count > 0) this.writeJson(this.factsPath(sourceId), rows);
        return count;
      });
    }
    return updated;
  }

  async readObservations(sourceId: SourceId): Promise<CumulativeObservation[]> {
    return this.readJson(this.observationsPath(sourceId), ObservationFileSchema) ?? [];
  }

  async writeObservations(sourceId: SourceId, observations: readonly CumulativeObservation[]): Promise<void> {
    if (observations.length === 0) return;
    this.withLock(sourceId, () => {
      const path = this.observationsPath(sourceId);
      const rows = new Map(
        (this.readJson(path, ObservationFileSchema) ?? []).map((o) => [observationKey(o), o]),
      );
      for (const o of observations) rows.set(observationKey(o), o);
      this.writeJson(path, sortObservations([...rows.values()]));
    });
  }
}
