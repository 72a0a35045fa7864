/**
 * Fact building
 *
 * Derives natural keys for classified records, aggregates records that
 * share a key and suppresses cost lines that overlap a finer-grained
 * scope of the same spend.
 *
 * Facts carry no wall-clock timestamps: rebuilding from the same input
 * yields byte-identical rows.
 */

import type { ClassifiedRecord, CostFact, UsageFact } from '../contracts/index.js';
import { factDateOf } from '../contracts/time.js';

/** Finest first: a coarser scope is dropped when a finer one covers the same spend. */
export const COST_SCOPE_RANK: Readonly<Record<string, number>> = {
  breakdown: 3,
  organization_total: 2,
  estimate: 1,
};

export interface SuppressedCostGroup {
  cost_group: string;
  fact_date: string;
  currency: string;
  cost_scope: string;
  kept_scope: string;
  record_count: number;
  amount_minor_units: number;
}

export interface BuildFactsResult {
  usage: UsageFact[];
  cost: CostFact[];
  suppressed: SuppressedCostGroup[];
  stats: {
    input: number;
    skipped_diagnostic: number;
    skipped_invalid_cost: number;
    suppressed_records: number;
  };
}

const DISCRIMINATOR_ATTRIBUTES = ['model', 'cost_type', 'token_type'] as const;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export function dimensionDiscriminator(classified: ClassifiedRecord): string {
  const { attributes, identity_hints: hints } = classified.record;
  const parts: string[] = [];
  for (const attr of DISCRIMINATOR_ATTRIBUTES) {
    const value = attributes[attr];
    if (value) parts.push(`${attr}=${value}`);
  }
  if (hints.workspace_id) parts.push(`workspace=${hints.workspace_id}`);
  if (classified.record.kind === 'cost') parts.push(`currency=${currencyOf(classified)}`);
  return parts.length > 0 ? parts.join(';') : '-';
}

function currencyOf(classified: ClassifiedRecord): string {
  return (classified.record.attributes.currency ?? 'USD').toUpperCase();
}

export function naturalKeyOf(classified: ClassifiedRecord): string {
  return [
    factDateOf(classified.record.bucket_end),
    classified.record.source_id,
    classified.identity.canonical_user_id,
    classified.platform_category,
    dimensionDiscriminator(classified),
  ].join('|');
}

function overlapKey(c: ClassifiedRecord): string | undefined {
  const group = c.record.attributes.cost_group;
  const scope = c.record.attributes.cost_scope;
  if (c.record.kind !== 'cost' || !group || !scope || COST_SCOPE_RANK[scope] === undefined) return undefined;
  return `${group}|${factDateOf(c.record.bucket_end)}|${currencyOf(c)}`;
}

/**
 * Drop cost records whose scope is coarser than the finest scope present
 * in their (cost_group, fact_date, currency) group. The finest scope is
 * taken over `context`, which may span several sources of one run.
 */
export function suppressOverlaps(
  records: readonly ClassifiedRecord[],
  context: readonly ClassifiedRecord[] = records,
): {
  kept: ClassifiedRecord[];
  suppressed: SuppressedCostGroup[];
} {
  const bestScope = new Map<string, string>();
  for (const c of context) {
    const key = overlapKey(c);
    const scope = c.record.attributes.cost_scope;
    if (!key || !scope) continue;
    const best = bestScope.get(key);
    if (!best || COST_SCOPE_RANK[scope] > COST_SCOPE_RANK[best]) bestScope.set(key, scope);
  }

  const kept: ClassifiedRecord[] = [];
  const suppressed = new Map<string, SuppressedCostGroup>();
  for (const c of records) {
    const key = overlapKey(c);
    const scope = c.record.attributes.cost_scope;
    const best = key ? bestScope.get(key) : undefined;
    if (!key || !scope || !best || scope === best) {
      kept.push(c);
      continue;
    }
    const summaryKey = `${key}|${scope}`;
    const entry = suppressed.get(summaryKey) ?? {
      cost_group: c.record.attributes.cost_group ?? '',
      fact_date: factDateOf(c.record.bucket_end),
      currency: currencyOf(c),
      cost_scope: scope,
      kept_scope: best,
      record_count: 0,
      amount_minor_units: 0,
    };
    entry.record_count += 1;
    entry.amount_minor_units += c.record.metric_fields.amount_minor_units ?? 0;
    suppressed.set(summaryKey, entry);
  }

  return {
    kept,
    suppressed: [...suppressed.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, entry]) => ({ ...entry, amount_minor_units: Math.round(entry.amount_minor_units) })),
  };
}

interface Accumulator {
  first: ClassifiedRecord;
  natural_key: string;
  bucket_start: number;
  bucket_end: number;
  attribution_confidence: number;
  attribution_method: ClassifiedRecord['identity']['method'];
  classification_confidence: number;
  record_count: number;
  metrics: Record<string, number>;
  amount: number;
  is_estimated: boolean;
}

function accumulate(groups: Map<string, Accumulator>, key: string, c: ClassifiedRecord): void {
  const existing = groups.get(key);
  const start = Date.parse(c.record.bucket_start);
  const end = Date.parse(c.record.bucket_end);
  const estimated = c.record.attributes.cost_scope === 'estimate';

  if (!existing) {
    groups.set(key, {
      first: c,
      natural_key: key,
      bucket_start: start,
      bucket_end: end,
      attribution_confidence: c.identity.confidence,
      attribution_method: c.identity.method,
      classification_confidence: c.classification_confidence,
      record_count: 1,
      metrics: { ...c.record.metric_fields },
      amount: c.record.metric_fields.amount_minor_units ?? 0,
      is_estimated: estimated,
    });
    return;
  }

  existing.bucket_start = Math.min(existing.bucket_start, start);
  existing.bucket_end = Math.max(existing.bucket_end, end);
  if (c.identity.confidence < existing.attribution_confidence) {
    existing.attribution_confidence = c.identity.confidence;
    existing.attribution_method = c.identity.method;
  }
  existing.classification_confidence = Math.min(existing.classification_confidence, c.classification_confidence);
  existing.record_count += 1;
  for (const [metric, value] of Object.entries(c.record.metric_fields)) {
    existing.metrics[metric] = (existing.metrics[metric] ?? 0) + value;
  }
  existing.amount += c.record.metric_fields.amount_minor_units ?? 0;
  existing.is_estimated = existing.is_estimated || estimated;
}

function baseFields(acc: Accumulator) {
  const c = acc.first;
  return {
    natural_key: acc.natural_key,
    fact_date: factDateOf(c.record.bucket_end),
    source_id: c.record.source_id,
    canonical_user_id: c.identity.canonical_user_id,
    platform_category: c.platform_category,
    dimension_discriminator: dimensionDiscriminator(c),
    bucket_start: new Date(acc.bucket_start).toISOString(),
    bucket_end: new Date(acc.bucket_end).toISOString(),
    attribution_method: acc.attribution_method,
    attribution_confidence: acc.attribution_confidence,
    classification_confidence: acc.classification_confidence,
    record_count: acc.record_count,
  };
}

interface ScreenedBatch {
  input: number;
  usable: ClassifiedRecord[];
  skipped_diagnostic: number;
  skipped_invalid_cost: number;
}

function screen(classified: readonly ClassifiedRecord[]): ScreenedBatch {
  const batch: ScreenedBatch = { input: classified.length, usable: [], skipped_diagnostic: 0, skipped_invalid_cost: 0 };
  for (const c of classified) {
    if (Object.keys(c.record.metric_fields).length === 0) {
      batch.skipped_diagnostic += 1;
      continue;
    }
    if (c.record.kind === 'cost') {
      const valid = c.record.metric_fields.amount_minor_units !== undefined
        && CURRENCY_PATTERN.test(currencyOf(c));
      if (!valid) {
        batch.skipped_invalid_cost += 1;
        continue;
      }
    }
    batch.usable.push(c);
  }
  return batch;
}

function aggregate(batch: ScreenedBatch, context: readonly ClassifiedRecord[]): BuildFactsResult {
  const { kept, suppressed } = suppressOverlaps(batch.usable, context);

  const usageGroups = new Map<string, Accumulator>();
  const costGroups = new Map<string, Accumulator>();
  for (const c of kept) {
    const key = naturalKeyOf(c);
    accumulate(c.record.kind === 'cost' ? costGroups : usageGroups, key, c);
  }

  const byKey = (a: { natural_key: string }, b: { natural_key: string }): number =>
    a.natural_key.localeCompare(b.natural_key);

  const usage: UsageFact[] = [...usageGroups.values()]
    .map((acc) => ({ ...baseFields(acc), fact_type: 'usage' as const, metrics: acc.metrics }))
    .sort(byKey);

  const cost: CostFact[] = [...costGroups.values()]
    .map((acc) => {
      const group = acc.first.record.attributes.cost_group;
      return {
        ...baseFields(acc),
        fact_type: 'cost' as const,
        amount_minor_units: Math.round(acc.amount),
        currency: currencyOf(acc.first),
        ...(group ? { cost_group: group } : {}),
        is_estimated: acc.is_estimated,
        reconciliation_status: 'pending' as const,
      };
    })
    .sort(byKey);

  return {
    usage,
    cost,
    suppressed,
    stats: {
      input: batch.input,
      skipped_diagnostic: batch.skipped_diagnostic,
      skipped_invalid_cost: batch.skipped_invalid_cost,
      suppressed_records: batch.usable.length - kept.length,
    },
  };
}

/**
 * Build usage and cost facts from classified records.
 */
export function buildFacts(classified: readonly ClassifiedRecord[]): BuildFactsResult {
  const batch = screen(classified);
  return aggregate(batch, batch.usable);
}

/**
 * Build facts for several sources of one run. Each batch yields its own
 * facts, but scope overlaps are resolved across every batch, so an
 * estimate from one source gives way to a breakdown from another.
 */
export function buildFactBatches(batches: readonly (readonly ClassifiedRecord[])[]): BuildFactsResult[] {
  const screened = batches.map(screen);
  const context = screened.flatMap((b) => b.usable);
  return screened.map((b) => aggregate(b, context));
}
