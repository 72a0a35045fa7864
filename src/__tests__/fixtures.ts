import type {
  ClassifiedRecord,
  CostFact,
  FetchWindow,
  PlatformCategory,
  RawRecord,
  ResolvedIdentity,
  UsageFact,
} from '../contracts/index.js';
import { factDateOf } from '../contracts/time.js';
import { createLogger, type StructuredLogger } from '../runner/logger.js';

export const DAY_WINDOW: FetchWindow = {
  start: '2026-03-01T00:00:00.000Z',
  end: '2026-03-02T00:00:00.000Z',
};

export function rawRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    source_id: 'test.source',
    kind: 'usage',
    bucket_start: '2026-03-01T00:00:00.000Z',
    bucket_end: '2026-03-02T00:00:00.000Z',
    identity_hints: {},
    metric_fields: { output_tokens: 10 },
    attributes: {},
    is_cumulative: false,
    raw_payload: { body: null, diagnostics: [] },
    ...overrides,
  };
}

/** Cumulative spend snapshot for one entity. */
export function spendSnapshot(observedAt: string, amount: number, cycleStart: string, email = 'dana@example.com'): RawRecord {
  return rawRecord({
    source_id: 'cursor.spend',
    kind: 'cost',
    bucket_start: cycleStart,
    bucket_end: observedAt,
    identity_hints: { email },
    metric_fields: { amount_minor_units: amount },
    attributes: { currency: 'USD', cost_group: 'cursor', cost_scope: 'breakdown', platform: 'ide_assistant' },
    is_cumulative: true,
    billing_cycle_start: cycleStart,
  });
}

export function emailIdentity(email: string): ResolvedIdentity {
  return { canonical_user_id: email, confidence: 1, method: 'direct_email', warnings: [] };
}

export function classified(
  record: RawRecord,
  identity: ResolvedIdentity,
  platform: PlatformCategory = 'raw_api',
  confidence = 0.5,
): ClassifiedRecord {
  return {
    record,
    identity,
    platform_category: platform,
    classification_confidence: confidence,
    classification_rule: 'metric_shape',
  };
}

export function costFact(overrides: Partial<CostFact> & Pick<CostFact, 'fact_date' | 'amount_minor_units'>): CostFact {
  const user = overrides.canonical_user_id ?? 'dana@example.com';
  const source = overrides.source_id ?? 'anthropic.cost_report';
  const platform = overrides.platform_category ?? 'raw_api';
  const discriminator = overrides.dimension_discriminator ?? 'currency=USD';
  const start = `${overrides.fact_date}T00:00:00.000Z`;
  return {
    fact_type: 'cost',
    natural_key: `${overrides.fact_date}|${source}|${user}|${platform}|${discriminator}`,
    source_id: source,
    canonical_user_id: user,
    platform_category: platform,
    dimension_discriminator: discriminator,
    bucket_start: start,
    bucket_end: new Date(Date.parse(start) + 86_400_000).toISOString(),
    attribution_method: 'direct_email',
    attribution_confidence: 1,
    classification_confidence: 0.5,
    record_count: 1,
    currency: 'USD',
    is_estimated: false,
    reconciliation_status: 'pending',
    ...overrides,
  };
}

export function usageFact(overrides: Partial<UsageFact> & Pick<UsageFact, 'bucket_end'>): UsageFact {
  const date = factDateOf(overrides.bucket_end);
  const user = overrides.canonical_user_id ?? 'dana@example.com';
  const source = overrides.source_id ?? 'anthropic.usage_report';
  return {
    fact_type: 'usage',
    natural_key: `${date}|${source}|${user}|raw_api|-`,
    fact_date: date,
    source_id: source,
    canonical_user_id: user,
    platform_category: 'raw_api',
    dimension_discriminator: '-',
    bucket_start: `${date}T00:00:00.000Z`,
    attribution_method: 'direct_email',
    attribution_confidence: 1,
    classification_confidence: 0.5,
    record_count: 1,
    metrics: { output_tokens: 100 },
    ...overrides,
  };
}

export function silentLogger(module = 'test'): StructuredLogger {
  return createLogger({ module, silent: true, minLevel: 'debug' });
}

export async function noSleep(): Promise<void> {
  /* tests skip back-off */
}
