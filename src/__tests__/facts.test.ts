import { describe, expect, it } from 'vitest';
import type { IdentityHints, ResolvedIdentity } from '../contracts/index.js';
import { FactSchema } from '../contracts/index.js';
import { buildFactBatches, buildFacts, dimensionDiscriminator, naturalKeyOf } from '../facts/index.js';
import { classified, emailIdentity, rawRecord } from './fixtures.js';

const unattributed: ResolvedIdentity = { canonical_user_id: 'unattributed', confidence: 0, method: 'unresolved', warnings: [] };

function costLine(amount: number, attributes: Record<string, string | null>, hints: IdentityHints = {}) {
  return rawRecord({
    source_id: 'anthropic.cost_report',
    kind: 'cost',
    identity_hints: hints,
    metric_fields: { amount_minor_units: amount },
    attributes: { currency: 'USD', cost_group: 'anthropic', ...attributes },
  });
}

describe('naturalKeyOf', () => {
  it('joins date, source, user, platform and discriminator', () => {
    const c = classified(
      costLine(100, { cost_scope: 'breakdown', model: 'claude-sonnet', token_type: 'output_tokens' }, { workspace_id: 'wrkspc_a' }),
      emailIdentity('dana@example.com'),
    );
    expect(dimensionDiscriminator(c)).toBe('model=claude-sonnet;token_type=output_tokens;workspace=wrkspc_a;currency=USD');
    expect(naturalKeyOf(c)).toBe(
      '2026-03-01|anthropic.cost_report|dana@example.com|raw_api|model=claude-sonnet;token_type=output_tokens;workspace=wrkspc_a;currency=USD',
    );
  });

  it('uses a dash when a usage record has no dimensions', () => {
    expect(dimensionDiscriminator(classified(rawRecord(), emailIdentity('dana@example.com')))).toBe('-');
  });
});

describe('buildFacts', () => {
  it('aggregates records sharing a natural key', () => {
    const first = classified(
      rawRecord({
        bucket_start: '2026-03-01T00:00:00.000Z',
        bucket_end: '2026-03-01T12:00:00.000Z',
        metric_fields: { output_tokens: 100, uncached_input_tokens: 10 },
      }),
      emailIdentity('dana@example.com'),
      'raw_api',
      0.5,
    );
    const second = classified(
      rawRecord({
        bucket_start: '2026-03-01T12:00:00.000Z',
        bucket_end: '2026-03-01T18:00:00.000Z',
        metric_fields: { output_tokens: 50 },
      }),
      { canonical_user_id: 'dana@example.com', confidence: 0.9, method: 'key_mapping', warnings: [] },
      'raw_api',
      0.4,
    );

    const { usage, cost } = buildFacts([first, second]);
    expect(cost).toEqual([]);
    expect(usage).toHaveLength(1);
    expect(usage[0]).toEqual({
      fact_type: 'usage',
      natural_key: '2026-03-01|test.source|dana@example.com|raw_api|-',
      fact_date: '2026-03-01',
      source_id: 'test.source',
      canonical_user_id: 'dana@example.com',
      platform_category: 'raw_api',
      dimension_discriminator: '-',
      bucket_start: '2026-03-01T00:00:00.000Z',
      bucket_end: '2026-03-01T18:00:00.000Z',
      attribution_method: 'key_mapping',
      attribution_confidence: 0.9,
      classification_confidence: 0.4,
      record_count: 2,
      metrics: { output_tokens: 150, uncached_input_tokens: 10 },
    });
    expect(FactSchema.safeParse(usage[0]).success).toBe(true);
  });

  it('suppresses an organization total covered by a breakdown', () => {
    const breakdown = classified(
      costLine(1210.5, { cost_scope: 'breakdown', model: 'claude-sonnet' }, { workspace_id: null }),
      unattributed,
    );
    const total = classified(costLine(1450.5, { cost_scope: 'organization_total' }), unattributed);

    const result = buildFacts([breakdown, total]);
    expect(result.cost).toHaveLength(1);
    expect(result.cost[0].amount_minor_units).toBe(1211);
    expect(result.cost[0].dimension_discriminator).toBe('model=claude-sonnet;currency=USD');
    expect(result.suppressed).toEqual([
      {
        cost_group: 'anthropic',
        fact_date: '2026-03-01',
        currency: 'USD',
        cost_scope: 'organization_total',
        kept_scope: 'breakdown',
        record_count: 1,
        amount_minor_units: 1451,
      },
    ]);
    expect(result.stats.suppressed_records).toBe(1);
  });

  it('keeps an organization total when it is the finest scope present', () => {
    const total = classified(costLine(1450, { cost_scope: 'organization_total' }), unattributed);
    const estimate = classified(costLine(300, { cost_scope: 'estimate' }), emailIdentity('dana@example.com'));
    const result = buildFacts([total, estimate]);
    expect(result.cost.map((f) => f.amount_minor_units)).toEqual([1450]);
    expect(result.suppressed[0].cost_scope).toBe('estimate');
  });

  it('carries the cost group onto cost facts', () => {
    const result = buildFacts([classified(costLine(700, { cost_scope: 'breakdown' }), unattributed)]);
    expect(result.cost[0].cost_group).toBe('anthropic');
    expect(FactSchema.safeParse(result.cost[0]).success).toBe(true);
  });

  it('marks estimates and keeps currencies apart', () => {
    const usd = classified(costLine(300, { cost_scope: 'estimate' }), emailIdentity('dana@example.com'));
    const eur = classified(costLine(200, { cost_scope: 'estimate', currency: 'eur' }), emailIdentity('dana@example.com'));
    const result = buildFacts([usd, eur]);
    expect(result.cost.map((f) => [f.currency, f.amount_minor_units, f.is_estimated])).toEqual([
      ['EUR', 200, true],
      ['USD', 300, true],
    ]);
    expect(result.cost.every((f) => f.reconciliation_status === 'pending')).toBe(true);
  });

  it('skips diagnostics and cost records without an amount or currency', () => {
    const result = buildFacts([
      classified(rawRecord({ metric_fields: {} }), unattributed),
      classified(rawRecord({ kind: 'cost', metric_fields: { spend: 1 } }), unattributed),
      classified(costLine(5, { currency: 'dollars' }), unattributed),
    ]);
    expect(result.usage).toEqual([]);
    expect(result.cost).toEqual([]);
    expect(result.stats).toEqual({ input: 3, skipped_diagnostic: 1, skipped_invalid_cost: 2, suppressed_records: 0 });
  });

  it('is deterministic and ordered by natural key', () => {
    const records = [
      classified(rawRecord({ metric_fields: { output_tokens: 1 } }), emailIdentity('zoe@example.com')),
      classified(rawRecord({ metric_fields: { output_tokens: 2 } }), emailIdentity('ana@example.com')),
    ];
    const first = buildFacts(records);
    const second = buildFacts([...records].reverse());
    expect(JSON.stringify(first.usage)).toBe(JSON.stringify(buildFacts(records).usage));
    expect(first.usage.map((f) => f.canonical_user_id)).toEqual(['ana@example.com', 'zoe@example.com']);
    expect(second.usage).toEqual(first.usage);
  });
});

describe('buildFactBatches', () => {
  it('suppresses one source\'s estimate under another source\'s breakdown', () => {
    const estimate = classified(
      { ...costLine(300, { cost_scope: 'estimate' }), source_id: 'anthropic.claude_code' },
      emailIdentity('dana@example.com'),
    );
    const breakdown = classified(costLine(1200, { cost_scope: 'breakdown', model: 'claude-sonnet' }), unattributed);

    const [estimates, actuals] = buildFactBatches([[estimate], [breakdown]]);
    expect(estimates.cost).toEqual([]);
    expect(estimates.stats.suppressed_records).toBe(1);
    expect(estimates.suppressed).toEqual([
      {
        cost_group: 'anthropic',
        fact_date: '2026-03-01',
        currency: 'USD',
        cost_scope: 'estimate',
        kept_scope: 'breakdown',
        record_count: 1,
        amount_minor_units: 300,
      },
    ]);
    expect(actuals.cost.map((f) => [f.source_id, f.amount_minor_units])).toEqual([['anthropic.cost_report', 1200]]);
    expect(actuals.suppressed).toEqual([]);
  });

  it('leaves other cost groups and days alone', () => {
    const estimate = classified(
      { ...costLine(300, { cost_scope: 'estimate', cost_group: 'cursor' }), source_id: 'anthropic.claude_code' },
      emailIdentity('dana@example.com'),
    );
    const breakdown = classified(costLine(1200, { cost_scope: 'breakdown' }), unattributed);
    const [estimates] = buildFactBatches([[estimate], [breakdown]]);
    expect(estimates.cost.map((f) => [f.amount_minor_units, f.is_estimated])).toEqual([[300, true]]);
  });
});
