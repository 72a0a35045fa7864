import { describe, expect, it } from 'vitest';
import type { Fact } from '../contracts/index.js';
import {
  parseGroundTruth,
  reconcile,
  reconcileAll,
  reconciledFactKeys,
  variancePercent,
} from '../reconcile/index.js';
import { costFact, usageFact } from './fixtures.js';

const PERIOD = { period_start: '2026-03-01', period_end: '2026-03-02' };
const fixedNow = () => new Date('2026-03-02T06:00:00.000Z');

function invoice(amount: number, sourceIds?: string[]) {
  return { label: 'march-invoice', amount_minor_units: amount, currency: 'USD', source_ids: sourceIds };
}

const facts: Fact[] = [
  costFact({ fact_date: '2026-03-01', amount_minor_units: 50_000 }),
  costFact({
    fact_date: '2026-03-01',
    amount_minor_units: 44_500,
    platform_category: 'coding_agent',
    source_id: 'anthropic.claude_code',
    is_estimated: true,
  }),
  costFact({ fact_date: '2026-03-02', amount_minor_units: 9_999 }),
  usageFact({ bucket_end: '2026-03-02T00:00:00.000Z' }),
];

describe('reconcile', () => {
  it('flags a variance above the tolerance', () => {
    const report = reconcile(PERIOD, facts, invoice(100_000), { tolerancePercent: 5, now: fixedNow });
    expect(report).toMatchObject({
      label: 'march-invoice',
      period_start: '2026-03-01',
      period_end: '2026-03-02',
      aggregated_minor_units: 94_500,
      ground_truth_minor_units: 100_000,
      variance_minor_units: -5_500,
      variance_absolute: 5_500,
      variance_percent: 5.5,
      status: 'variance_flagged',
      fact_count: 2,
      estimated_minor_units: 44_500,
      excluded_currency_count: 0,
      generated_at: '2026-03-02T06:00:00.000Z',
      version: '1.0.0',
    });
    expect(report.breakdown).toEqual([
      { platform_category: 'coding_agent', amount_minor_units: 44_500, fact_count: 1 },
      { platform_category: 'raw_api', amount_minor_units: 50_000, fact_count: 1 },
    ]);
    expect(report.report_id).toMatch(/^recon-2026-03-01-2026-03-02-[0-9a-f]{8}$/);
  });

  it('matches within the tolerance', () => {
    const report = reconcile(PERIOD, facts, invoice(96_500), { now: fixedNow });
    expect(report.variance_percent).toBe(2.0725);
    expect(report.tolerance_percent).toBe(5);
    expect(report.status).toBe('matched');
  });

  it('matches a two percent shortfall under the default tolerance', () => {
    const report = reconcile(PERIOD, [costFact({ fact_date: '2026-03-01', amount_minor_units: 98_000 })], invoice(100_000), {
      now: fixedNow,
    });
    expect(report.variance_minor_units).toBe(-2_000);
    expect(report.variance_percent).toBe(2);
    expect(report.status).toBe('matched');
  });

  it('treats the tolerance as inclusive', () => {
    const report = reconcile(PERIOD, [costFact({ fact_date: '2026-03-01', amount_minor_units: 95 })], invoice(100), {
      tolerancePercent: 5,
    });
    expect(report.variance_percent).toBe(5);
    expect(report.status).toBe('matched');
  });

  it('restricts to the listed sources', () => {
    const report = reconcile(PERIOD, facts, invoice(50_000, ['anthropic.cost_report']), { now: fixedNow });
    expect(report.aggregated_minor_units).toBe(50_000);
    expect(report.source_ids).toEqual(['anthropic.cost_report']);
    expect(report.status).toBe('matched');
  });

  it('excludes facts in other currencies', () => {
    const mixed = [...facts, costFact({ fact_date: '2026-03-01', amount_minor_units: 7_000, currency: 'EUR', dimension_discriminator: 'currency=EUR' })];
    const report = reconcile(PERIOD, mixed, invoice(94_500), { now: fixedNow });
    expect(report.aggregated_minor_units).toBe(94_500);
    expect(report.excluded_currency_count).toBe(1);
    expect(report.variance_percent).toBe(0);
  });

  it('drops estimates covered by an actual amount of the same cost group and day', () => {
    const grouped: Fact[] = [
      costFact({ fact_date: '2026-03-01', amount_minor_units: 50_000, cost_group: 'anthropic' }),
      costFact({
        fact_date: '2026-03-01',
        amount_minor_units: 44_500,
        platform_category: 'coding_agent',
        source_id: 'anthropic.claude_code',
        cost_group: 'anthropic',
        is_estimated: true,
      }),
      costFact({
        fact_date: '2026-03-02',
        amount_minor_units: 3_000,
        platform_category: 'coding_agent',
        source_id: 'anthropic.claude_code',
        cost_group: 'anthropic',
        is_estimated: true,
      }),
    ];
    const report = reconcile({ period_start: '2026-03-01', period_end: '2026-03-03' }, grouped, invoice(53_000), {
      now: fixedNow,
    });
    expect(report).toMatchObject({
      aggregated_minor_units: 53_000,
      fact_count: 2,
      estimated_minor_units: 3_000,
      superseded_estimate_count: 1,
      excluded_currency_count: 0,
      status: 'matched',
    });
    expect(reconciledFactKeys(grouped, { period_start: '2026-03-01', period_end: '2026-03-03', ...invoice(53_000) })).toEqual([
      '2026-03-01|anthropic.cost_report|dana@example.com|raw_api|currency=USD',
      '2026-03-02|anthropic.claude_code|dana@example.com|coding_agent|currency=USD',
    ]);
  });

  it('handles a zero ground truth', () => {
    expect(reconcile(PERIOD, [], invoice(0)).status).toBe('matched');
    const report = reconcile(PERIOD, facts, invoice(0));
    expect(report.variance_percent).toBe(100);
    expect(report.status).toBe('variance_flagged');
  });

  it('hashes the report content independently of the generation time', () => {
    const a = reconcile(PERIOD, facts, invoice(100_000), { now: fixedNow });
    const b = reconcile(PERIOD, facts, invoice(100_000), { now: () => new Date('2026-04-01T00:00:00.000Z') });
    expect(a.report_hash).toBe(b.report_hash);
    expect(a.report_id).toBe(b.report_id);
    expect(reconcile(PERIOD, facts, invoice(100_001)).report_hash).not.toBe(a.report_hash);
  });
});

describe('variancePercent', () => {
  it('rounds to four decimals', () => {
    expect(variancePercent(1, 3)).toBe(66.6667);
    expect(variancePercent(3, 3)).toBe(0);
  });
});

describe('reconciledFactKeys', () => {
  it('lists the covered cost facts in the truth currency', () => {
    const truth = { ...PERIOD, ...invoice(100_000) };
    expect(reconciledFactKeys(facts, truth)).toEqual([
      '2026-03-01|anthropic.claude_code|dana@example.com|coding_agent|currency=USD',
      '2026-03-01|anthropic.cost_report|dana@example.com|raw_api|currency=USD',
    ]);
  });
});

describe('parseGroundTruth', () => {
  it('parses totals', () => {
    const totals = parseGroundTruth({
      totals: [{ label: 'inv', period_start: '2026-03-01', period_end: '2026-03-02', amount_minor_units: 150_000, currency: 'USD' }],
    });
    expect(totals).toHaveLength(1);
    expect(reconcileAll(facts, totals, { now: fixedNow })[0].aggregated_minor_units).toBe(94_500);
  });

  it('rejects an empty or inverted period', () => {
    expect(() =>
      parseGroundTruth({
        totals: [{ label: 'inv', period_start: '2026-03-02', period_end: '2026-03-02', amount_minor_units: 1, currency: 'USD' }],
      }),
    ).toThrow('Invalid ground truth: totals.0: period_start must be before period_end (end is exclusive)');
  });
});
