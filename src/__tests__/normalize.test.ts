import { describe, expect, it } from 'vitest';
import {
  createParserRegistry,
  isDiagnostic,
  normalize,
  summarizeNormalization,
  supportedSources,
} from '../normalize/index.js';
import { classify } from '../classify/index.js';
import { DAY_WINDOW, emailIdentity } from './fixtures.js';

describe('normalize', () => {
  it('never throws on an unknown source', () => {
    const records = normalize('vendor.unknown', { data: [] }, DAY_WINDOW);
    expect(records).toHaveLength(1);
    expect(isDiagnostic(records[0])).toBe(true);
    expect(records[0].raw_payload.diagnostics).toEqual(["No parser registered for source 'vendor.unknown'"]);
  });

  it('turns a body of the wrong shape into one diagnostic record', () => {
    const records = normalize('anthropic.usage_report', 'upstream error page', DAY_WINDOW);
    expect(records).toHaveLength(1);
    expect(records[0].raw_payload.diagnostics).toEqual([
      "Parser failed: anthropic.usage_report: expected an object with a 'data' array",
    ]);
    expect(records[0].bucket_start).toBe(DAY_WINDOW.start);
    expect(records[0].bucket_end).toBe(DAY_WINDOW.end);
    expect(records[0].metric_fields).toEqual({});
  });

  it('validates parser output and replaces invalid candidates with diagnostics', () => {
    const registry = createParserRegistry({
      'test.broken': (_body, ctx) => [
        {
          source_id: ctx.sourceId,
          kind: 'usage',
          bucket_start: ctx.fetchWindow.end,
          bucket_end: ctx.fetchWindow.start,
          identity_hints: {},
          metric_fields: { requests: 1 },
          attributes: {},
          is_cumulative: false,
          raw_payload: { body: { id: 1 }, diagnostics: [] },
        },
      ],
    });
    const records = normalize('test.broken', {}, DAY_WINDOW, { registry });
    expect(records).toHaveLength(1);
    expect(records[0].raw_payload.diagnostics).toEqual(['Invalid record: bucket_end: bucket_start must be before bucket_end']);
    expect(records[0].raw_payload.body).toEqual({ id: 1 });
  });

  it('keeps candidates without a payload as the diagnostic body', () => {
    const registry = createParserRegistry({
      'test.loose': () => JSON.parse('[{"source_id":"test.loose"}]'),
      'test.scalar': () => JSON.parse('null'),
    });
    const records = normalize('test.loose', {}, DAY_WINDOW, { registry });
    expect(records).toHaveLength(1);
    expect(isDiagnostic(records[0])).toBe(true);
    expect(records[0].raw_payload.body).toEqual({ source_id: 'test.loose' });
    expect(records[0].raw_payload.diagnostics[0]).toMatch(/^Invalid record: /);

    expect(normalize('test.scalar', { data: [] }, DAY_WINDOW, { registry })[0].raw_payload.diagnostics).toEqual([
      'Parser failed: parser did not return a list of records',
    ]);
  });

  it('lists built-in sources', () => {
    expect(supportedSources()).toEqual([
      'anthropic.claude_code',
      'anthropic.cost_report',
      'anthropic.usage_report',
      'claude_ai.audit_log',
      'cursor.daily_usage',
      'cursor.spend',
    ]);
  });
});

describe('cursor.daily_usage', () => {
  it('maps daily rows to usage records with snake_case metrics', () => {
    const records = normalize(
      'cursor.daily_usage',
      {
        data: [
          {
            date: '2026-03-01',
            email: 'Dana@Example.com',
            totalLinesAdded: 120,
            totalTabsShown: 80,
            composerRequests: 14,
            mostUsedModel: 'claude-sonnet',
          },
        ],
      },
      DAY_WINDOW,
    );
    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.kind).toBe('usage');
    expect(record.bucket_start).toBe('2026-03-01T00:00:00.000Z');
    expect(record.bucket_end).toBe('2026-03-02T00:00:00.000Z');
    expect(record.identity_hints).toEqual({ email: 'Dana@Example.com' });
    expect(record.metric_fields).toEqual({ lines_added: 120, tabs_shown: 80, composer_requests: 14 });
    expect(record.attributes).toEqual({ platform: 'ide_assistant', most_used_model: 'claude-sonnet' });
  });

  it('keeps good rows when others are malformed', () => {
    const records = normalize(
      'cursor.daily_usage',
      {
        data: [
          'garbage',
          { email: 'lee@example.com', totalTabsShown: 3 },
          { date: '2026-03-01', email: 'lee@example.com' },
          { date: '2026-03-01', email: 'lee@example.com', totalTabsShown: '40' },
        ],
      },
      DAY_WINDOW,
    );
    expect(records.flatMap((r) => r.raw_payload.diagnostics)).toEqual([
      'row 0: not an object',
      'row 1: missing or invalid date',
      'row 2: no usage metrics',
    ]);
    expect(summarizeNormalization(records)).toEqual({
      total: 4,
      parsed: 1,
      unparseable: 3,
      byKind: { usage: 1 },
    });
    expect(records[3].metric_fields).toEqual({ tabs_shown: 40 });
  });
});

describe('cursor.spend', () => {
  const body = {
    subscriptionCycleStart: '2026-02-15T00:00:00Z',
    teamMemberSpend: [
      { email: 'dana@example.com', spendCents: 2150, includedSpendCents: 2000, fastPremiumRequests: 310 },
      { email: 'lee@example.com', spendCents: 0 },
    ],
  };

  it('emits cumulative cost snapshots observed over the fetch window', () => {
    const records = normalize('cursor.spend', body, DAY_WINDOW);
    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({
      kind: 'cost',
      is_cumulative: true,
      billing_cycle_start: '2026-02-15T00:00:00.000Z',
      bucket_start: DAY_WINDOW.start,
      bucket_end: DAY_WINDOW.end,
      metric_fields: {
        amount_minor_units: 4150,
        spend_cents: 2150,
        included_spend_cents: 2000,
        fast_premium_requests: 310,
      },
      attributes: { currency: 'USD', cost_group: 'cursor', cost_scope: 'breakdown', platform: 'ide_assistant' },
    });
    expect(records[1].metric_fields).toEqual({ amount_minor_units: 0, spend_cents: 0, included_spend_cents: 0 });
  });

  it('fails the whole body without a cycle start', () => {
    const records = normalize('cursor.spend', { teamMemberSpend: [] }, DAY_WINDOW);
    expect(records.map((r) => r.raw_payload.diagnostics[0])).toEqual([
      'Parser failed: cursor.spend: missing subscriptionCycleStart',
    ]);
  });

  it('rejects a cycle start at or after the window end', () => {
    const records = normalize('cursor.spend', { ...body, subscriptionCycleStart: '2026-03-02T00:00:00Z' }, DAY_WINDOW);
    expect(records[0].raw_payload.diagnostics).toEqual([
      'Parser failed: cursor.spend: subscriptionCycleStart is not before the fetch window end',
    ]);
  });
});

describe('anthropic.usage_report', () => {
  it('flattens bucketed token results with key and workspace hints', () => {
    const records = normalize(
      'anthropic.usage_report',
      {
        data: [
          {
            starting_at: '2026-03-01T00:00:00Z',
            ending_at: '2026-03-02T00:00:00Z',
            results: [
              {
                api_key_id: 'apikey_01',
                workspace_id: null,
                model: 'claude-sonnet',
                uncached_input_tokens: 18000,
                output_tokens: 5200,
                cache_read_input_tokens: 90000,
                cache_creation: { ephemeral_5m_input_tokens: 4000 },
                server_tool_use: { web_search_requests: 2 },
              },
              { api_key_id: 'apikey_02' },
            ],
          },
          { starting_at: '2026-03-01T00:00:00Z' },
        ],
      },
      DAY_WINDOW,
    );

    expect(records.flatMap((r) => r.raw_payload.diagnostics)).toEqual([
      'bucket 1: expected starting_at, ending_at and results',
      'result 1: no token counts',
    ]);
    const usage = records.filter((r) => !isDiagnostic(r));
    expect(usage).toHaveLength(1);
    expect(usage[0].identity_hints).toEqual({ opaque_key_id: 'apikey_01', workspace_id: null });
    expect(usage[0].metric_fields).toEqual({
      uncached_input_tokens: 18000,
      output_tokens: 5200,
      cache_read_input_tokens: 90000,
      cache_creation_5m_input_tokens: 4000,
      web_search_requests: 2,
    });
    expect(usage[0].attributes).toEqual({ model: 'claude-sonnet', service_tier: null, context_window: null });
  });
});

describe('anthropic.cost_report', () => {
  it('parses decimal amounts and tags the cost scope', () => {
    const records = normalize(
      'anthropic.cost_report',
      {
        data: [
          {
            starting_at: '2026-03-01T00:00:00Z',
            ending_at: '2026-03-02T00:00:00Z',
            results: [
              { currency: 'usd', amount: '1210.5', workspace_id: null, model: 'claude-sonnet', token_type: 'output_tokens' },
              { amount: '1450.5' },
              { amount: 'n/a', workspace_id: 'wrkspc_a' },
            ],
          },
        ],
      },
      DAY_WINDOW,
    );

    expect(records[0].metric_fields).toEqual({ amount_minor_units: 1210.5 });
    expect(records[0].attributes).toMatchObject({
      currency: 'USD',
      cost_scope: 'breakdown',
      cost_group: 'anthropic',
      token_type: 'output_tokens',
    });
    expect(records[1].attributes.cost_scope).toBe('organization_total');
    expect(records[1].attributes.currency).toBe('USD');
    expect(records[2].raw_payload.diagnostics).toEqual(['result 2: amount is not a decimal']);
  });
});

describe('anthropic.claude_code', () => {
  it('emits productivity usage and estimated cost per model', () => {
    const records = normalize(
      'anthropic.claude_code',
      {
        data: [
          {
            date: '2026-03-01T00:00:00Z',
            actor: { type: 'user_actor', email_address: 'dana@example.com' },
            terminal_type: 'vscode',
            core_metrics: {
              num_sessions: 4,
              lines_of_code: { added: 300, removed: 45 },
              commits_by_claude_code: 2,
              pull_requests_by_claude_code: 1,
            },
            tool_actions: {
              edit_tool: { accepted: 10, rejected: 2 },
              write_tool: { accepted: 3, rejected: 0 },
            },
            model_breakdown: [
              { model: 'claude-sonnet', estimated_cost: { currency: 'USD', amount: 812 } },
              { model: 'claude-haiku', estimated_cost: { currency: 'USD' } },
            ],
          },
        ],
      },
      DAY_WINDOW,
    );

    expect(records).toHaveLength(2);
    const [usage, cost] = records;
    expect(usage.metric_fields).toEqual({
      sessions: 4,
      commits: 2,
      pull_requests: 1,
      lines_added: 300,
      lines_removed: 45,
      tool_accepted: 13,
      tool_rejected: 2,
    });
    expect(usage.identity_hints).toEqual({ email: 'dana@example.com', key_name: null });
    expect(usage.attributes).toEqual({ platform: 'coding_agent', terminal_type: 'vscode' });
    expect(cost.kind).toBe('cost');
    expect(cost.metric_fields).toEqual({ amount_minor_units: 812 });
    expect(cost.attributes).toMatchObject({ cost_scope: 'estimate', model: 'claude-sonnet', currency: 'USD' });
  });

  it('attributes API-key actors by key name', () => {
    const records = normalize(
      'anthropic.claude_code',
      {
        data: [
          {
            date: '2026-03-01',
            actor: { type: 'api_actor', api_key_name: 'ci-bot' },
            core_metrics: { num_sessions: 1 },
          },
        ],
      },
      DAY_WINDOW,
    );
    expect(records[0].identity_hints).toEqual({ email: null, key_name: 'ci-bot' });
  });
});

describe('claude_ai.audit_log', () => {
  const events = [
    {
      actor: { email: 'dana@example.com', name: 'Dana' },
      event_type: 'conversation_created',
      timestamp: '2026-03-01T09:15:00Z',
      metadata: { client_platform: 'web_claude_ai' },
    },
    { actor: { email: 'Dana@Example.com' }, event_type: 'message_sent', timestamp: '2026-03-01T09:20:00Z' },
    { actor: { email: 'dana@example.com' }, event_type: 'file_uploaded', timestamp: '2026-03-01T10:00:00.000Z' },
    { actor_email: 'lee@example.com', event_type: 'project_created', timestamp: '2026-03-01T11:00:00Z' },
    { actor: { email: 'lee@example.com' }, event_type: 'user_signed_in', timestamp: '2026-03-01T08:00:00Z' },
    'garbage',
    { actor: { email: 'lee@example.com' }, event_type: 'conversation_created' },
  ];

  it('aggregates audit events per user per day', () => {
    const records = normalize('claude_ai.audit_log', { events }, DAY_WINDOW);

    expect(records.flatMap((r) => r.raw_payload.diagnostics)).toEqual([
      'event 5: not an object',
      'event 6: expected actor email, event_type and timestamp',
    ]);
    const usage = records.filter((r) => !isDiagnostic(r));
    expect(usage.map((r) => r.identity_hints.email)).toEqual(['dana@example.com', 'lee@example.com']);
    expect(usage[0]).toMatchObject({
      kind: 'usage',
      bucket_start: '2026-03-01T00:00:00.000Z',
      bucket_end: '2026-03-02T00:00:00.000Z',
      metric_fields: {
        conversations: 1,
        projects_created: 0,
        files_uploaded: 1,
        messages: 1,
        audit_events: 3,
        estimated_active_minutes: 10,
      },
      attributes: { interaction_types: 'chat,document_review,general' },
    });
    expect(usage[1].metric_fields).toEqual({
      conversations: 0,
      projects_created: 1,
      files_uploaded: 0,
      messages: 0,
      audit_events: 2,
      estimated_active_minutes: 10,
    });
    expect(usage[1].attributes).toEqual({ interaction_types: 'analysis,general' });
  });

  it('accepts a bare array export and rejects other shapes', () => {
    expect(normalize('claude_ai.audit_log', events.slice(0, 1), DAY_WINDOW)).toHaveLength(1);
    expect(normalize('claude_ai.audit_log', {}, DAY_WINDOW)[0].raw_payload.diagnostics).toEqual([
      "Parser failed: claude_ai.audit_log: expected an object with a 'events' array",
    ]);
  });

  it('feeds the chat category through metric shape', () => {
    const [record] = normalize('claude_ai.audit_log', events.slice(0, 1), DAY_WINDOW);
    expect(classify(record, emailIdentity('dana@example.com'))).toEqual({
      platform_category: 'chat_app',
      confidence: 0.6,
      rule: 'metric_shape',
    });
  });
});
