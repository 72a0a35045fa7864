/**
 * Built-in source parsers.
 *
 * Each parser maps one vendor response shape to RawRecords. Row-level
 * problems become diagnostic records; a body with the wrong top-level
 * shape throws and is handled by `normalize`.
 */

import type { IdentityHints, RawRecord } from '../contracts/index.js';
import { dayBucket, toFactDate, toIsoUtc } from '../contracts/time.js';
import {
  diagnosticRecord,
  isRecord,
  rowsOf,
  toNumber,
  toStringOrNull,
  type ParseContext,
  type SourceParser,
} from './records.js';

function requireRows(body: unknown, key: string, sourceId: string): unknown[] {
  const rows = rowsOf(body, key);
  if (!rows) {
    throw new Error(`${sourceId}: expected an object with a '${key}' array`);
  }
  return rows;
}

function collectMetrics(
  row: Record<string, unknown>,
  fieldMap: Readonly<Record<string, string>>,
): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const [vendorField, metric] of Object.entries(fieldMap)) {
    const value = toNumber(row[vendorField]);
    if (value !== undefined) metrics[metric] = value;
  }
  return metrics;
}

function currencyOf(value: unknown): string {
  const raw = toStringOrNull(value);
  return raw ? raw.toUpperCase() : 'USD';
}

// ============================================================================
// cursor.daily_usage
// ============================================================================

const CURSOR_DAILY_FIELDS: Readonly<Record<string, string>> = {
  totalLinesAdded: 'lines_added',
  totalLinesDeleted: 'lines_deleted',
  acceptedLinesAdded: 'accepted_lines_added',
  acceptedLinesDeleted: 'accepted_lines_deleted',
  totalApplies: 'applies',
  totalAccepts: 'accepts',
  totalRejects: 'rejects',
  totalTabsShown: 'tabs_shown',
  totalTabsAccepted: 'tabs_accepted',
  composerRequests: 'composer_requests',
  chatRequests: 'chat_requests',
  agentRequests: 'agent_requests',
  cmdkUsages: 'cmdk_usages',
  subscriptionIncludedReqs: 'subscription_included_requests',
  usageBasedReqs: 'usage_based_requests',
  apiKeyReqs: 'api_key_requests',
  bugbotUsages: 'bugbot_usages',
};

const parseCursorDailyUsage: SourceParser = (body, ctx) => {
  const rows = requireRows(body, 'data', ctx.sourceId);
  const records: RawRecord[] = [];

  rows.forEach((row, index) => {
    if (!isRecord(row)) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: not an object`));
      return;
    }
    const date = toFactDate(row.date ?? row.day);
    if (!date) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: missing or invalid date`));
      return;
    }
    const metrics = collectMetrics(row, CURSOR_DAILY_FIELDS);
    if (Object.keys(metrics).length === 0) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: no usage metrics`));
      return;
    }
    const bucket = dayBucket(date);
    records.push({
      source_id: ctx.sourceId,
      kind: 'usage',
      bucket_start: bucket.start,
      bucket_end: bucket.end,
      identity_hints: { email: toStringOrNull(row.email) },
      metric_fields: metrics,
      attributes: {
        platform: 'ide_assistant',
        most_used_model: toStringOrNull(row.mostUsedModel),
      },
      is_cumulative: false,
      raw_payload: { body: row, diagnostics: [] },
    });
  });

  return records;
};

// ============================================================================
// cursor.spend (cumulative per billing cycle)
// ============================================================================

const parseCursorSpend: SourceParser = (body, ctx) => {
  const rows = requireRows(body, 'teamMemberSpend', ctx.sourceId);
  const cycleStart = isRecord(body) ? toIsoUtc(body.subscriptionCycleStart) : null;
  if (!cycleStart) {
    throw new Error(`${ctx.sourceId}: missing subscriptionCycleStart`);
  }
  if (Date.parse(cycleStart) >= Date.parse(ctx.fetchWindow.end)) {
    throw new Error(`${ctx.sourceId}: subscriptionCycleStart is not before the fetch window end`);
  }

  const records: RawRecord[] = [];
  rows.forEach((row, index) => {
    if (!isRecord(row)) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: not an object`));
      return;
    }
    const spend = toNumber(row.spendCents);
    if (spend === undefined) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: missing spendCents`));
      return;
    }
    const included = toNumber(row.includedSpendCents) ?? 0;
    const metrics: Record<string, number> = {
      amount_minor_units: spend + included,
      spend_cents: spend,
      included_spend_cents: included,
    };
    const premium = toNumber(row.fastPremiumRequests);
    if (premium !== undefined) metrics.fast_premium_requests = premium;

    // The snapshot is observed over the fetch window; its cycle start is kept separately.
    records.push({
      source_id: ctx.sourceId,
      kind: 'cost',
      bucket_start: ctx.fetchWindow.start,
      bucket_end: ctx.fetchWindow.end,
      identity_hints: { email: toStringOrNull(row.email) },
      metric_fields: metrics,
      attributes: {
        platform: 'ide_assistant',
        currency: 'USD',
        cost_group: 'cursor',
        cost_scope: 'breakdown',
      },
      is_cumulative: true,
      billing_cycle_start: cycleStart,
      raw_payload: { body: row, diagnostics: [] },
    });
  });

  return records;
};

// ============================================================================
// anthropic.usage_report / anthropic.cost_report (bucketed results)
// ============================================================================

interface BucketRow {
  start: string;
  end: string;
  results: unknown[];
}

function bucketRows(body: unknown, ctx: ParseContext, records: RawRecord[]): BucketRow[] {
  const buckets = requireRows(body, 'data', ctx.sourceId);
  const out: BucketRow[] = [];
  buckets.forEach((bucket, index) => {
    const start = isRecord(bucket) ? toIsoUtc(bucket.starting_at) : null;
    const end = isRecord(bucket) ? toIsoUtc(bucket.ending_at) : null;
    const results = isRecord(bucket) && Array.isArray(bucket.results) ? bucket.results : null;
    if (!start || !end || !results) {
      records.push(diagnosticRecord(ctx, bucket, `bucket ${index}: expected starting_at, ending_at and results`));
      return;
    }
    out.push({ start, end, results });
  });
  return out;
}

const parseAnthropicUsageReport: SourceParser = (body, ctx) => {
  const records: RawRecord[] = [];

  for (const bucket of bucketRows(body, ctx, records)) {
    bucket.results.forEach((result, index) => {
      if (!isRecord(result)) {
        records.push(diagnosticRecord(ctx, result, `result ${index}: not an object`));
        return;
      }
      const cacheCreation = isRecord(result.cache_creation) ? result.cache_creation : {};
      const serverTools = isRecord(result.server_tool_use) ? result.server_tool_use : {};
      const metrics: Record<string, number> = {
        ...collectMetrics(result, {
          uncached_input_tokens: 'uncached_input_tokens',
          output_tokens: 'output_tokens',
          cache_read_input_tokens: 'cache_read_input_tokens',
        }),
        ...collectMetrics(cacheCreation, {
          ephemeral_5m_input_tokens: 'cache_creation_5m_input_tokens',
          ephemeral_1h_input_tokens: 'cache_creation_1h_input_tokens',
        }),
        ...collectMetrics(serverTools, { web_search_requests: 'web_search_requests' }),
      };
      if (Object.keys(metrics).length === 0) {
        records.push(diagnosticRecord(ctx, result, `result ${index}: no token counts`));
        return;
      }
      records.push({
        source_id: ctx.sourceId,
        kind: 'usage',
        bucket_start: bucket.start,
        bucket_end: bucket.end,
        identity_hints: {
          opaque_key_id: toStringOrNull(result.api_key_id),
          workspace_id: toStringOrNull(result.workspace_id),
        },
        metric_fields: metrics,
        attributes: {
          model: toStringOrNull(result.model),
          service_tier: toStringOrNull(result.service_tier),
          context_window: toStringOrNull(result.context_window),
        },
        is_cumulative: false,
        raw_payload: { body: result, diagnostics: [] },
      });
    });
  }

  return records;
};

const parseAnthropicCostReport: SourceParser = (body, ctx) => {
  const records: RawRecord[] = [];

  for (const bucket of bucketRows(body, ctx, records)) {
    bucket.results.forEach((result, index) => {
      if (!isRecord(result)) {
        records.push(diagnosticRecord(ctx, result, `result ${index}: not an object`));
        return;
      }
      const amount = toNumber(result.amount);
      if (amount === undefined) {
        records.push(diagnosticRecord(ctx, result, `result ${index}: amount is not a decimal`));
        return;
      }
      // Grouped-by-workspace rows always carry the key, null for the default workspace.
      const isBreakdown = 'workspace_id' in result;
      records.push({
        source_id: ctx.sourceId,
        kind: 'cost',
        bucket_start: bucket.start,
        bucket_end: bucket.end,
        identity_hints: { workspace_id: toStringOrNull(result.workspace_id) },
        metric_fields: { amount_minor_units: amount },
        attributes: {
          currency: currencyOf(result.currency),
          cost_type: toStringOrNull(result.cost_type),
          model: toStringOrNull(result.model),
          token_type: toStringOrNull(result.token_type),
          cost_group: 'anthropic',
          cost_scope: isBreakdown ? 'breakdown' : 'organization_total',
        },
        is_cumulative: false,
        raw_payload: { body: result, diagnostics: [] },
      });
    });
  }

  return records;
};

// ============================================================================
// anthropic.claude_code (per-actor daily productivity + estimated cost)
// ============================================================================

function actorHints(actor: unknown): IdentityHints {
  if (!isRecord(actor)) return {};
  return {
    email: toStringOrNull(actor.email_address),
    key_name: toStringOrNull(actor.api_key_name),
  };
}

function sumToolActions(toolActions: unknown): { accepted: number; rejected: number } | undefined {
  if (!isRecord(toolActions)) return undefined;
  let accepted = 0;
  let rejected = 0;
  for (const tool of Object.values(toolActions)) {
    if (!isRecord(tool)) continue;
    accepted += toNumber(tool.accepted) ?? 0;
    rejected += toNumber(tool.rejected) ?? 0;
  }
  return { accepted, rejected };
}

const parseAnthropicClaudeCode: SourceParser = (body, ctx) => {
  const rows = requireRows(body, 'data', ctx.sourceId);
  const records: RawRecord[] = [];

  rows.forEach((row, index) => {
    if (!isRecord(row)) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: not an object`));
      return;
    }
    const date = toFactDate(row.date);
    if (!date) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: missing or invalid date`));
      return;
    }
    const bucket = dayBucket(date);
    const hints = actorHints(row.actor);
    const core = isRecord(row.core_metrics) ? row.core_metrics : {};
    const lines = isRecord(core.lines_of_code) ? core.lines_of_code : {};

    const metrics: Record<string, number> = {
      ...collectMetrics(core, {
        num_sessions: 'sessions',
        commits_by_claude_code: 'commits',
        pull_requests_by_claude_code: 'pull_requests',
      }),
      ...collectMetrics(lines, { added: 'lines_added', removed: 'lines_removed' }),
    };
    const tools = sumToolActions(row.tool_actions);
    if (tools) {
      metrics.tool_accepted = tools.accepted;
      metrics.tool_rejected = tools.rejected;
    }

    if (Object.keys(metrics).length === 0) {
      records.push(diagnosticRecord(ctx, row, `row ${index}: no core metrics`));
    } else {
      records.push({
        source_id: ctx.sourceId,
        kind: 'usage',
        bucket_start: bucket.start,
        bucket_end: bucket.end,
        identity_hints: hints,
        metric_fields: metrics,
        attributes: {
          platform: 'coding_agent',
          terminal_type: toStringOrNull(row.terminal_type),
        },
        is_cumulative: false,
        raw_payload: { body: row, diagnostics: [] },
      });
    }

    const breakdown = Array.isArray(row.model_breakdown) ? row.model_breakdown : [];
    for (const entry of breakdown) {
      if (!isRecord(entry) || !isRecord(entry.estimated_cost)) continue;
      const amount = toNumber(entry.estimated_cost.amount);
      if (amount === undefined) continue;
      records.push({
        source_id: ctx.sourceId,
        kind: 'cost',
        bucket_start: bucket.start,
        bucket_end: bucket.end,
        identity_hints: hints,
        metric_fields: { amount_minor_units: amount },
        attributes: {
          platform: 'coding_agent',
          model: toStringOrNull(entry.model),
          currency: currencyOf(entry.estimated_cost.currency),
          cost_group: 'anthropic',
          cost_scope: 'estimate',
        },
        is_cumulative: false,
        raw_payload: { body: entry, diagnostics: [] },
      });
    }
  });

  return records;
};

// ============================================================================
// claude_ai.audit_log (enterprise audit export, aggregated per user per day)
// ============================================================================

const AUDIT_COUNTERS = ['conversations', 'projects_created', 'files_uploaded', 'messages'] as const;
type AuditCounter = (typeof AUDIT_COUNTERS)[number];

/** Minutes credited per counted event when estimating active time. */
const ACTIVE_MINUTES: Readonly<Record<AuditCounter, number>> = {
  conversations: 5,
  projects_created: 10,
  files_uploaded: 3,
  messages: 2,
};

function auditCounter(eventType: string): AuditCounter | undefined {
  const type = eventType.toLowerCase();
  if (type.includes('conversation')) return 'conversations';
  if (type.includes('project')) return 'projects_created';
  if (type.includes('file') || type.includes('upload')) return 'files_uploaded';
  if (type.includes('message')) return 'messages';
  return undefined;
}

function interactionType(eventType: string, clientPlatform: string | null): string {
  const type = eventType.toLowerCase();
  if (type.includes('conversation')) {
    if (clientPlatform === 'desktop_app') return 'coding_assistance';
    if (clientPlatform === 'web_claude_ai') return 'chat';
    return 'general';
  }
  if (type.includes('file')) return 'document_review';
  if (type.includes('project')) return 'analysis';
  return 'general';
}

interface AuditAggregate {
  email: string;
  date: string;
  counts: Record<AuditCounter, number>;
  events: number;
  interactions: Set<string>;
  bodies: unknown[];
}

function auditEvents(body: unknown, sourceId: string): unknown[] {
  if (Array.isArray(body)) return body;
  return requireRows(body, 'events', sourceId);
}

const parseClaudeAiAuditLog: SourceParser = (body, ctx) => {
  const records: RawRecord[] = [];
  const aggregates = new Map<string, AuditAggregate>();

  auditEvents(body, ctx.sourceId).forEach((event, index) => {
    if (!isRecord(event)) {
      records.push(diagnosticRecord(ctx, event, `event ${index}: not an object`));
      return;
    }
    const actor = isRecord(event.actor) ? event.actor : {};
    const email = toStringOrNull(actor.email) ?? toStringOrNull(event.actor_email);
    const eventType = toStringOrNull(event.event_type);
    const timestamp = toIsoUtc(event.timestamp);
    if (!email || !eventType || !timestamp) {
      records.push(diagnosticRecord(ctx, event, `event ${index}: expected actor email, event_type and timestamp`));
      return;
    }

    const date = timestamp.slice(0, 10);
    const key = `${date}|${email.toLowerCase()}`;
    const aggregate = aggregates.get(key) ?? {
      email,
      date,
      counts: { conversations: 0, projects_created: 0, files_uploaded: 0, messages: 0 },
      events: 0,
      interactions: new Set<string>(),
      bodies: [],
    };
    const metadata = isRecord(event.metadata) ? event.metadata : {};
    const counter = auditCounter(eventType);
    if (counter) aggregate.counts[counter] += 1;
    aggregate.events += 1;
    aggregate.interactions.add(interactionType(eventType, toStringOrNull(metadata.client_platform)));
    aggregate.bodies.push(event);
    aggregates.set(key, aggregate);
  });

  const ordered = [...aggregates.entries()].sort(([a], [b]) => a.localeCompare(b));
  for (const [, aggregate] of ordered) {
    const bucket = dayBucket(aggregate.date);
    const activeMinutes = AUDIT_COUNTERS.reduce(
      (sum, counter) => sum + aggregate.counts[counter] * ACTIVE_MINUTES[counter],
      0,
    );
    records.push({
      source_id: ctx.sourceId,
      kind: 'usage',
      bucket_start: bucket.start,
      bucket_end: bucket.end,
      identity_hints: { email: aggregate.email },
      metric_fields: {
        ...aggregate.counts,
        audit_events: aggregate.events,
        estimated_active_minutes: activeMinutes,
      },
      attributes: {
        interaction_types: [...aggregate.interactions].sort().join(','),
      },
      is_cumulative: false,
      raw_payload: { body: aggregate.bodies, diagnostics: [] },
    });
  }

  return records;
};

export const BUILTIN_PARSERS: Readonly<Record<string, SourceParser>> = {
  'cursor.daily_usage': parseCursorDailyUsage,
  'cursor.spend': parseCursorSpend,
  'anthropic.usage_report': parseAnthropicUsageReport,
  'anthropic.cost_report': parseAnthropicCostReport,
  'anthropic.claude_code': parseAnthropicClaudeCode,
  'claude_ai.audit_log': parseClaudeAiAuditLog,
};
