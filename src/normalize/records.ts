import type { FetchWindow, RawRecord, SourceId } from '../contracts/index.js';

export interface ParseContext {
  sourceId: SourceId;
  fetchWindow: FetchWindow;
}

/** A parser may throw; `normalize` turns the failure into a diagnostic record. */
export type SourceParser = (body: unknown, ctx: ParseContext) => RawRecord[];

/**
 * Build a record that only carries a diagnostic. It spans the fetch
 * window, has no identity hints and no metrics.
 */
export function diagnosticRecord(
  ctx: ParseContext,
  body: unknown,
  message: string,
): RawRecord {
  return {
    source_id: ctx.sourceId,
    kind: 'usage',
    bucket_start: ctx.fetchWindow.start,
    bucket_end: ctx.fetchWindow.end,
    identity_hints: {},
    metric_fields: {},
    attributes: {},
    is_cumulative: false,
    raw_payload: { body, diagnostics: [message] },
  };
}

export function isDiagnostic(record: RawRecord): boolean {
  return Object.keys(record.metric_fields).length === 0 && record.raw_payload.diagnostics.length > 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Finite number from a number or numeric string; undefined otherwise. */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function toStringOrNull(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return null;
}

/** Array under `key` of an object body, or undefined when the shape is wrong. */
export function rowsOf(body: unknown, key: string): unknown[] | undefined {
  if (!isRecord(body)) return undefined;
  const rows = body[key];
  return Array.isArray(rows) ? rows : undefined;
}
