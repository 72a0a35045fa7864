/**
 * Source normalization
 *
 * Transforms raw vendor responses into the canonical RawRecord envelope.
 * Normalization is total: a parser failure, a malformed row or a record
 * that fails schema validation becomes a diagnostic record with empty
 * metric fields instead of an exception.
 */

import type { FetchWindow, RawRecord, SourceId } from '../contracts/index.js';
import { RawRecordSchema } from '../contracts/index.js';
import { diagnosticRecord, isDiagnostic, isRecord, type ParseContext, type SourceParser } from './records.js';
import { BUILTIN_PARSERS } from './sources.js';

export type ParserRegistry = ReadonlyMap<string, SourceParser>;

export interface NormalizeOptions {
  registry?: ParserRegistry;
}

export interface NormalizeStats {
  total: number;
  parsed: number;
  unparseable: number;
  byKind: Record<string, number>;
}

export function createParserRegistry(extra: Record<string, SourceParser> = {}): ParserRegistry {
  const registry = new Map<string, SourceParser>(Object.entries(BUILTIN_PARSERS));
  for (const [sourceId, parser] of Object.entries(extra)) {
    registry.set(sourceId, parser);
  }
  return registry;
}

const DEFAULT_REGISTRY = createParserRegistry();

export function supportedSources(registry: ParserRegistry = DEFAULT_REGISTRY): string[] {
  return [...registry.keys()].sort();
}

/** The vendor row behind a candidate record, or the candidate itself when it has none. */
function payloadBodyOf(candidate: unknown): unknown {
  if (isRecord(candidate) && isRecord(candidate.raw_payload) && 'body' in candidate.raw_payload) {
    return candidate.raw_payload.body;
  }
  return candidate;
}

/**
 * Normalize one source response.
 *
 * @param sourceId - Registered source id, e.g. `anthropic.cost_report`
 * @param rawResponse - Parsed JSON body returned by the source adapter
 * @param fetchWindow - Window the adapter fetched
 */
export function normalize(
  sourceId: SourceId,
  rawResponse: unknown,
  fetchWindow: FetchWindow,
  options: NormalizeOptions = {},
): RawRecord[] {
  const ctx: ParseContext = { sourceId, fetchWindow };
  const parser = (options.registry ?? DEFAULT_REGISTRY).get(sourceId);

  if (!parser) {
    return [diagnosticRecord(ctx, rawResponse, `No parser registered for source '${sourceId}'`)];
  }

  let parsed: unknown;
  try {
    parsed = parser(rawResponse, ctx);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return [diagnosticRecord(ctx, rawResponse, `Parser failed: ${message}`)];
  }
  if (!Array.isArray(parsed)) {
    return [diagnosticRecord(ctx, rawResponse, 'Parser failed: parser did not return a list of records')];
  }

  const records: RawRecord[] = [];
  for (const candidate of parsed) {
    const result = RawRecordSchema.safeParse(candidate);
    if (result.success) {
      records.push(result.data);
    } else {
      const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      records.push(diagnosticRecord(ctx, payloadBodyOf(candidate), `Invalid record: ${issues}`));
    }
  }

  return records;
}

export function summarizeNormalization(records: readonly RawRecord[]): NormalizeStats {
  const byKind: Record<string, number> = {};
  let unparseable = 0;
  for (const record of records) {
    if (isDiagnostic(record)) {
      unparseable += 1;
      continue;
    }
    byKind[record.kind] = (byKind[record.kind] ?? 0) + 1;
  }
  return {
    total: records.length,
    parsed: records.length - unparseable,
    unparseable,
    byKind,
  };
}

export { diagnosticRecord, isDiagnostic, type ParseContext, type SourceParser } from './records.js';
export { BUILTIN_PARSERS } from './sources.js';
