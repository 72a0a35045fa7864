/**
 * Platform classification
 *
 * Assigns each record to a platform category from whatever metadata it
 * carries. Rules are tried in order and the first one that yields a
 * non-zero confidence wins:
 *
 *   (a) explicit `platform` attribute         confidence 1.0
 *   (b) identifier patterns                   min(reliability, identity confidence)
 *   (c) metric shape                          fixed per shape
 *   (d) fallback `unknown`                    0.0
 */

import type {
  ClassificationRule,
  ClassifiedRecord,
  IdentifierField,
  IdentifierPattern,
  PlatformCategory,
  RawRecord,
  ResolvedIdentity,
} from '../contracts/index.js';
import { PlatformCategorySchema } from '../contracts/index.js';
import { mappedPlatform, type IdentityMappingView } from '../identity/index.js';

export interface ClassificationResult {
  platform_category: PlatformCategory;
  confidence: number;
  rule: ClassificationRule;
}

export interface CompiledPattern {
  regex: RegExp;
  platform: PlatformCategory;
  reliability: number;
  fields: readonly IdentifierField[];
}

export interface ClassifyOptions {
  mapping?: IdentityMappingView;
  patterns?: readonly CompiledPattern[];
}

/** Reliability of a platform recorded on the identity mapping entry. */
export const MAPPING_PLATFORM_RELIABILITY = 0.9;

const IDE_FIELDS = new Set([
  'tabs_shown',
  'tabs_accepted',
  'composer_requests',
  'cmdk_usages',
  'applies',
  'accepts',
  'rejects',
]);
const CODING_AGENT_FIELDS = new Set([
  'sessions',
  'commits',
  'pull_requests',
  'lines_added',
  'lines_removed',
  'lines_deleted',
]);
const CHAT_FIELDS = new Set(['conversations', 'messages', 'chat_messages', 'projects_created']);
const TOKEN_AUX_FIELDS = new Set(['web_search_requests']);

const SHAPE_CONFIDENCE: Record<Exclude<PlatformCategory, 'unknown'>, number> = {
  ide_assistant: 0.7,
  coding_agent: 0.7,
  chat_app: 0.6,
  raw_api: 0.5,
};

/**
 * Compile configured identifier patterns. Throws on an invalid regex so a
 * bad profile is rejected at load time.
 */
export function compilePatterns(patterns: readonly IdentifierPattern[]): CompiledPattern[] {
  return patterns.map((p) => {
    let regex: RegExp;
    try {
      regex = new RegExp(p.pattern, 'i');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid identifier pattern '${p.pattern}': ${message}`);
    }
    return { regex, platform: p.platform, reliability: p.reliability, fields: p.fields };
  });
}

function explicitPlatform(record: RawRecord): PlatformCategory | undefined {
  const parsed = PlatformCategorySchema.safeParse(record.attributes.platform);
  return parsed.success && parsed.data !== 'unknown' ? parsed.data : undefined;
}

function matchIdentifier(
  record: RawRecord,
  identity: ResolvedIdentity,
  options: ClassifyOptions,
): ClassificationResult | undefined {
  if (options.mapping) {
    const platform = mappedPlatform(record, identity, options.mapping);
    if (platform && platform !== 'unknown') {
      const confidence = Math.min(MAPPING_PLATFORM_RELIABILITY, identity.confidence);
      if (confidence > 0) return { platform_category: platform, confidence, rule: 'identifier_pattern' };
    }
  }

  for (const pattern of options.patterns ?? []) {
    const matched = pattern.fields.some((field) => {
      const value = record.identity_hints[field];
      return value != null && pattern.regex.test(value);
    });
    if (!matched) continue;
    const confidence = Math.min(pattern.reliability, identity.confidence);
    if (confidence > 0) return { platform_category: pattern.platform, confidence, rule: 'identifier_pattern' };
  }

  return undefined;
}

/** Platform implied by which metrics a record carries, if any. */
export function shapeOf(record: RawRecord): Exclude<PlatformCategory, 'unknown'> | undefined {
  const fields = Object.keys(record.metric_fields);
  if (fields.some((f) => IDE_FIELDS.has(f))) return 'ide_assistant';
  if (fields.some((f) => CODING_AGENT_FIELDS.has(f))) return 'coding_agent';
  if (fields.some((f) => CHAT_FIELDS.has(f))) return 'chat_app';

  const tokenOnly = fields.length > 0
    && fields.every((f) => f.endsWith('_tokens') || TOKEN_AUX_FIELDS.has(f))
    && fields.some((f) => f.endsWith('_tokens'));
  if (tokenOnly) return 'raw_api';

  // Token-priced cost lines are API spend.
  if (record.kind === 'cost' && record.attributes.token_type) return 'raw_api';

  return undefined;
}

/**
 * Classify one record.
 */
export function classify(
  record: RawRecord,
  identity: ResolvedIdentity,
  options: ClassifyOptions = {},
): ClassificationResult {
  const explicit = explicitPlatform(record);
  if (explicit) {
    return { platform_category: explicit, confidence: 1, rule: 'explicit_field' };
  }

  const byIdentifier = matchIdentifier(record, identity, options);
  if (byIdentifier) return byIdentifier;

  const shape = shapeOf(record);
  if (shape) {
    return { platform_category: shape, confidence: SHAPE_CONFIDENCE[shape], rule: 'metric_shape' };
  }

  return { platform_category: 'unknown', confidence: 0, rule: 'fallback' };
}

export function classifyRecord(
  record: RawRecord,
  identity: ResolvedIdentity,
  options: ClassifyOptions = {},
): ClassifiedRecord {
  const result = classify(record, identity, options);
  return {
    record,
    identity,
    platform_category: result.platform_category,
    classification_confidence: result.confidence,
    classification_rule: result.rule,
  };
}
