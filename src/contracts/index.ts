/**
 * Core domain contracts and Zod schemas for the attribution pipeline
 *
 * One organization per store; facts carry no organization identifier.
 * All timestamps are ISO 8601 UTC strings for deterministic serialization.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Types
// ============================================================================

export const SourceIdSchema = z.string().min(1).regex(/^[a-z0-9_.-]+$/);
export const TimestampSchema = z.string().datetime();
export const FactDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
export const CurrencySchema = z.string().regex(/^[A-Z]{3}$/);
export const ConfidenceSchema = z.number().min(0).max(1);

export type SourceId = z.infer<typeof SourceIdSchema>;
export type FactDate = z.infer<typeof FactDateSchema>;

/** Sentinel user id for records no identity rule could attribute. */
export const UNATTRIBUTED = 'unattributed';

export const FetchWindowSchema = z
  .object({
    start: TimestampSchema,
    end: TimestampSchema,
  })
  .refine((w) => Date.parse(w.start) < Date.parse(w.end), {
    message: 'fetch window start must be before end',
  });

export type FetchWindow = z.infer<typeof FetchWindowSchema>;

// ============================================================================
// Raw Record (canonical envelope produced by the source normalizers)
// ============================================================================

export const RecordKindSchema = z.enum(['usage', 'cost']);

export const IdentityHintsSchema = z.object({
  email: z.string().nullable().optional(),
  opaque_key_id: z.string().nullable().optional(),
  key_name: z.string().nullable().optional(),
  workspace_id: z.string().nullable().optional(),
});

export const RawPayloadSchema = z.object({
  body: z.unknown(),
  diagnostics: z.array(z.string()),
});

export const RawRecordSchema = z
  .object({
    source_id: SourceIdSchema,
    kind: RecordKindSchema,
    bucket_start: TimestampSchema,
    bucket_end: TimestampSchema,
    identity_hints: IdentityHintsSchema,
    metric_fields: z.record(z.number().finite()),
    attributes: z.record(z.string().nullable()),
    is_cumulative: z.boolean(),
    billing_cycle_start: TimestampSchema.optional(),
    raw_payload: RawPayloadSchema,
  })
  .superRefine((record, ctx) => {
    if (Date.parse(record.bucket_start) >= Date.parse(record.bucket_end)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bucket_end'],
        message: 'bucket_start must be before bucket_end',
      });
    }
    if (record.is_cumulative && !record.billing_cycle_start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['billing_cycle_start'],
        message: 'cumulative records require billing_cycle_start',
      });
    }
  });

export type RecordKind = z.infer<typeof RecordKindSchema>;
export type IdentityHints = z.infer<typeof IdentityHintsSchema>;
export type RawPayload = z.infer<typeof RawPayloadSchema>;
export type RawRecord = z.infer<typeof RawRecordSchema>;

// ============================================================================
// Identity Resolution
// ============================================================================

export const AttributionMethodSchema = z.enum([
  'direct_email',
  'key_mapping',
  'workspace_inference',
  'unresolved',
]);

export const ResolvedIdentitySchema = z
  .object({
    canonical_user_id: z.string().min(1),
    confidence: ConfidenceSchema,
    method: AttributionMethodSchema,
    warnings: z.array(z.string()).default([]),
  })
  .superRefine((identity, ctx) => {
    if (identity.method === 'direct_email' && identity.confidence !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['confidence'],
        message: 'direct_email attribution must have confidence 1.0',
      });
    }
    if (
      identity.method === 'unresolved' &&
      (identity.canonical_user_id !== UNATTRIBUTED || identity.confidence !== 0)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['method'],
        message: 'unresolved attribution must be unattributed with confidence 0',
      });
    }
  });

export type AttributionMethod = z.infer<typeof AttributionMethodSchema>;
export type ResolvedIdentity = z.infer<typeof ResolvedIdentitySchema>;

// ============================================================================
// Identity Mapping (externally maintained, read-only)
// ============================================================================

export const PlatformCategorySchema = z.enum([
  'coding_agent',
  'ide_assistant',
  'chat_app',
  'raw_api',
  'unknown',
]);

export type PlatformCategory = z.infer<typeof PlatformCategorySchema>;

export const KeyMappingEntrySchema = z.object({
  opaque_key_id: z.string().min(1),
  key_name: z.string().min(1).optional(),
  user_email: z.string().min(1),
  confidence: ConfidenceSchema.optional(),
  platform: PlatformCategorySchema.optional(),
  description: z.string().optional(),
});

export const WorkspaceMappingEntrySchema = z
  .object({
    workspace_id: z.string().min(1),
    name: z.string().optional(),
    user_email: z.string().min(1).optional(),
    team: z.string().min(1).optional(),
    confidence: ConfidenceSchema.default(0.5),
    platform: PlatformCategorySchema.optional(),
  })
  .refine((entry) => entry.user_email !== undefined || entry.team !== undefined, {
    message: 'workspace mapping needs user_email or team',
  });

export const IdentityMappingSnapshotSchema = z.object({
  version: z.string().min(1),
  generated_at: TimestampSchema.optional(),
  keys: z.array(KeyMappingEntrySchema).default([]),
  workspaces: z.array(WorkspaceMappingEntrySchema).default([]),
});

export type KeyMappingEntry = z.infer<typeof KeyMappingEntrySchema>;
export type WorkspaceMappingEntry = z.infer<typeof WorkspaceMappingEntrySchema>;
export type IdentityMappingSnapshot = z.infer<typeof IdentityMappingSnapshotSchema>;

// ============================================================================
// Classification
// ============================================================================

export const ClassificationRuleSchema = z.enum([
  'explicit_field',
  'identifier_pattern',
  'metric_shape',
  'fallback',
]);

export const ClassifiedRecordSchema = z.object({
  record: RawRecordSchema,
  identity: ResolvedIdentitySchema,
  platform_category: PlatformCategorySchema,
  classification_confidence: ConfidenceSchema,
  classification_rule: ClassificationRuleSchema,
});

export type ClassificationRule = z.infer<typeof ClassificationRuleSchema>;
export type ClassifiedRecord = z.infer<typeof ClassifiedRecordSchema>;

// ============================================================================
// Facts (persisted shapes)
// ============================================================================

export const ReconciliationStatusSchema = z.enum(['pending', 'matched', 'variance_flagged']);

const FactBaseSchema = z.object({
  natural_key: z.string().min(1),
  fact_date: FactDateSchema,
  source_id: SourceIdSchema,
  canonical_user_id: z.string().min(1),
  platform_category: PlatformCategorySchema,
  dimension_discriminator: z.string().min(1),
  bucket_start: TimestampSchema,
  bucket_end: TimestampSchema,
  attribution_method: AttributionMethodSchema,
  attribution_confidence: ConfidenceSchema,
  classification_confidence: ConfidenceSchema,
  record_count: z.number().int().min(1),
});

export const UsageFactSchema = FactBaseSchema.extend({
  fact_type: z.literal('usage'),
  metrics: z.record(z.number().finite()),
});

export const CostFactSchema = FactBaseSchema.extend({
  fact_type: z.literal('cost'),
  amount_minor_units: z.number().int(),
  currency: CurrencySchema,
  /** Spend pool shared by every scope of the same underlying cost. */
  cost_group: z.string().min(1).optional(),
  is_estimated: z.boolean(),
  reconciliation_status: ReconciliationStatusSchema,
});

export const FactSchema = z.discriminatedUnion('fact_type', [UsageFactSchema, CostFactSchema]);

export type ReconciliationStatus = z.infer<typeof ReconciliationStatusSchema>;
export type UsageFact = z.infer<typeof UsageFactSchema>;
export type CostFact = z.infer<typeof CostFactSchema>;
export type Fact = z.infer<typeof FactSchema>;

/** Last cumulative reading kept per entity so later runs can difference against it. */
export const CumulativeObservationSchema = z.object({
  entity_key: z.string().min(1),
  source_id: SourceIdSchema,
  observed_at: TimestampSchema,
  billing_cycle_start: TimestampSchema,
  metric_fields: z.record(z.number().finite()),
});

export type CumulativeObservation = z.infer<typeof CumulativeObservationSchema>;

// ============================================================================
// Reconciliation
// ============================================================================

export const GroundTruthTotalSchema = z
  .object({
    label: z.string().min(1),
    period_start: FactDateSchema,
    period_end: FactDateSchema,
    amount_minor_units: z.number().int().min(0),
    currency: CurrencySchema,
    source_ids: z.array(SourceIdSchema).optional(),
  })
  .refine((t) => t.period_start < t.period_end, {
    message: 'period_start must be before period_end (end is exclusive)',
  });

export const GroundTruthFileSchema = z.object({
  totals: z.array(GroundTruthTotalSchema),
});

export const VerdictSchema = z.enum(['matched', 'variance_flagged']);

export const PlatformBreakdownSchema = z.object({
  platform_category: PlatformCategorySchema,
  amount_minor_units: z.number().int(),
  fact_count: z.number().int().min(0),
});

export const ReconciliationReportSchema = z.object({
  report_id: z.string(),
  label: z.string(),
  generated_at: TimestampSchema,
  period_start: FactDateSchema,
  period_end: FactDateSchema,
  currency: CurrencySchema,
  source_ids: z.array(SourceIdSchema),
  aggregated_minor_units: z.number().int(),
  ground_truth_minor_units: z.number().int().min(0),
  variance_minor_units: z.number().int(),
  variance_absolute: z.number().int().min(0),
  variance_percent: z.number().min(0),
  tolerance_percent: z.number().min(0),
  status: VerdictSchema,
  fact_count: z.number().int().min(0),
  estimated_minor_units: z.number().int(),
  excluded_currency_count: z.number().int().min(0),
  superseded_estimate_count: z.number().int().min(0).default(0),
  breakdown: z.array(PlatformBreakdownSchema),
  report_hash: z.string(),
  version: z.string().default('1.0.0'),
});

export type GroundTruthTotal = z.infer<typeof GroundTruthTotalSchema>;
export type Verdict = z.infer<typeof VerdictSchema>;
export type PlatformBreakdown = z.infer<typeof PlatformBreakdownSchema>;
export type ReconciliationReport = z.infer<typeof ReconciliationReportSchema>;

// ============================================================================
// Anomaly Detection
// ============================================================================

export const AnomalyTypeSchema = z.enum([
  'cost_spike',
  'attribution_gap',
  'reconciliation_variance',
]);

export const AnomalySeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const AnomalySchema = z.object({
  anomaly_id: z.string(),
  anomaly_type: AnomalyTypeSchema,
  severity: AnomalySeveritySchema,
  detected_at: TimestampSchema,
  fact_date: FactDateSchema.optional(),
  canonical_user_id: z.string().optional(),
  description: z.string(),
  expected_value: z.number().optional(),
  observed_value: z.number().optional(),
  difference: z.number().optional(),
  confidence: ConfidenceSchema,
  recommended_action: z.string().optional(),
  metadata: z.record(z.unknown()).optional().default({}),
});

export type AnomalyType = z.infer<typeof AnomalyTypeSchema>;
export type AnomalySeverity = z.infer<typeof AnomalySeveritySchema>;
export type Anomaly = z.infer<typeof AnomalySchema>;

// ============================================================================
// Profile Configuration
// ============================================================================

export const IdentifierFieldSchema = z.enum(['key_name', 'opaque_key_id', 'workspace_id']);

export const IdentifierPatternSchema = z.object({
  pattern: z.string().min(1),
  platform: PlatformCategorySchema,
  reliability: ConfidenceSchema.default(0.8),
  fields: z.array(IdentifierFieldSchema).default(['key_name', 'workspace_id']),
});

export const AnomalyThresholdSchema = z.object({
  cost_spike_multiplier: z.number().positive().default(3),
  cost_spike_min_minor_units: z.number().int().min(0).default(1000),
  cost_spike_lookback_days: z.number().int().positive().default(7),
  attribution_gap_threshold_pct: z.number().min(0).max(100).default(20),
});

export const MergeRetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(3),
  initial_delay_ms: z.number().int().min(0).default(250),
  max_delay_ms: z.number().int().min(0).default(5_000),
  backoff_factor: z.number().min(1).default(2),
});

export const ProfileSchema = z.object({
  profile_id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  variance_tolerance_pct: z.number().min(0).max(100).default(5),
  workspace_confidence_cap: z.number().min(0).max(0.5).default(0.5),
  default_key_confidence: ConfidenceSchema.default(0.9),
  email_alias_domains: z.record(z.string()).default({}),
  identifier_patterns: z.array(IdentifierPatternSchema).default([]),
  infer_rollover_on_drop: z.boolean().default(true),
  merge_retry: MergeRetrySchema.default({}),
  anomaly_thresholds: AnomalyThresholdSchema.default({}),
  version: z.string().default('1.0.0'),
});

export type IdentifierField = z.infer<typeof IdentifierFieldSchema>;
export type IdentifierPattern = z.infer<typeof IdentifierPatternSchema>;
export type AnomalyThreshold = z.infer<typeof AnomalyThresholdSchema>;
export type MergeRetry = z.infer<typeof MergeRetrySchema>;
export type Profile = z.infer<typeof ProfileSchema>;

// ============================================================================
// Run Metrics
// ============================================================================

export const RunMetricSchema = z.object({
  name: z.string().min(1),
  value: z.number().finite(),
  unit: z.enum(['count', 'ratio', 'minor_units', 'ms']),
  source_id: SourceIdSchema.optional(),
  labels: z.record(z.string()).default({}),
});

export const RunMetricsReportSchema = z.object({
  module_id: z.string(),
  schema_version: z.string(),
  run_id: z.string(),
  generated_at: TimestampSchema,
  metrics: z.array(RunMetricSchema),
});

export type RunMetric = z.infer<typeof RunMetricSchema>;
export type RunMetricsReport = z.infer<typeof RunMetricsReportSchema>;
