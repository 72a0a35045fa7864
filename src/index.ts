/**
 * Usage & Cost Attribution
 *
 * Daily batch pipeline that turns vendor usage and billing exports into
 * per-person usage and cost facts, reconciles them against invoice
 * totals and flags anomalies.
 *
 * Boundary Statement:
 * - No HTTP clients; source adapters hand over response bodies
 * - Single organization scope
 * - The fact merger is the only writer of persistent state
 * - No secrets storage - all inputs via files
 */

// Contracts
export {
  SourceIdSchema,
  TimestampSchema,
  FactDateSchema,
  CurrencySchema,
  ConfidenceSchema,
  FetchWindowSchema,
  RawRecordSchema,
  ResolvedIdentitySchema,
  PlatformCategorySchema,
  IdentityMappingSnapshotSchema,
  ClassifiedRecordSchema,
  UsageFactSchema,
  CostFactSchema,
  FactSchema,
  CumulativeObservationSchema,
  GroundTruthTotalSchema,
  GroundTruthFileSchema,
  ReconciliationReportSchema,
  AnomalySchema,
  AnomalyTypeSchema,
  AnomalySeveritySchema,
  ProfileSchema,
  RunMetricSchema,
  RunMetricsReportSchema,
  UNATTRIBUTED,
} from './contracts/index.js';

export type {
  SourceId,
  FactDate,
  FetchWindow,
  RecordKind,
  IdentityHints,
  RawRecord,
  AttributionMethod,
  ResolvedIdentity,
  PlatformCategory,
  KeyMappingEntry,
  WorkspaceMappingEntry,
  IdentityMappingSnapshot,
  ClassificationRule,
  ClassifiedRecord,
  ReconciliationStatus,
  UsageFact,
  CostFact,
  Fact,
  CumulativeObservation,
  GroundTruthTotal,
  ReconciliationReport,
  Anomaly,
  AnomalyType,
  AnomalySeverity,
  Profile,
  RunMetric,
  RunMetricsReport,
} from './contracts/index.js';

// Source normalization
export {
  normalize,
  summarizeNormalization,
  createParserRegistry,
  supportedSources,
  BUILTIN_PARSERS,
} from './normalize/index.js';

export type { NormalizeStats, ParserRegistry, SourceParser, ParseContext } from './normalize/index.js';

// Identity
export {
  resolve,
  summarizeAttribution,
  parseIdentityMapping,
  createIdentityMappingView,
  normalizeEmail,
  EMPTY_MAPPING_VIEW,
} from './identity/index.js';

export type { IdentityMappingView, IdentityOptions, AttributionSummary } from './identity/index.js';

// Classification
export { classify, classifyRecord, compilePatterns } from './classify/index.js';

export type { ClassificationResult, ClassifyOptions } from './classify/index.js';

// Billing deltas
export { toDeltas, normalizeCumulative, selectBaselines, entityKeyOf } from './billing-delta/index.js';

export type { CycleBoundaryEvent, CycleBoundaryAnomaly, DeltaResult } from './billing-delta/index.js';

// Facts
export { buildFacts, buildFactBatches, naturalKeyOf, dimensionDiscriminator } from './facts/index.js';

export type { BuildFactsResult } from './facts/index.js';

// Merge
export {
  factIdOf,
  FactMerger,
  InMemoryFactStore,
  JsonFileFactStore,
  MergeConflictError,
  StorageUnavailableError,
} from './merge/index.js';

export type { FactStore, FactQuery, DateRange, ReplacedFact, UpsertResult } from './merge/index.js';

// Reconciliation
export {
  reconcile,
  reconcileAll,
  parseGroundTruth,
  variancePercent,
  withoutSupersededEstimates,
} from './reconcile/index.js';

// Anomalies
export { detectAnomalies } from './anomalies/index.js';

export type { AnomalyOptions, AnomalyResult } from './anomalies/index.js';

// Profiles
export {
  baseProfile,
  strictProfile,
  getProfile,
  listProfiles,
  validateProfile,
  mergeProfileWithOverrides,
} from './profiles/index.js';

// Config
export {
  loadRunConfig,
  resolveRunConfig,
  loadSourceInputs,
  loadIdentityMapping,
  loadGroundTruth,
  RunConfigSchema,
} from './config/index.js';

export type { RunConfig, ResolvedRunConfig, SourceInput } from './config/index.js';

// Pipeline
export { runPipeline, exitCodeForStatus } from './pipeline/index.js';

export type { PipelineInputs, PipelineDeps, RunSummary, SourceOutcome, RunStatus } from './pipeline/index.js';

// Health
export { getHealthStatus, getCapabilityMetadata, isSupportedSource } from './health/index.js';

// Metrics
export { buildRunMetricsReport, metric } from './metrics/index.js';

// Runner
export {
  createLogger,
  createArtifactWriter,
  PipelineError,
  wrapError,
  type StructuredLogger,
  type ArtifactWriter,
  type RunIssue,
  type IssueCategory,
} from './runner/index.js';
