/**
 * Runner infrastructure, shared across all CLI commands.
 *
 * Re-exports the standard building blocks every command needs:
 * structured logging, artifact layout, error envelopes, redaction,
 * retry policies and canonical hashing.
 */

// Artifacts
export {
  createArtifactWriter,
  generateRunId,
  buildIdempotencyKey,
  type ArtifactWriter,
  type ArtifactSummary,
} from './artifacts.js';

// Logger
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  exitCodeForEnvelope,
  isErrorCode,
  createIssue,
  countIssues,
  isFatalIssue,
  PipelineError,
  ISSUE_CATEGORIES,
  EXIT_SUCCESS,
  EXIT_PARTIAL,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type RunnerErrorEnvelope,
  type ErrorCode,
  type IssueCategory,
  type RunIssue,
} from './errors.js';

// Redaction
export {
  redact,
  redactRecord,
  redactString,
  REDACT_DENYLIST_KEYS,
} from './redact.js';

// Retry
export {
  withRetry,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryResult,
  type RetryOptions,
} from './retry.js';

// Canonical hashing
export {
  canonicalizeJson,
  serializeCanonical,
  hashCanonical,
  shortHash,
} from './canonical.js';
