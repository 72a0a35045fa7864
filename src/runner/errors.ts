/**
 * Shared error envelope for all pipeline commands.
 *
 * Every error that reaches the user goes through this envelope so CLI,
 * logs, and artifact files always have the same shape.
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_PARTIAL = 1;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Error envelope --------------------------------------------------

export interface RunnerErrorEnvelope {
  code: string;
  message: string;
  userMessage: string;
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'SCHEMA_ERROR'
  | 'IO_ERROR'
  | 'SECURITY_ERROR'
  | 'NOT_FOUND'
  | 'MERGE_CONFLICT'
  | 'STORAGE_UNAVAILABLE'
  | 'ABORTED'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  VALIDATION_ERROR: EXIT_VALIDATION,
  SCHEMA_ERROR: EXIT_VALIDATION,
  IO_ERROR: EXIT_DEPENDENCY,
  SECURITY_ERROR: EXIT_VALIDATION,
  NOT_FOUND: EXIT_VALIDATION,
  MERGE_CONFLICT: EXIT_DEPENDENCY,
  STORAGE_UNAVAILABLE: EXIT_DEPENDENCY,
  ABORTED: EXIT_DEPENDENCY,
  INTERNAL_ERROR: EXIT_BUG,
};

const NON_RETRYABLE = new Set<ErrorCode>([
  'VALIDATION_ERROR',
  'SCHEMA_ERROR',
  'SECURITY_ERROR',
  'NOT_FOUND',
]);

export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(CODE_TO_EXIT, value);
}

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

/** Exit code for an envelope; unknown codes count as bugs. */
export function exitCodeForEnvelope(envelope: RunnerErrorEnvelope): number {
  return isErrorCode(envelope.code) ? exitCodeFor(envelope.code) : EXIT_BUG;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    retryable: !NON_RETRYABLE.has(code),
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/**
 * Error carrying a runner code, thrown by stages that know how the
 * failure should be classified.
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof PipelineError) {
    return createErrorEnvelope(err.code, err.message, { cause: err, context: err.context });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}

// ---- Run issues ------------------------------------------------------

/** Non-fatal (and the two fatal) issue categories surfaced in a run summary. */
export type IssueCategory =
  | 'SOURCE_UNPARSEABLE'
  | 'SOURCE_UNAVAILABLE'
  | 'IDENTITY_UNRESOLVED'
  | 'CYCLE_BOUNDARY_ANOMALY'
  | 'MERGE_CONFLICT'
  | 'STORAGE_UNAVAILABLE'
  | 'RECONCILIATION_VARIANCE';

export const ISSUE_CATEGORIES: readonly IssueCategory[] = [
  'SOURCE_UNPARSEABLE',
  'SOURCE_UNAVAILABLE',
  'IDENTITY_UNRESOLVED',
  'CYCLE_BOUNDARY_ANOMALY',
  'MERGE_CONFLICT',
  'STORAGE_UNAVAILABLE',
  'RECONCILIATION_VARIANCE',
];

const FATAL_ISSUES = new Set<IssueCategory>(['MERGE_CONFLICT', 'STORAGE_UNAVAILABLE']);

export interface RunIssue {
  category: IssueCategory;
  message: string;
  source_id?: string;
  context?: Record<string, unknown>;
}

export function isFatalIssue(category: IssueCategory): boolean {
  return FATAL_ISSUES.has(category);
}

export function createIssue(
  category: IssueCategory,
  message: string,
  opts: { sourceId?: string; context?: Record<string, unknown> } = {},
): RunIssue {
  return {
    category,
    message: redactString(message),
    ...(opts.sourceId && { source_id: opts.sourceId }),
    ...(opts.context && { context: opts.context }),
  };
}

export function countIssues(issues: readonly RunIssue[]): Record<IssueCategory, number> {
  const counts: Record<IssueCategory, number> = {
    SOURCE_UNPARSEABLE: 0,
    SOURCE_UNAVAILABLE: 0,
    IDENTITY_UNRESOLVED: 0,
    CYCLE_BOUNDARY_ANOMALY: 0,
    MERGE_CONFLICT: 0,
    STORAGE_UNAVAILABLE: 0,
    RECONCILIATION_VARIANCE: 0,
  };
  for (const issue of issues) counts[issue.category] += 1;
  return counts;
}
