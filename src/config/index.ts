/**
 * Run configuration
 *
 * A run is described by one JSON file: profile, store directory,
 * identity mapping, ground truth and the source responses to ingest.
 * Relative paths resolve against the config file's directory.
 * Environment variables override the store directory, profile and log
 * level.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { z } from 'zod';
import type { FetchWindow, GroundTruthTotal, Profile, SourceId } from '../contracts/index.js';
import {
  AnomalyThresholdSchema,
  ConfidenceSchema,
  FetchWindowSchema,
  IdentifierPatternSchema,
  MergeRetrySchema,
  SourceIdSchema,
} from '../contracts/index.js';
import {
  createIdentityMappingView,
  EMPTY_MAPPING_VIEW,
  parseIdentityMapping,
  type IdentityMappingView,
} from '../identity/index.js';
import { getProfile, mergeProfileWithOverrides } from '../profiles/index.js';
import { parseGroundTruth } from '../reconcile/index.js';
import { PipelineError } from '../runner/errors.js';
import { isLogLevel, type LogLevel } from '../runner/logger.js';
import { safeJsonParse, validateSafePath } from '../security/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const ProfileOverridesSchema = z
  .object({
    variance_tolerance_pct: z.number().min(0).max(100).optional(),
    workspace_confidence_cap: z.number().min(0).max(0.5).optional(),
    default_key_confidence: ConfidenceSchema.optional(),
    email_alias_domains: z.record(z.string()).optional(),
    identifier_patterns: z.array(IdentifierPatternSchema).optional(),
    infer_rollover_on_drop: z.boolean().optional(),
    merge_retry: MergeRetrySchema.partial().optional(),
    anomaly_thresholds: AnomalyThresholdSchema.partial().optional(),
  })
  .strict();

export const SourceConfigSchema = z
  .object({
    source_id: SourceIdSchema,
    fetch_window: FetchWindowSchema,
    response_path: z.string().min(1).optional(),
    /** Terminal adapter error reported instead of a response. */
    error: z.string().min(1).optional(),
  })
  .refine((s) => (s.response_path === undefined) !== (s.error === undefined), {
    message: 'exactly one of response_path or error is required',
  });

export const RunConfigSchema = z.object({
  profile: z.string().min(1).default('base'),
  profile_overrides: ProfileOverridesSchema.optional(),
  store_dir: z.string().min(1).default('.attribution-store'),
  artifacts_dir: z.string().min(1).default('.'),
  identity_mapping_path: z.string().min(1).optional(),
  ground_truth_path: z.string().min(1).optional(),
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  sources: z.array(SourceConfigSchema).min(1),
});

export type ProfileOverridesInput = z.infer<typeof ProfileOverridesSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;

export interface ResolvedRunConfig {
  config_path: string;
  profile: Profile;
  store_dir: string;
  artifacts_dir: string;
  identity_mapping_path?: string;
  ground_truth_path?: string;
  log_level: LogLevel;
  sources: SourceConfig[];
}

/** What a source adapter handed over: a response body or a terminal error. */
export interface SourceInput {
  source_id: SourceId;
  fetch_window: FetchWindow;
  response?: unknown;
  error?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and parse a JSON file. Missing files are NOT_FOUND, malformed
 * JSON is a VALIDATION_ERROR.
 */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new PipelineError('NOT_FOUND', `File not found: ${path}`, { path });
  }
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new PipelineError('IO_ERROR', `Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = safeJsonParse(content);
  if (!parsed.success) {
    throw new PipelineError('VALIDATION_ERROR', `${path}: ${parsed.error ?? 'invalid JSON'}`, { path });
  }
  return parsed.data;
}

function resolveConfigPath(baseDir: string, field: string, value: string): string {
  const check = validateSafePath(value);
  if (!check.valid) {
    throw new PipelineError('SECURITY_ERROR', `${field}: ${check.error ?? 'unsafe path'}`, { field });
  }
  return resolve(baseDir, value);
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Validate a raw config object and resolve it against `configPath`.
 */
export function resolveRunConfig(raw: unknown, configPath: string, env: Env = process.env): ResolvedRunConfig {
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new PipelineError('SCHEMA_ERROR', `Invalid run config: ${formatIssues(result.error)}`);
  }
  const config = result.data;
  const baseDir = dirname(resolve(configPath));

  const profileId = env.ATTRIBUTION_PROFILE || config.profile;
  let profile: Profile;
  try {
    profile = mergeProfileWithOverrides(getProfile(profileId), config.profile_overrides ?? {});
  } catch (err) {
    throw new PipelineError('VALIDATION_ERROR', err instanceof Error ? err.message : String(err));
  }

  const envLevel = env.ATTRIBUTION_LOG_LEVEL;
  if (envLevel && !isLogLevel(envLevel)) {
    throw new PipelineError('VALIDATION_ERROR', `ATTRIBUTION_LOG_LEVEL: unknown level '${envLevel}'`);
  }
  const logLevel: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : config.log_level ?? 'info';

  const envStore = env.ATTRIBUTION_STORE_DIR;
  const storeDir = envStore
    ? resolve(envStore)
    : resolveConfigPath(baseDir, 'store_dir', config.store_dir);

  return {
    config_path: resolve(configPath),
    profile,
    store_dir: storeDir,
    artifacts_dir: resolveConfigPath(baseDir, 'artifacts_dir', config.artifacts_dir),
    identity_mapping_path: config.identity_mapping_path
      ? resolveConfigPath(baseDir, 'identity_mapping_path', config.identity_mapping_path)
      : undefined,
    ground_truth_path: config.ground_truth_path
      ? resolveConfigPath(baseDir, 'ground_truth_path', config.ground_truth_path)
      : undefined,
    log_level: logLevel,
    sources: config.sources.map((source, i) => ({
      ...source,
      ...(source.response_path && {
        response_path: resolveConfigPath(baseDir, `sources.${i}.response_path`, source.response_path),
      }),
    })),
  };
}

export function loadRunConfig(configPath: string, env: Env = process.env): ResolvedRunConfig {
  return resolveRunConfig(readJsonFile(configPath), configPath, env);
}

/**
 * Load each configured source response. A response that cannot be read
 * or parsed fails only its own source.
 */
export function loadSourceInputs(sources: readonly SourceConfig[]): SourceInput[] {
  return sources.map((source): SourceInput => {
    const base = { source_id: source.source_id, fetch_window: source.fetch_window };
    if (source.error !== undefined || source.response_path === undefined) {
      return { ...base, error: source.error ?? 'no response' };
    }
    try {
      return { ...base, response: readJsonFile(source.response_path) };
    } catch (err) {
      return { ...base, error: err instanceof Error ? err.message : String(err) };
    }
  });
}

export function loadIdentityMapping(path?: string): IdentityMappingView {
  if (!path) return EMPTY_MAPPING_VIEW;
  try {
    return createIdentityMappingView(parseIdentityMapping(readJsonFile(path)));
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new PipelineError('SCHEMA_ERROR', err instanceof Error ? err.message : String(err), { path });
  }
}

export function loadGroundTruth(path?: string): GroundTruthTotal[] {
  if (!path) return [];
  try {
    return parseGroundTruth(readJsonFile(path));
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new PipelineError('SCHEMA_ERROR', err instanceof Error ? err.message : String(err), { path });
  }
}

/** Absolute paths pass through; relative ones resolve against `cwd`. */
export function resolveCliPath(value: string, cwd: string = process.cwd()): string {
  return isAbsolute(value) ? value : resolve(cwd, value);
}
