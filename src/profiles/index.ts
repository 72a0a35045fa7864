/**
 * Profile Management
 *
 * Provides the base and strict profiles holding attribution thresholds,
 * identifier patterns, merge retry policy and anomaly thresholds.
 */

import type { AnomalyThreshold, IdentifierPattern, MergeRetry, Profile } from '../contracts/index.js';
import { ProfileSchema } from '../contracts/index.js';
import { compilePatterns } from '../classify/index.js';
import type { RetryPolicy } from '../runner/retry.js';

// Default anomaly thresholds
const DEFAULT_ANOMALY_THRESHOLDS: AnomalyThreshold = {
  cost_spike_multiplier: 3,            // 3x trailing mean
  cost_spike_min_minor_units: 1000,    // $10
  cost_spike_lookback_days: 7,
  attribution_gap_threshold_pct: 20,
};

const DEFAULT_MERGE_RETRY: MergeRetry = {
  max_attempts: 3,
  initial_delay_ms: 250,
  max_delay_ms: 5_000,
  backoff_factor: 2,
};

const DEFAULT_IDENTIFIER_PATTERNS: IdentifierPattern[] = [
  { pattern: 'claude[-_ ]?code', platform: 'coding_agent', reliability: 0.8, fields: ['key_name', 'workspace_id'] },
  { pattern: 'cursor', platform: 'ide_assistant', reliability: 0.8, fields: ['key_name', 'workspace_id'] },
  { pattern: '(^|[-_ ])(chat|assistant|bot)([-_ ]|$)', platform: 'chat_app', reliability: 0.6, fields: ['key_name'] },
];

/**
 * Base profile - defaults suitable for most organizations
 */
export const baseProfile: Profile = {
  profile_id: 'base',
  name: 'Base Profile',
  description: 'Default attribution thresholds with 5% reconciliation tolerance',
  variance_tolerance_pct: 5,
  workspace_confidence_cap: 0.5,
  default_key_confidence: 0.9,
  email_alias_domains: {},
  identifier_patterns: DEFAULT_IDENTIFIER_PATTERNS,
  infer_rollover_on_drop: true,
  merge_retry: DEFAULT_MERGE_RETRY,
  anomaly_thresholds: DEFAULT_ANOMALY_THRESHOLDS,
  version: '1.0.0',
};

/**
 * Strict profile - tighter tolerance, weaker inference. A spend drop
 * inside a declared cycle is excluded as an anomaly, not taken as a rollover.
 */
export const strictProfile: Profile = {
  profile_id: 'strict',
  name: 'Strict Profile',
  description: 'Finance close: 2% tolerance, low workspace confidence, spend drops flagged, more retries',
  variance_tolerance_pct: 2,
  workspace_confidence_cap: 0.3,
  default_key_confidence: 0.8,
  email_alias_domains: {},
  identifier_patterns: DEFAULT_IDENTIFIER_PATTERNS.map((p) => ({ ...p, reliability: Math.min(p.reliability, 0.6) })),
  infer_rollover_on_drop: false,
  merge_retry: { ...DEFAULT_MERGE_RETRY, max_attempts: 5 },
  anomaly_thresholds: {
    ...DEFAULT_ANOMALY_THRESHOLDS,
    cost_spike_multiplier: 2,
    attribution_gap_threshold_pct: 10,
  },
  version: '1.0.0',
};

const PROFILES: Readonly<Record<string, Profile>> = {
  base: baseProfile,
  strict: strictProfile,
};

/**
 * Get profile by ID. Throws for unknown ids.
 */
export function getProfile(profileId: string): Profile {
  const profile = PROFILES[profileId];
  if (!profile) {
    throw new Error(`Unknown profile '${profileId}' (available: ${Object.keys(PROFILES).join(', ')})`);
  }
  return profile;
}

/**
 * List all available profiles
 */
export function listProfiles(): Profile[] {
  return Object.values(PROFILES);
}

export interface ProfileOverrides {
  variance_tolerance_pct?: number;
  workspace_confidence_cap?: number;
  default_key_confidence?: number;
  email_alias_domains?: Record<string, string>;
  identifier_patterns?: IdentifierPattern[];
  infer_rollover_on_drop?: boolean;
  merge_retry?: Partial<MergeRetry>;
  anomaly_thresholds?: Partial<AnomalyThreshold>;
}

/**
 * Validate a profile configuration, including its identifier patterns
 */
export function validateProfile(profile: unknown): { valid: boolean; errors: string[] } {
  const result = ProfileSchema.safeParse(profile);

  if (!result.success) {
    return {
      valid: false,
      errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    };
  }

  try {
    compilePatterns(result.data.identifier_patterns);
  } catch (err) {
    return { valid: false, errors: [err instanceof Error ? err.message : String(err)] };
  }

  return { valid: true, errors: [] };
}

/**
 * Merge per-run overrides onto a profile and validate the result
 */
export function mergeProfileWithOverrides(profile: Profile, overrides: ProfileOverrides): Profile {
  const merged = {
    ...profile,
    variance_tolerance_pct: overrides.variance_tolerance_pct ?? profile.variance_tolerance_pct,
    workspace_confidence_cap: overrides.workspace_confidence_cap ?? profile.workspace_confidence_cap,
    default_key_confidence: overrides.default_key_confidence ?? profile.default_key_confidence,
    identifier_patterns: overrides.identifier_patterns ?? profile.identifier_patterns,
    infer_rollover_on_drop: overrides.infer_rollover_on_drop ?? profile.infer_rollover_on_drop,
    email_alias_domains: {
      ...profile.email_alias_domains,
      ...overrides.email_alias_domains,
    },
    merge_retry: {
      ...profile.merge_retry,
      ...overrides.merge_retry,
    },
    anomaly_thresholds: {
      ...profile.anomaly_thresholds,
      ...overrides.anomaly_thresholds,
    },
  };

  const { valid, errors } = validateProfile(merged);
  if (!valid) {
    throw new Error(`Merged profile validation failed: ${errors.join(', ')}`);
  }

  return ProfileSchema.parse(merged);
}

export function retryPolicyOf(profile: Profile): RetryPolicy {
  return {
    maxAttempts: profile.merge_retry.max_attempts,
    initialDelayMs: profile.merge_retry.initial_delay_ms,
    maxDelayMs: profile.merge_retry.max_delay_ms,
    backoffFactor: profile.merge_retry.backoff_factor,
  };
}

/**
 * Serialize profile to JSON
 */
export function serializeProfile(profile: Profile): string {
  return JSON.stringify(profile, null, 2);
}
