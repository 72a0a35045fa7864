/**
 * Health and capability metadata
 *
 * Provides:
 * - Self-check results for the `health` command
 * - Capability metadata: supported sources, issue categories, exit codes
 */

import { supportedSources } from '../normalize/index.js';
import { listProfiles, validateProfile } from '../profiles/index.js';
import {
  EXIT_BUG,
  EXIT_DEPENDENCY,
  EXIT_PARTIAL,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  ISSUE_CATEGORIES,
  isFatalIssue,
  type IssueCategory,
} from '../runner/errors.js';

export const MODULE_ID = 'usage-attribution';
export const MODULE_VERSION = '0.1.0';
export const SCHEMA_VERSION = '1.0.0';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  module_id: string;
  module_version: string;
  timestamp: string;
  checks: {
    profiles: boolean;
    parsers: boolean;
  };
  errors: string[];
  capabilities: string[];
}

export interface CapabilityMetadata {
  module_id: string;
  module_version: string;
  schema_version: string;
  commands: string[];
  sources: string[];
  profiles: string[];
  issue_categories: Array<{ category: IssueCategory; fatal: boolean }>;
  exit_codes: Record<string, number>;
  features: string[];
}

const COMMANDS = ['run', 'normalize', 'reconcile', 'backfill', 'health'];

/**
 * Returns health status for the module
 */
export function getHealthStatus(now: Date = new Date()): HealthStatus {
  const errors: string[] = [];

  for (const profile of listProfiles()) {
    const { valid, errors: profileErrors } = validateProfile(profile);
    if (!valid) errors.push(...profileErrors.map((e) => `profile ${profile.profile_id}: ${e}`));
  }
  const profilesOk = errors.length === 0;

  const sources = supportedSources();
  const parsersOk = sources.length > 0;
  if (!parsersOk) errors.push('no source parsers registered');

  return {
    status: profilesOk && parsersOk ? 'healthy' : profilesOk || parsersOk ? 'degraded' : 'unhealthy',
    module_id: MODULE_ID,
    module_version: MODULE_VERSION,
    timestamp: now.toISOString(),
    checks: {
      profiles: profilesOk,
      parsers: parsersOk,
    },
    errors,
    capabilities: [
      'source_normalize',
      'identity_resolve',
      'platform_classify',
      'billing_delta',
      'fact_merge',
      'cost_reconcile',
      'anomaly_detect',
    ],
  };
}

/**
 * Returns capability metadata for discovery
 */
export function getCapabilityMetadata(): CapabilityMetadata {
  return {
    module_id: MODULE_ID,
    module_version: MODULE_VERSION,
    schema_version: SCHEMA_VERSION,
    commands: COMMANDS,
    sources: supportedSources(),
    profiles: listProfiles().map((p) => p.profile_id),
    issue_categories: ISSUE_CATEGORIES.map((category) => ({ category, fatal: isFatalIssue(category) })),
    exit_codes: {
      success: EXIT_SUCCESS,
      partial: EXIT_PARTIAL,
      validation: EXIT_VALIDATION,
      dependency: EXIT_DEPENDENCY,
      bug: EXIT_BUG,
    },
    features: [
      'deterministic_output',
      'canonical_hashing',
      'idempotent_upsert',
      'profile_based_thresholds',
    ],
  };
}

/**
 * Validates if a source id has a registered parser
 */
export function isSupportedSource(sourceId: string): boolean {
  return supportedSources().includes(sourceId);
}
