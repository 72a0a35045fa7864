/**
 * Identity resolution
 *
 * Attributes a record to a canonical user (lower-cased email or
 * `team:<name>`) using, in order: a direct email hint, the API key
 * mapping, then workspace inference. Resolution never throws; anything
 * it cannot attribute is `unattributed` with confidence 0.
 */

import type {
  AttributionMethod,
  IdentityMappingSnapshot,
  KeyMappingEntry,
  PlatformCategory,
  Profile,
  RawRecord,
  ResolvedIdentity,
  WorkspaceMappingEntry,
} from '../contracts/index.js';
import { IdentityMappingSnapshotSchema, UNATTRIBUTED } from '../contracts/index.js';

/** Workspace inference never claims more than this, whatever the profile says. */
export const MAX_WORKSPACE_CONFIDENCE = 0.5;

export interface IdentityMappingView {
  readonly version: string;
  readonly keysById: ReadonlyMap<string, KeyMappingEntry>;
  readonly keysByName: ReadonlyMap<string, KeyMappingEntry>;
  readonly workspaces: ReadonlyMap<string, WorkspaceMappingEntry>;
}

export interface IdentityOptions {
  /** Maps alias domains to their canonical domain, e.g. `{ "corp.example.com": "example.com" }`. */
  aliasDomains?: Readonly<Record<string, string>>;
  workspaceConfidenceCap?: number;
  defaultKeyConfidence?: number;
}

export interface AttributionSummary {
  total_records: number;
  attributed_records: number;
  attribution_rate: number;
  by_method: Record<AttributionMethod, number>;
  unmapped_key_ids: string[];
  unmapped_workspace_ids: string[];
  recommendations: string[];
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function identityOptionsFromProfile(profile: Profile): IdentityOptions {
  return {
    aliasDomains: profile.email_alias_domains,
    workspaceConfidenceCap: profile.workspace_confidence_cap,
    defaultKeyConfidence: profile.default_key_confidence,
  };
}

/**
 * Trim, lower-case and collapse alias domains. Returns null for anything
 * that is not a plausible email address.
 */
export function normalizeEmail(
  raw: string,
  aliasDomains: Readonly<Record<string, string>> = {},
): string | null {
  const email = raw.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(email)) return null;
  const at = email.lastIndexOf('@');
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  const canonical = aliasDomains[domain];
  return canonical ? `${local}@${canonical.toLowerCase()}` : email;
}

/**
 * Validate a raw mapping snapshot (as read from disk).
 */
export function parseIdentityMapping(raw: unknown): IdentityMappingSnapshot {
  const result = IdentityMappingSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid identity mapping: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
    );
  }
  return result.data;
}

export function createIdentityMappingView(snapshot: IdentityMappingSnapshot): IdentityMappingView {
  const keysById = new Map<string, KeyMappingEntry>();
  const keysByName = new Map<string, KeyMappingEntry>();
  const workspaces = new Map<string, WorkspaceMappingEntry>();

  for (const entry of snapshot.keys) {
    keysById.set(entry.opaque_key_id, entry);
    if (entry.key_name) keysByName.set(entry.key_name, entry);
  }
  for (const entry of snapshot.workspaces) {
    workspaces.set(entry.workspace_id, entry);
  }

  return { version: snapshot.version, keysById, keysByName, workspaces };
}

export const EMPTY_MAPPING_VIEW: IdentityMappingView = createIdentityMappingView({
  version: 'empty',
  keys: [],
  workspaces: [],
});

/** Mapping entry for the key hints on a record, by key id first and key name second. */
export function lookupKey(record: RawRecord, mapping: IdentityMappingView): KeyMappingEntry | undefined {
  const { opaque_key_id: keyId, key_name: keyName } = record.identity_hints;
  if (keyId) {
    const byId = mapping.keysById.get(keyId);
    if (byId) return byId;
  }
  if (keyName) return mapping.keysByName.get(keyName);
  return undefined;
}

/** Platform recorded on the mapping entry that attributed the record, if any. */
export function mappedPlatform(
  record: RawRecord,
  identity: ResolvedIdentity,
  mapping: IdentityMappingView,
): PlatformCategory | undefined {
  if (identity.method === 'key_mapping') return lookupKey(record, mapping)?.platform;
  if (identity.method === 'workspace_inference' && record.identity_hints.workspace_id) {
    return mapping.workspaces.get(record.identity_hints.workspace_id)?.platform;
  }
  return undefined;
}

function unresolved(warnings: string[]): ResolvedIdentity {
  return { canonical_user_id: UNATTRIBUTED, confidence: 0, method: 'unresolved', warnings };
}

/**
 * Resolve the canonical user for one record.
 */
export function resolve(
  record: RawRecord,
  mapping: IdentityMappingView,
  options: IdentityOptions = {},
): ResolvedIdentity {
  const aliases = options.aliasDomains ?? {};
  const hints = record.identity_hints;
  const warnings: string[] = [];

  if (hints.email != null) {
    const email = normalizeEmail(hints.email, aliases);
    if (email) {
      return { canonical_user_id: email, confidence: 1, method: 'direct_email', warnings };
    }
    warnings.push('email hint is not a valid address; ignored');
  }

  const keyEntry = lookupKey(record, mapping);
  if (keyEntry) {
    const email = normalizeEmail(keyEntry.user_email, aliases);
    if (email) {
      return {
        canonical_user_id: email,
        confidence: keyEntry.confidence ?? options.defaultKeyConfidence ?? 0.9,
        method: 'key_mapping',
        warnings,
      };
    }
    warnings.push(`key mapping for '${keyEntry.opaque_key_id}' has an invalid user_email`);
  } else if (hints.opaque_key_id || hints.key_name) {
    warnings.push(`key '${hints.opaque_key_id ?? hints.key_name}' not in mapping ${mapping.version}`);
  }

  const workspaceId = hints.workspace_id;
  const workspaceEntry = workspaceId ? mapping.workspaces.get(workspaceId) : undefined;
  if (workspaceEntry) {
    const email = workspaceEntry.user_email ? normalizeEmail(workspaceEntry.user_email, aliases) : null;
    const userId = email ?? (workspaceEntry.team ? `team:${workspaceEntry.team}` : null);
    if (userId) {
      const cap = Math.min(options.workspaceConfidenceCap ?? MAX_WORKSPACE_CONFIDENCE, MAX_WORKSPACE_CONFIDENCE);
      return {
        canonical_user_id: userId,
        confidence: Math.min(workspaceEntry.confidence, cap),
        method: 'workspace_inference',
        warnings,
      };
    }
    warnings.push(`workspace mapping for '${workspaceEntry.workspace_id}' has no usable user or team`);
  }

  return unresolved(warnings);
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Summarize attribution quality over aligned identity/record lists.
 */
export function summarizeAttribution(
  identities: readonly ResolvedIdentity[],
  records: readonly RawRecord[],
): AttributionSummary {
  if (identities.length !== records.length) {
    throw new Error(`summarizeAttribution: ${identities.length} identities for ${records.length} records`);
  }

  const byMethod: Record<AttributionMethod, number> = {
    direct_email: 0,
    key_mapping: 0,
    workspace_inference: 0,
    unresolved: 0,
  };
  const unmappedKeys = new Set<string>();
  const unmappedWorkspaces = new Set<string>();

  identities.forEach((identity, i) => {
    byMethod[identity.method] += 1;
    if (identity.method === 'direct_email' || identity.method === 'key_mapping') return;
    const hints = records[i].identity_hints;
    const key = hints.opaque_key_id ?? hints.key_name;
    if (key) unmappedKeys.add(key);
    if (identity.method === 'unresolved' && hints.workspace_id) unmappedWorkspaces.add(hints.workspace_id);
  });

  const total = identities.length;
  const attributed = total - byMethod.unresolved;
  const rate = total === 0 ? 1 : round4(attributed / total);

  const recommendations: string[] = [];
  if (unmappedKeys.size > 0) {
    recommendations.push(`Add ${unmappedKeys.size} unmapped API key(s) to the identity mapping`);
  }
  if (byMethod.workspace_inference > 0) {
    recommendations.push(
      `${byMethod.workspace_inference} record(s) attributed by workspace inference only; map their keys directly`,
    );
  }
  if (rate < 0.8) {
    recommendations.push(`Attribution rate ${round4(rate * 100)}% is below 80%`);
  }

  return {
    total_records: total,
    attributed_records: attributed,
    attribution_rate: rate,
    by_method: byMethod,
    unmapped_key_ids: [...unmappedKeys].sort(),
    unmapped_workspace_ids: [...unmappedWorkspaces].sort(),
    recommendations,
  };
}
