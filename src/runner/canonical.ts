/**
 * Stable JSON canonicalization.
 *
 * Object keys are sorted recursively so two values that differ only in
 * key order serialize and hash identically. Fact equality, natural-key
 * digests and report hashes all go through here.
 */

import { createHash } from 'crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function canonicalizeJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalizeJson(item));
  }

  if (isPlainObject(value)) {
    const sortedKeys = Object.keys(value).sort();
    const result: Record<string, unknown> = {};
    for (const key of sortedKeys) {
      if (value[key] === undefined) continue;
      result[key] = canonicalizeJson(value[key]);
    }
    return result;
  }

  return value;
}

export function serializeCanonical(value: unknown, space = 2): string {
  return JSON.stringify(canonicalizeJson(value), null, space);
}

export function hashCanonical(value: unknown): string {
  const canonical = JSON.stringify(canonicalizeJson(value));
  return createHash('sha256').update(canonical).digest('hex');
}

/** Short, file-safe id derived from a canonical hash. */
export function shortHash(value: unknown, length = 16): string {
  return hashCanonical(value).slice(0, length);
}
