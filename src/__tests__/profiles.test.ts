import { describe, expect, it } from 'vitest';
import {
  baseProfile,
  getProfile,
  listProfiles,
  mergeProfileWithOverrides,
  retryPolicyOf,
  serializeProfile,
  strictProfile,
  validateProfile,
} from '../profiles/index.js';

describe('Profiles', () => {
  describe('getProfile', () => {
    it('returns the built-in profiles', () => {
      expect(getProfile('base')).toBe(baseProfile);
      expect(getProfile('strict')).toBe(strictProfile);
      expect(listProfiles().map((p) => p.profile_id)).toEqual(['base', 'strict']);
    });

    it('throws for an unknown id', () => {
      expect(() => getProfile('lenient')).toThrow("Unknown profile 'lenient' (available: base, strict)");
    });
  });

  describe('validateProfile', () => {
    it('accepts both built-in profiles', () => {
      for (const profile of listProfiles()) {
        expect(validateProfile(profile)).toEqual({ valid: true, errors: [] });
      }
    });

    it('rejects a workspace cap above 0.5', () => {
      const result = validateProfile({ ...baseProfile, workspace_confidence_cap: 0.7 });
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['workspace_confidence_cap: Number must be less than or equal to 0.5']);
    });

    it('rejects identifier patterns that do not compile', () => {
      const result = validateProfile({
        ...baseProfile,
        identifier_patterns: [{ pattern: '[', platform: 'chat_app', reliability: 0.5, fields: ['key_name'] }],
      });
      expect(result.valid).toBe(false);
      expect(result.errors[0]).toMatch(/^Invalid identifier pattern '\['/);
    });
  });

  describe('mergeProfileWithOverrides', () => {
    it('overrides scalars and merges nested sections', () => {
      const merged = mergeProfileWithOverrides(baseProfile, {
        variance_tolerance_pct: 1.5,
        email_alias_domains: { 'corp.example.com': 'example.com' },
        merge_retry: { max_attempts: 6 },
        anomaly_thresholds: { cost_spike_multiplier: 4 },
      });
      expect(merged.variance_tolerance_pct).toBe(1.5);
      expect(merged.email_alias_domains).toEqual({ 'corp.example.com': 'example.com' });
      expect(merged.merge_retry).toEqual({ max_attempts: 6, initial_delay_ms: 250, max_delay_ms: 5_000, backoff_factor: 2 });
      expect(merged.anomaly_thresholds.cost_spike_multiplier).toBe(4);
      expect(merged.anomaly_thresholds.cost_spike_lookback_days).toBe(7);
      expect(baseProfile.variance_tolerance_pct).toBe(5);
    });

    it('throws when the result is invalid', () => {
      expect(() => mergeProfileWithOverrides(baseProfile, { default_key_confidence: 2 })).toThrow(
        'Merged profile validation failed: default_key_confidence: Number must be less than or equal to 1',
      );
    });
  });

  it('infers rollovers from spend drops except under the strict profile', () => {
    expect(baseProfile.infer_rollover_on_drop).toBe(true);
    expect(strictProfile.infer_rollover_on_drop).toBe(false);
    expect(mergeProfileWithOverrides(baseProfile, { infer_rollover_on_drop: false }).infer_rollover_on_drop).toBe(false);
  });

  it('maps the merge retry section onto a retry policy', () => {
    expect(retryPolicyOf(strictProfile)).toEqual({
      maxAttempts: 5,
      initialDelayMs: 250,
      maxDelayMs: 5_000,
      backoffFactor: 2,
    });
  });

  it('serializes to JSON that parses back to the same profile', () => {
    expect(JSON.parse(serializeProfile(strictProfile))).toEqual(strictProfile);
  });
});
