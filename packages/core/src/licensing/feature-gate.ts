/**
 * Feature Gate
 *
 * Turns a license verification outcome into the immutable set of features
 * the rest of the tool may use, and provides the guards the CLI calls
 * before running a gated mode.
 */

import type {
  Feature,
  FeatureCheckResult,
  LicenseOutcome,
  LicenseTier,
} from './types.js';
import { FEATURE_TIERS, TIER_HIERARCHY } from './types.js';

// =============================================================================
// Feature Set
// =============================================================================

/**
 * Entitlements for the lifetime of the process
 */
export class FeatureSet {
  readonly tier: LicenseTier;
  private readonly features: ReadonlySet<Feature>;

  constructor(tier: LicenseTier) {
    const level = TIER_HIERARCHY[tier];
    this.tier = tier;
    this.features = new Set(
      (Object.keys(FEATURE_TIERS) as Feature[]).filter(
        (feature) => TIER_HIERARCHY[FEATURE_TIERS[feature]] <= level
      )
    );
    Object.freeze(this);
  }

  has(feature: Feature): boolean {
    return this.features.has(feature);
  }

  list(): Feature[] {
    return [...this.features];
  }
}

/**
 * Map a verification outcome to the features it unlocks.
 *
 * Free features are always present; paid ones need a `valid` outcome (or
 * the debug-only `dev-override`).
 */
export function resolveFeatures(outcome: LicenseOutcome): FeatureSet {
  switch (outcome.status) {
    case 'valid':
    case 'dev-override':
      return new FeatureSet('pro');
    case 'missing':
    case 'invalid':
      return new FeatureSet('free');
  }
}

/**
 * Human-readable explanation of an outcome
 */
export function describeOutcome(outcome: LicenseOutcome): string {
  switch (outcome.status) {
    case 'valid':
      return `Licensed to ${outcome.license.email} (${outcome.license.plan})`;
    case 'dev-override':
      return 'Development license override (debug build)';
    case 'missing':
      return `No license file at ${outcome.path} (free mode)`;
    case 'invalid':
      return `${outcome.message} (free mode)`;
  }
}

// =============================================================================
// Guards
// =============================================================================

export class FeatureNotLicensedError extends Error {
  readonly feature: Feature;
  readonly requiredTier: LicenseTier;
  readonly currentTier: LicenseTier;

  constructor(check: FeatureCheckResult) {
    super(check.message);
    this.name = 'FeatureNotLicensedError';
    this.feature = check.feature;
    this.requiredTier = check.requiredTier;
    this.currentTier = check.currentTier;
  }
}

/**
 * Check if a feature is available (non-throwing)
 */
export function checkFeature(features: FeatureSet, feature: Feature): FeatureCheckResult {
  const allowed = features.has(feature);
  const requiredTier = FEATURE_TIERS[feature];

  return {
    allowed,
    feature,
    requiredTier,
    currentTier: features.tier,
    message: allowed
      ? `Feature "${feature}" is available with your ${features.tier} license`
      : `Feature "${feature}" requires the ${requiredTier} tier (current: ${features.tier})`,
  };
}

/**
 * Check if a feature is available and throw if not
 */
export function requireFeature(features: FeatureSet, feature: Feature): void {
  const check = checkFeature(features, feature);
  if (!check.allowed) {
    throw new FeatureNotLicensedError(check);
  }
}

/**
 * Format a feature gate error for CLI output
 */
export function formatFeatureError(error: FeatureNotLicensedError, reason?: string): string {
  const lines = [
    '',
    'Pro Feature Required',
    '',
    `Feature:  ${error.feature}`,
    `Required: ${error.requiredTier} tier`,
    `Current:  ${error.currentTier} tier`,
  ];
  if (reason) {
    lines.push(`License:  ${reason}`);
  }
  lines.push('');
  return lines.join('\n');
}
