/**
 * Clipscrub Licensing - Types
 *
 * Defines the license record, the verification outcome and the feature
 * entitlements gated by it.
 */

// =============================================================================
// License Tiers
// =============================================================================

export type LicenseTier = 'free' | 'pro';

/**
 * A verified license record.
 *
 * Only ever constructed from a payload whose signature has already been
 * verified against the embedded public key.
 */
export interface License {
  email: string;
  plan: string;
  /** Device the license is bound to (see `currentDeviceId`) */
  deviceId: string;
  /** ISO date or timestamp */
  issuedAt: string;
  /** ISO date (valid through that UTC day) or timestamp; absent = perpetual */
  expiry?: string;
  /** Base64 Ed25519 signature over the canonical payload */
  signature: string;
}

/** License fields covered by the signature */
export type LicenseFields = Omit<License, 'signature'>;

// =============================================================================
// Feature Flags
// =============================================================================

/**
 * Every capability the CLI consults.
 *
 * FREE: clipboard sanitizing, the experimental watch loop, device id query.
 * PRO: stable placeholders, JSON report, config rules, file and stdin input.
 */
export type Feature =
  | 'sanitize:clipboard'
  | 'sanitize:watch'
  | 'license:device-id'
  | 'placeholders:stable'
  | 'report:json'
  | 'config:rules'
  | 'input:file'
  | 'input:stdin';

export const FEATURE_TIERS: Record<Feature, LicenseTier> = {
  'sanitize:clipboard': 'free',
  'sanitize:watch': 'free',
  'license:device-id': 'free',

  'placeholders:stable': 'pro',
  'report:json': 'pro',
  'config:rules': 'pro',
  'input:file': 'pro',
  'input:stdin': 'pro',
};

export const TIER_HIERARCHY: Record<LicenseTier, number> = {
  free: 0,
  pro: 1,
};

// =============================================================================
// Verification Outcome
// =============================================================================

export type LicenseErrorKind =
  | 'missing'
  | 'parse'
  | 'signature-invalid'
  | 'device-mismatch'
  | 'expired';

/**
 * Result of license verification. Every non-valid outcome degrades to the
 * free tier; none of them is fatal.
 */
export type LicenseOutcome =
  | { status: 'missing'; path: string }
  | { status: 'invalid'; reason: Exclude<LicenseErrorKind, 'missing'>; message: string; path?: string }
  | { status: 'valid'; license: License; warnings: string[]; path?: string }
  | { status: 'dev-override' };

export interface FeatureCheckResult {
  allowed: boolean;
  feature: Feature;
  requiredTier: LicenseTier;
  currentTier: LicenseTier;
  message: string;
}
