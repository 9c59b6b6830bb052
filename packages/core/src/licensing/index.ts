/**
 * Clipscrub Licensing System
 *
 * Offline license verification and feature gating. Nothing here touches
 * the network.
 *
 * @example
 * ```typescript
 * import {
 *   createLicenseResolver,
 *   loadLicenseContext,
 *   requireFeature,
 *   FeatureNotLicensedError,
 * } from 'clipscrub-core';
 *
 * const license = loadLicenseContext(createLicenseResolver());
 * if (!license.features.has('placeholders:stable')) {
 *   console.log(license.reason);
 * }
 *
 * try {
 *   requireFeature(license.features, 'input:file');
 * } catch (error) {
 *   if (error instanceof FeatureNotLicensedError) {
 *     console.log(`Requires ${error.requiredTier}`);
 *   }
 * }
 * ```
 */

// Types
export type {
  Feature,
  FeatureCheckResult,
  License,
  LicenseErrorKind,
  LicenseFields,
  LicenseOutcome,
  LicenseTier,
} from './types.js';

export { FEATURE_TIERS, TIER_HIERARCHY } from './types.js';

// License File
export {
  LICENSE_HEADER,
  LicenseParseError,
  formatLicenseFile,
  parseLicenseEnvelope,
  parseLicensePayload,
  serializeLicensePayload,
} from './license-file.js';
export type { LicenseEnvelope } from './license-file.js';

// Verifier
export {
  LICENSE_PATH_ENV,
  LicenseVerifier,
  defaultLicensePath,
  expiryInstant,
  loadPublicKey,
} from './license-verifier.js';
export type { LicenseVerifierOptions } from './license-verifier.js';

export { EMBEDDED_PUBLIC_KEY } from './public-key.js';

// Device Id
export {
  DEVICE_ID_LENGTH,
  collectDeviceSignals,
  currentDeviceId,
  deriveDeviceId,
  readMachineId,
} from './device-id.js';
export type { DeviceSignals } from './device-id.js';

// Feature Gate
export {
  FeatureNotLicensedError,
  FeatureSet,
  checkFeature,
  describeOutcome,
  formatFeatureError,
  requireFeature,
  resolveFeatures,
} from './feature-gate.js';

// License Manager
export { createLicenseResolver, loadLicenseContext } from './license-manager.js';
export type {
  LicenseContext,
  LicenseResolver,
  LicenseResolverOptions,
} from './license-manager.js';
