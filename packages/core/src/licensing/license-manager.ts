/**
 * License Manager
 *
 * Composes the verifier, the license path and the feature gate into the
 * license context built once at process start.
 */

import type * as crypto from 'node:crypto';

import { describeOutcome, resolveFeatures, type FeatureSet } from './feature-gate.js';
import { defaultLicensePath, LicenseVerifier } from './license-verifier.js';
import { EMBEDDED_PUBLIC_KEY } from './public-key.js';
import type { LicenseOutcome } from './types.js';

export type LicenseResolver = () => LicenseOutcome;

export interface LicenseResolverOptions {
  /** License file (default: {@link defaultLicensePath}) */
  path?: string;
  /** Default: the embedded key */
  publicKey?: string | crypto.KeyObject;
  deviceId?: string | (() => string);
  now?: () => Date;
}

/**
 * Resolver that verifies the license file with the embedded public key
 */
export function createLicenseResolver(options: LicenseResolverOptions = {}): LicenseResolver {
  const verifier = new LicenseVerifier({
    publicKey: options.publicKey ?? EMBEDDED_PUBLIC_KEY,
    ...(options.deviceId !== undefined ? { deviceId: options.deviceId } : {}),
    ...(options.now !== undefined ? { now: options.now } : {}),
  });
  const filePath = options.path ?? defaultLicensePath();
  return () => verifier.verifyFile(filePath);
}

/**
 * Immutable license state for the lifetime of the process
 */
export interface LicenseContext {
  readonly outcome: LicenseOutcome;
  readonly features: FeatureSet;
  /** Why the current tier applies, for display */
  readonly reason: string;
}

/**
 * Run verification once and freeze the result
 */
export function loadLicenseContext(resolve: LicenseResolver): LicenseContext {
  const outcome = resolve();
  return Object.freeze({
    outcome,
    features: resolveFeatures(outcome),
    reason: describeOutcome(outcome),
  });
}
