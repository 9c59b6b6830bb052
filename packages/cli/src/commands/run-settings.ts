/**
 * Run Settings
 *
 * Merges command flags, the optional config file and the license into the
 * settings a sanitize or watch run uses. Paid options requested without a
 * license fall back to free behaviour with a warning.
 */

import {
  DetectorRegistry,
  loadConfig,
  toDetectorOptions,
  type ClipscrubConfig,
  type Feature,
  type LicenseContext,
  type PlaceholderMode,
} from 'clipscrub-core';

import type { ReportFormat } from '../reporters/index.js';
import { debug, warn } from '../ui/messages.js';

export interface GlobalOptions {
  verbose?: boolean;
  color?: boolean;
}

export interface RunOptions {
  json?: boolean;
  stable?: boolean;
  config?: string;
}

export interface RunSettings {
  placeholders: PlaceholderMode;
  format: ReportFormat;
  registry: DetectorRegistry;
  /** Watch interval from the config file, if any */
  intervalMs: number | undefined;
}

type DegradableFeature = Extract<Feature, 'placeholders:stable' | 'report:json' | 'config:rules'>;

const FALLBACKS: Record<DegradableFeature, string> = {
  'placeholders:stable': '--stable requires a Pro license; using generic placeholders',
  'report:json': '--json requires a Pro license; printing the text summary',
  'config:rules': '--config requires a Pro license; using built-in rules',
};

function entitled(license: LicenseContext, feature: DegradableFeature): boolean {
  if (license.features.has(feature)) return true;
  warn(`${FALLBACKS[feature]}. ${license.reason}`);
  return false;
}

/**
 * Print license warnings, and the license reason with --verbose
 */
export function reportLicense(license: LicenseContext, globals: GlobalOptions): void {
  debug(globals.verbose, `License: ${license.reason}`);
  if (license.outcome.status === 'valid') {
    for (const warning of license.outcome.warnings) {
      warn(warning);
    }
  }
}

export function resolveRunSettings(
  options: RunOptions,
  license: LicenseContext,
  globals: GlobalOptions
): RunSettings {
  let config: ClipscrubConfig = {};
  if (options.config !== undefined && entitled(license, 'config:rules')) {
    config = loadConfig(options.config);
    debug(globals.verbose, `Loaded config ${options.config}`);
  }

  const stable = options.stable ?? config.stablePlaceholders ?? false;
  const json = options.json ?? config.jsonReport ?? false;

  const registry = new DetectorRegistry({
    ...toDetectorOptions(config),
    onDetectorError: (kind, error) => {
      debug(globals.verbose, `Detector ${kind} failed: ${error instanceof Error ? error.message : String(error)}`);
    },
  });

  return {
    placeholders: stable && entitled(license, 'placeholders:stable') ? 'stable' : 'ephemeral',
    format: json && entitled(license, 'report:json') ? 'json' : 'text',
    registry,
    intervalMs: config.intervalMs,
  };
}
