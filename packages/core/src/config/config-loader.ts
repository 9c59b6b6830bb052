/**
 * Config Loader
 *
 * Loads the JSON rule/config file used for config-driven customization
 * (a Pro feature). Validation collects every problem before failing.
 */

import * as fs from 'node:fs';

import type { DetectorRegistryOptions } from '../detectors/registry.js';
import { createAllowList, getDefaultAllowList } from '../detectors/allow-list.js';
import { DETECTOR_PRIORITY, type DetectorKind } from '../detectors/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ClipscrubConfig {
  stablePlaceholders?: boolean;
  jsonReport?: boolean;
  /** Watch poll interval in milliseconds (>= {@link MIN_INTERVAL_MS}) */
  intervalMs?: number;
  /** Per-kind on/off switches; omitted kinds stay enabled */
  detectors?: Partial<Record<DetectorKind, boolean>>;
  entropy?: {
    minLength?: number;
    threshold?: number;
  };
  /** Extra words appended to the shipped token allow-list */
  allowList?: string[];
}

export const MIN_INTERVAL_MS = 100;
export const DEFAULT_INTERVAL_MS = 750;

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

// ============================================================================
// Validation
// ============================================================================

const TOP_LEVEL_KEYS = new Set([
  'stablePlaceholders',
  'jsonReport',
  'intervalMs',
  'detectors',
  'entropy',
  'allowList',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDetectorKind(value: string): value is DetectorKind {
  return (DETECTOR_PRIORITY as readonly string[]).includes(value);
}

/**
 * Validate a parsed config value
 */
export function validateConfig(raw: unknown): { config: ClipscrubConfig; errors: string[] } {
  const errors: string[] = [];
  const config: ClipscrubConfig = {};

  if (!isRecord(raw)) {
    return { config, errors: ['Config must be a JSON object'] };
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) errors.push(`Unknown config key "${key}"`);
  }

  for (const key of ['stablePlaceholders', 'jsonReport'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'boolean') config[key] = value;
    else errors.push(`"${key}" must be a boolean`);
  }

  const intervalMs = raw['intervalMs'];
  if (intervalMs !== undefined) {
    if (typeof intervalMs === 'number' && Number.isInteger(intervalMs) && intervalMs >= MIN_INTERVAL_MS) {
      config.intervalMs = intervalMs;
    } else {
      errors.push(`"intervalMs" must be an integer >= ${MIN_INTERVAL_MS}`);
    }
  }

  const detectors = raw['detectors'];
  if (detectors !== undefined) {
    if (!isRecord(detectors)) {
      errors.push('"detectors" must be an object');
    } else {
      const switches: Partial<Record<DetectorKind, boolean>> = {};
      for (const [kind, enabled] of Object.entries(detectors)) {
        if (!isDetectorKind(kind)) {
          errors.push(`Unknown detector "${kind}" (expected one of ${DETECTOR_PRIORITY.join(', ')})`);
        } else if (typeof enabled !== 'boolean') {
          errors.push(`"detectors.${kind}" must be a boolean`);
        } else {
          switches[kind] = enabled;
        }
      }
      config.detectors = switches;
    }
  }

  const entropy = raw['entropy'];
  if (entropy !== undefined) {
    if (!isRecord(entropy)) {
      errors.push('"entropy" must be an object');
    } else {
      const settings: NonNullable<ClipscrubConfig['entropy']> = {};
      for (const key of Object.keys(entropy)) {
        if (key !== 'minLength' && key !== 'threshold') errors.push(`Unknown entropy key "${key}"`);
      }
      const { minLength, threshold } = entropy;
      if (minLength !== undefined) {
        if (typeof minLength === 'number' && Number.isInteger(minLength) && minLength >= 1) {
          settings.minLength = minLength;
        } else {
          errors.push('"entropy.minLength" must be a positive integer');
        }
      }
      if (threshold !== undefined) {
        if (typeof threshold === 'number' && threshold >= 0 && Number.isFinite(threshold)) {
          settings.threshold = threshold;
        } else {
          errors.push('"entropy.threshold" must be a non-negative number');
        }
      }
      config.entropy = settings;
    }
  }

  const allowList = raw['allowList'];
  if (allowList !== undefined) {
    if (Array.isArray(allowList) && allowList.every((w): w is string => typeof w === 'string')) {
      config.allowList = allowList;
    } else {
      errors.push('"allowList" must be an array of strings');
    }
  }

  return { config, errors };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse config file content
 */
export function parseConfig(content: string, source = 'config'): ClipscrubConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${source}`, [(error as Error).message]);
  }

  const { config, errors } = validateConfig(raw);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid config ${source}`, errors);
  }
  return config;
}

/**
 * Read and validate a config file
 */
export function loadConfig(filePath: string): ClipscrubConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config ${filePath}`, [(error as Error).message]);
  }
  return parseConfig(content, filePath);
}

/**
 * Detector registry options described by a config
 */
export function toDetectorOptions(config: ClipscrubConfig): DetectorRegistryOptions {
  const options: DetectorRegistryOptions = {};

  if (config.detectors) {
    const switches = config.detectors;
    options.enabled = DETECTOR_PRIORITY.filter((kind) => switches[kind] !== false);
  }
  if (config.entropy) {
    options.entropy = config.entropy;
  }
  if (config.allowList && config.allowList.length > 0) {
    options.allowList = createAllowList(config.allowList, getDefaultAllowList());
  }

  return options;
}
