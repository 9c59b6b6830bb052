/**
 * clipscrub-core
 *
 * Offline detection and redaction of sensitive substrings, license
 * verification and feature gating.
 */

// Detectors
export type {
  DetectorKind,
  DetectorOptions,
  EntropyOptions,
  Span,
} from './detectors/types.js';
export {
  DEFAULT_ENTROPY_OPTIONS,
  DETECTOR_PRIORITY,
  isStructuralKind,
} from './detectors/types.js';
export { shannonEntropy } from './detectors/entropy.js';
export { createAllowList, getDefaultAllowList, isAllowListed } from './detectors/allow-list.js';
export {
  detectEmail,
  detectIpv4,
  detectIpv6,
  detectJwt,
  detectKind,
  detectTokens,
  detectUuid,
} from './detectors/patterns.js';
export { resolveOverlaps } from './detectors/resolve.js';
export { DetectorRegistry, createDetectorRegistry } from './detectors/registry.js';
export type { DetectorRegistryOptions } from './detectors/registry.js';

// Redaction
export type {
  KindCounts,
  PlaceholderAssignment,
  PlaceholderMode,
  RedactionResult,
  RedactionSummary,
  Replacement,
} from './redaction/types.js';
export {
  PLACEHOLDER_LABELS,
  createPlaceholderAllocator,
  normalizeValue,
  renderPlaceholder,
} from './redaction/placeholders.js';
export type { PlaceholderAllocator } from './redaction/placeholders.js';
export { emptyCounts, redact, sanitize, summarize } from './redaction/redactor.js';
export type { SanitizeOptions } from './redaction/redactor.js';

// Config
export {
  ConfigError,
  DEFAULT_INTERVAL_MS,
  MIN_INTERVAL_MS,
  loadConfig,
  parseConfig,
  toDetectorOptions,
  validateConfig,
} from './config/config-loader.js';
export type { ClipscrubConfig } from './config/config-loader.js';

// Watch
export { ClipboardWatcher } from './watch/clipboard-watcher.js';
export type {
  ClipboardPort,
  ClipboardWatcherOptions,
  PollResult,
  Sleep,
  StaleWrite,
} from './watch/clipboard-watcher.js';

// Licensing
export * from './licensing/index.js';
