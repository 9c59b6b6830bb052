/**
 * Commands module exports
 *
 * Each factory builds a Commander.js command bound to a CLI context.
 */

export { createSanitizeCommand, sanitizeAction } from './sanitize.js';
export type { SanitizeCommandOptions } from './sanitize.js';
export { createWatchCommand, parseInterval, watchAction } from './watch.js';
export type { WatchCommandOptions } from './watch.js';
export { createDeviceIdCommand, deviceIdAction } from './device-id.js';
export { buildLicenseReport, createLicenseCommand, licenseAction } from './license.js';
export type { LicenseCommandOptions, LicenseReport } from './license.js';
export { resolveRunSettings } from './run-settings.js';
export type { GlobalOptions, RunOptions, RunSettings } from './run-settings.js';
