/**
 * Reporters
 */

export { TextReporter } from './text-reporter.js';
export { JsonReporter } from './json-reporter.js';
export type { Reporter, ReportFormat } from './types.js';

import { JsonReporter } from './json-reporter.js';
import { TextReporter } from './text-reporter.js';
import type { Reporter, ReportFormat } from './types.js';

/**
 * Reporter for an output format
 */
export function createReporter(format: ReportFormat): Reporter {
  return format === 'json' ? new JsonReporter() : new TextReporter();
}
