/**
 * Reporter type definitions
 */

import type { RedactionSummary } from 'clipscrub-core';

export type ReportFormat = 'text' | 'json';

/**
 * Reporter interface
 */
export interface Reporter {
  /** Render the summary of one sanitization */
  generate(summary: RedactionSummary): string;
}
