/**
 * Text Reporter - Human-readable summary
 */

import chalk from 'chalk';
import type { RedactionSummary } from 'clipscrub-core';
import type { Reporter } from './types.js';

/**
 * Text reporter for human-readable output
 */
export class TextReporter implements Reporter {
  generate(summary: RedactionSummary): string {
    return [
      chalk.bold('Clipscrub cleaned your clipboard:'),
      `- Emails: ${summary.emails}`,
      `- IPs: ${summary.ips}`,
      `- UUIDs: ${summary.uuids}`,
      `- JWTs: ${summary.jwts}`,
      `- Tokens: ${summary.tokens}`,
      chalk.green('Safe to paste.'),
    ].join('\n');
  }
}
