/**
 * JSON Reporter - Machine-readable summary on a single line
 *
 * Key names are a stable interface for scripts; do not rename them.
 */

import type { RedactionSummary } from 'clipscrub-core';
import type { Reporter } from './types.js';

export class JsonReporter implements Reporter {
  generate(summary: RedactionSummary): string {
    return JSON.stringify({
      emails: summary.emails,
      ips: summary.ips,
      uuids: summary.uuids,
      jwts: summary.jwts,
      tokens: summary.tokens,
      safe_to_paste: true,
    });
  }
}
