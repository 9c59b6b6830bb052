/**
 * Redaction Types
 */

import type { DetectorKind, Span } from '../detectors/types.js';

export type PlaceholderMode = 'ephemeral' | 'stable';

/**
 * Placeholder chosen for one matched value.
 *
 * `index` is 0 in ephemeral mode. In stable mode it is the 1-based
 * first-appearance rank of `stableKey` among values of the same kind.
 */
export interface PlaceholderAssignment {
  kind: DetectorKind;
  index: number;
  stableKey?: string;
}

export type KindCounts = Record<DetectorKind, number>;

export interface Replacement {
  span: Span;
  placeholder: string;
}

export interface RedactionResult {
  /** Final text with every resolved span replaced */
  text: string;
  /** Number of replacements per kind */
  counts: KindCounts;
  /** Spans replaced, in start order, with the text that replaced them */
  replacements: Replacement[];
}

/**
 * User-facing summary; IPv4 and IPv6 are reported together as IPs
 */
export interface RedactionSummary {
  emails: number;
  ips: number;
  uuids: number;
  jwts: number;
  tokens: number;
  total: number;
}
