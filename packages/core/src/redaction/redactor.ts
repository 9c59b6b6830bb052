/**
 * Redactor
 *
 * Replaces resolved spans with placeholders in a single forward pass. The
 * output is assembled from slices of the original text, so replacement
 * lengths never shift offsets that are still to be processed.
 */

import { DetectorRegistry, type DetectorRegistryOptions } from '../detectors/registry.js';
import type { Span } from '../detectors/types.js';
import { createPlaceholderAllocator, renderPlaceholder, type PlaceholderAllocator } from './placeholders.js';
import type {
  KindCounts,
  PlaceholderMode,
  RedactionResult,
  RedactionSummary,
  Replacement,
} from './types.js';

export function emptyCounts(): KindCounts {
  return { email: 0, ipv4: 0, ipv6: 0, uuid: 0, jwt: 0, token: 0 };
}

/**
 * Replace `spans` in `text`.
 *
 * `spans` must be non-overlapping and sorted by start, as returned by
 * {@link DetectorRegistry.scan}.
 */
export function redact(
  text: string,
  spans: readonly Span[],
  allocator: PlaceholderAllocator
): RedactionResult {
  const counts = emptyCounts();
  const replacements: Replacement[] = [];
  const parts: string[] = [];
  let cursor = 0;

  for (const span of spans) {
    if (span.start < cursor) {
      throw new RangeError(`Span at ${span.start} overlaps a previous span ending at ${cursor}`);
    }
    const placeholder = renderPlaceholder(allocator.assign(span.kind, span.matchedText));

    parts.push(text.slice(cursor, span.start), placeholder);
    cursor = span.end;
    counts[span.kind]++;
    replacements.push({ span, placeholder });
  }

  if (replacements.length === 0) {
    return { text, counts, replacements };
  }

  parts.push(text.slice(cursor));
  return { text: parts.join(''), counts, replacements };
}

// ============================================================================
// Sanitize
// ============================================================================

export interface SanitizeOptions {
  placeholders?: PlaceholderMode;
  /** Reuse a registry across calls (its options win over `detectors`) */
  registry?: DetectorRegistry;
  detectors?: DetectorRegistryOptions;
}

/**
 * Detect, resolve and redact in one call.
 *
 * Each call gets its own placeholder allocator, so stable numbering never
 * leaks from one invocation into the next.
 */
export function sanitize(text: string, options: SanitizeOptions = {}): RedactionResult {
  const registry = options.registry ?? new DetectorRegistry(options.detectors);
  const allocator = createPlaceholderAllocator(options.placeholders ?? 'ephemeral');
  return redact(text, registry.scan(text), allocator);
}

// ============================================================================
// Summary
// ============================================================================

export function summarize(counts: KindCounts): RedactionSummary {
  const summary = {
    emails: counts.email,
    ips: counts.ipv4 + counts.ipv6,
    uuids: counts.uuid,
    jwts: counts.jwt,
    tokens: counts.token,
  };
  return {
    ...summary,
    total: summary.emails + summary.ips + summary.uuids + summary.jwts + summary.tokens,
  };
}
