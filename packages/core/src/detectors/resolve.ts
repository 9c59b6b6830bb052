/**
 * Overlap Resolution
 *
 * Turns the raw candidates of all detectors into a non-overlapping list
 * sorted by start offset.
 */

import { DETECTOR_PRIORITY, isStructuralKind, type Span } from './types.js';

/**
 * Ordering in which candidates claim text: structural kinds before tokens,
 * then longer matches, then earlier starts, then detector priority.
 */
function compareClaims(a: Span, b: Span): number {
  const precedence = Number(!isStructuralKind(a.kind)) - Number(!isStructuralKind(b.kind));
  if (precedence !== 0) return precedence;

  const length = (b.end - b.start) - (a.end - a.start);
  if (length !== 0) return length;

  if (a.start !== b.start) return a.start - b.start;

  return DETECTOR_PRIORITY.indexOf(a.kind) - DETECTOR_PRIORITY.indexOf(b.kind);
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Resolve overlapping spans.
 *
 * A candidate is kept only if it overlaps none of the candidates that
 * outrank it; partially covered candidates are dropped whole.
 */
export function resolveOverlaps(spans: readonly Span[]): Span[] {
  const claimed: Span[] = [];

  for (const candidate of spans.filter((s) => s.end > s.start).sort(compareClaims)) {
    if (!claimed.some((kept) => overlaps(kept, candidate))) {
      claimed.push(candidate);
    }
  }

  return claimed.sort((a, b) => a.start - b.start);
}
