/**
 * Overlap Resolution Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { resolveOverlaps } from '../resolve.js';
import { DETECTOR_PRIORITY, type DetectorKind, type Span } from '../types.js';

function span(kind: DetectorKind, start: number, end: number): Span {
  return { start, end, matchedText: 'x'.repeat(end - start), kind };
}

// ============================================================================
// Arbitrary Generators
// ============================================================================

const spanArb = fc
  .tuple(fc.constantFrom(...DETECTOR_PRIORITY), fc.nat(200), fc.integer({ min: 1, max: 60 }))
  .map(([kind, start, length]) => span(kind, start, start + length));

describe('resolveOverlaps', () => {
  it('should keep disjoint spans in start order', () => {
    const result = resolveOverlaps([span('ipv4', 20, 28), span('email', 0, 7)]);
    expect(result).toEqual([span('email', 0, 7), span('ipv4', 20, 28)]);
  });

  it('should prefer structural matches over longer tokens', () => {
    const result = resolveOverlaps([span('token', 0, 40), span('email', 5, 20)]);
    expect(result).toEqual([span('email', 5, 20)]);
  });

  it('should prefer the longer structural match', () => {
    const result = resolveOverlaps([span('ipv6', 0, 10), span('uuid', 0, 36)]);
    expect(result).toEqual([span('uuid', 0, 36)]);
  });

  it('should rank length above start position', () => {
    const result = resolveOverlaps([span('email', 0, 10), span('uuid', 5, 41)]);
    expect(result).toEqual([span('uuid', 5, 41)]);
  });

  it('should prefer the earlier start between equal lengths', () => {
    const result = resolveOverlaps([span('jwt', 4, 14), span('jwt', 0, 10)]);
    expect(result).toEqual([span('jwt', 0, 10)]);
  });

  it('should fall back to detector priority', () => {
    const result = resolveOverlaps([span('ipv4', 0, 9), span('email', 0, 9)]);
    expect(result).toEqual([span('email', 0, 9)]);
  });

  it('should drop partially covered candidates whole', () => {
    const result = resolveOverlaps([
      span('token', 0, 50),
      span('token', 45, 90),
      span('uuid', 30, 66),
    ]);
    expect(result).toEqual([span('uuid', 30, 66)]);
  });

  it('should ignore empty spans', () => {
    expect(resolveOverlaps([span('email', 3, 3)])).toEqual([]);
  });

  it('should always return sorted, non-overlapping input spans', () => {
    fc.assert(
      fc.property(fc.array(spanArb, { maxLength: 30 }), (spans) => {
        const result = resolveOverlaps(spans);

        result.slice(1).forEach((current, i) => {
          expect(current.start).toBeGreaterThanOrEqual(result[i]?.end ?? Infinity);
        });
        for (const kept of result) {
          expect(spans).toContainEqual(kept);
        }
        if (spans.length > 0) {
          expect(result.length).toBeGreaterThan(0);
        }
      })
    );
  });
});
