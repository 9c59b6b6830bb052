/**
 * Detector Registry Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DetectorRegistry, createDetectorRegistry } from '../registry.js';
import { DETECTOR_PRIORITY } from '../types.js';

const UUID = '123e4567-e89b-12d3-a456-426614174000';

describe('DetectorRegistry', () => {
  describe('options', () => {
    it('should enable every kind in priority order by default', () => {
      expect(createDetectorRegistry().kinds()).toEqual([...DETECTOR_PRIORITY]);
    });

    it('should keep priority order for a custom selection', () => {
      const registry = new DetectorRegistry({ enabled: ['token', 'email'] });
      expect(registry.kinds()).toEqual(['email', 'token']);
    });

    it('should merge partial entropy options with the defaults', () => {
      const registry = new DetectorRegistry({ entropy: { minLength: 8 } });
      expect(registry.options.entropy).toEqual({ minLength: 8, threshold: 3.5 });
    });

    it('should freeze its options', () => {
      expect(Object.isFrozen(createDetectorRegistry().options)).toBe(true);
    });
  });

  describe('detect', () => {
    it('should return overlapping raw candidates', () => {
      const spans = createDetectorRegistry().detect(`id ${UUID}`);
      expect(spans.map((s) => s.kind)).toEqual(['uuid', 'token']);
      expect(spans.every((s) => s.start === 3 && s.end === 39)).toBe(true);
    });
  });

  describe('scan', () => {
    it('should resolve candidates into final spans', () => {
      const text = `Mail ops@example.com, host 10.1.2.3, id ${UUID}`;
      const spans = createDetectorRegistry().scan(text);

      expect(spans.map((s) => [s.kind, s.matchedText])).toEqual([
        ['email', 'ops@example.com'],
        ['ipv4', '10.1.2.3'],
        ['uuid', UUID],
      ]);
    });

    it('should cut a token run at a structural match it touches', () => {
      const secret = 'Xk9qL2mZ7vB4nR8tW1yC5pD3fG6hJ0sA';
      const uuid = '123e4567-e89b-42d3-a456-556642440000';
      const spans = createDetectorRegistry().scan(`key ${secret}-${uuid} end`);

      expect(spans).toEqual([
        { start: 4, end: 37, matchedText: `${secret}-`, kind: 'token' },
        { start: 37, end: 73, matchedText: uuid, kind: 'uuid' },
      ]);
    });

    it('should run the token heuristic on every gap between structural matches', () => {
      const secret = 'Xk9qL2mZ7vB4nR8tW1yC5pD3fG6hJ0sA';
      const spans = createDetectorRegistry().scan(`a@b.com ${secret}=10.0.0.5`);

      expect(spans.map((s) => [s.kind, s.start, s.end])).toEqual([
        ['email', 0, 7],
        ['token', 8, 41],
        ['ipv4', 41, 49],
      ]);
    });

    it('should skip disabled kinds', () => {
      const registry = new DetectorRegistry({ enabled: DETECTOR_PRIORITY.filter((k) => k !== 'email') });
      expect(registry.scan('write to ops@example.com')).toEqual([]);
    });

    it('should return offsets that slice back to the matched text', () => {
      const registry = createDetectorRegistry();
      fc.assert(
        fc.property(fc.string({ maxLength: 300 }), (text) => {
          let previousEnd = 0;
          for (const span of registry.scan(text)) {
            expect(span.start).toBeGreaterThanOrEqual(previousEnd);
            expect(text.slice(span.start, span.end)).toBe(span.matchedText);
            previousEnd = span.end;
          }
        })
      );
    });
  });
});
