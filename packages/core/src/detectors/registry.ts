/**
 * Detector Registry
 *
 * Runs the fixed, ordered set of detectors over a text and resolves their
 * candidates into the final span list.
 */

import { getDefaultAllowList } from './allow-list.js';
import { detectKind } from './patterns.js';
import { resolveOverlaps } from './resolve.js';
import {
  DEFAULT_ENTROPY_OPTIONS,
  DETECTOR_PRIORITY,
  isStructuralKind,
  type DetectorKind,
  type DetectorOptions,
  type EntropyOptions,
  type Span,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface DetectorRegistryOptions {
  /** Kinds to run (default: all) */
  enabled?: Iterable<DetectorKind>;
  entropy?: Partial<EntropyOptions>;
  /** Replaces the shipped allow-list when given */
  allowList?: ReadonlySet<string>;
  /** Called when a detector fails; that detector then contributes no spans */
  onDetectorError?: (kind: DetectorKind, error: unknown) => void;
}

// ============================================================================
// Registry
// ============================================================================

export class DetectorRegistry {
  readonly options: Readonly<DetectorOptions>;
  private readonly onDetectorError: ((kind: DetectorKind, error: unknown) => void) | undefined;

  constructor(options: DetectorRegistryOptions = {}) {
    this.options = Object.freeze({
      enabled: new Set(options.enabled ?? DETECTOR_PRIORITY),
      entropy: { ...DEFAULT_ENTROPY_OPTIONS, ...options.entropy },
      allowList: options.allowList ?? getDefaultAllowList(),
    });
    this.onDetectorError = options.onDetectorError;
  }

  /**
   * Enabled kinds in priority order
   */
  kinds(): DetectorKind[] {
    return DETECTOR_PRIORITY.filter((kind) => this.options.enabled.has(kind));
  }

  /**
   * Raw candidates, one detector pass per enabled kind in priority order
   */
  detect(text: string): Span[] {
    const spans: Span[] = [];
    for (const kind of this.kinds()) {
      spans.push(...this.runDetector(kind, text));
    }
    return spans;
  }

  /**
   * Final non-overlapping spans in start order.
   *
   * Structural matches are resolved first. The token heuristic then only
   * sees the text between them, so a token run touching a structural match
   * is cut at its boundary instead of being lost to it.
   */
  scan(text: string): Span[] {
    const structural = resolveOverlaps(
      this.kinds()
        .filter(isStructuralKind)
        .flatMap((kind) => this.runDetector(kind, text))
    );
    if (!this.options.enabled.has('token')) {
      return structural;
    }

    const tokens = this.guarded('token', () => this.detectTokensBetween(text, structural));
    return [...structural, ...tokens].sort((a, b) => a.start - b.start);
  }

  /**
   * Token spans in the gaps left by `claimed` (sorted, non-overlapping)
   */
  private detectTokensBetween(text: string, claimed: readonly Span[]): Span[] {
    const spans: Span[] = [];
    let cursor = 0;

    const boundaries = [...claimed, { start: text.length, end: text.length }];
    for (const boundary of boundaries) {
      if (boundary.start > cursor) {
        for (const span of detectKind('token', text.slice(cursor, boundary.start), this.options)) {
          spans.push({ ...span, start: span.start + cursor, end: span.end + cursor });
        }
      }
      cursor = boundary.end;
    }

    return spans;
  }

  private runDetector(kind: DetectorKind, text: string): Span[] {
    return this.guarded(kind, () => detectKind(kind, text, this.options));
  }

  private guarded(kind: DetectorKind, run: () => Span[]): Span[] {
    try {
      return run();
    } catch (error) {
      this.onDetectorError?.(kind, error);
      return [];
    }
  }
}

/**
 * Create a registry with the given options
 */
export function createDetectorRegistry(options?: DetectorRegistryOptions): DetectorRegistry {
  return new DetectorRegistry(options);
}
