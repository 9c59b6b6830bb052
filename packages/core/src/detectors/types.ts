/**
 * Detector Types
 *
 * Shared types for the detector registry: the closed set of detector kinds,
 * match spans, and the options that tune the heuristic token detector.
 */

// =============================================================================
// Detector Kinds
// =============================================================================

/**
 * Every kind of sensitive substring the engine recognizes.
 *
 * The set is closed on purpose: adding a kind means adding a match function
 * in `patterns.ts` and a slot in {@link DETECTOR_PRIORITY}.
 */
export type DetectorKind = 'email' | 'ipv4' | 'ipv6' | 'uuid' | 'jwt' | 'token';

/**
 * Fixed detector order. Detectors run in this order and it breaks the last
 * ties during overlap resolution (lower index wins).
 */
export const DETECTOR_PRIORITY: readonly DetectorKind[] = [
  'email',
  'ipv4',
  'ipv6',
  'uuid',
  'jwt',
  'token',
] as const;

/**
 * Kinds matched by a structural pattern. These always beat `token`.
 */
export function isStructuralKind(kind: DetectorKind): boolean {
  return kind !== 'token';
}

// =============================================================================
// Spans
// =============================================================================

/**
 * A match over the input text.
 *
 * Offsets are UTF-16 code unit indices into the JavaScript string;
 * `end` is exclusive.
 */
export interface Span {
  start: number;
  end: number;
  matchedText: string;
  kind: DetectorKind;
}

// =============================================================================
// Options
// =============================================================================

/**
 * Tuning for the high-entropy token heuristic
 */
export interface EntropyOptions {
  /** Minimum run length (in characters) before a run is considered */
  minLength: number;
  /** Minimum Shannon entropy in bits per character */
  threshold: number;
}

export const DEFAULT_ENTROPY_OPTIONS: Readonly<EntropyOptions> = Object.freeze({
  minLength: 32,
  threshold: 3.5,
});

/**
 * Options accepted by the registry and the individual detectors
 */
export interface DetectorOptions {
  /** Kinds to run; defaults to every kind */
  enabled: ReadonlySet<DetectorKind>;
  entropy: EntropyOptions;
  /** Lowercased words that never count as tokens */
  allowList: ReadonlySet<string>;
}
