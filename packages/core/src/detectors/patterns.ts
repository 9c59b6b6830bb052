/**
 * Detector Patterns
 *
 * One match function per {@link DetectorKind}. Every function is total:
 * it accepts any string and returns an empty array when nothing matches.
 */

import { isIPv6 } from 'node:net';

import { isAllowListed } from './allow-list.js';
import { shannonEntropy } from './entropy.js';
import type { DetectorKind, DetectorOptions, Span } from './types.js';

// ============================================================================
// Patterns
// ============================================================================

/** Domain after the `@`; the local part is found by scanning back from it */
const EMAIL_DOMAIN_PATTERN = /[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/y;
const EMAIL_LOCAL_CHAR = /[A-Za-z0-9._%+-]/;
const WORD_CHAR = /\w/;

const OCTET = '(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';

/** Four octets, not embedded in a longer dotted or alphanumeric run */
const IPV4_PATTERN = new RegExp(`(?<![\\w.])(?:${OCTET}\\.){3}${OCTET}(?!\\w|\\.\\d)`, 'g');

/** Maximal colon-hex runs; validated afterwards */
const IPV6_CANDIDATE_PATTERN = /(?<![\w:.])[0-9A-Fa-f:.]{2,}(?![\w:.])/g;

const UUID_PATTERN =
  /\b[0-9A-Fa-f]{8}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{12}\b/g;

/** header.payload.signature, header and payload being base64url JSON objects */
const JWT_PATTERN = /(?<![\w-])eyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*(?![\w-])/g;

/** Maximal runs of base64 / base64url / key-like characters */
const TOKEN_RUN_PATTERN = /[A-Za-z0-9_+/=-]+/g;

// ============================================================================
// Helpers
// ============================================================================

function collect(
  text: string,
  pattern: RegExp,
  kind: DetectorKind,
  accept: (value: string) => boolean = () => true
): Span[] {
  const spans: Span[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = match[0];
    const start = match.index ?? 0;
    if (!accept(value)) continue;
    spans.push({ start, end: start + value.length, matchedText: value, kind });
  }
  return spans;
}

// ============================================================================
// Structural Detectors
// ============================================================================

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

/**
 * Leftmost word-boundary start of the local part ending at `at`, not before
 * `from`; -1 when the run holds no word character.
 */
function localPartStart(text: string, from: number, at: number): number {
  let runStart = at;
  while (runStart > from && EMAIL_LOCAL_CHAR.test(text[runStart - 1] ?? '')) runStart--;

  for (let i = runStart; i < at; i++) {
    if (isWordChar(text[i - 1]) !== isWordChar(text[i])) return i;
  }
  return -1;
}

/**
 * Email addresses, matched from each `@` outward. Each character is
 * scanned a bounded number of times, so long runs without a domain stay
 * linear.
 */
export function detectEmail(text: string): Span[] {
  const spans: Span[] = [];
  const domainPattern = new RegExp(EMAIL_DOMAIN_PATTERN);
  let cursor = 0;
  let at = text.indexOf('@');

  while (at !== -1) {
    const start = localPartStart(text, cursor, at);
    domainPattern.lastIndex = at + 1;
    const domain = start === -1 ? null : domainPattern.exec(text);

    if (start !== -1 && domain) {
      const end = at + 1 + domain[0].length;
      spans.push({ start, end, matchedText: text.slice(start, end), kind: 'email' });
      cursor = end;
    }
    at = text.indexOf('@', Math.max(cursor, at + 1));
  }
  return spans;
}

export function detectIpv4(text: string): Span[] {
  return collect(text, IPV4_PATTERN, 'ipv4');
}

/**
 * IPv6 addresses, full or compressed, optionally ending in an embedded IPv4.
 *
 * Candidates must carry at least two non-empty groups, so scope operators
 * such as `std::` (which would read as `d::`) are not reported.
 */
export function detectIpv6(text: string): Span[] {
  const spans: Span[] = [];
  for (const match of text.matchAll(IPV6_CANDIDATE_PATTERN)) {
    const start = match.index ?? 0;
    // Sentence punctuation is not part of the address.
    const value = match[0].replace(/\.+$/, '');
    if (!value.includes(':') || !isIPv6(value)) continue;

    const groups = value.split(':').filter(Boolean);
    if (groups.length < 2) continue;

    spans.push({ start, end: start + value.length, matchedText: value, kind: 'ipv6' });
  }
  return spans;
}

export function detectUuid(text: string): Span[] {
  return collect(text, UUID_PATTERN, 'uuid');
}

export function detectJwt(text: string): Span[] {
  return collect(text, JWT_PATTERN, 'jwt');
}

// ============================================================================
// Heuristic Detector
// ============================================================================

/**
 * High-entropy tokens: runs of at least `minLength` characters whose Shannon
 * entropy reaches `threshold` and that the allow-list does not cover.
 */
export function detectTokens(
  text: string,
  options: Pick<DetectorOptions, 'entropy' | 'allowList'>
): Span[] {
  const { minLength, threshold } = options.entropy;
  return collect(text, TOKEN_RUN_PATTERN, 'token', (run) =>
    run.length >= minLength &&
    shannonEntropy(run) >= threshold &&
    !isAllowListed(run, options.allowList)
  );
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Run the match function for one kind
 */
export function detectKind(kind: DetectorKind, text: string, options: DetectorOptions): Span[] {
  switch (kind) {
    case 'email':
      return detectEmail(text);
    case 'ipv4':
      return detectIpv4(text);
    case 'ipv6':
      return detectIpv6(text);
    case 'uuid':
      return detectUuid(text);
    case 'jwt':
      return detectJwt(text);
    case 'token':
      return detectTokens(text, options);
  }
}
