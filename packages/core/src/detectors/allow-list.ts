/**
 * Token Allow-List
 *
 * Common dictionary and programming words that must never be classified as
 * high-entropy tokens. The shipped list lives in `data/allow-list.json`;
 * the config file may extend it.
 */

import * as fs from 'node:fs';

const ALLOW_LIST_URL = new URL('../../data/allow-list.json', import.meta.url);

/** Separators splitting a token run into word-like segments */
const SEGMENT_SEPARATORS = /[_\-+/=]+/;

let defaultAllowList: ReadonlySet<string> | null = null;

/**
 * Load the shipped allow-list (read once per process)
 */
export function getDefaultAllowList(): ReadonlySet<string> {
  if (!defaultAllowList) {
    const raw: unknown = JSON.parse(fs.readFileSync(ALLOW_LIST_URL, 'utf-8'));
    if (!Array.isArray(raw)) {
      throw new Error(`Allow-list at ${ALLOW_LIST_URL.pathname} must be a JSON array`);
    }
    defaultAllowList = createAllowList(raw.filter((w): w is string => typeof w === 'string'));
  }
  return defaultAllowList;
}

/**
 * Build an allow-list from words (lowercased, blanks dropped)
 */
export function createAllowList(
  words: Iterable<string>,
  base?: ReadonlySet<string>
): ReadonlySet<string> {
  const set = new Set<string>(base);
  for (const word of words) {
    const normalized = word.trim().toLowerCase();
    if (normalized) set.add(normalized);
  }
  return set;
}

/**
 * Whether a token candidate is covered by the allow-list.
 *
 * A candidate is covered when it equals an allow-listed entry, or when every
 * segment between separators is an allow-listed word or a plain number.
 */
export function isAllowListed(candidate: string, allowList: ReadonlySet<string>): boolean {
  const lowered = candidate.toLowerCase();
  if (allowList.has(lowered)) return true;

  const segments = lowered.split(SEGMENT_SEPARATORS).filter(Boolean);
  if (segments.length === 0) return false;

  return segments.every((segment) => allowList.has(segment) || /^\d+$/.test(segment));
}
