/**
 * Shannon entropy for the high-entropy token heuristic.
 */

/**
 * Calculate the Shannon entropy of a string in bits per character.
 *
 * Characters are counted by code point, so a surrogate pair counts once.
 *
 * @returns 0 for the empty string, up to log2(distinct characters) otherwise
 */
export function shannonEntropy(value: string): number {
  if (!value) return 0;

  const freq = new Map<string, number>();
  let length = 0;
  for (const char of value) {
    freq.set(char, (freq.get(char) ?? 0) + 1);
    length++;
  }

  let entropy = 0;
  for (const count of freq.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }

  return entropy;
}
