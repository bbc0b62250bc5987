/**
 * Jaccard index of two token sequences, compared as sets.
 * Two empty sequences share nothing and score 0.
 */
export function jaccard(left: readonly string[], right: readonly string[]): number {
  const a = new Set(left);
  const b = new Set(right);
  if (a.size === 0 && b.size === 0) return 0;

  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function levenshteinDistance(s: string, t: string): number {
  const n = s.length;
  const m = t.length;

  if (n === 0) return m;
  if (m === 0) return n;

  // Two rolling rows of the edit matrix
  let previous = Array.from({ length: m + 1 }, (_, j) => j);
  let current = new Array<number>(m + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    current[0] = i;
    for (let j = 1; j <= m; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[m];
}

/** 1.0 for identical strings, 0.0 when every character has to change. */
export function editSimilarity(s: string, t: string): number {
  const maxLen = Math.max(s.length, t.length);
  if (maxLen === 0) return 1;
  return 1 - levenshteinDistance(s, t) / maxLen;
}
