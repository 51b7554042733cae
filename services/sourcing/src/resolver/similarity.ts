/**
 * Name Similarity
 * Exact match scores 1.0, containment 0.9, anything else an edit-distance
 * score capped at 0.8 so that it can never beat a containment match.
 */

export const EXACT_SCORE = 1.0;
export const CONTAINMENT_SCORE = 0.9;
export const EDIT_DISTANCE_CAP = 0.8;

/**
 * Levenshtein distance (Wagner-Fischer, two rows)
 */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let prev = Array.from({ length: n + 1 }, (_, j) => j);
  let curr = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        curr[j - 1] + 1, // insertion
        prev[j] + 1, // deletion
        prev[j - 1] + cost // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[n];
}

/**
 * Similarity in [0, 1] between two names, compared trimmed and lowercased
 */
export function nameSimilarity(left: string, right: string): number {
  const a = left.trim().toLowerCase();
  const b = right.trim().toLowerCase();

  if (!a || !b) return 0;
  if (a === b) return EXACT_SCORE;
  if (a.includes(b) || b.includes(a)) return CONTAINMENT_SCORE;

  const distance = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - distance / maxLen;

  return Math.max(0, Math.min(score, EDIT_DISTANCE_CAP));
}
