/**
 * Typo detection for unknown field names
 *
 * @module errors
 */

/**
 * Levenshtein distance, computed with two rolling rows
 */
function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1);
      current[j] = Math.min(substitution, previous[j] + 1, current[j - 1] + 1);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similarity between two strings in [0, 1], case-insensitive
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a.toLowerCase(), b.toLowerCase()) / longest;
}

/**
 * Best candidate scoring above `threshold`, or undefined
 *
 * @example
 * ```typescript
 * findClosestMatch('plan_inptus', ['plan_inputs', 'plan_outputs']); // 'plan_inputs'
 * ```
 */
export function findClosestMatch(
  input: string,
  candidates: readonly string[],
  threshold: number = 0.6
): string | undefined {
  let best: string | undefined;
  let bestScore = threshold;

  for (const candidate of candidates) {
    const score = similarity(input, candidate);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }

  return best;
}
