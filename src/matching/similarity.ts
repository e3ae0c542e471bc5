/**
 * Set and string similarity measures used by the matcher
 */

/**
 * Jaccard similarity between two sets; 0 when both are empty
 */
export function jaccardSimilarity<T>(set1: Set<T>, set2: Set<T>): number {
  if (set1.size === 0 && set2.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const item of set1) {
    if (set2.has(item)) intersection++;
  }
  const union = set1.size + set2.size - intersection;

  return intersection / union;
}

/**
 * Character similarity in [0, 1] based on Levenshtein distance,
 * 1 - distance / longer length
 */
export function stringSimilarity(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;

  if (len1 === 0) return len2 === 0 ? 1 : 0;
  if (len2 === 0) return 0;

  // Two rolling rows of the distance matrix
  let previous = Array.from({ length: len2 + 1 }, (_, j) => j);
  let current = new Array<number>(len2 + 1).fill(0);

  for (let i = 1; i <= len1; i++) {
    current[0] = i;
    for (let j = 1; j <= len2; j++) {
      const cost = str1[i - 1] === str2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,        // deletion
        current[j - 1] + 1,     // insertion
        previous[j - 1] + cost  // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  const distance = previous[len2];
  return 1 - distance / Math.max(len1, len2);
}
