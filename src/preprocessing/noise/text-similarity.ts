/**
 * Character-set overlap (Jaccard) between two strings, case-insensitive.
 *
 * Unordered: "12" and "21" score 1.0. Short strings over-match; callers rely
 * on this to absorb running page numbers inside otherwise constant lines.
 */
export function characterSetSimilarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const setA = new Set(Array.from(a.toLowerCase()));
  const setB = new Set(Array.from(b.toLowerCase()));

  let intersection = 0;
  for (const ch of setA) {
    if (setB.has(ch)) {
      intersection++;
    }
  }

  const union = setA.size + setB.size - intersection;
  return union > 0 ? intersection / union : 0;
}
