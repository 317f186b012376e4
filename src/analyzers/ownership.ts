/**
 * Authorship dispersion of one file, 0–1.
 *
 * Shannon entropy of the per-author commit distribution divided by its
 * maximum, log(authorCount). A single owner scores 0; authors with equal
 * commit counts score 1.
 */
export function ownershipEntropy(authorCommits: ReadonlyMap<string, number>): number {
  const counts = [...authorCommits.values()].filter(c => c > 0);
  if (counts.length <= 1) return 0;

  const total = counts.reduce((sum, c) => sum + c, 0);
  let entropy = 0;
  for (const count of counts) {
    const p = count / total;
    entropy -= p * Math.log(p);
  }

  return Math.min(1, Math.max(0, entropy / Math.log(counts.length)));
}

/** Author with the most commits; the first one seen wins ties. */
export function topAuthor(authorCommits: ReadonlyMap<string, number>): string | null {
  let top: string | null = null;
  let topCount = 0;
  for (const [author, count] of authorCommits) {
    if (count > topCount) {
      top = author;
      topCount = count;
    }
  }
  return top;
}
