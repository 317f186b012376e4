import type { ContributorRecord, FileRecord, FileTable } from '../types.js';

// A bug fix costs as much as ten ordinary commits in the efficiency score.
export const BUG_PENALTY_FACTOR = 10;

/**
 * Spreads file-level metrics over the authors who touched each file.
 *
 * An author's share of a file is their fraction of its commits, not of its
 * lines: half the commits earns half the churn, bug fixes and risk. Authors
 * appear only once they have touched a scored file with history.
 */
export function attributeContributors(
  files: FileTable<FileRecord>
): Map<string, ContributorRecord> {
  const contributors = new Map<string, ContributorRecord>();

  for (const file of files.values()) {
    if (file.loc <= 0 || file.commitCount === 0) continue;

    for (const [author, commits] of file.authorCommits) {
      const share = commits / file.commitCount;

      let c = contributors.get(author);
      if (!c) {
        c = emptyContributor(author);
        contributors.set(author, c);
      }

      c.totalCommits           += commits;
      c.linesAdded             += file.linesAdded * share;
      c.linesRemoved           += file.linesRemoved * share;
      c.bugFixCount            += file.bugFixCount * share;
      c.riskContributionSum    += file.riskScore * share;
      c.totalAttributionWeight += share;
      c.filesTouched           += 1;
    }
  }

  const result = new Map<string, ContributorRecord>();
  for (const author of [...contributors.keys()].sort()) {
    const c = contributors.get(author);
    if (!c) continue;

    const cost = c.totalCommits + c.linesRemoved + c.bugFixCount * BUG_PENALTY_FACTOR;
    result.set(author, {
      ...c,
      efficiencyScore: cost > 0 ? c.linesAdded / cost : 0,
      // weighted average of the risk of the files the author touched
      riskScore: c.totalAttributionWeight > 0 ? c.riskContributionSum / c.totalAttributionWeight : 0,
    });
  }

  return result;
}

function emptyContributor(author: string): ContributorRecord {
  return {
    author,
    totalCommits: 0,
    linesAdded: 0,
    linesRemoved: 0,
    bugFixCount: 0,
    riskContributionSum: 0,
    totalAttributionWeight: 0,
    efficiencyScore: 0,
    riskScore: 0,
    filesTouched: 0,
  };
}
