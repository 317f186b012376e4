import { isBugFixMessage } from './bug-correlation.js';
import { ownershipEntropy, topAuthor } from './ownership.js';
import type { GitHistorySource } from '../git/history-source.js';
import type {
  AnalysisWarning,
  FileCommit,
  FileTable,
  HistoryFileMetrics,
  StaticFileMetrics,
} from '../types.js';

export interface HistoryMining {
  files: FileTable<HistoryFileMetrics>;
  warnings: AnalysisWarning[];
}

/**
 * Adds churn, authorship and bug-fix counts to every scanned file.
 *
 * History problems never abort the run: when the root is not a checkout every
 * record is zero-filled and one warning is returned; when a single path's
 * history cannot be read only that record is zero-filled.
 */
export function mineHistory(
  root: string,
  files: FileTable<StaticFileMetrics>,
  source: GitHistorySource
): HistoryMining {
  const result = new Map<string, HistoryFileMetrics>();
  const warnings: AnalysisWarning[] = [];

  if (!source.isRepository(root)) {
    warnings.push({
      kind: 'history-unavailable',
      path: null,
      message: `${root} is not a git working tree; history metrics are zero`,
    });
    for (const [path, record] of files) result.set(path, summarizeHistory(record, []));
    return { files: result, warnings };
  }

  for (const [path, record] of files) {
    let commits: FileCommit[];
    try {
      commits = source.fileHistory(root, path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      warnings.push({ kind: 'history-unavailable', path, message });
      commits = [];
    }
    result.set(path, summarizeHistory(record, commits));
  }

  return { files: result, warnings };
}

/**
 * Folds one path's commits (oldest first) into history metrics. An empty list
 * yields the zeroed record.
 */
export function summarizeHistory(
  record: StaticFileMetrics,
  commits: FileCommit[]
): HistoryFileMetrics {
  const authorCommits = new Map<string, number>();
  let linesAdded = 0;
  let linesRemoved = 0;
  let bugFixCount = 0;

  for (const commit of commits) {
    authorCommits.set(commit.author, (authorCommits.get(commit.author) ?? 0) + 1);
    if (isBugFixMessage(commit.message)) bugFixCount++;

    if (commit.parents.length > 0 && commit.diff) {
      linesAdded   += commit.diff.additions;
      linesRemoved += commit.diff.deletions;
    }
  }

  return {
    ...record,
    commitCount:       commits.length,
    linesAdded,
    linesRemoved,
    bugFixCount,
    authorCommits,
    uniqueAuthorCount: authorCommits.size,
    ownershipEntropy:  ownershipEntropy(authorCommits),
    topAuthor:         topAuthor(authorCommits),
    firstCommitAt:     commits[0]?.timestamp ?? null,
    lastCommitAt:      commits[commits.length - 1]?.timestamp ?? null,
  };
}
