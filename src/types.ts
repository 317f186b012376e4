// ─── File Tables ──────────────────────────────────────────────────────────────

/** Repository-relative path (forward slashes) → record produced by one stage. */
export type FileTable<T> = ReadonlyMap<string, T>;

export type ComplexityMethod = 'structural' | 'markup' | 'keyword';

export interface StaticFileMetrics {
  path: string;
  loc: number;
  complexity: number;
  complexityMethod: ComplexityMethod;
}

export interface HistoryFileMetrics extends StaticFileMetrics {
  commitCount: number;
  linesAdded: number;
  linesRemoved: number;
  bugFixCount: number;
  authorCommits: ReadonlyMap<string, number>;
  uniqueAuthorCount: number;
  ownershipEntropy: number;
  topAuthor: string | null;
  firstCommitAt: number | null;
  lastCommitAt: number | null;
}

export interface GraphFileMetrics extends HistoryFileMetrics {
  fanOut: number;
  fanIn: number;
  dependencies: string[];
}

export type CoverageFactor = 0.1 | 0.5 | 1.0;

export type Tier = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface FileRecord extends GraphFileMetrics {
  riskScore: number;
  systemicRiskScore: number;
  missingTestCoverageFactor: CoverageFactor;
  mainFactor: string;
  tier: Tier;
}

// ─── Core Git Data ────────────────────────────────────────────────────────────

export interface DiffStats {
  additions: number;
  deletions: number;
}

export interface FileCommit {
  hash: string;
  parents: string[];
  author: string;
  timestamp: number;
  message: string;
  /** Line counts for the path against the first parent; null when unavailable. */
  diff: DiffStats | null;
}

// ─── Dependency Graph ─────────────────────────────────────────────────────────

export interface DependencyEdge {
  from: string;
  to: string;
}

// ─── Scoring ──────────────────────────────────────────────────────────────────

export type FactorName = 'Complexity' | 'Churn' | 'Entropy' | 'Bugs' | 'Dependency';

export type FactorContributions = Record<FactorName, number>;

export interface MaxValues {
  complexity: number;
  totalChurn: number;
  ownershipEntropy: number;
  bugFixFreq: number;
  dependencyScore: number;
}

export interface RepositoryStats {
  maxValues: Readonly<MaxValues & { systemicRiskScore: number }>;
  overallTechnicalDebt: number;
  fileCount: number;
}

export interface ContributorRecord {
  author: string;
  totalCommits: number;
  linesAdded: number;
  linesRemoved: number;
  bugFixCount: number;
  riskContributionSum: number;
  totalAttributionWeight: number;
  efficiencyScore: number;
  riskScore: number;
  filesTouched: number;
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export type WarningKind = 'input-unreadable' | 'history-unavailable';

export interface AnalysisWarning {
  kind: WarningKind;
  /** Affected path, or null when the warning concerns the whole repository. */
  path: string | null;
  message: string;
}

export interface AnalysisResult {
  root: string;
  analyzedAt: string;
  files: FileTable<FileRecord>;
  stats: RepositoryStats;
  contributors: ReadonlyMap<string, ContributorRecord>;
  edges: DependencyEdge[];
  warnings: AnalysisWarning[];
}
