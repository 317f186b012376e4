import { writeFileSync } from 'fs';
import type {
  AnalysisResult,
  AnalysisWarning,
  ContributorRecord,
  DependencyEdge,
  FileRecord,
  RepositoryStats,
} from '../types.js';

export type SerializedFile = Omit<FileRecord, 'authorCommits'> & {
  authorCommits: Record<string, number>;
};

export interface ReportMeta {
  root: string;
  analyzedAt: string;
  fileCount: number;
  contributorCount: number;
  overallTechnicalDebt: number;
}

export interface Report {
  meta: ReportMeta;
  stats: RepositoryStats;
  files: SerializedFile[];
  contributors: ContributorRecord[];
  edges: DependencyEdge[];
  warnings: AnalysisWarning[];
}

/**
 * Plain-object form of a result: files by risk score (desc, then path),
 * contributors by efficiency (desc, then author).
 */
export function toReport(result: AnalysisResult): Report {
  const files = [...result.files.values()]
    .sort((a, b) => b.riskScore - a.riskScore || compare(a.path, b.path))
    .map((f): SerializedFile => ({ ...f, authorCommits: Object.fromEntries(f.authorCommits) }));

  const contributors = [...result.contributors.values()]
    .sort((a, b) => b.efficiencyScore - a.efficiencyScore || compare(a.author, b.author));

  return {
    meta: {
      root: result.root,
      analyzedAt: result.analyzedAt,
      fileCount: result.stats.fileCount,
      contributorCount: result.contributors.size,
      overallTechnicalDebt: result.stats.overallTechnicalDebt,
    },
    stats: result.stats,
    files,
    contributors,
    edges: result.edges,
    warnings: result.warnings,
  };
}

/**
 * Outputs the report as machine-readable JSON.
 * If outputFile is provided, writes to disk; otherwise writes to stdout.
 */
export function reportJson(result: AnalysisResult, outputFile: string | null = null): void {
  const payload = JSON.stringify(toReport(result), null, 2);

  if (outputFile) {
    writeFileSync(outputFile, payload, 'utf8');
    console.error(`✓ JSON report written to ${outputFile}`);
  } else {
    process.stdout.write(payload + '\n');
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
