import { statSync } from 'fs';
import { resolve } from 'path';
import dayjs from 'dayjs';
import { DEFAULT_CONFIG, type AnalysisConfig } from './config.js';
import { RepositoryAccessError } from './errors.js';
import { createSourceFilter } from './filters/file-filter.js';
import { scanRepository } from './analyzers/static-scanner.js';
import { mineHistory } from './analyzers/history-miner.js';
import { buildDependencyGraph, type DependencyResolver, type SourceReader } from './analyzers/dependency-graph.js';
import { scoreFiles } from './scoring/metrics-engine.js';
import { attributeContributors } from './scoring/contributor-attribution.js';
import { GitCliHistorySource, type GitHistorySource } from './git/history-source.js';
import type { AnalysisResult, AnalysisWarning } from './types.js';

export const STAGES = [
  'Scanning source files...',
  'Mining commit history...',
  'Building dependency graph...',
  'Scoring technical debt...',
  'Attributing contributors...',
] as const;

export type StageName = (typeof STAGES)[number];

export interface AnalysisOptions {
  config?: AnalysisConfig;
  historySource?: GitHistorySource;
  resolver?: DependencyResolver;
  readSource?: SourceReader;
  /** Called before each stage starts; `index` is 1-based. */
  onStage?: (stage: StageName, index: number, total: number) => void;
}

/**
 * Runs the five analysis stages over one working tree, strictly in order:
 * each stage returns a new file table that the next one extends.
 *
 * Throws RepositoryAccessError when `root` is not a readable directory;
 * every other problem ends up in `warnings`.
 */
export function runAnalysis(root: string, options: AnalysisOptions = {}): AnalysisResult {
  const absRoot = resolve(root);
  assertDirectory(absRoot);

  const config = options.config ?? DEFAULT_CONFIG;
  const historySource = options.historySource ?? new GitCliHistorySource();
  const warnings: AnalysisWarning[] = [];
  const stage = (index: number) => {
    const name = STAGES[index - 1];
    if (name && options.onStage) options.onStage(name, index, STAGES.length);
  };

  stage(1);
  const scan = scanRepository(absRoot, createSourceFilter(config.extensions, config.ignoreDirs));
  for (const path of scan.unreadable) {
    warnings.push({ kind: 'input-unreadable', path, message: `Could not read ${path}; skipped` });
  }

  stage(2);
  const history = mineHistory(absRoot, scan.files, historySource);
  warnings.push(...history.warnings);

  stage(3);
  const graph = buildDependencyGraph(absRoot, history.files, {
    resolver: options.resolver,
    readSource: options.readSource,
  });

  stage(4);
  const { files, stats } = scoreFiles(graph.files);

  stage(5);
  const contributors = attributeContributors(files);

  return {
    root: absRoot,
    analyzedAt: dayjs().toISOString(),
    files,
    stats,
    contributors,
    edges: graph.edges,
    warnings,
  };
}

function assertDirectory(root: string): void {
  let isDir: boolean;
  try {
    isDir = statSync(root).isDirectory();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RepositoryAccessError(root, message);
  }
  if (!isDir) throw new RepositoryAccessError(root, 'not a directory');
}
