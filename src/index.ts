export { runAnalysis, STAGES, type AnalysisOptions, type StageName } from './pipeline.js';
export {
  DEFAULT_CONFIG,
  loadConfigFile,
  findConfigFile,
  resolveConfig,
  type AnalysisConfig,
} from './config.js';
export { RepositoryAccessError, ConfigError } from './errors.js';
export { scanRepository } from './analyzers/static-scanner.js';
export { mineHistory } from './analyzers/history-miner.js';
export { buildDependencyGraph, HeuristicResolver, type DependencyResolver } from './analyzers/dependency-graph.js';
export { GitCliHistorySource, type GitHistorySource } from './git/history-source.js';
export {
  scoreFiles,
  computeMaxima,
  normalize,
  describeMainFactor,
  missingTestCoverageFactor,
  RISK_WEIGHTS,
} from './scoring/metrics-engine.js';
export { attributeContributors } from './scoring/contributor-attribution.js';
export { toReport, type Report } from './reporters/json.js';
export type * from './types.js';
