import type {
  CoverageFactor,
  FactorContributions,
  FactorName,
  FileRecord,
  FileTable,
  GraphFileMetrics,
  MaxValues,
  RepositoryStats,
  Tier,
} from '../types.js';

/** Fixed weights of the risk score; they sum to 1. */
export const RISK_WEIGHTS: Readonly<Record<FactorName, number>> = {
  Complexity: 0.30,
  Churn:      0.20,
  Entropy:    0.15,
  Bugs:       0.25,
  Dependency: 0.10,
};

/** Tie-break order for the main contributing factor: earlier wins. */
export const FACTOR_ORDER: readonly FactorName[] = ['Complexity', 'Churn', 'Entropy', 'Bugs', 'Dependency'];

/** Below this total contribution a file is reported as stable. */
export const NOISE_THRESHOLD = 0.01;
export const STABLE_LABEL = 'Low Risk / High Stability';

// Used when there are no files to take a maximum over.
const EMPTY_MAXIMA: MaxValues = {
  complexity:       1,
  totalChurn:       1,
  ownershipEntropy: 1.0,
  bugFixFreq:       0.1,
  dependencyScore:  1,
};

const TIER_THRESHOLDS = {
  CRITICAL: 75,
  HIGH:     50,
  MEDIUM:   25,
} as const;

const CRITICAL_PATH_KEYWORDS = ['model', 'interface', 'util', 'core', 'api', 'database'];
const TEST_SUFFIXES = ['_spec.rb', '_test.py', '.spec.ts', '.spec.tsx', '.spec.js', '.spec.jsx'];

/**
 * Min-max normalization clamped to [0, 1]. A degenerate range (max == min, or
 * max == 0) yields 0.
 */
export function normalize(value: number, max: number, min: number = 0): number {
  if (max === min || max === 0) return 0;
  const v = Math.max(min, value);
  return Math.min(1, (v - min) / (max - min));
}

export const totalChurn = (f: GraphFileMetrics) => f.linesAdded + f.linesRemoved;
export const bugFixFrequency = (f: GraphFileMetrics) => f.bugFixCount / Math.max(f.commitCount, 1);
export const dependencyScore = (f: GraphFileMetrics) => f.fanIn * 2 + f.fanOut;

/**
 * First pass: the normalization denominators. The returned object is frozen
 * so nothing can move the maxima while scores are computed against them.
 */
export function computeMaxima(files: Iterable<GraphFileMetrics>): Readonly<MaxValues> {
  const eligible = [...files].filter(f => f.loc > 0);
  if (eligible.length === 0) return Object.freeze({ ...EMPTY_MAXIMA });

  return Object.freeze({
    complexity:       maxOf(eligible, f => f.complexity),
    totalChurn:       maxOf(eligible, totalChurn),
    ownershipEntropy: 1.0,
    bugFixFreq:       maxOf(eligible, bugFixFrequency),
    dependencyScore:  maxOf(eligible, dependencyScore),
  });
}

function maxOf(files: GraphFileMetrics[], metric: (f: GraphFileMetrics) => number): number {
  return files.reduce((max, f) => Math.max(max, metric(f)), -Infinity);
}

/** The five weighted, normalized metrics whose sum (×100) is the risk score. */
export function factorContributions(
  file: GraphFileMetrics,
  maxima: Readonly<MaxValues>
): FactorContributions {
  return {
    Complexity: normalize(file.complexity, maxima.complexity) * RISK_WEIGHTS.Complexity,
    Churn:      normalize(totalChurn(file), maxima.totalChurn) * RISK_WEIGHTS.Churn,
    Entropy:    normalize(file.ownershipEntropy, maxima.ownershipEntropy) * RISK_WEIGHTS.Entropy,
    Bugs:       normalize(bugFixFrequency(file), maxima.bugFixFreq) * RISK_WEIGHTS.Bugs,
    Dependency: normalize(dependencyScore(file), maxima.dependencyScore) * RISK_WEIGHTS.Dependency,
  };
}

export function riskScoreOf(contributions: FactorContributions): number {
  const sum = FACTOR_ORDER.reduce((acc, name) => acc + contributions[name], 0);
  return Math.min(100, Math.max(0, sum * 100));
}

/**
 * Names the factor explaining most of the risk and its share of the total
 * contribution, e.g. "Bugs (41.7%)". Ties go to the factor listed first in
 * FACTOR_ORDER.
 */
export function describeMainFactor(contributions: FactorContributions): string {
  let winner: FactorName = FACTOR_ORDER[0] ?? 'Complexity';
  let total = 0;

  for (const name of FACTOR_ORDER) {
    total += contributions[name];
    if (contributions[name] > contributions[winner]) winner = name;
  }

  if (total < NOISE_THRESHOLD) return STABLE_LABEL;
  return `${winner} (${((contributions[winner] * 100) / total).toFixed(1)}%)`;
}

/**
 * Guesses how likely a file is to lack tests from its path alone:
 * 0.1 for test files, 1.0 for critical-looking paths, 0.5 otherwise.
 */
export function missingTestCoverageFactor(path: string): CoverageFactor {
  const lower = path.toLowerCase();
  if (lower.includes('test') || TEST_SUFFIXES.some(s => lower.endsWith(s))) return 0.1;
  if (CRITICAL_PATH_KEYWORDS.some(k => lower.includes(k))) return 1.0;
  return 0.5;
}

export function riskTier(score: number): Tier {
  if (score >= TIER_THRESHOLDS.CRITICAL) return 'CRITICAL';
  if (score >= TIER_THRESHOLDS.HIGH)     return 'HIGH';
  if (score >= TIER_THRESHOLDS.MEDIUM)   return 'MEDIUM';
  return 'LOW';
}

export interface Scoring {
  files: FileTable<FileRecord>;
  stats: RepositoryStats;
}

/**
 * Second pass: risk score, systemic risk and main factor for every file,
 * against maxima fixed beforehand. Scoring the same table twice gives
 * identical numbers.
 */
export function scoreFiles(files: FileTable<GraphFileMetrics>): Scoring {
  const maxima = computeMaxima(files.values());
  const scored = new Map<string, FileRecord>();
  let maxSystemic = 0;
  let riskSum = 0;

  for (const [path, file] of files) {
    if (file.loc <= 0) continue;

    const contributions = factorContributions(file, maxima);
    const riskScore = riskScoreOf(contributions);
    const coverage = missingTestCoverageFactor(path);
    const systemicRiskScore = file.fanIn * riskScore * coverage;

    maxSystemic = Math.max(maxSystemic, systemicRiskScore);
    riskSum += riskScore;

    scored.set(path, {
      ...file,
      riskScore,
      systemicRiskScore,
      missingTestCoverageFactor: coverage,
      mainFactor: describeMainFactor(contributions),
      tier: riskTier(riskScore),
    });
  }

  const stats: RepositoryStats = {
    maxValues: Object.freeze({ ...maxima, systemicRiskScore: maxSystemic }),
    overallTechnicalDebt: scored.size > 0 ? riskSum / scored.size : 0,
    fileCount: scored.size,
  };

  return { files: scored, stats };
}
