import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  computeMaxima,
  describeMainFactor,
  missingTestCoverageFactor,
  normalize,
  riskTier,
  RISK_WEIGHTS,
  scoreFiles,
  STABLE_LABEL,
} from '../src/scoring/metrics-engine.js';
import type { GraphFileMetrics } from '../src/types.js';

function graphRecord(path: string, overrides: Partial<GraphFileMetrics> = {}): GraphFileMetrics {
  return {
    path, loc: 50, complexity: 5, complexityMethod: 'structural',
    commitCount: 2, linesAdded: 20, linesRemoved: 5, bugFixCount: 0,
    authorCommits: new Map([['a@x', 2]]), uniqueAuthorCount: 1, ownershipEntropy: 0,
    topAuthor: 'a@x', firstCommitAt: 1700000000, lastCommitAt: 1700000100,
    fanOut: 0, fanIn: 0, dependencies: [],
    ...overrides,
  };
}

function table(...records: GraphFileMetrics[]): Map<string, GraphFileMetrics> {
  return new Map(records.map(r => [r.path, r]));
}

function assertClose(actual: number | undefined, expected: number, message?: string): void {
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, message ?? `${actual} ≉ ${expected}`);
}

test('normalize clamps to [0, 1] and treats a degenerate range as 0', () => {
  assert.equal(normalize(5, 10), 0.5);
  assert.equal(normalize(15, 10), 1);
  assert.equal(normalize(-3, 10), 0);
  assert.equal(normalize(4, 4, 4), 0);
  assert.equal(normalize(7, 0), 0);
  assert.equal(normalize(6, 10, 2), 0.5);
});

test('risk weights sum to 1', () => {
  const sum = Object.values(RISK_WEIGHTS).reduce((a, b) => a + b, 0);
  assertClose(sum, 1);
});

test('a lone single-author file scores on complexity and churn only', () => {
  const { files, stats } = scoreFiles(table(graphRecord('src/a.ts')));
  const a = files.get('src/a.ts');

  assertClose(a?.riskScore, 50);
  assert.equal(a?.mainFactor, 'Complexity (60.0%)');
  assert.equal(a?.tier, 'HIGH');
  assert.equal(a?.missingTestCoverageFactor, 0.5);
  assert.equal(a?.systemicRiskScore, 0);
  assert.equal(stats.fileCount, 1);
  assertClose(stats.overallTechnicalDebt, 50);
  assert.deepEqual(
    { ...stats.maxValues },
    { complexity: 5, totalChurn: 25, ownershipEntropy: 1, bugFixFreq: 0, dependencyScore: 0, systemicRiskScore: 0 }
  );
});

test('shared ownership and bug fixes raise the score to 90', () => {
  const record = graphRecord('src/a.ts', {
    authorCommits: new Map([['a@x', 1], ['b@x', 1]]),
    uniqueAuthorCount: 2,
    ownershipEntropy: 1,
    bugFixCount: 1,
  });
  const a = scoreFiles(table(record)).files.get('src/a.ts');

  assertClose(a?.riskScore, 90);
  assert.equal(a?.mainFactor, 'Complexity (33.3%)');
  assert.equal(a?.tier, 'CRITICAL');
});

test('systemic risk multiplies fan-in, risk and the coverage factor', () => {
  const { files, stats } = scoreFiles(table(graphRecord('src/database/conn.ts', { fanIn: 3 })));
  const conn = files.get('src/database/conn.ts');

  // complexity 0.30 + churn 0.20 + dependency 0.10
  assertClose(conn?.riskScore, 60);
  assert.equal(conn?.missingTestCoverageFactor, 1.0);
  assertClose(conn?.systemicRiskScore, 180);
  assertClose(stats.maxValues.systemicRiskScore, 180);
});

test('scores are relative to the repository maxima', () => {
  const { files, stats } = scoreFiles(table(
    graphRecord('src/big.ts', { complexity: 10, linesAdded: 40, linesRemoved: 10 }),
    graphRecord('src/small.ts', { complexity: 5, linesAdded: 20, linesRemoved: 5 })
  ));

  assertClose(files.get('src/big.ts')?.riskScore, 50);
  assertClose(files.get('src/small.ts')?.riskScore, 25);
  assert.equal(files.get('src/small.ts')?.tier, 'MEDIUM');
  assertClose(stats.overallTechnicalDebt, 37.5);
});

test('files without lines are left out of scoring and maxima', () => {
  const { files, stats } = scoreFiles(table(
    graphRecord('src/a.ts'),
    graphRecord('src/empty.ts', { loc: 0, complexity: 99 })
  ));

  assert.equal(files.has('src/empty.ts'), false);
  assert.equal(stats.fileCount, 1);
  assert.equal(stats.maxValues.complexity, 5);
});

test('an empty table falls back to default maxima', () => {
  const { files, stats } = scoreFiles(new Map());

  assert.equal(files.size, 0);
  assert.equal(stats.overallTechnicalDebt, 0);
  assert.deepEqual(
    { ...stats.maxValues },
    { complexity: 1, totalChurn: 1, ownershipEntropy: 1, bugFixFreq: 0.1, dependencyScore: 1, systemicRiskScore: 0 }
  );
  assert.ok(Object.isFrozen(computeMaxima([])));
});

test('a file with nothing to report is labelled stable', () => {
  const quiet = graphRecord('src/quiet.ts', {
    complexity: 0, commitCount: 0, linesAdded: 0, linesRemoved: 0,
    authorCommits: new Map(), uniqueAuthorCount: 0, topAuthor: null,
  });
  const q = scoreFiles(table(quiet)).files.get('src/quiet.ts');

  assert.equal(q?.riskScore, 0);
  assert.equal(q?.mainFactor, STABLE_LABEL);
  assert.equal(q?.tier, 'LOW');
});

test('scoring the same table twice gives identical results', () => {
  const input = table(
    graphRecord('src/a.ts', { fanIn: 2, fanOut: 1 }),
    graphRecord('src/b.ts', { complexity: 9, bugFixCount: 1 })
  );
  assert.deepEqual(scoreFiles(input), scoreFiles(input));
});

test('describeMainFactor breaks ties in factor order', () => {
  const label = describeMainFactor({ Complexity: 0, Churn: 0.2, Entropy: 0, Bugs: 0.2, Dependency: 0 });
  assert.equal(label, 'Churn (50.0%)');
  assert.equal(describeMainFactor({ Complexity: 0.004, Churn: 0.004, Entropy: 0, Bugs: 0, Dependency: 0 }), STABLE_LABEL);
});

test('missingTestCoverageFactor reads test and critical paths', () => {
  assert.equal(missingTestCoverageFactor('tests/parser.ts'), 0.1);
  assert.equal(missingTestCoverageFactor('spec/user_spec.rb'), 0.1);
  assert.equal(missingTestCoverageFactor('src/Button.spec.tsx'), 0.1);
  assert.equal(missingTestCoverageFactor('src/api/routes.ts'), 1.0);
  assert.equal(missingTestCoverageFactor('src/Core/engine.go'), 1.0);
  assert.equal(missingTestCoverageFactor('src/main.ts'), 0.5);
});

test('riskTier thresholds', () => {
  assert.equal(riskTier(75), 'CRITICAL');
  assert.equal(riskTier(74.9), 'HIGH');
  assert.equal(riskTier(50), 'HIGH');
  assert.equal(riskTier(25), 'MEDIUM');
  assert.equal(riskTier(24.99), 'LOW');
});
