import { test } from 'node:test';
import assert from 'node:assert/strict';
import { toReport } from '../src/reporters/json.js';
import { scoreFiles } from '../src/scoring/metrics-engine.js';
import { attributeContributors } from '../src/scoring/contributor-attribution.js';
import type { AnalysisResult, GraphFileMetrics } from '../src/types.js';

function graphRecord(path: string, complexity: number, authors: [string, number][]): GraphFileMetrics {
  const commitCount = authors.reduce((n, [, c]) => n + c, 0);
  return {
    path, loc: 10, complexity, complexityMethod: 'structural',
    commitCount, linesAdded: 10, linesRemoved: 2, bugFixCount: 0,
    authorCommits: new Map(authors), uniqueAuthorCount: authors.length, ownershipEntropy: 0,
    topAuthor: authors[0]?.[0] ?? null, firstCommitAt: null, lastCommitAt: null,
    fanOut: 0, fanIn: 0, dependencies: [],
  };
}

function sampleResult(): AnalysisResult {
  const { files, stats } = scoreFiles(new Map([
    ['src/b.ts', graphRecord('src/b.ts', 4, [['zed@x', 1]])],
    ['src/a.ts', graphRecord('src/a.ts', 4, [['amy@x', 1]])],
    ['src/hot.ts', graphRecord('src/hot.ts', 8, [['amy@x', 3]])],
  ]));
  return {
    root: '/repo',
    analyzedAt: '2026-01-02T03:04:05.000Z',
    files,
    stats,
    contributors: attributeContributors(files),
    edges: [{ from: 'src/a.ts', to: 'src/hot.ts' }],
    warnings: [],
  };
}

test('toReport orders files by risk, then path', () => {
  const report = toReport(sampleResult());
  assert.deepEqual(report.files.map(f => f.path), ['src/hot.ts', 'src/a.ts', 'src/b.ts']);
});

test('toReport turns author maps into plain objects', () => {
  const report = toReport(sampleResult());
  assert.deepEqual(report.files[0]?.authorCommits, { 'amy@x': 3 });
  assert.equal(JSON.parse(JSON.stringify(report)).files[0].authorCommits['amy@x'], 3);
});

test('toReport orders contributors by efficiency, then author', () => {
  const report = toReport(sampleResult());

  // amy: 20 added / (4 commits + 4 removed); zed: 10 / (1 + 2)
  assert.deepEqual(report.contributors.map(c => c.author), ['zed@x', 'amy@x']);
  assert.equal(report.contributors[1]?.efficiencyScore, 20 / 8);
  assert.deepEqual(report.meta, {
    root: '/repo',
    analyzedAt: '2026-01-02T03:04:05.000Z',
    fileCount: 3,
    contributorCount: 2,
    overallTechnicalDebt: report.stats.overallTechnicalDebt,
  });
  assert.deepEqual(report.edges, [{ from: 'src/a.ts', to: 'src/hot.ts' }]);
});
