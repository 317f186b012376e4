import { test } from 'node:test';
import assert from 'node:assert/strict';
import { attributeContributors } from '../src/scoring/contributor-attribution.js';
import type { FileRecord } from '../src/types.js';

function fileRecord(path: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    path, loc: 50, complexity: 5, complexityMethod: 'structural',
    commitCount: 2, linesAdded: 20, linesRemoved: 5, bugFixCount: 0,
    authorCommits: new Map([['a@x', 2]]), uniqueAuthorCount: 1, ownershipEntropy: 0,
    topAuthor: 'a@x', firstCommitAt: 1700000000, lastCommitAt: 1700000100,
    fanOut: 0, fanIn: 0, dependencies: [],
    riskScore: 50, systemicRiskScore: 0, missingTestCoverageFactor: 0.5,
    mainFactor: 'Complexity (60.0%)', tier: 'HIGH',
    ...overrides,
  };
}

function table(...records: FileRecord[]): Map<string, FileRecord> {
  return new Map(records.map(r => [r.path, r]));
}

test('a sole author inherits the whole file', () => {
  const a = attributeContributors(table(fileRecord('src/a.ts'))).get('a@x');

  assert.equal(a?.totalCommits, 2);
  assert.equal(a?.linesAdded, 20);
  assert.equal(a?.linesRemoved, 5);
  assert.equal(a?.efficiencyScore, 20 / 7);
  assert.equal(a?.riskScore, 50);
  assert.equal(a?.filesTouched, 1);
});

test('shared files are split by commit share', () => {
  const contributors = attributeContributors(table(
    fileRecord('src/a.ts'),
    fileRecord('src/b.ts', {
      commitCount: 4,
      linesAdded: 40,
      linesRemoved: 8,
      bugFixCount: 2,
      authorCommits: new Map([['b@x', 2], ['a@x', 2]]),
      uniqueAuthorCount: 2,
      riskScore: 80,
    })
  ));

  assert.deepEqual([...contributors.keys()], ['a@x', 'b@x']);

  const a = contributors.get('a@x');
  assert.equal(a?.totalCommits, 4);
  assert.equal(a?.linesAdded, 40);
  assert.equal(a?.linesRemoved, 9);
  assert.equal(a?.bugFixCount, 1);
  assert.equal(a?.totalAttributionWeight, 1.5);
  assert.equal(a?.riskScore, 60);
  assert.equal(a?.efficiencyScore, 40 / 23);
  assert.equal(a?.filesTouched, 2);

  const b = contributors.get('b@x');
  assert.equal(b?.efficiencyScore, 1.25);
  assert.equal(b?.riskScore, 80);
  assert.equal(b?.filesTouched, 1);
});

test('files without commits or lines attribute nothing', () => {
  const contributors = attributeContributors(table(
    fileRecord('src/new.ts', { commitCount: 0, authorCommits: new Map([['ghost@x', 0]]) }),
    fileRecord('src/blank.ts', { loc: 0, authorCommits: new Map([['blank@x', 2]]) })
  ));
  assert.equal(contributors.size, 0);
});
