import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createSourceFilter, isSkippedDir, isSourceFile } from '../src/filters/file-filter.js';

const filter = createSourceFilter(['.ts', '.py', '.html'], ['node_modules']);

test('isSourceFile keeps allow-listed extensions only', () => {
  assert.equal(isSourceFile('src/app.ts', filter), true);
  assert.equal(isSourceFile('scripts/build.py', filter), true);
  assert.equal(isSourceFile('README.md', filter), false);
  assert.equal(isSourceFile('assets/logo.png', filter), false);
});

test('isSourceFile matches extensions case-insensitively', () => {
  assert.equal(isSourceFile('web/INDEX.HTML', filter), true);
});

test('isSourceFile skips version-control and ignored directories', () => {
  assert.equal(isSourceFile('.git/hooks/pre-commit.py', filter), false);
  assert.equal(isSourceFile('vendor/.hg/x.py', filter), false);
  assert.equal(isSourceFile('node_modules/lodash/index.ts', filter), false);
  assert.equal(isSourceFile('src/node_modules.ts', filter), true, 'only directory segments are checked');
});

test('isSkippedDir always skips VCS metadata even with an empty ignore list', () => {
  const bare = createSourceFilter(['.ts'], []);
  assert.equal(isSkippedDir('.git', bare), true);
  assert.equal(isSkippedDir('.svn', bare), true);
  assert.equal(isSkippedDir('node_modules', bare), false);
});
