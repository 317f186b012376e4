import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ComplexityAnalyzer, keywordComplexity, markupComplexity } from '../src/analyzers/complexity.js';

const analyzer = new ComplexityAnalyzer();

test('structural complexity counts branches, loops and boolean operators', () => {
  const source = [
    'export function pick(a: number, b: number): number {',
    '  if (a > b && b > 0) {',
    '    return a;',
    '  }',
    '  for (const x of [a, b]) {',
    '    if (x === 0 || x === 1 || x === 2) return x;',
    '  }',
    '  return b;',
    '}',
  ].join('\n');

  // 1 base + function + 2 ifs + for-of + one && + two ||
  assert.deepEqual(analyzer.measure('src/pick.ts', source), { complexity: 8, method: 'structural' });
});

test('structural complexity counts class members, arrows, catch and ternaries', () => {
  const source = [
    'class Box {',
    '  constructor(private v: number) {}',
    '  get value() { return this.v; }',
    '  map(fn: (n: number) => number) { return new Box(fn(this.v)); }',
    '}',
    'const twice = (n: number) => n * 2;',
    "try { new Box(1).map(twice); } catch (e) { console.log(e ? 'y' : 'n'); }",
  ].join('\n');

  // 1 base + class + constructor + getter + method + arrow + catch + ternary
  assert.deepEqual(analyzer.measure('src/box.ts', source), { complexity: 8, method: 'structural' });
});

test('an empty-bodied module has the base complexity', () => {
  assert.deepEqual(analyzer.measure('src/consts.js', 'export const A = 1;\n'), { complexity: 1, method: 'structural' });
});

test('sources that fail to parse fall back to the markup heuristic', () => {
  const source = [
    '<div class="card">',
    '<section>',
    'function (',
    '</section>',
    '</div>',
  ].join('\n');

  assert.deepEqual(analyzer.measure('views/card.ts', source), { complexity: 3, method: 'markup' });
});

test('other languages use the keyword heuristic for their extension', () => {
  const python = [
    'class A:',
    '    def f(self, x):',
    '        if x:',
    '            return 1',
    '        elif x is None:',
    '            return 2',
  ].join('\n');
  // class + def + "if " twice ("elif " contains it)
  assert.deepEqual(analyzer.measure('pkg/a.py', python), { complexity: 5, method: 'keyword' });

  const java = 'public class Main {\n  void run() { if (a) {} if (b) {} }\n}\n';
  assert.deepEqual(analyzer.measure('src/Main.java', java), { complexity: 4, method: 'keyword' });
});

test('markupComplexity and keywordComplexity count plain substrings', () => {
  assert.equal(markupComplexity('<div><div></div><section></section></div>'), 4);
  assert.equal(markupComplexity('plain text'), 1);
  assert.equal(keywordComplexity('// function in a comment\nfunction a() {}'), 3);
});
