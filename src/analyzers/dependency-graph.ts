import { readFileSync } from 'fs';
import { basename, extname, join } from 'path';
import { extractImports, importPatternFor } from './import-patterns.js';
import type { DependencyEdge, FileTable, GraphFileMetrics, HistoryFileMetrics } from '../types.js';

/**
 * Maps an import token to one of the known files. Implementations may be as
 * rough or as exact as they like; the scoring only sees fan-in and fan-out.
 */
export interface DependencyResolver {
  resolve(token: string, from: string, candidates: readonly string[]): string | null;
}

/**
 * Best-effort resolver: the first candidate (in sorted order, never the
 * importing file itself) that contains the token as a substring, or whose
 * filename stem equals the token's, wins. No module resolution rules apply,
 * so `import 'os'` can land on `src/posts.py`.
 */
export class HeuristicResolver implements DependencyResolver {
  resolve(token: string, from: string, candidates: readonly string[]): string | null {
    const needle = stripRelativePrefix(token);
    if (!needle) return null;
    const needleStem = stem(needle);

    for (const candidate of candidates) {
      if (candidate === from) continue;
      if (candidate.includes(needle) || (needleStem !== '' && stem(candidate) === needleStem)) {
        return candidate;
      }
    }
    return null;
  }
}

export type SourceReader = (root: string, path: string) => string;

export interface GraphOptions {
  resolver?: DependencyResolver;
  readSource?: SourceReader;
}

export interface DependencyGraph {
  files: FileTable<GraphFileMetrics>;
  edges: DependencyEdge[];
}

const readFromDisk: SourceReader = (root, path) => readFileSync(join(root, path), 'utf8');

/**
 * Builds the file → file edge set from import statements and derives fan-out
 * (distinct targets) and fan-in (distinct sources) for every record.
 *
 * Files without a registered import pattern, or that cannot be read, add no
 * outgoing edges but can still be targets.
 */
export function buildDependencyGraph(
  root: string,
  files: FileTable<HistoryFileMetrics>,
  options: GraphOptions = {}
): DependencyGraph {
  const resolver = options.resolver ?? new HeuristicResolver();
  const readSource = options.readSource ?? readFromDisk;
  const candidates = [...files.keys()].sort();

  // source → distinct targets
  const targets = new Map<string, Set<string>>();

  for (const path of candidates) {
    const reached = new Set<string>();
    targets.set(path, reached);

    const pattern = importPatternFor(path);
    if (!pattern) continue;

    let source: string;
    try {
      source = readSource(root, path);
    } catch {
      continue;
    }

    for (const token of extractImports(source, pattern)) {
      const target = resolver.resolve(token, path, candidates);
      if (target && target !== path) reached.add(target);
    }
  }

  const fanIn = new Map<string, number>(candidates.map(p => [p, 0]));
  const edges: DependencyEdge[] = [];
  for (const [from, reached] of targets) {
    for (const to of [...reached].sort()) {
      fanIn.set(to, (fanIn.get(to) ?? 0) + 1);
      edges.push({ from, to });
    }
  }

  const result = new Map<string, GraphFileMetrics>();
  for (const [path, record] of files) {
    const reached = targets.get(path) ?? new Set<string>();
    result.set(path, {
      ...record,
      fanOut: reached.size,
      fanIn: fanIn.get(path) ?? 0,
      dependencies: [...reached].sort(),
    });
  }

  return { files: result, edges };
}

// './a/b', '../../a/b', '/a/b' → 'a/b'
function stripRelativePrefix(token: string): string {
  return token.trim().replace(/^(?:\.{1,2}\/)+/, '').replace(/^\/+/, '');
}

function stem(path: string): string {
  const name = basename(path);
  return basename(name, extname(name));
}
