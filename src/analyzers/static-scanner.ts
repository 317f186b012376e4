import { readFileSync, readdirSync, realpathSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { ComplexityAnalyzer } from './complexity.js';
import { isSkippedDir, isSourceFile, type SourceFilter } from '../filters/file-filter.js';
import type { FileTable, StaticFileMetrics } from '../types.js';

export interface StaticScan {
  files: FileTable<StaticFileMetrics>;
  /** Paths that matched the filter but could not be read. */
  unreadable: string[];
}

/**
 * Walks the working tree and measures size and complexity of every
 * allow-listed source file.
 *
 * Empty files (no non-blank lines) and unreadable files produce no record.
 */
export function scanRepository(root: string, filter: SourceFilter): StaticScan {
  const analyzer = new ComplexityAnalyzer();
  const files = new Map<string, StaticFileMetrics>();
  const unreadable: string[] = [];

  for (const relPath of listSourceFiles(root, filter)) {
    let source: string;
    try {
      // Invalid UTF-8 sequences decode to U+FFFD instead of throwing.
      source = readFileSync(join(root, relPath), 'utf8');
    } catch {
      unreadable.push(relPath);
      continue;
    }

    const loc = countLines(source);
    if (loc === 0) continue;

    const { complexity, method } = analyzer.measure(relPath, source);
    files.set(relPath, { path: relPath, loc, complexity, complexityMethod: method });
  }

  return { files, unreadable };
}

/** Non-blank line count. */
export function countLines(source: string): number {
  let loc = 0;
  for (const line of source.split(/\r\n|\r|\n/)) {
    if (line.trim()) loc++;
  }
  return loc;
}

/**
 * Lists allow-listed files as repository-relative, '/'-separated paths,
 * sorted. Symlinked directories are followed once.
 */
export function listSourceFiles(root: string, filter: SourceFilter): string[] {
  const found: string[] = [];
  const visited = new Set<string>();

  const walk = (dir: string, rel: string): void => {
    let realDir: string;
    try { realDir = realpathSync(dir); } catch { return; }
    if (visited.has(realDir)) return;
    visited.add(realDir);

    let entries: Dirent[];
    try { entries = readdirSync(dir, { withFileTypes: true }); } catch { return; }

    for (const entry of entries) {
      const relPath = rel ? `${rel}/${entry.name}` : entry.name;
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(fullPath))) {
        if (!isSkippedDir(entry.name, filter)) walk(fullPath, relPath);
        continue;
      }
      if (isSourceFile(relPath, filter)) found.push(relPath);
    }
  };

  walk(root, '');
  return found.sort();
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
