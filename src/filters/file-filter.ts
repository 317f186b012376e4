import { extname } from 'path';

// Version-control metadata is never analyzed, whatever the configuration says.
const VCS_DIRS = new Set(['.git', '.hg', '.svn']);

export interface SourceFilter {
  extensions: ReadonlySet<string>;
  ignoreDirs: ReadonlySet<string>;
}

export function createSourceFilter(extensions: string[], ignoreDirs: string[]): SourceFilter {
  return {
    extensions: new Set(extensions.map(e => e.toLowerCase())),
    ignoreDirs: new Set(ignoreDirs),
  };
}

/** True when a directory with this name should not be descended into. */
export function isSkippedDir(name: string, filter: SourceFilter): boolean {
  return VCS_DIRS.has(name) || filter.ignoreDirs.has(name);
}

/**
 * Decides whether a repository-relative path is an analyzable source file:
 * no segment may be a skipped directory and the extension must be allow-listed.
 */
export function isSourceFile(relPath: string, filter: SourceFilter): boolean {
  if (!relPath) return false;

  const segments = relPath.split('/');
  const dirs = segments.slice(0, -1);
  if (dirs.some(seg => isSkippedDir(seg, filter))) return false;

  return filter.extensions.has(extname(relPath).toLowerCase());
}
