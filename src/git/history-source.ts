import { execFileSync } from 'child_process';
import { LOG_FORMAT, parseFileLog } from './log-parser.js';
import type { FileCommit } from '../types.js';

/**
 * Where commit history comes from. The miner only needs to know whether the
 * root is a checkout and which commits touched one path.
 */
export interface GitHistorySource {
  isRepository(root: string): boolean;
  /** Commits touching `path`, oldest first. Throws when history cannot be read. */
  fileHistory(root: string, path: string): FileCommit[];
}

const MAX_BUFFER = 200 * 1024 * 1024;

/** Reads history by running the local `git` executable. */
export class GitCliHistorySource implements GitHistorySource {
  isRepository(root: string): boolean {
    try {
      const out = execFileSync('git', ['rev-parse', '--is-inside-work-tree'], {
        cwd: root,
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
      });
      return out.trim() === 'true';
    } catch {
      return false;
    }
  }

  fileHistory(root: string, path: string): FileCommit[] {
    let output: string;
    try {
      output = execFileSync(
        'git',
        [
          // --relative keeps numstat paths relative to `root`, which may be a
          // subdirectory of the checkout; quotePath=false leaves non-ASCII names raw.
          '-c', 'core.quotePath=false',
          'log', '--relative', '--reverse', '--numstat', '--diff-merges=first-parent',
          `--format=${LOG_FORMAT}`, '--', path,
        ],
        { cwd: root, encoding: 'utf8', maxBuffer: MAX_BUFFER, stdio: ['ignore', 'pipe', 'pipe'] }
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`git log failed for ${path}: ${message}`);
    }

    return parseFileLog(output, path);
  }
}
