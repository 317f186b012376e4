import { parseNumstat, statsForPath } from './diff-parser.js';
import type { FileCommit } from '../types.js';

// ASCII record/field separators; git emits them for %x1e and %x1f.
export const RECORD_SEP = '\x1e';
export const FIELD_SEP = '\x1f';

/** hash, parents, author e-mail, unix time, raw body; numstat rows follow. */
export const LOG_FORMAT = '%x1e%H%x1f%P%x1f%ae%x1f%at%x1f%B%x1f';

/**
 * Parses the output of
 * `git log --reverse --numstat --format=<LOG_FORMAT> -- <path>`
 * into commits for that one path, oldest first.
 *
 * Root commits carry no diff: their line counts are against the empty tree.
 */
export function parseFileLog(output: string, path: string): FileCommit[] {
  const commits: FileCommit[] = [];

  for (const record of output.split(RECORD_SEP)) {
    if (!record.trim()) continue;

    const parts = record.split(FIELD_SEP);
    if (parts.length < 6) continue;

    const [hash = '', parentList = '', author = '', time = '0'] = parts;
    const message = parts.slice(4, -1).join(FIELD_SEP);
    const numstat = parts[parts.length - 1] ?? '';
    const parents = parentList.split(' ').filter(p => p.length > 0);

    commits.push({
      hash,
      parents,
      author,
      timestamp: parseInt(time, 10) || 0,
      message: message.trim(),
      diff: parents.length > 0 ? statsForPath(parseNumstat(numstat), path) : null,
    });
  }

  return commits;
}
