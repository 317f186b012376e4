import type { DiffStats } from '../types.js';

export interface NumstatEntry {
  file: string;
  /** Null for binary files, which git reports as '-'. */
  stats: DiffStats | null;
}

/**
 * Parses `--numstat` lines: `<additions>\t<deletions>\t<filename>`.
 * Lines that are not numstat rows are ignored.
 */
export function parseNumstat(output: string): NumstatEntry[] {
  const entries: NumstatEntry[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split('\t');
    if (parts.length < 3) continue;

    const rawFilename = unquoteGitPath(parts.slice(2).join('\t'));
    const file = normalizeNumstatFilename(rawFilename);
    if (!file) continue;

    if (parts[0] === '-' || parts[1] === '-') {
      entries.push({ file, stats: null });
      continue;
    }

    const additions = parseInt(parts[0] ?? '', 10);
    const deletions = parseInt(parts[1] ?? '', 10);
    if (isNaN(additions) || isNaN(deletions)) continue;

    entries.push({ file, stats: { additions, deletions } });
  }

  return entries;
}

/**
 * Picks the line counts for `path` out of a commit's numstat rows.
 * Returns null when the path is missing (renames git could not pair up) or binary.
 */
export function statsForPath(entries: NumstatEntry[], path: string): DiffStats | null {
  return entries.find(e => e.file === path)?.stats ?? null;
}

export function normalizeNumstatFilename(raw: string): string | null {
  // Handle "src/{old => new}/file.js"
  if (raw.includes('{') && raw.includes('=>')) {
    const normalized = raw
      .replace(/\{[^}]* => ([^}]*)\}/, '$1')
      .replace(/\/\//g, '/');
    return normalized.includes('{') ? null : normalized.trim();
  }

  // Handle "old-name => new-name"
  if (raw.includes(' => ')) {
    return raw.split(' => ').pop()?.trim() ?? null;
  }

  return raw.trim() || null;
}

const C_ESCAPES: Record<string, number> = {
  a: 0x07, b: 0x08, t: 0x09, n: 0x0a, v: 0x0b, f: 0x0c, r: 0x0d, '"': 0x22, '\\': 0x5c,
};

/**
 * Undoes git's C-style quoting of unusual paths: `"caf\303\251.ts"` → `café.ts`.
 * Octal escapes are UTF-8 bytes. Unquoted input is returned unchanged.
 */
export function unquoteGitPath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    const ch = String.fromCodePoint(body.codePointAt(i) ?? 0);
    if (ch !== '\\') {
      bytes.push(...Buffer.from(ch, 'utf8'));
      i += ch.length;
      continue;
    }

    const octal = /^[0-7]{3}/.exec(body.slice(i + 1));
    const escaped = C_ESCAPES[body.charAt(i + 1)];
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 4;
    } else if (escaped !== undefined) {
      bytes.push(escaped);
      i += 2;
    } else {
      bytes.push(0x5c);
      i += 1;
    }
  }

  return Buffer.from(bytes).toString('utf8');
}
