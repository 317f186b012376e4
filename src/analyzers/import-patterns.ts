import { extname } from 'path';

export interface ImportPattern {
  /** Global regexes; capture group 1 is the imported module or path. */
  regexes: RegExp[];
  /** Rewrites a language-specific module name into path form. */
  toPath?: (token: string) => string;
}

// a.b.c → a/b/c (leading dots of relative Python imports dropped)
const dottedToPath = (token: string) => token.replace(/^\.+/, '').replace(/\./g, '/');

const JS_PATTERN: ImportPattern = {
  regexes: [
    /\bimport\s+(?:[\w*{}\s,$]+?\s+from\s+)?['"]([^'"\n]+)['"]/g,
    /\bexport\s+[\w*{}\s,$]+?\s+from\s+['"]([^'"\n]+)['"]/g,
    /\brequire\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g,
    /\bimport\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g,
  ],
};

const PYTHON_PATTERN: ImportPattern = {
  regexes: [
    /^\s*from\s+([\w.]+)\s+import\b/gm,
    /^\s*import\s+([\w.]+)/gm,
  ],
  toPath: dottedToPath,
};

const C_PATTERN: ImportPattern = {
  regexes: [/#include\s*["<]([^">\n]+)[">]/g],
};

export const IMPORT_PATTERNS: Record<string, ImportPattern> = {
  '.ts':  JS_PATTERN,
  '.tsx': JS_PATTERN,
  '.js':  JS_PATTERN,
  '.jsx': JS_PATTERN,
  '.mjs': JS_PATTERN,
  '.cjs': JS_PATTERN,
  '.py':  PYTHON_PATTERN,
  '.java': {
    regexes: [/^\s*import\s+(?:static\s+)?([\w.]+)\s*;/gm],
    toPath: dottedToPath,
  },
  '.c':   C_PATTERN,
  '.h':   C_PATTERN,
  '.cpp': C_PATTERN,
  '.hpp': C_PATTERN,
  '.cs': {
    regexes: [/^\s*using\s+(?:static\s+)?([\w.]+)\s*;/gm],
    toPath: dottedToPath,
  },
  '.go': {
    regexes: [/\bimport\s+(?:\w+\s+)?"([^"\n]+)"/g],
  },
  '.rb': {
    regexes: [/\brequire(?:_relative)?\s*\(?\s*['"]([^'"\n]+)['"]/g],
  },
  '.php': {
    regexes: [
      /\b(?:require|include)(?:_once)?\s*\(?\s*['"]([^'"\n]+)['"]/g,
      /^\s*use\s+([\w\\]+)\s*;/gm,
    ],
    toPath: token => token.replace(/\\/g, '/'),
  },
  '.html': {
    regexes: [/(?:<script\s[^>]*?src|href)\s*=\s*["']([^"']+)["']/g],
  },
  '.css': {
    regexes: [/@import\s+(?:url\(\s*)?["']([^"']+)["']/g],
  },
};

export function importPatternFor(path: string): ImportPattern | null {
  return IMPORT_PATTERNS[extname(path).toLowerCase()] ?? null;
}

/**
 * Distinct import tokens of a source file in first-seen order, already in
 * path form. Not syntax-aware: commented-out imports count too.
 */
export function extractImports(source: string, pattern: ImportPattern): string[] {
  const tokens = new Set<string>();

  for (const regex of pattern.regexes) {
    regex.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(source)) !== null) {
      const raw = match[1];
      if (!raw) continue;
      tokens.add(pattern.toPath ? pattern.toPath(raw) : raw);
    }
  }

  return [...tokens];
}
