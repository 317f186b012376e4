import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError } from './errors.js';

export const CONFIG_FILENAME = 'debt-radar.config.json';

export interface AnalysisConfig {
  /** Lower-case extensions, leading dot included. */
  extensions: string[];
  /** Directory names skipped anywhere in the tree (VCS metadata is always skipped). */
  ignoreDirs: string[];
}

export const DEFAULT_CONFIG: AnalysisConfig = {
  extensions: [
    '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs',
    '.py', '.java', '.c', '.h', '.cpp', '.hpp', '.cs',
    '.go', '.rb', '.php', '.html', '.css',
  ],
  ignoreDirs: ['node_modules'],
};

/**
 * Reads a JSON config file. Only `extensions` and `ignoreDirs` are accepted;
 * both must be arrays of strings when present.
 */
export function loadConfigFile(file: string): Partial<AnalysisConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(file, message);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(file, 'expected a JSON object');
  }

  const config: Partial<AnalysisConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'extensions' && key !== 'ignoreDirs') {
      throw new ConfigError(file, `unknown key "${key}"`);
    }
    config[key] = readStringList(file, key, value);
  }
  return config;
}

/** Looks for `debt-radar.config.json` at the root of the analyzed tree. */
export function findConfigFile(root: string): string | null {
  const candidate = join(root, CONFIG_FILENAME);
  return existsSync(candidate) ? candidate : null;
}

/** Later layers win: defaults ← file ← flags. */
export function resolveConfig(...layers: Partial<AnalysisConfig>[]): AnalysisConfig {
  let config: AnalysisConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    config = {
      extensions: layer.extensions ?? config.extensions,
      ignoreDirs: layer.ignoreDirs ?? config.ignoreDirs,
    };
  }
  return {
    extensions: config.extensions.map(normalizeExtension),
    ignoreDirs: [...config.ignoreDirs],
  };
}

/** Splits a comma-separated CLI value: "ts, .py" → ['ts', '.py']. */
export function parseList(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/** Parses a whole positive number such as a `--top` value; null for anything else. */
export function parsePositiveInt(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = parseInt(trimmed, 10);
  return n > 0 && Number.isSafeInteger(n) ? n : null;
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function readStringList(file: string, key: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(file, `"${key}" must be an array of strings`);
  }
  return value;
}
