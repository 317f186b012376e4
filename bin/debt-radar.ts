#!/usr/bin/env node

import { program } from 'commander';
import ora from 'ora';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';

import { runAnalysis } from '../src/pipeline.js';
import {
  findConfigFile,
  loadConfigFile,
  parseList,
  parsePositiveInt,
  resolveConfig,
  type AnalysisConfig,
} from '../src/config.js';
import { reportTerminal, type SortKey } from '../src/reporters/terminal.js';
import { reportJson } from '../src/reporters/json.js';

interface CliOptions {
  format: string;
  output?: string;
  top: string;
  sort: string;
  ext?: string;
  ignore?: string;
  config?: string;
}

const FORMATS = new Set(['terminal', 'json']);
const SORT_KEYS = new Set<string>(['risk', 'systemic']);

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  // ../package.json from sources, ../../package.json from dist/bin
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const pkg: { version?: unknown } = JSON.parse(readFileSync(join(__dirname, candidate), 'utf8'));
      if (typeof pkg.version === 'string') return pkg.version;
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

program
  .name('debt-radar')
  .description('Score technical debt per file and per contributor from a git working tree.')
  .version(readVersion())
  .argument('[path]', 'Path to the git working tree to analyze', '.')
  .option('--format <format>', 'Output format: terminal, json', 'terminal')
  .option('--output <file>',   'Write the JSON report to a file instead of stdout')
  .option('--top <n>',         'Rows to show per terminal table', '20')
  .option('--sort <key>',      'Order of the main table: risk, systemic', 'risk')
  .option('--ext <list>',      'Comma-separated source extensions to analyze')
  .option('--ignore <list>',   'Comma-separated directory names to skip')
  .option('--config <file>',   'JSON config file (default: debt-radar.config.json in the analyzed path)')
  .parse(process.argv);

const opts = program.opts<CliOptions>();
const targetPath = resolve(program.args[0] ?? '.');

function buildConfig(): AnalysisConfig {
  const configFile = opts.config ?? findConfigFile(targetPath);
  const fromFile = configFile ? loadConfigFile(configFile) : {};
  const fromFlags: Partial<AnalysisConfig> = {};
  if (opts.ext) fromFlags.extensions = parseList(opts.ext);
  if (opts.ignore) fromFlags.ignoreDirs = parseList(opts.ignore);
  return resolveConfig(fromFile, fromFlags);
}

function main(): void {
  if (!FORMATS.has(opts.format)) {
    console.error(`Error: unknown format "${opts.format}" (expected terminal or json)`);
    process.exitCode = 1;
    return;
  }
  if (!SORT_KEYS.has(opts.sort)) {
    console.error(`Error: unknown sort key "${opts.sort}" (expected risk or systemic)`);
    process.exitCode = 1;
    return;
  }
  const top = parsePositiveInt(opts.top);
  if (top === null) {
    console.error(`Error: invalid --top "${opts.top}" (expected a positive integer)`);
    process.exitCode = 1;
    return;
  }
  const sort: SortKey = opts.sort === 'systemic' ? 'systemic' : 'risk';

  const spinner = ora({ text: '', stream: process.stderr }).start();
  const totalStart = Date.now();
  let stepStart = Date.now();
  let lastLabel = '';

  const fmtMs = (ms: number) => ms >= 1000 ? `${(ms / 1000).toFixed(1)}s` : `${ms}ms`;

  const completeStep = () => {
    if (lastLabel) {
      spinner.succeed(`${lastLabel.padEnd(40)} ${fmtMs(Date.now() - stepStart)}`);
      spinner.start();
    }
  };

  try {
    const config = buildConfig();
    const result = runAnalysis(targetPath, {
      config,
      onStage: (stage, index, total) => {
        completeStep();
        lastLabel = `[${index}/${total}] ${stage}`;
        stepStart = Date.now();
        spinner.text = lastLabel;
      },
    });
    completeStep();

    for (const warning of result.warnings) {
      spinner.warn(warning.message);
    }
    spinner.succeed(
      `${result.stats.fileCount} files, ${result.contributors.size} contributors — ⏱ ${fmtMs(Date.now() - totalStart)}`
    );

    if (opts.format === 'json') {
      reportJson(result, opts.output ?? null);
    } else {
      reportTerminal(result, { top, sort });
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    spinner.fail(msg);
    if (process.env.DEBUG) console.error(err);
    process.exitCode = 1;
  }
}

main();
