import chalk, { type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import dayjs from 'dayjs';
import type { AnalysisResult, ContributorRecord, FileRecord, Tier } from '../types.js';

export type SortKey = 'risk' | 'systemic';

export interface TerminalOptions {
  top: number;
  sort: SortKey;
}

const TIER_LABEL: Record<Tier, string> = {
  CRITICAL: chalk.red('🔴 CRITICAL'),
  HIGH:     chalk.yellow('🟠 HIGH'),
  MEDIUM:   chalk.white('🟡 MEDIUM'),
  LOW:      chalk.green('🟢 LOW'),
};

const TABLE_CHARS = {
  top: '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
  bottom: '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
  left: '│', 'left-mid': '├', mid: '─', 'mid-mid': '┼',
  right: '│', 'right-mid': '┤', middle: '│',
};

export function reportTerminal(result: AnalysisResult, { top, sort }: TerminalOptions): void {
  const { stats } = result;

  console.log('');
  console.log(
    chalk.bold.red('📉 debt-radar') +
    chalk.gray(` — ${result.root}`) +
    chalk.gray(` (${stats.fileCount} files, ${result.contributors.size} contributors)`)
  );
  console.log(
    '   Overall technical debt: ' +
    scoreChalk(stats.overallTechnicalDebt)(stats.overallTechnicalDebt.toFixed(2)) +
    chalk.gray(' / 100')
  );
  console.log('');

  if (stats.fileCount === 0) {
    console.log(chalk.yellow('  No source files with content found.'));
    console.log('');
    return;
  }

  const files = [...result.files.values()];
  const primary = sort === 'systemic' ? bySystemic : byRisk;

  console.log(chalk.cyan('Highest-risk files'));
  console.log(riskTable([...files].sort(primary).slice(0, top)));
  console.log('');

  const systemic = [...files].filter(f => f.systemicRiskScore > 0).sort(bySystemic).slice(0, top);
  if (systemic.length > 0) {
    console.log(chalk.cyan('Systemic risk (depended-on files with weak test signals)'));
    console.log(systemicTable(systemic));
    console.log('');
  }

  const contributors = [...result.contributors.values()]
    .sort((a, b) => b.efficiencyScore - a.efficiencyScore)
    .slice(0, top);
  if (contributors.length > 0) {
    console.log(chalk.cyan('Contributors'));
    console.log(contributorTable(contributors));
    console.log('');
  }
}

function riskTable(files: FileRecord[]): string {
  const table = new Table(tableOptions(
    ['RANK', 'FILE', 'SCORE', 'LOC', 'CC', 'CHURN', 'MAIN FACTOR', 'LAST CHANGE', 'RISK'],
    [6, 40, 7, 7, 6, 8, 22, 13, 15]
  ));

  files.forEach((f, i) => {
    table.push([
      chalk.gray(String(i + 1).padStart(3)),
      truncatePath(f.path, 38),
      scoreChalk(f.riskScore)(f.riskScore.toFixed(1).padStart(5)),
      String(f.loc),
      String(f.complexity),
      String(f.linesAdded + f.linesRemoved),
      f.mainFactor,
      f.lastCommitAt === null ? chalk.gray('—') : dayjs.unix(f.lastCommitAt).format('YYYY-MM-DD'),
      TIER_LABEL[f.tier],
    ]);
  });

  return table.toString();
}

function systemicTable(files: FileRecord[]): string {
  const table = new Table(tableOptions(['FILE', 'FAN-IN', 'RISK', 'TESTS', 'SYSTEMIC'], [44, 8, 7, 8, 10]));

  for (const f of files) {
    table.push([
      truncatePath(f.path, 42),
      String(f.fanIn),
      f.riskScore.toFixed(1),
      coverageLabel(f.missingTestCoverageFactor),
      chalk.bold(f.systemicRiskScore.toFixed(0)),
    ]);
  }

  return table.toString();
}

function contributorTable(contributors: ContributorRecord[]): string {
  const table = new Table(tableOptions(
    ['AUTHOR', 'COMMITS', 'ADDED', 'REMOVED', 'BUG FIXES', 'EFFICIENCY', 'RISK'],
    [32, 9, 9, 9, 11, 12, 7]
  ));

  for (const c of contributors) {
    table.push([
      truncatePath(c.author, 30),
      String(c.totalCommits),
      c.linesAdded.toFixed(0),
      c.linesRemoved.toFixed(0),
      c.bugFixCount.toFixed(1),
      c.efficiencyScore.toFixed(3),
      scoreChalk(c.riskScore)(c.riskScore.toFixed(1)),
    ]);
  }

  return table.toString();
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function tableOptions(head: string[], colWidths: number[]) {
  return {
    head: head.map(h => chalk.bold.gray(h)),
    colWidths,
    style: { head: [], border: ['gray'] },
    chars: TABLE_CHARS,
  };
}

const byRisk = (a: FileRecord, b: FileRecord) => b.riskScore - a.riskScore;
const bySystemic = (a: FileRecord, b: FileRecord) =>
  b.systemicRiskScore - a.systemicRiskScore || b.riskScore - a.riskScore;

function coverageLabel(factor: FileRecord['missingTestCoverageFactor']): string {
  if (factor === 0.1) return chalk.green('likely');
  if (factor === 1.0) return chalk.red('missing');
  return chalk.yellow('unsure');
}

function scoreChalk(score: number): ChalkInstance {
  if (score >= 75) return chalk.red.bold;
  if (score >= 50) return chalk.yellow.bold;
  if (score >= 25) return chalk.white;
  return chalk.green;
}

function truncatePath(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return chalk.gray('…') + str.slice(-(maxLen - 1));
}
