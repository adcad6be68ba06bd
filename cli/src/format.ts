/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function statusColor(status: string): string {
  switch (status) {
    case 'Persisted':
    case 'Exported':
    case 'exported':
    case 'CLOSED':
      return chalk.green(status);
    case 'Received':
    case 'Fetched':
    case 'Transformed':
      return chalk.blue(status);
    case 'Skipped':
    case 'skipped':
    case 'HALF_OPEN':
      return chalk.yellow(status);
    case 'Failed':
    case 'rejected':
    case 'OPEN':
      return chalk.red(status);
    default:
      return status;
  }
}

export function yesNo(value: boolean): string {
  return value ? chalk.green('Yes') : chalk.dim('No');
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function table(rows: Record<string, string | number>[], columns?: string[]): void {
  const [first] = rows;
  if (!first) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns || Object.keys(first);
  // Width from visible text so chalk escapes don't skew alignment
  const visible = (value: string | number | undefined): string => stripAnsi(String(value ?? ''));
  const widths = cols.map((c) => Math.max(c.length, ...rows.map((r) => visible(r[c]).length)));
  const pad = (value: string | number | undefined, width: number): string =>
    String(value ?? '') + ' '.repeat(Math.max(0, width - visible(value).length));

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => pad(row[c], widths[i] ?? 0)).join('  ');
    console.log(`  ${line}`);
  }
}

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}
