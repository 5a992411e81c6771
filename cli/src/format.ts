/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('-') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function line(text = ''): void {
  console.log(text);
}

export function dim(text: string): void {
  console.log(chalk.dim(text));
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

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns ?? Object.keys(rows[0] ?? {});
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => String(r[c] ?? '').length))
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const text = cols.map((c, i) => String(row[c] ?? '').padEnd(widths[i] ?? 0)).join('  ');
    console.log(`  ${text}`);
  }
}
