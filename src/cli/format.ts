/**
 * Output formatting for the CLI. Human output goes to stdout, logs to stderr.
 */

import chalk from "chalk";

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim("─".repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined || value === "" ? chalk.dim("—") : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function statusColor(status: string): string {
  return status === "found" || status === "copied" ? chalk.green(status) : chalk.red(status);
}

function visibleLength(text: string): number {
  return text.replace(/\u001b\[[0-9;]*m/g, "").length;
}

function pad(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - visibleLength(text)));
}

export function table(rows: Record<string, string>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim("  No results"));
    return;
  }

  const cols = columns ?? Object.keys(rows[0]);
  const widths = cols.map((c) => Math.max(c.length, ...rows.map((r) => visibleLength(r[c] ?? ""))));

  const header = cols.map((c, i) => pad(c, widths[i])).join("  ");
  console.log(chalk.bold(`  ${header}`.trimEnd()));
  console.log(chalk.dim(`  ${widths.map((w) => "─".repeat(w)).join("──")}`));

  for (const row of rows) {
    const line = cols.map((c, i) => pad(row[c] ?? "", widths[i])).join("  ");
    console.log(`  ${line}`.trimEnd());
  }
}
