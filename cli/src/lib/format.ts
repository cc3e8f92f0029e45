/**
 * Terminal output formatting
 */

import chalk from "chalk";

export function header(text: string): string {
  return chalk.bold.cyan(`\n  ${text}\n`);
}

export function warn(text: string): string {
  return chalk.yellow(`  ⚠ ${text}`);
}

export function label(key: string, value: string | number | undefined | null): string {
  if (value === undefined || value === null) return "";
  return `  ${chalk.gray(key + ":")} ${value}`;
}

export function progress(done: number, total: number, text: string): string {
  return `${text} ${chalk.gray(`(${done}/${total})`)}`;
}

// stderr only, and only with ZOG_DEBUG set
export function debug(scope: string, message: string): void {
  if (!process.env.ZOG_DEBUG) return;
  console.error(chalk.dim(`[${scope}] ${message}`));
}
