import chalk from 'chalk';
import { getConfig, type LogLevel } from './config.js';

/**
 * Leveled console logging. Output goes to stderr so statement
 * output on stdout stays machine-readable.
 */

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[level] >= RANK[getConfig().logLevel];
}

export function debug(...args: unknown[]): void {
  if (enabled('debug')) console.error(chalk.dim('[debug]'), ...args);
}

export function info(...args: unknown[]): void {
  if (enabled('info')) console.error(chalk.cyan('[info]'), ...args);
}

export function warn(...args: unknown[]): void {
  if (enabled('warn')) console.error(chalk.yellow('[warn]'), ...args);
}

export function error(...args: unknown[]): void {
  if (enabled('error')) console.error(chalk.red('[error]'), ...args);
}

/** Log every warning collected by a best-effort step */
export function logWarnings(scope: string, warnings: string[]): void {
  for (const w of warnings) warn(`${scope}: ${w}`);
}
