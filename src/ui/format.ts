import chalk from 'chalk';
import type { FailureCause } from '../core/sequencer.js';

export const DIVIDER = '─'.repeat(40);

export function header(title: string): string {
  return `\n${chalk.bold.cyan(title)}\n${chalk.dim(DIVIDER)}`;
}

export function success(msg: string): string {
  return chalk.green(`✓ ${msg}`);
}

export function warn(msg: string): string {
  return chalk.yellow(`⚠ ${msg}`);
}

export function error(msg: string): string {
  return chalk.red(`✗ ${msg}`);
}

export function info(msg: string): string {
  return chalk.dim(`  ${msg}`);
}

export function tableRow(label: string, value: string | number, pad = 20): string {
  return `  ${label.padEnd(pad)} ${value}`;
}

export function sectionTitle(title: string): string {
  return chalk.bold(`\n${title}`);
}

/**
 * 850 -> "850ms", 12_400 -> "12.4s", 95_000 -> "1m 35s"
 * Rounds before splitting, so 59_990 is "1m 0s", not "60.0s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const tenths = Math.round(ms / 100);
  if (tenths < 600) return `${(tenths / 10).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

/**
 * Diagnostic lines for a failed step, without colour.
 */
export function describeCause(cause: FailureCause): string[] {
  const lines = [cause.message];
  if (cause.exitCode !== undefined) lines.push(`exit code: ${cause.exitCode}`);
  if (cause.signal) lines.push(`signal: ${cause.signal}`);
  if (cause.timedOut) lines.push('timed out');
  return lines;
}
