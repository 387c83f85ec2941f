/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, PriorityName, blocksRemaining } from '@pledge/core';
import type { OperationResult, DeadlineRecord } from '@pledge/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(urgency: Priority | null): string {
  switch (urgency) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
    default: return chalk.dim('·  ');
  }
}

export function formatPriorityName(urgency: Priority): string {
  return `${PriorityName[urgency]} (${urgency})`;
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/** Deadline label relative to the current block. Completed objectives are never overdue. */
export function formatDeadline(
  deadline: DeadlineRecord | null,
  current: number,
  completed = false,
): string {
  if (!deadline) return '';

  const left = blocksRemaining(deadline, current);
  if (completed) return chalk.dim(`  Due: block ${deadline.targetPoint}`);
  if (left < 0) return chalk.red(`  OVERDUE (${plural(-left, 'block')})`);
  if (left === 0) return chalk.yellow('  Due: this block');
  if (left === 1) return chalk.dim('  Due: next block');
  return chalk.dim(`  Due: block ${deadline.targetPoint} (in ${plural(left, 'block')})`);
}

// --- Result output ---

export function printResult(result: OperationResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`No objective found for ${result.address}`); break;
    case 'already-exists': error(`An objective already exists for ${result.address}`); break;
    case 'invalid-input': error(result.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
