/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, categoryLabel } from '@tasklet/core';
import type { AmbiguousCandidate, Category, Task, TaskResult, BatchResult } from '@tasklet/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

/** One task row: `(id) >>> [ ] title`, with the description dimmed below */
export function formatTask(task: Task): string {
  const indent = ' '.repeat(String(task.id).length + 3 + 4 + 4);
  const line = `${chalk.dim(`(${task.id})`)} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${chalk.bold(task.title)}`;
  if (!task.description) return line;

  const rest = task.description
    .split('\n')
    .filter(l => l.trim().length > 0)
    .map(l => `\n${indent}${chalk.dim(l)}`)
    .join('');
  return line + rest;
}

export function formatHeading(categoryId: Task['categoryId'], categories: readonly Category[]): string {
  return chalk.bold.underline(categoryLabel(categoryId, categories));
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task '${result.input}'`); break;
    case 'ambiguous':
      error(`'${result.input}' matches tasks ${result.candidateIds.join(', ')}; use an ID or -c <category>`);
      break;
    case 'no-change': info(result.message); break;
    case 'error': error(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

export function printCandidates(candidates: readonly AmbiguousCandidate[]): void {
  for (const c of candidates) {
    console.log(`  ${chalk.dim(`(${c.id})`)} ${c.title} ${chalk.dim(`in ${c.categoryName}`)}`);
  }
  info('Use the task ID, or narrow the search with -c <category>');
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
