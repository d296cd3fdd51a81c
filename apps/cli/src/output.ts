/**
 * chalk-based terminal output for board snapshots and results.
 */

import chalk from 'chalk';
import { Priority, ServerError, formatDueDate, formatDateRange } from '@taskdock/core';
import type { TaskRow, TaskStats, Category, ReportedError, DueState } from '@taskdock/core';

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

const DUE_STYLE: Record<DueState, (s: string) => string> = {
  overdue: chalk.red,
  today: chalk.yellow,
  upcoming: chalk.dim,
  done: chalk.dim,
  none: chalk.dim,
};

export function formatDue(row: TaskRow, today: Date = new Date()): string {
  const label = formatDueDate(row.task.dueDate, today);
  if (!label) return '';
  return DUE_STYLE[row.dueState](`  Due: ${label}`);
}

export function formatCategory(row: TaskRow, categories: readonly Category[]): string {
  if (row.categoryLink !== 'assigned') return '';
  const color = categories.find((c) => c.id === row.task.categoryId)?.color;
  const paint = color ? chalk.hex(color) : chalk.cyan;
  return '  ' + paint(`@${row.categoryName}`);
}

/** One list line: position, checkbox, id, priority, content, category, due */
export function formatRow(row: TaskRow, position: number, categories: readonly Category[]): string {
  const content = row.task.completed ? chalk.strikethrough.dim(row.task.content) : row.task.content;
  return [
    chalk.dim(String(position).padStart(3)),
    formatCheckbox(row.task.completed),
    chalk.dim(`#${row.task.id}`),
    formatPriority(row.task.priority),
    content,
  ].join(' ') + formatCategory(row, categories) + formatDue(row);
}

export function printRows(rows: readonly TaskRow[], categories: readonly Category[]): void {
  rows.forEach((row, i) => console.log(formatRow(row, i + 1, categories)));
}

export function printTaskDetail(row: TaskRow): void {
  const { task } = row;
  console.log(`${formatCheckbox(task.completed)} ${chalk.bold(task.content)}`);
  console.log(chalk.dim(`  id:       ${task.id}`));
  console.log(chalk.dim(`  priority: ${task.priority}`));
  console.log(chalk.dim(`  category: ${row.categoryName}`));
  const range = formatDateRange(task);
  if (range) console.log(chalk.dim(`  dates:    ${range}`));
}

export function printStats(stats: TaskStats): void {
  console.log(chalk.bold.underline('Tasks'));
  console.log(`  Total:      ${stats.total}`);
  console.log(`  Completed:  ${chalk.green(String(stats.completed))}`);
  console.log(`  Pending:    ${chalk.yellow(String(stats.pending))}`);
  console.log(`  Completion: ${stats.completionRate}%`);
  console.log();
  console.log(chalk.bold.underline('By priority'));
  console.log(`  ${formatPriority(Priority.High)} high    ${stats.byPriority.high}`);
  console.log(`  ${formatPriority(Priority.Medium)} medium  ${stats.byPriority.medium}`);
  console.log(`  ${formatPriority(Priority.Low)} low     ${stats.byPriority.low}`);

  if (stats.byCategory.length > 0) {
    console.log();
    console.log(chalk.bold.underline('By category'));
    for (const { category, count } of stats.byCategory) {
      const name = category ? chalk.hex(category.color)(category.name) : chalk.dim('No category');
      console.log(`  ${name}  ${count}`);
    }
  }
}

export function printCategories(categories: readonly Category[]): void {
  for (const c of categories) {
    console.log(`${chalk.dim(`#${c.id}`)} ${chalk.hex(c.color)('●')} ${c.name}`);
  }
}

/** A failed operation; a rejected batch also names the ids the server could not find */
export function printFailure(err: ReportedError): void {
  error(err.message);
  if (err instanceof ServerError && err.missingIds.length > 0) {
    warning(`Nothing was changed. Missing task ids: ${err.missingIds.join(', ')}`);
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
