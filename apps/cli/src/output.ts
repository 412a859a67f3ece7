/**
 * chalk-based output formatting for the terminal.
 */

import chalk from 'chalk';
import { Priority, describeResult } from '@duetrack/core';
import type { Bucket, TaskResult, TaskView } from '@duetrack/core';

export const BUCKET_TITLES: Record<Bucket, string> = {
  overdue: 'Overdue',
  today: 'Today',
  week: 'This week',
  two_weeks: 'Next two weeks',
  later: 'Later',
};

export function formatCheckbox(isDone: boolean): string {
  return isDone ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: string): string {
  return priority === Priority.Optional ? chalk.dim('opt') : chalk.bold('req');
}

/** Relative due label; overdue in red, today/tomorrow in yellow */
export function formatDueLabel(task: Pick<TaskView, 'isDone' | 'overdue' | 'soon' | 'daysLeft' | 'dueDate'>): string {
  if (task.isDone) return chalk.dim(`Due: ${task.dueDate}`);
  if (task.overdue) return chalk.red(`OVERDUE (${-task.daysLeft}d)`);
  if (task.daysLeft === 0) return chalk.yellow('Due: Today');
  if (task.soon) return chalk.yellow('Due: Tomorrow');
  return chalk.dim(`Due: ${task.dueDate} (${task.daysLeft}d)`);
}

export function formatTask(task: TaskView): string {
  const id = chalk.dim(`(${task.id})`.padEnd(6));
  const title = task.isDone ? chalk.strikethrough(task.title) : chalk.bold(task.title);
  const meta = chalk.cyan(`${task.subject} · ${task.taskType}`);
  return `${id} ${formatCheckbox(task.isDone)} ${formatPriority(task.priority)} ${title}  ${meta}  ${formatDueLabel(task)}`;
}

// --- Result output ---

/** Print a result; anything but success marks the process as failed */
export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); return;
    case 'not-found': error(describeResult(result)); break;
    case 'not-owned': error(describeResult(result)); break;
    case 'invalid':
      for (const issue of result.issues) error(`${issue.field}: ${issue.message}`);
      break;
  }
  process.exitCode = 1;
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
