/**
 * CLI helpers: id parsing, edit-form merging, error handling.
 */

import type { Task } from '@duetrack/core';
import * as out from './output.js';

/** Parse task id arguments; returns null for the first one that is not a positive integer */
export function parseIds(raw: readonly string[]): number[] | null {
  const ids: number[] = [];
  for (const r of raw) {
    if (!/^\d+$/.test(r)) {
      out.error(`Invalid task id: ${r}`);
      process.exitCode = 1;
      return null;
    }
    ids.push(Number(r));
  }
  return ids;
}

export interface TaskOptions {
  subject?: string;
  due?: string;
  type?: string;
  priority?: string;
  description?: string;
}

/** Form fields for add: title argument plus options */
export function toForm(title: string, opts: TaskOptions): Record<string, string | undefined> {
  return {
    title,
    subject: opts.subject,
    due_date: opts.due,
    task_type: opts.type,
    priority: opts.priority,
    description: opts.description,
  };
}

/** Form fields for edit: current values overlaid with the given options */
export function toEditForm(task: Task, title: string | undefined, opts: TaskOptions): Record<string, string> {
  return {
    title: title ?? task.title,
    subject: opts.subject ?? task.subject,
    due_date: opts.due ?? task.dueDate,
    task_type: opts.type ?? task.taskType,
    priority: opts.priority ?? task.priority,
    description: opts.description ?? task.description,
  };
}

/**
 * Wrap a command action with error handling.
 */
export function withErrorHandling<A extends unknown[]>(fn: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      fn(...args);
    } catch (err: unknown) {
      out.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  };
}
