/**
 * Pure functions for deadline classification — no DB access, fully testable.
 */

import type { Task } from '../types/task.js';
import { daysBetween } from '../parsers/date-parser.js';

export const BUCKETS = ['overdue', 'today', 'week', 'two_weeks', 'later'] as const;

export type Bucket = (typeof BUCKETS)[number];

export type Buckets<T> = Record<Bucket, T[]>;

/** The fields classification looks at */
export type DatedTask = Pick<Task, 'dueDate' | 'isDone'>;

/** Positive = future, 0 = today, negative = overdue. */
export function daysUntilDue(task: DatedTask, today: string): number {
  return daysBetween(today, task.dueDate);
}

export function bucketForDelta(delta: number): Bucket {
  if (delta < 0) return 'overdue';
  if (delta === 0) return 'today';
  if (delta <= 7) return 'week';
  if (delta <= 14) return 'two_weeks';
  return 'later';
}

/** Bucket of a single task, ignoring its completion state */
export function bucketFor(task: DatedTask, today: string): Bucket {
  return bucketForDelta(daysUntilDue(task, today));
}

export function emptyBuckets<T>(): Buckets<T> {
  return { overdue: [], today: [], week: [], two_weeks: [], later: [] };
}

/**
 * Partition the not-done tasks into the five urgency buckets.
 * Done tasks are dropped first; input order is kept within each bucket.
 */
export function classifyTasks<T extends DatedTask>(tasks: readonly T[], today: string): Buckets<T> {
  const buckets = emptyBuckets<T>();
  for (const task of tasks) {
    if (task.isDone) continue;
    buckets[bucketFor(task, today)].push(task);
  }
  return buckets;
}

/** Overdue: not done and due strictly before today. */
export function isOverdue(task: DatedTask, today: string): boolean {
  return !task.isDone && task.dueDate < today;
}

/**
 * Due soon: not done and due today or tomorrow.
 * A highlight signal, narrower than the today/week buckets.
 */
export function isSoon(task: DatedTask, today: string): boolean {
  if (task.isDone) return false;
  const delta = daysUntilDue(task, today);
  return delta >= 0 && delta <= 1;
}
