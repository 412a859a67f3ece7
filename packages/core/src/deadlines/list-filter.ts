/**
 * The task list query: subject, range and show-done selectors over an
 * already owner-scoped task set.
 */

import type { Task } from '../types/task.js';
import { addDays } from '../parsers/date-parser.js';
import { BUCKETS } from './classifier.js';
import type { Bucket } from './classifier.js';

export type FilterableTask = Pick<Task, 'dueDate' | 'isDone' | 'subject'>;

export interface ListFilter {
  /** Exact, case-sensitive match. Empty or missing means any subject. */
  readonly subject?: string | null;
  /** Bucket token. Unrecognized tokens behave like no range. */
  readonly range?: string | null;
  /** Include done tasks when no range is active */
  readonly showDone?: boolean;
}

/** Map a range token to a bucket, or null when empty or unrecognized */
export function parseRange(token: string | null | undefined): Bucket | null {
  if (!token) return null;
  return BUCKETS.find(b => b === token) ?? null;
}

/**
 * Absolute date test for a range. `week` and `two_weeks` start at today
 * (inclusive), unlike the classifier whose week bucket starts tomorrow.
 */
export function matchesRange(dueDate: string, range: Bucket, today: string): boolean {
  switch (range) {
    case 'overdue': return dueDate < today;
    case 'today': return dueDate === today;
    case 'week': return dueDate >= today && dueDate <= addDays(today, 7);
    case 'two_weeks': return dueDate >= today && dueDate <= addDays(today, 14);
    case 'later': return dueDate > addDays(today, 14);
  }
}

/**
 * Apply the list selectors and sort by due date.
 * Input is expected in creation order; the sort is stable, so equal
 * due dates keep that order.
 */
export function filterTasks<T extends FilterableTask>(
  tasks: readonly T[],
  filter: ListFilter,
  today: string,
): T[] {
  let result = [...tasks];

  if (filter.subject) {
    const subject = filter.subject;
    result = result.filter(t => t.subject === subject);
  }

  const range = parseRange(filter.range);
  if (range != null) {
    result = result.filter(t => !t.isDone && matchesRange(t.dueDate, range, today));
  } else if (!filter.showDone) {
    result = result.filter(t => !t.isDone);
  }

  return result.sort((a, b) => (a.dueDate < b.dueDate ? -1 : a.dueDate > b.dueDate ? 1 : 0));
}

/** Distinct subjects, alphabetically */
export function distinctSubjects(tasks: readonly Pick<Task, 'subject'>[]): string[] {
  return [...new Set(tasks.map(t => t.subject))].sort();
}
