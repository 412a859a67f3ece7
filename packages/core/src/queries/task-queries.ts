/**
 * Task CRUD operations using Drizzle ORM.
 * Every read and write takes a TaskScope; under an owner scope a task that
 * belongs to someone else reports `not-owned` and is left untouched.
 */

import { eq, asc } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { TrackerDb } from '../db.js';
import type { Task, TaskId, TaskInput } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import type { TaskScope } from '../types/scope.js';
import { tasks } from '../schema/tasks.js';
import { parseTaskForm } from '../parsers/task-form-parser.js';
import { filterTasks, buildDashboard, distinctSubjects } from '../deadlines/index.js';
import type { ListFilter, Dashboard } from '../deadlines/index.js';

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

/** Map a Drizzle row to a Task object (description is nullable in storage) */
function toTask(row: typeof tasks.$inferSelect): Task {
  return { ...row, description: row.description ?? '' };
}

function scopeCondition(scope: TaskScope): SQL | undefined {
  return scope.kind === 'owner' ? eq(tasks.userId, scope.userId) : undefined;
}

type Lookup =
  | { readonly type: 'found'; readonly task: Task }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'not-owned'; readonly taskId: TaskId };

/** Resolve a task id against a scope */
function lookup(db: TrackerDb, taskId: TaskId, scope: TaskScope): Lookup {
  const task = getTaskById(db, taskId);
  if (!task) return { type: 'not-found', taskId };
  if (scope.kind === 'owner' && task.userId !== scope.userId) return { type: 'not-owned', taskId };
  return { type: 'found', task };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID, ignoring ownership */
export function getTaskById(db: TrackerDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get a single task by ID if it is visible in the scope */
export function getScopedTask(db: TrackerDb, taskId: TaskId, scope: TaskScope): TaskResult {
  const found = lookup(db, taskId, scope);
  if (found.type !== 'found') return found;
  return { type: 'success', task: found.task, message: `Task ${taskId}` };
}

/** All tasks in scope, in creation order */
export function getTasks(db: TrackerDb, scope: TaskScope): Task[] {
  const rows = db.select().from(tasks).where(scopeCondition(scope)).orderBy(asc(tasks.id)).all();
  return rows.map(toTask);
}

/** Distinct subjects in scope, in the same order the dashboard lists them */
export function getSubjects(db: TrackerDb, scope: TaskScope): string[] {
  return distinctSubjects(getTasks(db, scope));
}

/** The filtered, due-date-sorted task list */
export function getTaskList(db: TrackerDb, scope: TaskScope, filter: ListFilter, today: string): Task[] {
  return filterTasks(getTasks(db, scope), filter, today);
}

/** Filtered list plus the bucketed overview for one request */
export function getDashboard(db: TrackerDb, scope: TaskScope, filter: ListFilter, today: string): Dashboard {
  return buildDashboard(getTasks(db, scope), filter, today);
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert already-normalized input */
export function insertTask(db: TrackerDb, input: TaskInput, scope: TaskScope, now?: Date): Task {
  const row = db.insert(tasks).values({
    ...input,
    isDone: false,
    userId: scope.kind === 'owner' ? scope.userId : null,
    createdAt: (now ?? new Date()).toISOString(),
  }).returning().get();
  return toTask(row);
}

/** Add a task from submitted form fields */
export function addTask(db: TrackerDb, form: unknown, scope: TaskScope, now?: Date): TaskResult {
  const parsed = parseTaskForm(form);
  if (!parsed.ok) return { type: 'invalid', issues: parsed.issues };

  const task = insertTask(db, parsed.input, scope, now);
  return { type: 'success', task, message: `Added task ${task.id}: ${task.title}` };
}

/** Replace every field except id and isDone from submitted form fields */
export function editTask(db: TrackerDb, taskId: TaskId, form: unknown, scope: TaskScope): TaskResult {
  const found = lookup(db, taskId, scope);
  if (found.type !== 'found') return found;

  const parsed = parseTaskForm(form);
  if (!parsed.ok) return { type: 'invalid', issues: parsed.issues };

  const row = db.update(tasks).set(parsed.input).where(eq(tasks.id, taskId)).returning().get();
  if (!row) return { type: 'not-found', taskId };
  return { type: 'success', task: toTask(row), message: `Updated task ${taskId}` };
}

/** Mark a task done or not done. Touches isDone only. */
export function setDone(db: TrackerDb, taskId: TaskId, done: boolean, scope: TaskScope): TaskResult {
  const found = lookup(db, taskId, scope);
  if (found.type !== 'found') return found;

  const row = db.update(tasks).set({ isDone: done }).where(eq(tasks.id, taskId)).returning().get();
  if (!row) return { type: 'not-found', taskId };
  return {
    type: 'success',
    task: toTask(row),
    message: done ? `Marked task ${taskId} done` : `Marked task ${taskId} not done`,
  };
}

/** Delete a task permanently */
export function deleteTask(db: TrackerDb, taskId: TaskId, scope: TaskScope): TaskResult {
  const found = lookup(db, taskId, scope);
  if (found.type !== 'found') return found;

  db.delete(tasks).where(eq(tasks.id, taskId)).run();
  return { type: 'success', task: found.task, message: `Deleted task ${taskId}` };
}
