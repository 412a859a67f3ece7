import type { Task, TaskId } from './task.js';

export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/** Outcome of a task mutation. `not-owned` only occurs under the per-user policy. */
export type TaskResult =
  | { readonly type: 'success'; readonly task: Task; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'not-owned'; readonly taskId: TaskId }
  | { readonly type: 'invalid'; readonly issues: readonly ValidationIssue[] };

export type RegisterResult =
  | { readonly type: 'success'; readonly userId: number }
  | { readonly type: 'taken'; readonly username: string }
  | { readonly type: 'invalid'; readonly issues: readonly ValidationIssue[] };

export function isSuccess(r: TaskResult): r is Extract<TaskResult, { type: 'success' }> {
  return r.type === 'success';
}

export function isError(r: TaskResult): boolean {
  return r.type !== 'success';
}

export function describeResult(r: TaskResult): string {
  switch (r.type) {
    case 'success': return r.message;
    case 'not-found': return `Could not find task with id ${r.taskId}`;
    case 'not-owned': return `Task ${r.taskId} belongs to another user`;
    case 'invalid': return r.issues.map(i => `${i.field}: ${i.message}`).join('; ');
  }
}
