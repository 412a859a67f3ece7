import type { Priority } from './priority.js';

export type TaskId = number;
export type UserId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly taskType: string;
  readonly subject: string;
  readonly dueDate: string; // yyyy-MM-dd
  readonly description: string;
  readonly isDone: boolean;
  readonly priority: Priority;
  readonly userId: UserId | null;
  readonly createdAt: string; // ISO string
}

/** Normalized form input for add/edit. Everything but id and isDone. */
export interface TaskInput {
  readonly title: string;
  readonly taskType: string;
  readonly subject: string;
  readonly dueDate: string;
  readonly description: string;
  readonly priority: Priority;
}

export interface User {
  readonly id: UserId;
  readonly username: string;
  readonly createdAt: string;
}
