/**
 * Zod schemas for the task add/edit form.
 * Field names follow the HTML form (snake_case); the parsed value is a TaskInput.
 */

import { z } from 'zod';
import type { TaskInput } from '../types/task.js';
import type { ValidationIssue } from '../types/results.js';
import { DEFAULT_PRIORITY, Priority } from '../types/priority.js';
import { DEFAULT_TASK_TYPE } from '../types/task-type.js';
import { parseDueDate } from './date-parser.js';

export const PrioritySchema = z.enum([Priority.Required, Priority.Optional]);

/** Trimmed text that falls back to `fallback` when blank or missing */
function textOrDefault(fallback: string) {
  return z.string().trim().optional().transform(v => (v ? v : fallback));
}

export const TaskFormSchema = z.object({
  title: z.string({ required_error: 'Title is required' }).trim().min(1, 'Title is required'),
  task_type: textOrDefault(DEFAULT_TASK_TYPE),
  subject: z.string({ required_error: 'Subject is required' }).trim().min(1, 'Subject is required'),
  due_date: z
    .string({ required_error: 'Due date is required' })
    .refine(v => parseDueDate(v) != null, 'Due date must be a valid YYYY-MM-DD date'),
  description: z.string().trim().optional().transform(v => v ?? ''),
  priority: textOrDefault(DEFAULT_PRIORITY).pipe(PrioritySchema),
});

export type TaskForm = z.input<typeof TaskFormSchema>;

export type TaskFormResult =
  | { readonly ok: true; readonly input: TaskInput }
  | { readonly ok: false; readonly issues: ValidationIssue[] };

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(i => ({ field: i.path.join('.') || 'form', message: i.message }));
}

/** Validate and normalize submitted form fields */
export function parseTaskForm(raw: unknown): TaskFormResult {
  const parsed = TaskFormSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, issues: toIssues(parsed.error) };

  const f = parsed.data;
  return {
    ok: true,
    input: {
      title: f.title,
      taskType: f.task_type,
      subject: f.subject,
      dueDate: f.due_date,
      description: f.description,
      priority: f.priority,
    },
  };
}
