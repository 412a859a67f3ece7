export { parseDueDate, formatDate, todayISO, addDays, daysBetween } from './date-parser.js';
export { parseTaskForm, TaskFormSchema, PrioritySchema, toIssues } from './task-form-parser.js';
export type { TaskForm, TaskFormResult } from './task-form-parser.js';
