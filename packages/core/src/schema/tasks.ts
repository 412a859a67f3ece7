import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';
import { users } from './users.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  taskType: text('task_type').notNull(),
  subject: text('subject').notNull(),
  /** yyyy-MM-dd */
  dueDate: text('due_date').notNull(),
  description: text('description'),
  isDone: integer('is_done', { mode: 'boolean' }).notNull().default(false),
  priority: text('priority').$type<Priority>().notNull().default('required'),
  /** Only set under the per-user ownership policy */
  userId: integer('user_id').references(() => users.id),
  createdAt: text('created_at').notNull().default(''),
}, (table) => ({
  dueDateIdx: index('idx_tasks_due_date').on(table.dueDate),
  userIdIdx: index('idx_tasks_user_id').on(table.userId),
  subjectIdx: index('idx_tasks_subject').on(table.subject),
}));
