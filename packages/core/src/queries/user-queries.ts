/**
 * Users for the per-user ownership policy, plus the shared-account check.
 */

import { eq } from 'drizzle-orm';
import { z } from 'zod';
import type { TrackerDb } from '../db.js';
import type { User, UserId } from '../types/task.js';
import type { RegisterResult } from '../types/results.js';
import type { SharedAccount } from '../config.js';
import { users } from '../schema/users.js';
import { hashPassword, verifyPassword, safeEqual } from '../auth/password.js';
import { toIssues } from '../parsers/task-form-parser.js';

export const CredentialsSchema = z.object({
  username: z.string({ required_error: 'Username is required' }).trim().min(1, 'Username is required').max(80),
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

function toUser(row: typeof users.$inferSelect): User {
  return { id: row.id, username: row.username, createdAt: row.createdAt };
}

export function getUserById(db: TrackerDb, userId: UserId): User | null {
  const row = db.select().from(users).where(eq(users.id, userId)).get();
  return row ? toUser(row) : null;
}

export function getUserByUsername(db: TrackerDb, username: string): User | null {
  const row = db.select().from(users).where(eq(users.username, username)).get();
  return row ? toUser(row) : null;
}

/** Register a new user. Taken usernames are reported, never overwritten. */
export function registerUser(db: TrackerDb, form: unknown, now?: Date): RegisterResult {
  const parsed = CredentialsSchema.safeParse(form);
  if (!parsed.success) return { type: 'invalid', issues: toIssues(parsed.error) };

  const { username, password } = parsed.data;
  if (getUserByUsername(db, username)) return { type: 'taken', username };

  const row = db.insert(users).values({
    username,
    passwordHash: hashPassword(password),
    createdAt: (now ?? new Date()).toISOString(),
  }).returning().get();
  return { type: 'success', userId: row.id };
}

/** Check a username/password pair. Returns the user on success. */
export function verifyUser(db: TrackerDb, username: string, password: string): User | null {
  const row = db.select().from(users).where(eq(users.username, username.trim())).get();
  if (!row || !verifyPassword(password, row.passwordHash)) return null;
  return toUser(row);
}

/** Check a username/password pair against the configured shared account */
export function verifySharedAccount(account: SharedAccount, username: string, password: string): boolean {
  // Both comparisons always run
  const userOk = safeEqual(username.trim(), account.username);
  const passOk = safeEqual(password, account.password);
  return userOk && passOk;
}
