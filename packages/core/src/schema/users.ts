import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull().unique(),
  /** scrypt$<salt-hex>$<hash-hex> */
  passwordHash: text('password_hash').notNull(),
  createdAt: text('created_at').notNull(),
});
