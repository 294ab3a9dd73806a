import { pgTable, text, varchar, timestamp } from 'drizzle-orm/pg-core';

export const users = pgTable('users', {
  identity: varchar('identity', { length: 64 }).primaryKey(),
  name: varchar('name', { length: 50 }).notNull(),
  role: text('role', { enum: ['client', 'freelancer'] }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
