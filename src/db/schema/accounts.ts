import { pgTable, varchar, numeric, timestamp } from 'drizzle-orm/pg-core';

// numeric(20, 0) holds the full unsigned 64-bit range; drizzle returns it as a string.
export const accounts = pgTable('accounts', {
  identity: varchar('identity', { length: 64 }).primaryKey(),
  balance: numeric('balance', { precision: 20, scale: 0 }).notNull().default('0'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
