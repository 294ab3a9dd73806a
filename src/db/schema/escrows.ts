import { pgTable, varchar, numeric, timestamp } from 'drizzle-orm/pg-core';
import { jobs } from './jobs';

export const escrows = pgTable('escrows', {
  id: varchar('id', { length: 64 }).primaryKey(),
  jobId: varchar('job_id', { length: 64 })
    .notNull()
    .unique()
    .references(() => jobs.id),
  balance: numeric('balance', { precision: 20, scale: 0 }).notNull(),
  releasedTo: varchar('released_to', { length: 64 }),
  releasedAt: timestamp('released_at', { withTimezone: true }),
});
