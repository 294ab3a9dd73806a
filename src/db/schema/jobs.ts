import {
  pgTable,
  text,
  varchar,
  numeric,
  boolean,
  bigint,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { users } from './users';

export const jobs = pgTable(
  'jobs',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    client: varchar('client', { length: 64 })
      .notNull()
      .references(() => users.identity),
    title: varchar('title', { length: 100 }).notNull(),
    description: varchar('description', { length: 500 }).notNull(),
    amount: numeric('amount', { precision: 20, scale: 0 }).notNull(),
    filled: boolean('filled').notNull().default(false),
    status: text('status', { enum: ['OPEN', 'FILLED', 'WORK_SUBMITTED', 'PAID'] })
      .notNull()
      .default('OPEN'),
    escrowNonce: varchar('escrow_nonce', { length: 64 }).notNull(),
    startDate: bigint('start_date', { mode: 'number' }),
    endDate: bigint('end_date', { mode: 'number' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [unique('uq_job_client_title').on(table.client, table.title)],
);
