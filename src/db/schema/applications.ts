import {
  pgTable,
  varchar,
  boolean,
  bigint,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { jobs } from './jobs';
import { users } from './users';

export const applications = pgTable(
  'applications',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    jobId: varchar('job_id', { length: 64 })
      .notNull()
      .references(() => jobs.id),
    applicant: varchar('applicant', { length: 64 })
      .notNull()
      .references(() => users.identity),
    resumeLink: varchar('resume_link', { length: 200 }).notNull(),
    approved: boolean('approved').notNull().default(false),
    completed: boolean('completed').notNull().default(false),
    paid: boolean('paid').notNull().default(false),
    submissionLink: varchar('submission_link', { length: 200 }).notNull().default(''),
    narration: varchar('narration', { length: 300 }).notNull().default(''),
    clientReview: varchar('client_review', { length: 300 }).notNull().default(''),
    expectedEndDate: bigint('expected_end_date', { mode: 'number' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [unique('uq_application_job_applicant').on(table.jobId, table.applicant)],
);
