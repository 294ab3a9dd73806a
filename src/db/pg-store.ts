import { and, asc, eq } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { Pool } from 'pg';
import type {
  AccountRecord,
  ApplicationRecord,
  EscrowRecord,
  IdentityRecord,
  JobPost,
} from '@shared/types';
import { AlreadyExistsError } from '@core/errors';
import type {
  JobFilter,
  LockOptions,
  MarketplaceStore,
  MarketplaceTx,
} from '@core/store';
import type { Database } from './connection';
import * as schema from './schema';

const { users, accounts, jobs, escrows, applications } = schema;

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toJob(row: typeof jobs.$inferSelect): JobPost {
  return { ...row, amount: BigInt(row.amount) };
}

function toEscrow(row: typeof escrows.$inferSelect): EscrowRecord {
  return { ...row, balance: BigInt(row.balance) };
}

function jobRow(job: JobPost): typeof jobs.$inferInsert {
  return { ...job, amount: job.amount.toString() };
}

function escrowRow(escrow: EscrowRecord): typeof escrows.$inferInsert {
  return { ...escrow, balance: escrow.balance.toString() };
}

/** Postgres unique_violation, raw or wrapped by the driver layer. */
export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('code' in err && err.code === '23505') return true;
  return 'cause' in err && isUniqueViolation(err.cause);
}

// ---------------------------------------------------------------------------
// Transaction
// ---------------------------------------------------------------------------

class PgTx implements MarketplaceTx {
  constructor(private readonly db: Executor) {}

  async findUser(identity: string): Promise<IdentityRecord | undefined> {
    const [row] = await this.db.select().from(users).where(eq(users.identity, identity));
    return row;
  }

  async insertUser(user: IdentityRecord) {
    await this.db.insert(users).values(user);
  }

  async findAccount(identity: string, opts: LockOptions = {}): Promise<AccountRecord | undefined> {
    const query = this.db.select().from(accounts).where(eq(accounts.identity, identity));
    const [row] = opts.forUpdate ? await query.for('update') : await query;
    return row ? { identity: row.identity, balance: BigInt(row.balance) } : undefined;
  }

  async saveAccount(account: AccountRecord) {
    const balance = account.balance.toString();
    await this.db
      .insert(accounts)
      .values({ identity: account.identity, balance })
      .onConflictDoUpdate({
        target: accounts.identity,
        set: { balance, updatedAt: new Date() },
      });
  }

  async findJob(id: string, opts: LockOptions = {}): Promise<JobPost | undefined> {
    const query = this.db.select().from(jobs).where(eq(jobs.id, id));
    const [row] = opts.forUpdate ? await query.for('update') : await query;
    return row ? toJob(row) : undefined;
  }

  async listJobs(filter: JobFilter = {}): Promise<JobPost[]> {
    const rows = await this.db
      .select()
      .from(jobs)
      .where(
        and(
          filter.client ? eq(jobs.client, filter.client) : undefined,
          filter.status ? eq(jobs.status, filter.status) : undefined,
        ),
      )
      .orderBy(asc(jobs.createdAt));
    return rows.map(toJob);
  }

  async insertJob(job: JobPost) {
    await this.db.insert(jobs).values(jobRow(job));
  }

  async updateJob(job: JobPost) {
    await this.db
      .update(jobs)
      .set({ filled: job.filled, status: job.status })
      .where(eq(jobs.id, job.id));
  }

  async findEscrow(id: string): Promise<EscrowRecord | undefined> {
    const [row] = await this.db.select().from(escrows).where(eq(escrows.id, id));
    return row ? toEscrow(row) : undefined;
  }

  async findEscrowByJob(jobId: string): Promise<EscrowRecord | undefined> {
    const [row] = await this.db.select().from(escrows).where(eq(escrows.jobId, jobId));
    return row ? toEscrow(row) : undefined;
  }

  async insertEscrow(escrow: EscrowRecord) {
    await this.db.insert(escrows).values(escrowRow(escrow));
  }

  async updateEscrow(escrow: EscrowRecord) {
    await this.db
      .update(escrows)
      .set({
        balance: escrow.balance.toString(),
        releasedTo: escrow.releasedTo,
        releasedAt: escrow.releasedAt,
      })
      .where(eq(escrows.id, escrow.id));
  }

  async findApplication(id: string): Promise<ApplicationRecord | undefined> {
    const [row] = await this.db.select().from(applications).where(eq(applications.id, id));
    return row;
  }

  async listApplications(jobId: string): Promise<ApplicationRecord[]> {
    return this.db
      .select()
      .from(applications)
      .where(eq(applications.jobId, jobId))
      .orderBy(asc(applications.createdAt));
  }

  async insertApplication(application: ApplicationRecord) {
    await this.db.insert(applications).values(application);
  }

  async updateApplication(application: ApplicationRecord) {
    await this.db
      .update(applications)
      .set({
        approved: application.approved,
        completed: application.completed,
        paid: application.paid,
        submissionLink: application.submissionLink,
        narration: application.narration,
        clientReview: application.clientReview,
      })
      .where(eq(applications.id, application.id));
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Postgres-backed store. Each operation is one database transaction; rows
 * read with `forUpdate` stay locked until it commits or rolls back.
 */
export class PgMarketplaceStore implements MarketplaceStore {
  constructor(
    private readonly db: Database,
    private readonly pool?: Pool,
  ) {}

  async transaction<T>(fn: (tx: MarketplaceTx) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((trx) => fn(new PgTx(trx)));
    } catch (err) {
      // Two writers raced past the existence check on the same key.
      if (isUniqueViolation(err)) {
        throw new AlreadyExistsError('Record already exists');
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}
