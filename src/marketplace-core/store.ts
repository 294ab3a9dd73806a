import type {
  AccountRecord,
  ApplicationRecord,
  EscrowRecord,
  IdentityRecord,
  JobPost,
  JobStatus,
} from '@shared/types';

// ---------------------------------------------------------------------------
// Store contract
// ---------------------------------------------------------------------------

export interface LockOptions {
  /** Hold the row until the transaction ends (per-job / per-account single writer). */
  forUpdate?: boolean;
}

export interface JobFilter {
  client?: string;
  status?: JobStatus;
}

/**
 * Reads and writes available inside one transaction. Writes are visible to
 * later reads in the same transaction and are discarded if it throws.
 */
export interface MarketplaceTx {
  findUser(identity: string): Promise<IdentityRecord | undefined>;
  insertUser(user: IdentityRecord): Promise<void>;

  findAccount(identity: string, opts?: LockOptions): Promise<AccountRecord | undefined>;
  saveAccount(account: AccountRecord): Promise<void>;

  findJob(id: string, opts?: LockOptions): Promise<JobPost | undefined>;
  listJobs(filter?: JobFilter): Promise<JobPost[]>;
  insertJob(job: JobPost): Promise<void>;
  updateJob(job: JobPost): Promise<void>;

  findEscrow(id: string): Promise<EscrowRecord | undefined>;
  findEscrowByJob(jobId: string): Promise<EscrowRecord | undefined>;
  insertEscrow(escrow: EscrowRecord): Promise<void>;
  updateEscrow(escrow: EscrowRecord): Promise<void>;

  findApplication(id: string): Promise<ApplicationRecord | undefined>;
  listApplications(jobId: string): Promise<ApplicationRecord[]>;
  insertApplication(application: ApplicationRecord): Promise<void>;
  updateApplication(application: ApplicationRecord): Promise<void>;
}

export interface MarketplaceStore {
  transaction<T>(fn: (tx: MarketplaceTx) => Promise<T>): Promise<T>;
  close?(): Promise<void>;
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

interface MemoryState {
  users: Map<string, IdentityRecord>;
  accounts: Map<string, AccountRecord>;
  jobs: Map<string, JobPost>;
  escrows: Map<string, EscrowRecord>;
  applications: Map<string, ApplicationRecord>;
}

function emptyState(): MemoryState {
  return {
    users: new Map(),
    accounts: new Map(),
    jobs: new Map(),
    escrows: new Map(),
    applications: new Map(),
  };
}

function copy<T extends object>(record: T | undefined): T | undefined {
  return record ? { ...record } : undefined;
}

function byCreatedAt<T extends { createdAt: Date }>(a: T, b: T): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

class MemoryTx implements MarketplaceTx {
  constructor(private readonly state: MemoryState) {}

  async findUser(identity: string) {
    return copy(this.state.users.get(identity));
  }

  async insertUser(user: IdentityRecord) {
    this.state.users.set(user.identity, { ...user });
  }

  // Transactions already run one at a time, so row locks are implicit.
  async findAccount(identity: string, _opts?: LockOptions) {
    return copy(this.state.accounts.get(identity));
  }

  async saveAccount(account: AccountRecord) {
    this.state.accounts.set(account.identity, { ...account });
  }

  async findJob(id: string, _opts?: LockOptions) {
    return copy(this.state.jobs.get(id));
  }

  async listJobs(filter: JobFilter = {}) {
    return [...this.state.jobs.values()]
      .filter((job) => !filter.client || job.client === filter.client)
      .filter((job) => !filter.status || job.status === filter.status)
      .sort(byCreatedAt)
      .map((job) => ({ ...job }));
  }

  async insertJob(job: JobPost) {
    this.state.jobs.set(job.id, { ...job });
  }

  async updateJob(job: JobPost) {
    this.state.jobs.set(job.id, { ...job });
  }

  async findEscrow(id: string) {
    return copy(this.state.escrows.get(id));
  }

  async findEscrowByJob(jobId: string) {
    for (const escrow of this.state.escrows.values()) {
      if (escrow.jobId === jobId) return { ...escrow };
    }
    return undefined;
  }

  async insertEscrow(escrow: EscrowRecord) {
    this.state.escrows.set(escrow.id, { ...escrow });
  }

  async updateEscrow(escrow: EscrowRecord) {
    this.state.escrows.set(escrow.id, { ...escrow });
  }

  async findApplication(id: string) {
    return copy(this.state.applications.get(id));
  }

  async listApplications(jobId: string) {
    return [...this.state.applications.values()]
      .filter((application) => application.jobId === jobId)
      .sort(byCreatedAt)
      .map((application) => ({ ...application }));
  }

  async insertApplication(application: ApplicationRecord) {
    this.state.applications.set(application.id, { ...application });
  }

  async updateApplication(application: ApplicationRecord) {
    this.state.applications.set(application.id, { ...application });
  }
}

/**
 * Single-writer store: transactions are queued and run one after another
 * against a working copy that replaces the committed state only on success.
 */
export class InMemoryStore implements MarketplaceStore {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(fn: (tx: MarketplaceTx) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.run(fn));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async run<T>(fn: (tx: MarketplaceTx) => Promise<T>): Promise<T> {
    const working = structuredClone(this.state);
    const result = await fn(new MemoryTx(working));
    this.state = working;
    return result;
  }
}
