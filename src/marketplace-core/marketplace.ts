import type {
  AccountRecord,
  ApplicationRecord,
  EscrowRecord,
  IdentityRecord,
  JobPost,
} from '@shared/types';
import { applicationAddress, jobAddress } from './addresses';
import {
  AlreadyExistsError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  errorForCode,
} from './errors';
import { creditBalance } from './escrow';
import type { EscrowCustodian } from './escrow';
import { checkRole, transition } from './state-machine';
import type { JobAction, TransitionContext, TransitionSuccess } from './state-machine';
import type { JobFilter, MarketplaceStore, MarketplaceTx } from './store';
import {
  applyToJobSchema,
  approveSubmissionSchema,
  fundAccountSchema,
  identitySchema,
  jobFilterSchema,
  parseInput,
  postJobSchema,
  registerUserSchema,
  submitWorkSchema,
} from './validation';
import type {
  ApplyToJobInput,
  ApproveSubmissionInput,
  FundAccountInput,
  JobFilterInput,
  PostJobInput,
  RegisterUserInput,
  SubmitWorkInput,
} from './validation';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface MarketplaceOptions {
  store: MarketplaceStore;
  custodian: EscrowCustodian;
  clock?: () => Date;
}

export interface JobDetails {
  job: JobPost;
  escrowBalance: bigint;
}

export interface ApprovalResult {
  job: JobPost;
  application: ApplicationRecord;
}

export interface PayoutResult {
  job: JobPost;
  application: ApplicationRecord;
  escrow: EscrowRecord;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Returns why the job's dates are unacceptable, or null when they are fine.
 * Dates come as a pair: both present or both absent.
 */
export function checkJobDates(
  startDate: number | undefined,
  endDate: number | undefined,
  now: Date,
): string | null {
  if (startDate === undefined && endDate === undefined) return null;
  if (startDate === undefined || endDate === undefined) {
    return 'startDate and endDate must be supplied together';
  }
  if (startDate > endDate) {
    return `startDate ${startDate} is after endDate ${endDate}`;
  }
  if (startDate < toSeconds(now)) {
    return `startDate ${startDate} is in the past`;
  }
  return null;
}

function assertTransition(
  result: ReturnType<typeof transition>,
): asserts result is TransitionSuccess {
  if (!result.ok) {
    throw errorForCode(result.code, result.error);
  }
}

// ---------------------------------------------------------------------------
// Marketplace
// ---------------------------------------------------------------------------

/**
 * Entry point for every marketplace operation. Each call runs in one store
 * transaction and checks everything before it writes anything.
 */
export class Marketplace {
  private readonly store: MarketplaceStore;
  private readonly custodian: EscrowCustodian;
  private readonly clock: () => Date;

  constructor(options: MarketplaceOptions) {
    this.store = options.store;
    this.custodian = options.custodian;
    this.clock = options.clock ?? (() => new Date());
  }

  // --- Identity Registry ---

  async registerUser(caller: string, input: RegisterUserInput): Promise<IdentityRecord> {
    const identity = parseInput(identitySchema, caller);
    const { name, role } = parseInput(registerUserSchema, input);

    return this.store.transaction(async (tx) => {
      if (await tx.findUser(identity)) {
        throw new AlreadyExistsError(`Identity '${identity}' is already registered`);
      }
      const user: IdentityRecord = { identity, name, role, createdAt: this.clock() };
      await tx.insertUser(user);
      return user;
    });
  }

  async getUser(identity: string): Promise<IdentityRecord> {
    return this.store.transaction(async (tx) => {
      const user = await tx.findUser(identity);
      if (!user) throw new NotFoundError('User', identity);
      return user;
    });
  }

  // --- Accounts ---

  async fundAccount(identity: string, input: FundAccountInput): Promise<AccountRecord> {
    const owner = parseInput(identitySchema, identity);
    const { amount } = parseInput(fundAccountSchema, input);

    return this.store.transaction(async (tx) => {
      const account = await tx.findAccount(owner, { forUpdate: true });
      const funded: AccountRecord = {
        identity: owner,
        balance: creditBalance(owner, account?.balance ?? 0n, amount),
      };
      await tx.saveAccount(funded);
      return funded;
    });
  }

  async getAccount(identity: string): Promise<AccountRecord> {
    return this.store.transaction(async (tx) => {
      const account = await tx.findAccount(identity);
      return account ?? { identity, balance: 0n };
    });
  }

  // --- Job Ledger ---

  async postJob(caller: string, input: PostJobInput): Promise<JobDetails> {
    const identity = parseInput(identitySchema, caller);
    const { title, description, amount, startDate, endDate } = parseInput(postJobSchema, input);

    return this.store.transaction(async (tx) => {
      const actor = await this.requireActor(tx, identity);
      this.assertRole('post_job', actor);

      const now = this.clock();
      const dateProblem = checkJobDates(startDate, endDate, now);
      if (dateProblem) {
        throw new ValidationError('InvalidDates', dateProblem);
      }

      const id = jobAddress(identity, title);
      if (await tx.findJob(id, { forUpdate: true })) {
        throw new AlreadyExistsError(`Job '${title}' already exists for client '${identity}'`);
      }

      const job: JobPost = {
        id,
        client: identity,
        title,
        description,
        amount,
        filled: false,
        status: 'OPEN',
        escrowNonce: this.custodian.newNonce(),
        startDate: startDate ?? null,
        endDate: endDate ?? null,
        createdAt: now,
      };
      await tx.insertJob(job);
      const escrow = await this.custodian.open(tx, job);
      return { job, escrowBalance: escrow.balance };
    });
  }

  async getJob(jobId: string): Promise<JobDetails> {
    return this.store.transaction(async (tx) => {
      const job = await this.requireJob(tx, jobId);
      return { job, escrowBalance: await this.custodian.balanceOf(tx, job.id) };
    });
  }

  /** `query` is parsed here, so a raw query-string object can be passed through. */
  async listJobs(query: JobFilterInput | Record<string, unknown> = {}): Promise<JobDetails[]> {
    const filter: JobFilter = parseInput(jobFilterSchema, query);
    return this.store.transaction(async (tx) => {
      const jobs = await tx.listJobs(filter);
      const details: JobDetails[] = [];
      for (const job of jobs) {
        details.push({ job, escrowBalance: await this.custodian.balanceOf(tx, job.id) });
      }
      return details;
    });
  }

  // --- Application Ledger ---

  async applyToJob(caller: string, jobId: string, input: ApplyToJobInput): Promise<ApplicationRecord> {
    const identity = parseInput(identitySchema, caller);
    const { resumeLink, expectedEndDate } = parseInput(applyToJobSchema, input);

    return this.store.transaction(async (tx) => {
      const actor = await this.requireActor(tx, identity);
      this.assertRole('apply_to_job', actor);

      if (expectedEndDate !== undefined && expectedEndDate < 0) {
        throw new ValidationError('InvalidDates', `expectedEndDate ${expectedEndDate} is negative`);
      }

      const job = await this.requireJob(tx, jobId);
      const id = applicationAddress(job.id, identity);
      if (await tx.findApplication(id)) {
        throw new AlreadyExistsError(`'${identity}' has already applied to job ${job.id}`);
      }

      assertTransition(
        transition(job.status, 'apply_to_job', this.context(actor, job)),
      );

      const application: ApplicationRecord = {
        id,
        jobId: job.id,
        applicant: identity,
        resumeLink,
        approved: false,
        completed: false,
        paid: false,
        submissionLink: '',
        narration: '',
        clientReview: '',
        expectedEndDate: expectedEndDate ?? null,
        createdAt: this.clock(),
      };
      await tx.insertApplication(application);
      return application;
    });
  }

  /**
   * Approves one application and fills the job. The job row is held for the
   * whole transaction, so of two concurrent approvals only the first sees OPEN.
   */
  async approveApplication(caller: string, jobId: string, applicationId: string): Promise<ApprovalResult> {
    const identity = parseInput(identitySchema, caller);

    return this.store.transaction(async (tx) => {
      const actor = await this.requireActor(tx, identity);
      const job = await this.requireJob(tx, jobId, true);
      const application = await this.requireApplication(tx, applicationId);

      const result = transition(job.status, 'approve_application', this.context(actor, job, application));
      assertTransition(result);

      const approved: ApplicationRecord = { ...application, approved: true };
      const filled: JobPost = { ...job, filled: true, status: result.newState };
      await tx.updateApplication(approved);
      await tx.updateJob(filled);
      return { job: filled, application: approved };
    });
  }

  async submitWork(caller: string, applicationId: string, input: SubmitWorkInput): Promise<ApplicationRecord> {
    const identity = parseInput(identitySchema, caller);
    const { submissionLink, narration } = parseInput(submitWorkSchema, input);

    return this.store.transaction(async (tx) => {
      const actor = await this.requireActor(tx, identity);
      const { jobId } = await this.requireApplication(tx, applicationId);
      const job = await this.requireJob(tx, jobId, true);
      // Re-read under the job lock so a concurrent approval is seen.
      const application = await this.requireApplication(tx, applicationId);

      const result = transition(job.status, 'submit_work', this.context(actor, job, application));
      assertTransition(result);

      const submitted: ApplicationRecord = {
        ...application,
        submissionLink,
        narration,
        completed: true,
      };
      await tx.updateApplication(submitted);
      if (result.newState !== job.status) {
        await tx.updateJob({ ...job, status: result.newState });
      }
      return submitted;
    });
  }

  /**
   * Records the client's review and releases the escrow to the applicant.
   * Moving the job to PAID in the same transaction makes the payout one-shot.
   */
  async approveSubmission(
    caller: string,
    jobId: string,
    applicationId: string,
    input: ApproveSubmissionInput,
  ): Promise<PayoutResult> {
    const identity = parseInput(identitySchema, caller);
    const { clientReview } = parseInput(approveSubmissionSchema, input);

    return this.store.transaction(async (tx) => {
      const actor = await this.requireActor(tx, identity);
      const job = await this.requireJob(tx, jobId, true);
      const application = await this.requireApplication(tx, applicationId);

      const result = transition(job.status, 'approve_submission', this.context(actor, job, application));
      assertTransition(result);

      const escrow = await this.custodian.release(tx, job, application.applicant, result, this.clock());

      const reviewed: ApplicationRecord = { ...application, clientReview, paid: true };
      const paid: JobPost = { ...job, status: result.newState };
      await tx.updateApplication(reviewed);
      await tx.updateJob(paid);
      return { job: paid, application: reviewed, escrow };
    });
  }

  async getApplication(applicationId: string): Promise<ApplicationRecord> {
    return this.store.transaction((tx) => this.requireApplication(tx, applicationId));
  }

  async listApplications(jobId: string): Promise<ApplicationRecord[]> {
    return this.store.transaction(async (tx) => {
      const job = await this.requireJob(tx, jobId);
      return tx.listApplications(job.id);
    });
  }

  // --- Authorization Guard plumbing ---

  private async requireActor(tx: MarketplaceTx, identity: string): Promise<IdentityRecord> {
    const user = await tx.findUser(identity);
    if (!user) {
      throw new AuthorizationError(`Identity '${identity}' is not registered`);
    }
    return user;
  }

  private assertRole(action: JobAction, actor: IdentityRecord): void {
    const result = checkRole(action, actor.role);
    if (!result.passed) {
      throw new AuthorizationError(result.reason ?? `Not permitted to perform '${action}'`);
    }
  }

  private async requireJob(tx: MarketplaceTx, jobId: string, forUpdate = false): Promise<JobPost> {
    const job = await tx.findJob(jobId, { forUpdate });
    if (!job) throw new NotFoundError('Job', jobId);
    return job;
  }

  private async requireApplication(tx: MarketplaceTx, applicationId: string): Promise<ApplicationRecord> {
    const application = await tx.findApplication(applicationId);
    if (!application) throw new NotFoundError('Application', applicationId);
    return application;
  }

  private context(
    actor: IdentityRecord,
    job: JobPost,
    application?: ApplicationRecord,
  ): TransitionContext {
    return {
      jobId: job.id,
      currentState: job.status,
      actor: { role: actor.role, identity: actor.identity },
      timestamp: this.clock(),
      job: { id: job.id, client: job.client },
      application: application
        ? {
            id: application.id,
            jobId: application.jobId,
            applicant: application.applicant,
            approved: application.approved,
            completed: application.completed,
          }
        : undefined,
    };
  }
}
