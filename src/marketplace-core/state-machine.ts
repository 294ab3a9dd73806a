import { JOB_STATUSES, JOB_ACTIONS, ROLES } from '@shared/constants';
import type { ErrorCode } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JobStatus = (typeof JOB_STATUSES)[number];
export type JobAction = (typeof JOB_ACTIONS)[number];
export type Role = (typeof ROLES)[number];

export interface JobSnapshot {
  id: string;
  client: string;
}

export interface ApplicationSnapshot {
  id: string;
  jobId: string;
  applicant: string;
  approved: boolean;
  completed: boolean;
}

export interface TransitionContext {
  jobId: string;
  currentState: JobStatus;
  actor: {
    role: Role;
    identity: string;
  };
  timestamp: Date;
  job: JobSnapshot;
  application?: ApplicationSnapshot;
}

export interface GuardResult {
  guardName: string;
  passed: boolean;
  reason?: string;
  code?: ErrorCode;
}

export interface TransitionSuccess {
  ok: true;
  action: JobAction;
  fromState: JobStatus;
  newState: JobStatus;
  guardResults: GuardResult[];
}

export interface TransitionFailure {
  ok: false;
  code: ErrorCode;
  error: string;
  guardResults?: GuardResult[];
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Role Permissions
// ---------------------------------------------------------------------------

export const ROLE_PERMISSIONS: Record<JobAction, readonly Role[]> = {
  post_job: ['client'],
  apply_to_job: ['freelancer'],
  approve_application: ['client'],
  submit_work: ['freelancer'],
  approve_submission: ['client'],
};

/**
 * Role check shared by the reducer and by `post_job`, which has no job to
 * transition yet.
 */
export function checkRole(action: JobAction, role: Role): GuardResult {
  if (ROLE_PERMISSIONS[action].includes(role)) {
    return { guardName: 'checkRole', passed: true };
  }
  return {
    guardName: 'checkRole',
    passed: false,
    reason: `Role '${role}' is not permitted to perform '${action}'`,
    code: 'Unauthorized',
  };
}

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

// post_job creates the job in OPEN and has no entry here.
export const TRANSITION_TABLE: Record<JobStatus, Partial<Record<JobAction, JobStatus>>> = {
  OPEN: {
    apply_to_job: 'OPEN',
    approve_application: 'FILLED',
  },
  FILLED: {
    apply_to_job: 'FILLED',
    submit_work: 'WORK_SUBMITTED',
  },
  WORK_SUBMITTED: {
    apply_to_job: 'WORK_SUBMITTED',
    submit_work: 'WORK_SUBMITTED',
    approve_submission: 'PAID',
  },
  PAID: {
    apply_to_job: 'PAID',
  },
};

/**
 * Error code for an action the table does not allow from `state`.
 */
export function rejectionCode(action: JobAction, state: JobStatus): ErrorCode {
  if (action === 'approve_application') return 'JobAlreadyFilled';
  if (state === 'PAID') return 'AlreadyPaid';
  if (action === 'submit_work') return 'ApplicationNotApproved';
  return 'WorkNotCompleted';
}

// ---------------------------------------------------------------------------
// Guard Functions
// ---------------------------------------------------------------------------

type GuardFn = (ctx: TransitionContext) => GuardResult;

export function guardJobOwner(ctx: TransitionContext): GuardResult {
  if (ctx.job.client === ctx.actor.identity) {
    return { guardName: 'guardJobOwner', passed: true };
  }
  return {
    guardName: 'guardJobOwner',
    passed: false,
    reason: `Caller '${ctx.actor.identity}' is not the client of job ${ctx.job.id}`,
    code: 'Unauthorized',
  };
}

export function guardApplicantOwner(ctx: TransitionContext): GuardResult {
  if (ctx.application?.applicant === ctx.actor.identity) {
    return { guardName: 'guardApplicantOwner', passed: true };
  }
  return {
    guardName: 'guardApplicantOwner',
    passed: false,
    reason: `Caller '${ctx.actor.identity}' is not the applicant`,
    code: 'Unauthorized',
  };
}

export function guardApplicationBelongsToJob(ctx: TransitionContext): GuardResult {
  if (ctx.application && ctx.application.jobId === ctx.job.id) {
    return { guardName: 'guardApplicationBelongsToJob', passed: true };
  }
  return {
    guardName: 'guardApplicationBelongsToJob',
    passed: false,
    reason: `Application does not belong to job ${ctx.job.id}`,
    code: 'InvalidApplication',
  };
}

export function guardApplicationApproved(ctx: TransitionContext): GuardResult {
  if (ctx.application?.approved) {
    return { guardName: 'guardApplicationApproved', passed: true };
  }
  return {
    guardName: 'guardApplicationApproved',
    passed: false,
    reason: 'Application has not been approved yet',
    code: 'ApplicationNotApproved',
  };
}

export function guardWorkCompleted(ctx: TransitionContext): GuardResult {
  if (ctx.application?.completed) {
    return { guardName: 'guardWorkCompleted', passed: true };
  }
  return {
    guardName: 'guardWorkCompleted',
    passed: false,
    reason: 'Work has not been completed yet',
    code: 'WorkNotCompleted',
  };
}

/**
 * Identity guards, evaluated right after the role check so that an outsider
 * learns nothing about the job's state.
 */
export const OWNERSHIP_GUARDS: Record<JobAction, GuardFn[]> = {
  post_job: [],
  apply_to_job: [],
  approve_application: [guardJobOwner],
  submit_work: [guardApplicantOwner],
  approve_submission: [guardJobOwner],
};

/**
 * State guards: ALL must pass once the transition table allows the action.
 */
export const GUARDS: Record<JobAction, GuardFn[]> = {
  post_job: [],
  apply_to_job: [],
  approve_application: [guardApplicationBelongsToJob],
  submit_work: [guardApplicationApproved],
  approve_submission: [guardApplicationBelongsToJob, guardWorkCompleted],
};

export function checkGuards(
  guards: Record<JobAction, GuardFn[]>,
  action: JobAction,
  ctx: TransitionContext,
): GuardResult[] {
  return guards[action].map((fn) => fn(ctx));
}

function failWith(guardResults: GuardResult[]): TransitionFailure | null {
  const failed = guardResults.filter((g) => !g.passed);
  if (failed.length === 0) return null;
  return {
    ok: false,
    code: failed[0].code ?? 'Unauthorized',
    error: failed.map((g) => g.reason ?? g.guardName).join('; '),
    guardResults,
  };
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: given (currentState, action, context), returns either a
 * successful transition with the new state, or the first rejection in
 * check order: role, ownership, transition table, state guards.
 */
export function transition(
  currentState: JobStatus,
  action: JobAction,
  ctx: TransitionContext,
): TransitionResult {
  // 1. Role permission check
  const role = checkRole(action, ctx.actor.role);
  if (!role.passed) {
    return { ok: false, code: 'Unauthorized', error: role.reason ?? 'Unauthorized' };
  }

  // 2. Ownership
  const ownership = checkGuards(OWNERSHIP_GUARDS, action, ctx);
  const ownershipFailure = failWith(ownership);
  if (ownershipFailure) return ownershipFailure;

  // 3. Transition table check
  const newState = TRANSITION_TABLE[currentState][action];
  if (!newState) {
    return {
      ok: false,
      code: rejectionCode(action, currentState),
      error: `Action '${action}' is not valid in state '${currentState}'`,
    };
  }

  // 4. State guards
  const guardResults = checkGuards(GUARDS, action, ctx);
  const guardFailure = failWith(guardResults);
  if (guardFailure) return guardFailure;

  return {
    ok: true,
    action,
    fromState: currentState,
    newState,
    guardResults: [...ownership, ...guardResults],
  };
}
