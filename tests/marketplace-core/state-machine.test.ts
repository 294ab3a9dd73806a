import { describe, it, expect } from 'vitest';
import { JOB_STATUSES, JOB_ACTIONS, ROLES } from '@shared/constants';
import {
  ROLE_PERMISSIONS,
  TRANSITION_TABLE,
  GUARDS,
  OWNERSHIP_GUARDS,
  checkRole,
  rejectionCode,
  guardJobOwner,
  guardApplicantOwner,
  guardApplicationBelongsToJob,
  guardApplicationApproved,
  guardWorkCompleted,
  transition,
  type JobStatus,
  type TransitionContext,
  type ApplicationSnapshot,
} from '@core/state-machine';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeApplication(overrides: Partial<ApplicationSnapshot> = {}): ApplicationSnapshot {
  return {
    id: 'app-1',
    jobId: 'job-1',
    applicant: 'fred',
    approved: false,
    completed: false,
    ...overrides,
  };
}

function makeCtx(overrides: Partial<TransitionContext> = {}): TransitionContext {
  return {
    jobId: 'job-1',
    currentState: 'OPEN',
    actor: { role: 'client', identity: 'carol' },
    timestamp: new Date('2026-03-01'),
    job: { id: 'job-1', client: 'carol' },
    application: makeApplication(),
    ...overrides,
  };
}

const freelancer = { role: 'freelancer' as const, identity: 'fred' };

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

describe('ROLE_PERMISSIONS', () => {
  it('covers every JOB_ACTION', () => {
    for (const action of JOB_ACTIONS) {
      expect(ROLE_PERMISSIONS[action].length).toBeGreaterThan(0);
    }
  });

  it('only references valid ROLES', () => {
    const validRoles = new Set<string>(ROLES);
    for (const action of JOB_ACTIONS) {
      for (const role of ROLE_PERMISSIONS[action]) {
        expect(validRoles.has(role)).toBe(true);
      }
    }
  });

  it('gives clients and freelancers disjoint actions', () => {
    const clientActions = JOB_ACTIONS.filter((a) => ROLE_PERMISSIONS[a].includes('client'));
    const freelancerActions = JOB_ACTIONS.filter((a) => ROLE_PERMISSIONS[a].includes('freelancer'));
    expect(clientActions).toEqual(['post_job', 'approve_application', 'approve_submission']);
    expect(freelancerActions).toEqual(['apply_to_job', 'submit_work']);
  });
});

describe('TRANSITION_TABLE', () => {
  const order = (s: JobStatus) => JOB_STATUSES.indexOf(s);
  const targets = (from: JobStatus) =>
    Object.values(TRANSITION_TABLE[from]).filter((s): s is JobStatus => s !== undefined);

  it('never moves a job backwards', () => {
    for (const from of JOB_STATUSES) {
      for (const to of targets(from)) {
        expect(order(to)).toBeGreaterThanOrEqual(order(from));
      }
    }
  });

  it('advances one status at a time', () => {
    for (const from of JOB_STATUSES) {
      for (const to of targets(from)) {
        expect(order(to) - order(from)).toBeLessThanOrEqual(1);
      }
    }
  });

  it('only allows applying once a job is PAID', () => {
    expect(TRANSITION_TABLE.PAID).toEqual({ apply_to_job: 'PAID' });
  });

  it('has no entry for post_job', () => {
    for (const from of JOB_STATUSES) {
      expect(TRANSITION_TABLE[from].post_job).toBeUndefined();
    }
  });
});

describe('rejectionCode', () => {
  it('reports JobAlreadyFilled for any late approval', () => {
    expect(rejectionCode('approve_application', 'FILLED')).toBe('JobAlreadyFilled');
    expect(rejectionCode('approve_application', 'PAID')).toBe('JobAlreadyFilled');
  });

  it('reports AlreadyPaid after payout', () => {
    expect(rejectionCode('submit_work', 'PAID')).toBe('AlreadyPaid');
    expect(rejectionCode('approve_submission', 'PAID')).toBe('AlreadyPaid');
  });

  it('reports the missing prerequisite otherwise', () => {
    expect(rejectionCode('submit_work', 'OPEN')).toBe('ApplicationNotApproved');
    expect(rejectionCode('approve_submission', 'FILLED')).toBe('WorkNotCompleted');
  });
});

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

describe('checkRole', () => {
  it('passes a client posting a job', () => {
    expect(checkRole('post_job', 'client').passed).toBe(true);
  });

  it('rejects a freelancer posting a job', () => {
    const result = checkRole('post_job', 'freelancer');
    expect(result.passed).toBe(false);
    expect(result.code).toBe('Unauthorized');
    expect(result.reason).toBe("Role 'freelancer' is not permitted to perform 'post_job'");
  });
});

describe('ownership guards', () => {
  it('guardJobOwner passes for the job client only', () => {
    expect(guardJobOwner(makeCtx()).passed).toBe(true);
    const other = guardJobOwner(makeCtx({ actor: { role: 'client', identity: 'dave' } }));
    expect(other.passed).toBe(false);
    expect(other.code).toBe('Unauthorized');
  });

  it('guardApplicantOwner passes for the applicant only', () => {
    expect(guardApplicantOwner(makeCtx({ actor: freelancer })).passed).toBe(true);
    expect(
      guardApplicantOwner(makeCtx({ actor: { role: 'freelancer', identity: 'gina' } })).passed,
    ).toBe(false);
  });

  it('guardApplicantOwner fails without an application', () => {
    expect(guardApplicantOwner(makeCtx({ actor: freelancer, application: undefined })).passed).toBe(false);
  });

  it('registers ownership guards for approvals and submissions', () => {
    expect(OWNERSHIP_GUARDS.approve_application).toContain(guardJobOwner);
    expect(OWNERSHIP_GUARDS.approve_submission).toContain(guardJobOwner);
    expect(OWNERSHIP_GUARDS.submit_work).toContain(guardApplicantOwner);
  });
});

describe('state guards', () => {
  it('guardApplicationBelongsToJob rejects an application for another job', () => {
    const result = guardApplicationBelongsToJob(
      makeCtx({ application: makeApplication({ jobId: 'job-2' }) }),
    );
    expect(result.passed).toBe(false);
    expect(result.code).toBe('InvalidApplication');
  });

  it('guardApplicationApproved follows the approved flag', () => {
    expect(guardApplicationApproved(makeCtx()).code).toBe('ApplicationNotApproved');
    expect(
      guardApplicationApproved(makeCtx({ application: makeApplication({ approved: true }) })).passed,
    ).toBe(true);
  });

  it('guardWorkCompleted follows the completed flag', () => {
    expect(guardWorkCompleted(makeCtx()).code).toBe('WorkNotCompleted');
    expect(
      guardWorkCompleted(makeCtx({ application: makeApplication({ completed: true }) })).passed,
    ).toBe(true);
  });

  it('approve_submission requires both job membership and completion', () => {
    expect(GUARDS.approve_submission).toEqual([guardApplicationBelongsToJob, guardWorkCompleted]);
  });
});

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

describe('transition', () => {
  it('fills an OPEN job on approval by its client', () => {
    const result = transition('OPEN', 'approve_application', makeCtx());
    expect(result).toMatchObject({
      ok: true,
      action: 'approve_application',
      fromState: 'OPEN',
      newState: 'FILLED',
    });
  });

  it('rejects a freelancer approving', () => {
    const result = transition('OPEN', 'approve_application', makeCtx({ actor: freelancer }));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('Unauthorized');
  });

  it('checks ownership before the job state', () => {
    const result = transition(
      'FILLED',
      'approve_application',
      makeCtx({ currentState: 'FILLED', actor: { role: 'client', identity: 'dave' } }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('Unauthorized');
  });

  it('rejects a second approval with JobAlreadyFilled', () => {
    const result = transition('FILLED', 'approve_application', makeCtx({ currentState: 'FILLED' }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe('JobAlreadyFilled');
      expect(result.error).toBe("Action 'approve_application' is not valid in state 'FILLED'");
    }
  });

  it('rejects approving an application that belongs to another job', () => {
    const result = transition(
      'OPEN',
      'approve_application',
      makeCtx({ application: makeApplication({ jobId: 'job-2' }) }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe('InvalidApplication');
      expect(result.guardResults?.[0].guardName).toBe('guardApplicationBelongsToJob');
    }
  });

  it('moves FILLED to WORK_SUBMITTED on submission by the approved applicant', () => {
    const result = transition(
      'FILLED',
      'submit_work',
      makeCtx({ actor: freelancer, application: makeApplication({ approved: true }) }),
    );
    expect(result).toMatchObject({ ok: true, newState: 'WORK_SUBMITTED' });
  });

  it('keeps WORK_SUBMITTED on resubmission', () => {
    const result = transition(
      'WORK_SUBMITTED',
      'submit_work',
      makeCtx({
        actor: freelancer,
        application: makeApplication({ approved: true, completed: true }),
      }),
    );
    expect(result).toMatchObject({ ok: true, newState: 'WORK_SUBMITTED' });
  });

  it('rejects submission from an applicant who was not approved', () => {
    const result = transition('FILLED', 'submit_work', makeCtx({ actor: freelancer }));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('ApplicationNotApproved');
  });

  it('rejects payout before work is submitted', () => {
    const result = transition(
      'FILLED',
      'approve_submission',
      makeCtx({ application: makeApplication({ approved: true }) }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('WorkNotCompleted');
  });

  it('pays out a completed application', () => {
    const result = transition(
      'WORK_SUBMITTED',
      'approve_submission',
      makeCtx({ application: makeApplication({ approved: true, completed: true }) }),
    );
    expect(result).toMatchObject({ ok: true, action: 'approve_submission', newState: 'PAID' });
  });

  it('rejects a second payout with AlreadyPaid', () => {
    const result = transition(
      'PAID',
      'approve_submission',
      makeCtx({ application: makeApplication({ approved: true, completed: true }) }),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('AlreadyPaid');
  });

  it('lets freelancers apply in every state', () => {
    for (const state of JOB_STATUSES) {
      const result = transition(state, 'apply_to_job', makeCtx({ actor: freelancer, currentState: state }));
      expect(result).toMatchObject({ ok: true, newState: state });
    }
  });
});
