export const API_PREFIX = '/api';

export const IDENTITY_HEADER = 'x-identity';

export const JOB_STATUSES = ['OPEN', 'FILLED', 'WORK_SUBMITTED', 'PAID'] as const;

export const JOB_ACTIONS = [
  'post_job',
  'apply_to_job',
  'approve_application',
  'submit_work',
  'approve_submission',
] as const;

export const ROLES = ['client', 'freelancer'] as const;

export const ERROR_CODES = [
  'Unauthorized',
  'AlreadyExists',
  'InvalidDates',
  'InvalidInput',
  'InvalidApplication',
  'InsufficientFunds',
  'EscrowMismatch',
  'BalanceOverflow',
  'JobAlreadyFilled',
  'ApplicationNotApproved',
  'WorkNotCompleted',
  'AlreadyPaid',
  'NotFound',
] as const;

export const FIELD_LIMITS = {
  name: 50,
  title: 100,
  description: 500,
  resumeLink: 200,
  submissionLink: 200,
  narration: 300,
  clientReview: 300,
  identity: 64,
} as const;

export const MAX_AMOUNT = 2n ** 64n - 1n;
