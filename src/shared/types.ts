import type { ERROR_CODES, JOB_STATUSES, ROLES } from './constants';

export type JobStatus = (typeof JOB_STATUSES)[number];
export type Role = (typeof ROLES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];

export interface IdentityRecord {
  identity: string;
  name: string;
  role: Role;
  createdAt: Date;
}

export interface AccountRecord {
  identity: string;
  balance: bigint;
}

export interface JobPost {
  id: string;
  client: string;
  title: string;
  description: string;
  amount: bigint;
  filled: boolean;
  status: JobStatus;
  escrowNonce: string;
  startDate: number | null;
  endDate: number | null;
  createdAt: Date;
}

export interface EscrowRecord {
  id: string;
  jobId: string;
  balance: bigint;
  releasedTo: string | null;
  releasedAt: Date | null;
}

export interface ApplicationRecord {
  id: string;
  jobId: string;
  applicant: string;
  resumeLink: string;
  approved: boolean;
  completed: boolean;
  paid: boolean;
  submissionLink: string;
  narration: string;
  clientReview: string;
  expectedEndDate: number | null;
  createdAt: Date;
}

// Wire shapes: u64 amounts travel as decimal strings, the escrow nonce never leaves the server.

export interface AccountView {
  identity: string;
  balance: string;
}

export interface JobView {
  id: string;
  client: string;
  title: string;
  description: string;
  amount: string;
  filled: boolean;
  status: JobStatus;
  startDate: number | null;
  endDate: number | null;
  escrowBalance: string;
  createdAt: string;
}

export interface ApplicationView {
  id: string;
  jobId: string;
  applicant: string;
  resumeLink: string;
  approved: boolean;
  completed: boolean;
  paid: boolean;
  submissionLink: string;
  narration: string;
  clientReview: string;
  expectedEndDate: number | null;
  createdAt: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
}
