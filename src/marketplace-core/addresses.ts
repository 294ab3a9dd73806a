import { createHash, createHmac, randomBytes } from 'crypto';

// Record ids are derived from their natural keys so that a second create for
// the same key lands on the same id.

const SEPARATOR = '\u0000';

function digest(seeds: string[]): string {
  return createHash('sha256').update(seeds.join(SEPARATOR)).digest('hex');
}

export function jobAddress(client: string, title: string): string {
  return digest(['job_post', client, title]);
}

export function applicationAddress(jobId: string, applicant: string): string {
  return digest(['application', jobId, applicant]);
}

/**
 * Keyed derivation: without `secret` the escrow id cannot be recomputed from
 * the job id and nonce.
 */
export function escrowAddress(secret: string, jobId: string, nonce: string): string {
  return createHmac('sha256', secret)
    .update(['escrow', jobId, nonce].join(SEPARATOR))
    .digest('hex');
}

export function generateNonce(): string {
  return randomBytes(16).toString('hex');
}
