import { MAX_AMOUNT } from '@shared/constants';
import type { EscrowRecord, JobPost } from '@shared/types';
import { escrowAddress, generateNonce } from './addresses';
import { AuthorizationError, ResourceError } from './errors';
import type { TransitionSuccess } from './state-machine';
import type { MarketplaceTx } from './store';

/** Balance after crediting `amount`; accounts are unsigned 64-bit. */
export function creditBalance(identity: string, balance: bigint, amount: bigint): bigint {
  const credited = balance + amount;
  if (credited > MAX_AMOUNT) {
    throw new ResourceError(
      'BalanceOverflow',
      `Crediting ${amount} to '${identity}' would exceed the maximum balance`,
    );
  }
  return credited;
}

/**
 * Holds job deposits. Escrow ids are keyed derivations of (job id, nonce)
 * under a secret only the custodian holds, so funds move out only through
 * {@link EscrowCustodian.release}, never through a key a client or
 * freelancer controls.
 */
export class EscrowCustodian {
  private readonly secret: string;

  constructor(secret: string) {
    if (secret.length === 0) {
      throw new Error('Escrow custodian secret must not be empty');
    }
    this.secret = secret;
  }

  newNonce(): string {
    return generateNonce();
  }

  /**
   * Debits the job's client and creates the escrow holding `job.amount`,
   * addressed by the job id and `job.escrowNonce`. Must run in the
   * transaction that inserts the job.
   */
  async open(tx: MarketplaceTx, job: JobPost): Promise<EscrowRecord> {
    const account = await tx.findAccount(job.client, { forUpdate: true });
    const balance = account?.balance ?? 0n;
    if (balance < job.amount) {
      throw new ResourceError(
        'InsufficientFunds',
        `Balance ${balance} is below the job amount ${job.amount}`,
      );
    }

    const escrow: EscrowRecord = {
      id: escrowAddress(this.secret, job.id, job.escrowNonce),
      jobId: job.id,
      balance: job.amount,
      releasedTo: null,
      releasedAt: null,
    };

    await tx.saveAccount({ identity: job.client, balance: balance - job.amount });
    await tx.insertEscrow(escrow);
    return escrow;
  }

  /**
   * Pays the whole escrow out to `beneficiary`. Only an `approve_submission`
   * transition that reached PAID authorizes a release; the escrow is located
   * by re-deriving its id from the nonce stored on the job.
   */
  async release(
    tx: MarketplaceTx,
    job: JobPost,
    beneficiary: string,
    approval: TransitionSuccess,
    releasedAt: Date,
  ): Promise<EscrowRecord> {
    if (approval.action !== 'approve_submission' || approval.newState !== 'PAID') {
      throw new AuthorizationError(`Escrow release is not permitted after '${approval.action}'`);
    }

    const escrowId = escrowAddress(this.secret, job.id, job.escrowNonce);
    const escrow = await tx.findEscrow(escrowId);
    if (!escrow || escrow.jobId !== job.id) {
      throw new ResourceError('EscrowMismatch', `No escrow derivable for job ${job.id}`);
    }
    if (escrow.balance !== job.amount) {
      throw new ResourceError(
        'EscrowMismatch',
        `Escrow holds ${escrow.balance} but job ${job.id} is worth ${job.amount}`,
      );
    }

    const account = await tx.findAccount(beneficiary, { forUpdate: true });
    await tx.saveAccount({
      identity: beneficiary,
      balance: creditBalance(beneficiary, account?.balance ?? 0n, escrow.balance),
    });

    const released: EscrowRecord = {
      ...escrow,
      balance: 0n,
      releasedTo: beneficiary,
      releasedAt,
    };
    await tx.updateEscrow(released);
    return released;
  }

  /** Current escrow balance for a job, zero once released or if none exists. */
  async balanceOf(tx: MarketplaceTx, jobId: string): Promise<bigint> {
    const escrow = await tx.findEscrowByJob(jobId);
    return escrow?.balance ?? 0n;
  }
}
