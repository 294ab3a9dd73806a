import type {
  AccountRecord,
  AccountView,
  ApplicationRecord,
  ApplicationView,
  JobView,
} from '@shared/types';
import type { JobDetails } from './marketplace';

export function toAccountView(account: AccountRecord): AccountView {
  return { identity: account.identity, balance: account.balance.toString() };
}

/** Wire form of a job. Leaves out the escrow nonce. */
export function toJobView({ job, escrowBalance }: JobDetails): JobView {
  return {
    id: job.id,
    client: job.client,
    title: job.title,
    description: job.description,
    amount: job.amount.toString(),
    filled: job.filled,
    status: job.status,
    startDate: job.startDate,
    endDate: job.endDate,
    escrowBalance: escrowBalance.toString(),
    createdAt: job.createdAt.toISOString(),
  };
}

export function toApplicationView(application: ApplicationRecord): ApplicationView {
  return {
    ...application,
    createdAt: application.createdAt.toISOString(),
  };
}
