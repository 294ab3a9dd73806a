import { z } from 'zod';
import { FIELD_LIMITS, JOB_STATUSES, MAX_AMOUNT, ROLES } from '@shared/constants';
import { ValidationError } from './errors';

const limited = (max: number) => z.string().max(max);

// u64 amounts arrive as bigint in process and as decimal strings or safe integers over JSON.
export const amountSchema = z
  .union([
    z.bigint(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^\d+$/, 'amount must be a non-negative integer'),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_AMOUNT, {
    message: 'amount must fit in an unsigned 64-bit integer',
  });

const timestampSchema = z.number().int().safe();

export const identitySchema = z.string().min(1).max(FIELD_LIMITS.identity);

export const registerUserSchema = z.object({
  name: limited(FIELD_LIMITS.name).min(1),
  role: z.enum(ROLES),
});

export const postJobSchema = z.object({
  title: limited(FIELD_LIMITS.title).min(1),
  description: limited(FIELD_LIMITS.description),
  amount: amountSchema,
  startDate: timestampSchema.optional(),
  endDate: timestampSchema.optional(),
});

export const applyToJobSchema = z.object({
  resumeLink: limited(FIELD_LIMITS.resumeLink),
  expectedEndDate: timestampSchema.optional(),
});

export const submitWorkSchema = z.object({
  submissionLink: limited(FIELD_LIMITS.submissionLink),
  narration: limited(FIELD_LIMITS.narration),
});

export const approveSubmissionSchema = z.object({
  clientReview: limited(FIELD_LIMITS.clientReview),
});

export const fundAccountSchema = z.object({
  amount: amountSchema,
});

export const jobFilterSchema = z.object({
  client: identitySchema.optional(),
  status: z.enum(JOB_STATUSES).optional(),
});

export type RegisterUserInput = z.input<typeof registerUserSchema>;
export type PostJobInput = z.input<typeof postJobSchema>;
export type ApplyToJobInput = z.input<typeof applyToJobSchema>;
export type SubmitWorkInput = z.input<typeof submitWorkSchema>;
export type ApproveSubmissionInput = z.input<typeof approveSubmissionSchema>;
export type FundAccountInput = z.input<typeof fundAccountSchema>;
export type JobFilterInput = z.input<typeof jobFilterSchema>;

/**
 * Parses `input` against `schema`, throwing `InvalidInput` with the first
 * offending path on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError('InvalidInput', `${where}${issue?.message ?? 'invalid input'}`);
  }
  return result.data;
}
