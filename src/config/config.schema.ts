import { z } from 'zod';

export const RequiredValueSchema = z.string().trim().min(1, 'must be set');

export const BackupScopeSchema = z.enum(['all', 'specific'], {
  errorMap: () => ({ message: "must be either 'all' or 'specific'" }),
});

export const BackupTargetSchema = z.enum(['aws', 'azure'], {
  errorMap: () => ({ message: "must be either 'aws' or 'azure'" }),
});

export const AwsAuthModeSchema = z.enum(['ec2', 'iam'], {
  errorMap: () => ({ message: "must be either 'ec2' or 'iam'" }),
});

/** A century; larger windows put the cutoff outside the range a Date can hold. */
export const MAX_RETENTION_DAYS = 36500;

export const RetentionDaysSchema = z
  .string()
  .regex(/^\d+$/, 'must be a whole number of days')
  .transform((value) => Number.parseInt(value, 10))
  .refine((days) => days <= MAX_RETENTION_DAYS, `must be at most ${MAX_RETENTION_DAYS} days`);
