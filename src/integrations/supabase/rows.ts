// Row schemas for the work tracking tables. The client is untyped, so every
// row is parsed before it reaches the services.
import { z } from 'zod';
import type { Job, MileageRate, PayPeriod, Platform, Technician, TimeEntry } from '@/types/workTracking';

// numeric columns may come back as strings
const numeric = z.coerce.number();

export const platformRowSchema: z.ZodType<Platform, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  code: z.string(),
  status: z.enum(['active', 'inactive']),
});

export const jobRowSchema: z.ZodType<Job, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  platform_id: z.string(),
  ticket_number: z.string().nullable(),
  description: z.string(),
  client_name: z.string().nullable(),
  billing_type: z.enum(['flat_rate', 'hourly', 'per_task']),
  billing_amount: numeric.nullable(),
  expenses: numeric,
  commissions: numeric,
  job_status: z.enum(['pending', 'assigned', 'in_progress', 'completed', 'cancelled']),
  job_date: z.string().nullable(),
  external_url: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const technicianRowSchema: z.ZodType<Technician, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string().nullable(),
  hourly_rate: numeric,
  status: z.enum(['active', 'inactive']),
});

export const timeEntryRowSchema: z.ZodType<TimeEntry, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  job_id: z.string(),
  technician_id: z.string().nullable(),
  date_worked: z.string(),
  time_in: z.string().nullable(),
  time_out: z.string().nullable(),
  hours_worked: numeric.nullable(),
  mileage: numeric,
  per_diem: numeric,
  personal_expenses: numeric,
  status: z.enum(['draft', 'submitted', 'verified', 'billed', 'paid']),
  rejection_reason: z.string().nullable(),
  notes: z.string().nullable(),
  verified_by: z.string().nullable(),
  verified_at: z.string().nullable(),
  created_by: z.string(),
  updated_by: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  version: z.number().int(),
});

export const payPeriodRowSchema: z.ZodType<PayPeriod, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  name: z.string(),
  status: z.enum(['open', 'closed', 'archived']),
  total_hours: numeric.nullable(),
  closed_at: z.string().nullable(),
});

export const mileageRateRowSchema: z.ZodType<MileageRate, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  rate_per_mile: numeric,
  effective_date: z.string(),
  end_date: z.string().nullable(),
  description: z.string().nullable(),
});
