import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { ValidationFailedError } from '@/lib/errors';
import { parseClockTime } from '@/lib/timeUtils';

const dateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(value => isValid(parseISO(value)), 'Date is not a real calendar date');

const clockTime = z.string().refine(value => parseClockTime(value) !== null, 'Time must be HH:MM or HH:MM:SS');

const cents = z.number().int('Amount must be whole cents').min(0, 'Amount cannot be negative');

const timeEntryFields = {
  job_id: z.string().min(1, 'Job is required'),
  technician_id: z.string().min(1).nullable().optional(),
  date_worked: dateString,
  time_in: clockTime.nullable().optional(),
  time_out: clockTime.nullable().optional(),
  hours_worked: z.number().min(0, 'Hours cannot be negative').max(24, 'Hours cannot exceed 24').nullable().optional(),
  mileage: z.number().min(0, 'Mileage cannot be negative').default(0),
  per_diem: cents.default(0),
  personal_expenses: cents.default(0),
  notes: z.string().max(2000).nullable().optional(),
};

const bothOrNeitherTimes = (value: { time_in?: string | null; time_out?: string | null }) =>
  Boolean(value.time_in) === Boolean(value.time_out);

export const createTimeEntrySchema = z
  .object(timeEntryFields)
  .refine(bothOrNeitherTimes, { message: 'Time in and time out must be given together', path: ['time_out'] });

export type CreateTimeEntryInput = z.input<typeof createTimeEntrySchema>;

export const updateTimeEntrySchema = z
  .object({
    job_id: timeEntryFields.job_id.optional(),
    technician_id: timeEntryFields.technician_id,
    date_worked: dateString.optional(),
    time_in: timeEntryFields.time_in,
    time_out: timeEntryFields.time_out,
    hours_worked: timeEntryFields.hours_worked,
    mileage: z.number().min(0, 'Mileage cannot be negative').optional(),
    per_diem: cents.optional(),
    personal_expenses: cents.optional(),
    notes: timeEntryFields.notes,
  })
  .strict();

export type UpdateTimeEntryInput = z.input<typeof updateTimeEntrySchema>;

export const rejectionReasonSchema = z.string().trim().min(1, 'A rejection reason is required');

export const dateRangeSchema = z
  .object({ fromDate: dateString, toDate: dateString })
  .refine(range => range.fromDate <= range.toDate, { message: 'fromDate must not be after toDate', path: ['toDate'] });

export const payPeriodInputSchema = z
  .object({
    start_date: dateString,
    end_date: dateString,
    name: z.string().trim().min(1).optional(),
  })
  .refine(period => period.start_date <= period.end_date, {
    message: 'start_date must not be after end_date',
    path: ['end_date'],
  });

export type PayPeriodInput = z.input<typeof payPeriodInputSchema>;

export const mileageRateInputSchema = z
  .object({
    rate_per_mile: z.number().positive('Rate per mile must be greater than 0'),
    effective_date: dateString,
    end_date: dateString.nullable().optional(),
    description: z.string().nullable().optional(),
  })
  .refine(rate => !rate.end_date || rate.effective_date <= rate.end_date, {
    message: 'end_date must not be before effective_date',
    path: ['end_date'],
  });

export type MileageRateInput = z.input<typeof mileageRateInputSchema>;

export const jobImportSchema = z.object({
  platform_id: z.string().min(1, 'Platform is required'),
  ticket_number: z.string().trim().min(1).nullable().optional(),
  description: z.string().trim().min(1, 'Description is required'),
  client_name: z.string().nullable().optional(),
  billing_type: z.enum(['flat_rate', 'hourly', 'per_task']).default('flat_rate'),
  billing_amount: cents.nullable().optional(),
  expenses: cents.default(0),
  commissions: cents.default(0),
  job_status: z.enum(['pending', 'assigned', 'in_progress', 'completed', 'cancelled']).default('pending'),
  job_date: dateString.nullable().optional(),
  external_url: z.string().url('External URL must be a valid URL').nullable().optional(),
});

export type JobImportCandidate = z.input<typeof jobImportSchema>;

export const timeEntryImportSchema = z
  .object(timeEntryFields)
  .refine(bothOrNeitherTimes, { message: 'Time in and time out must be given together', path: ['time_out'] });

export type TimeEntryImportCandidate = z.input<typeof timeEntryImportSchema>;

/**
 * Parse with a schema, turning zod issues into a ValidationFailedError.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationFailedError(message, issues);
  }
  return parsed.data;
}
