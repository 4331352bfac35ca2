/**
 * Payroll Service
 *
 * Loads fresh snapshots from the store and hands them to the pure pay
 * engine and report builders. Nothing is cached between calls.
 */

import type { Actor, Job, MileageRate } from '@/types/workTracking';
import { NotFoundError, PermissionDeniedError, isWorkTrackingError } from '@/lib/errors';
import { assertCapability, canActOnTechnicianRecord } from '@/lib/permissions';
import { calculateJobPay, type JobPayCalculation } from '@/utils/jobPayCalculations';
import {
  buildJobBillingReport,
  buildPayrollReport,
  buildPlatformSummaryReport,
  buildTechnicianHoursReport,
  buildTechnicianSummary,
  type HoursGroupBy,
  type JobBillingFilters,
  type JobBillingReport,
  type PayrollReport,
  type PlatformSummaryReport,
  type TechnicianHoursReport,
  type TechnicianSummary,
  type UnpayableJob,
} from '@/utils/payrollAggregation';
import { PAYABLE_STATUSES } from '@/utils/timeEntryTransitions';
import type { WorkTrackingContext } from './store';
import { dateRangeSchema, parseInput } from './validation';

async function calculateForJob(
  ctx: WorkTrackingContext,
  job: Job,
  mileageRates: readonly MileageRate[]
): Promise<JobPayCalculation> {
  const entries = await ctx.store.listTimeEntriesForJob(job.id, PAYABLE_STATUSES);
  const technicianIds = [...new Set(entries.flatMap(e => (e.technician_id ? [e.technician_id] : [])))];
  const technicians = technicianIds.length > 0 ? await ctx.store.listTechnicians(technicianIds) : [];

  const calculation = calculateJobPay({ job, entries, technicians, mileageRates, rules: ctx.payRules });
  for (const warning of calculation.warnings) {
    ctx.logger.warn(warning.message, { entityId: job.id, metadata: { code: warning.code, entryId: warning.entryId } });
  }
  return calculation;
}

/**
 * Pay for every technician on one job. Idempotent: calling it twice with
 * no data changes in between gives the same result.
 */
export async function calculateJobPayForJob(ctx: WorkTrackingContext, jobId: string): Promise<JobPayCalculation> {
  const job = await ctx.store.getJob(jobId);
  if (!job) {
    throw new NotFoundError('job', jobId);
  }
  const mileageRates = await ctx.store.listMileageRates();
  return calculateForJob(ctx, job, mileageRates);
}

export interface PayrollReportOptions {
  technicianId?: string;
}

export async function payrollReport(
  ctx: WorkTrackingContext,
  actor: Actor,
  fromDate: string,
  toDate: string,
  options: PayrollReportOptions = {}
): Promise<PayrollReport> {
  assertCapability(actor, 'view:payroll', 'view payroll');
  parseInput(dateRangeSchema, { fromDate, toDate }, 'Invalid payroll date range');

  const entriesInRange = await ctx.store.listTimeEntries({
    fromDate,
    toDate,
    statuses: PAYABLE_STATUSES,
    technicianId: options.technicianId,
  });
  const jobIds = [...new Set(entriesInRange.map(e => e.job_id))].sort();
  const jobs = jobIds.length > 0 ? await ctx.store.listJobs({ ids: jobIds }) : [];
  const mileageRates = await ctx.store.listMileageRates();

  const calculations: JobPayCalculation[] = [];
  const unpayableJobs: UnpayableJob[] = [];
  for (const job of jobs) {
    try {
      calculations.push(await calculateForJob(ctx, job, mileageRates));
    } catch (error) {
      if (isWorkTrackingError(error)) {
        unpayableJobs.push({ jobId: job.id, code: error.code, reason: error.message });
      } else {
        ctx.logger.error('Pay calculation failed', { actorId: actor.userId, entityId: job.id, error });
        unpayableJobs.push({
          jobId: job.id,
          code: 'UNEXPECTED',
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  const report = buildPayrollReport({
    fromDate,
    toDate,
    jobs,
    calculations,
    entriesInRange,
    unpayableJobs,
    technicianId: options.technicianId,
  });
  ctx.logger.info('Payroll report generated', {
    actorId: actor.userId,
    metadata: {
      fromDate,
      toDate,
      technicians: report.technicians.length,
      unpayableJobs: unpayableJobs.length,
      totalPay: report.grandTotals.totalPay,
    },
  });
  return report;
}

export async function payrollReportForPeriod(
  ctx: WorkTrackingContext,
  actor: Actor,
  periodId: string,
  options: PayrollReportOptions = {}
): Promise<PayrollReport> {
  const period = await ctx.store.getPayPeriod(periodId);
  if (!period) {
    throw new NotFoundError('pay_period', periodId);
  }
  return payrollReport(ctx, actor, period.start_date, period.end_date, options);
}

export async function jobBillingReport(
  ctx: WorkTrackingContext,
  actor: Actor,
  fromDate: string,
  toDate: string,
  filters: JobBillingFilters = {}
): Promise<JobBillingReport> {
  assertCapability(actor, 'view:job_billing', 'view job billing');
  parseInput(dateRangeSchema, { fromDate, toDate }, 'Invalid billing date range');

  const jobs = await ctx.store.listJobs({ fromDate, toDate, status: filters.status, platformId: filters.platformId });
  const entries =
    jobs.length > 0
      ? await ctx.store.listTimeEntries({ jobIds: jobs.map(j => j.id), statuses: PAYABLE_STATUSES })
      : [];

  return buildJobBillingReport({ fromDate, toDate, jobs, entries, filters });
}

/**
 * Hours for one technician. Technicians may only look at their own.
 */
export async function technicianHoursReport(
  ctx: WorkTrackingContext,
  actor: Actor,
  technicianId: string,
  fromDate: string,
  toDate: string,
  groupBy: HoursGroupBy = 'day'
): Promise<TechnicianHoursReport> {
  if (!canActOnTechnicianRecord(actor, technicianId, 'view:hours', 'view:own_hours')) {
    throw new PermissionDeniedError("view another technician's hours", actor.role);
  }
  parseInput(dateRangeSchema, { fromDate, toDate }, 'Invalid hours date range');
  if (!(await ctx.store.getTechnician(technicianId))) {
    throw new NotFoundError('technician', technicianId);
  }

  const entries = await ctx.store.listTimeEntries({ technicianId, fromDate, toDate });
  const jobIds = [...new Set(entries.map(e => e.job_id))];
  const jobs = jobIds.length > 0 ? await ctx.store.listJobs({ ids: jobIds }) : [];

  return buildTechnicianHoursReport({ technicianId, fromDate, toDate, groupBy, entries, jobs });
}

/**
 * Job count, billing and payable hours per platform.
 */
export async function platformSummaryReport(
  ctx: WorkTrackingContext,
  actor: Actor,
  fromDate: string,
  toDate: string
): Promise<PlatformSummaryReport> {
  assertCapability(actor, 'view:job_billing', 'view the platform summary');
  parseInput(dateRangeSchema, { fromDate, toDate }, 'Invalid platform summary date range');

  const jobs = await ctx.store.listJobs({ fromDate, toDate });
  const entries =
    jobs.length > 0
      ? await ctx.store.listTimeEntries({ jobIds: jobs.map(j => j.id), statuses: PAYABLE_STATUSES })
      : [];
  const platforms = await ctx.store.listPlatforms();

  return buildPlatformSummaryReport({ fromDate, toDate, platforms, jobs, entries });
}

/**
 * Totals by status and for the current week. Defaults to the actor's own
 * linked technician.
 */
export async function technicianSummary(
  ctx: WorkTrackingContext,
  actor: Actor,
  technicianId: string | null = actor.technicianId
): Promise<TechnicianSummary> {
  if (technicianId === null) {
    throw new PermissionDeniedError('view a summary without a linked technician', actor.role);
  }
  if (!canActOnTechnicianRecord(actor, technicianId, 'view:hours', 'view:own_hours')) {
    throw new PermissionDeniedError("view another technician's summary", actor.role);
  }
  if (!(await ctx.store.getTechnician(technicianId))) {
    throw new NotFoundError('technician', technicianId);
  }

  const entries = await ctx.store.listTimeEntries({ technicianId });
  const today = ctx.now().toISOString().slice(0, 10);
  return buildTechnicianSummary({ technicianId, entries, today });
}
