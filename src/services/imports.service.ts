/**
 * Import Service
 *
 * Entry point for scrapers and CSV uploads. Candidates are validated one at
 * a time; a bad candidate is reported and the rest of the batch carries on.
 * Re-running the same import creates nothing new.
 */

import type { Actor, Job, TimeEntry } from '@/types/workTracking';
import { NotFoundError, isWorkTrackingError } from '@/lib/errors';
import { assertCapability } from '@/lib/permissions';
import { resolveHoursWorked } from '@/lib/timeUtils';
import type { WorkTrackingContext } from './store';
import { jobImportSchema, parseInput, timeEntryImportSchema } from './validation';

export interface ImportSkip {
  index: number;
  existingId: string;
  reason: string;
}

export interface ImportFailure {
  index: number;
  code: string;
  message: string;
}

export interface ImportResult<T> {
  created: T[];
  skipped: ImportSkip[];
  errors: ImportFailure[];
}

function toFailure(ctx: WorkTrackingContext, index: number, error: unknown): ImportFailure {
  if (isWorkTrackingError(error)) {
    const issues = error.details.issues;
    const message = Array.isArray(issues) && issues.length > 0 ? `${error.message}: ${issues.join('; ')}` : error.message;
    return { index, code: error.code, message };
  }
  ctx.logger.error('Unexpected error while importing', { metadata: { index }, error });
  return { index, code: 'UNEXPECTED', message: error instanceof Error ? error.message : String(error) };
}

async function findExistingJob(ctx: WorkTrackingContext, externalUrl: string | null, platformId: string, ticket: string | null) {
  if (externalUrl) {
    const byUrl = await ctx.store.findJobByExternalUrl(externalUrl);
    if (byUrl) return { job: byUrl, reason: 'external_url already imported' };
  }
  if (ticket) {
    const byTicket = await ctx.store.findJobByTicketNumber(platformId, ticket);
    if (byTicket) return { job: byTicket, reason: 'ticket_number already imported' };
  }
  return null;
}

/**
 * Import jobs, skipping any that match an existing job by external URL,
 * then by ticket number on the same platform.
 */
export async function importJobs(
  ctx: WorkTrackingContext,
  actor: Actor,
  candidates: readonly unknown[]
): Promise<ImportResult<Job>> {
  assertCapability(actor, 'import:work', 'import jobs');
  const result: ImportResult<Job> = { created: [], skipped: [], errors: [] };

  for (const [index, candidate] of candidates.entries()) {
    try {
      const data = parseInput(jobImportSchema, candidate, `Invalid job at index ${index}`);
      if (!(await ctx.store.getPlatform(data.platform_id))) {
        throw new NotFoundError('platform', data.platform_id);
      }

      const existing = await findExistingJob(
        ctx,
        data.external_url ?? null,
        data.platform_id,
        data.ticket_number ?? null
      );
      if (existing) {
        result.skipped.push({ index, existingId: existing.job.id, reason: existing.reason });
        continue;
      }

      const timestamp = ctx.now().toISOString();
      const job = await ctx.store.insertJob({
        platform_id: data.platform_id,
        ticket_number: data.ticket_number ?? null,
        description: data.description,
        client_name: data.client_name ?? null,
        billing_type: data.billing_type,
        billing_amount: data.billing_amount ?? null,
        expenses: data.expenses,
        commissions: data.commissions,
        job_status: data.job_status,
        job_date: data.job_date ?? null,
        external_url: data.external_url ?? null,
        created_at: timestamp,
        updated_at: timestamp,
      });
      result.created.push(job);
    } catch (error) {
      result.errors.push(toFailure(ctx, index, error));
    }
  }

  await recordImport(ctx, actor, 'jobs_imported', 'job', result);
  return result;
}

/**
 * Import time entries as drafts. Technicians may be missing; such entries
 * wait for assignment. An entry matching an existing one on
 * (job, date worked, hours) is skipped.
 */
export async function importTimeEntries(
  ctx: WorkTrackingContext,
  actor: Actor,
  candidates: readonly unknown[]
): Promise<ImportResult<TimeEntry>> {
  assertCapability(actor, 'import:work', 'import time entries');
  const result: ImportResult<TimeEntry> = { created: [], skipped: [], errors: [] };

  for (const [index, candidate] of candidates.entries()) {
    try {
      const data = parseInput(timeEntryImportSchema, candidate, `Invalid time entry at index ${index}`);
      if (!(await ctx.store.getJob(data.job_id))) {
        throw new NotFoundError('job', data.job_id);
      }
      const technicianId = data.technician_id ?? null;
      if (technicianId !== null && !(await ctx.store.getTechnician(technicianId))) {
        throw new NotFoundError('technician', technicianId);
      }

      const hours = resolveHoursWorked({
        hours_worked: data.hours_worked,
        time_in: data.time_in,
        time_out: data.time_out,
      });
      const sameDay = await ctx.store.listTimeEntries({
        jobIds: [data.job_id],
        fromDate: data.date_worked,
        toDate: data.date_worked,
      });
      const duplicate = sameDay.find(entry => entry.hours_worked === hours);
      if (duplicate) {
        result.skipped.push({ index, existingId: duplicate.id, reason: 'entry for this job, date and hours exists' });
        continue;
      }

      const timestamp = ctx.now().toISOString();
      const entry = await ctx.store.insertTimeEntry({
        job_id: data.job_id,
        technician_id: technicianId,
        date_worked: data.date_worked,
        time_in: data.time_in ?? null,
        time_out: data.time_out ?? null,
        hours_worked: hours,
        mileage: data.mileage,
        per_diem: data.per_diem,
        personal_expenses: data.personal_expenses,
        status: 'draft',
        rejection_reason: null,
        notes: data.notes ?? null,
        verified_by: null,
        verified_at: null,
        created_by: actor.userId,
        updated_by: null,
        created_at: timestamp,
        updated_at: timestamp,
      });
      result.created.push(entry);
    } catch (error) {
      result.errors.push(toFailure(ctx, index, error));
    }
  }

  await recordImport(ctx, actor, 'time_entries_imported', 'time_entry', result);
  return result;
}

async function recordImport<T>(
  ctx: WorkTrackingContext,
  actor: Actor,
  action: string,
  entityType: 'job' | 'time_entry',
  result: ImportResult<T>
): Promise<void> {
  const counts = { created: result.created.length, skipped: result.skipped.length, failed: result.errors.length };
  ctx.logger.info(`Import finished: ${action}`, { actorId: actor.userId, metadata: counts });
  await ctx.audit.record({
    actorId: actor.userId,
    action,
    entityType,
    entityId: null,
    before: null,
    after: counts,
  });
}
