/**
 * Time Entry Lifecycle Service
 *
 * draft -> submitted -> verified -> billed -> paid, with reject sending a
 * submitted entry back to draft. Every write is a compare-and-swap on the
 * entry version, so two managers verifying the same entry cannot both win.
 */

import type { Actor, TimeEntry, TimeEntryStatus } from '@/types/workTracking';
import {
  ConflictError,
  InvalidTransitionError,
  MissingAssignmentError,
  MissingHoursError,
  NotFoundError,
  PermissionDeniedError,
  isWorkTrackingError,
} from '@/lib/errors';
import { assertCapability, canActOnTechnicianRecord, hasCapability } from '@/lib/permissions';
import { calculateHoursFromClockTimes, resolveHoursWorked } from '@/lib/timeUtils';
import { TIME_ENTRY_ACTIONS, canApplyAction, type TimeEntryAction } from '@/utils/timeEntryTransitions';
import type { TimeEntryPatch, WorkTrackingContext } from './store';
import {
  createTimeEntrySchema,
  parseInput,
  rejectionReasonSchema,
  updateTimeEntrySchema,
  type CreateTimeEntryInput,
  type UpdateTimeEntryInput,
} from './validation';

const EDITABLE_BY_TECHNICIAN: readonly TimeEntryStatus[] = ['draft', 'submitted'];

export type BulkItemResult =
  | { id: string; ok: true; entry: TimeEntry }
  | { id: string; ok: false; code: string; message: string };

export interface BulkResult {
  results: BulkItemResult[];
  succeeded: string[];
  failed: string[];
}

function snapshot(entry: TimeEntry): Record<string, unknown> {
  return { ...entry };
}

async function loadEntry(ctx: WorkTrackingContext, id: string): Promise<TimeEntry> {
  const entry = await ctx.store.getTimeEntry(id);
  if (!entry) {
    throw new NotFoundError('time_entry', id);
  }
  return entry;
}

function assertActionAllowed(entry: TimeEntry, action: TimeEntryAction): void {
  if (!canApplyAction(entry.status, action)) {
    throw new InvalidTransitionError(entry.id, action, entry.status, [TIME_ENTRY_ACTIONS[action].from]);
  }
}

/**
 * Anything past draft must keep a technician and positive hours.
 */
function assertAssignedWithHours(entry: TimeEntry): void {
  if (entry.technician_id === null) {
    throw new MissingAssignmentError(entry.id);
  }
  const hours = resolveHoursWorked(entry);
  if (hours === null || hours <= 0) {
    throw new MissingHoursError(entry.id);
  }
}

/**
 * Write a patch against the version we read. On a lost race the entry is
 * re-read: a status change means the transition no longer applies, anything
 * else is a plain conflict.
 */
async function writeEntry(
  ctx: WorkTrackingContext,
  actor: Actor,
  entry: TimeEntry,
  action: string,
  patch: TimeEntryPatch
): Promise<TimeEntry> {
  const updated = await ctx.store.updateTimeEntry(entry.id, entry.version, {
    ...patch,
    updated_by: actor.userId,
    updated_at: ctx.now().toISOString(),
  });
  if (updated) {
    return updated;
  }

  const current = await ctx.store.getTimeEntry(entry.id);
  if (!current) {
    throw new NotFoundError('time_entry', entry.id);
  }
  ctx.logger.warn(`Lost concurrent update on time entry during ${action}`, {
    actorId: actor.userId,
    entityId: entry.id,
    metadata: { expectedVersion: entry.version, currentVersion: current.version, currentStatus: current.status },
  });
  if (current.status !== entry.status) {
    throw new InvalidTransitionError(entry.id, action, current.status);
  }
  throw new ConflictError(`Time entry ${entry.id} was modified by someone else`, {
    entryId: entry.id,
    expectedVersion: entry.version,
    currentVersion: current.version,
  });
}

async function recordEntryAudit(
  ctx: WorkTrackingContext,
  actor: Actor,
  action: string,
  before: TimeEntry | null,
  after: TimeEntry | null,
  description?: string
): Promise<void> {
  await ctx.audit.record({
    actorId: actor.userId,
    action,
    entityType: 'time_entry',
    entityId: after?.id ?? before?.id ?? null,
    before: before ? snapshot(before) : null,
    after: after ? snapshot(after) : null,
    description,
  });
}

/**
 * Create a draft entry. Technicians always log against their own linked
 * technician; managers and admins may leave the technician empty.
 */
export async function createTimeEntry(
  ctx: WorkTrackingContext,
  actor: Actor,
  input: CreateTimeEntryInput
): Promise<TimeEntry> {
  const data = parseInput(createTimeEntrySchema, input, 'Invalid time entry');

  let technicianId: string | null = data.technician_id ?? null;
  if (!hasCapability(actor.role, 'create:time_entries')) {
    assertCapability(actor, 'create:own_time_entries', 'create time entries');
    if (!actor.technicianId) {
      throw new PermissionDeniedError('create time entries without a linked technician', actor.role);
    }
    if (technicianId !== null && technicianId !== actor.technicianId) {
      throw new PermissionDeniedError('create time entries for another technician', actor.role);
    }
    technicianId = actor.technicianId;
  }

  const job = await ctx.store.getJob(data.job_id);
  if (!job) {
    throw new NotFoundError('job', data.job_id);
  }
  if (technicianId !== null && !(await ctx.store.getTechnician(technicianId))) {
    throw new NotFoundError('technician', technicianId);
  }

  const timestamp = ctx.now().toISOString();
  const entry = await ctx.store.insertTimeEntry({
    job_id: job.id,
    technician_id: technicianId,
    date_worked: data.date_worked,
    time_in: data.time_in ?? null,
    time_out: data.time_out ?? null,
    hours_worked: resolveHoursWorked({
      hours_worked: data.hours_worked,
      time_in: data.time_in,
      time_out: data.time_out,
    }),
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

  ctx.logger.info('Time entry created', { actorId: actor.userId, entityId: entry.id });
  await recordEntryAudit(ctx, actor, 'time_entry_created', null, entry);
  return entry;
}

/**
 * Edit an entry's details.
 * Admins may edit anything, managers anything not yet paid,
 * technicians only their own draft or submitted entries.
 */
export async function updateTimeEntry(
  ctx: WorkTrackingContext,
  actor: Actor,
  id: string,
  input: UpdateTimeEntryInput
): Promise<TimeEntry> {
  const patch = parseInput(updateTimeEntrySchema, input, 'Invalid time entry update');
  const entry = await loadEntry(ctx, id);

  const managesEntries = hasCapability(actor.role, 'edit:time_entries');
  const allowed = managesEntries
    ? entry.status !== 'paid' || hasCapability(actor.role, 'edit:paid_time_entries')
    : canActOnTechnicianRecord(actor, entry.technician_id, 'edit:time_entries', 'edit:own_time_entries') &&
      EDITABLE_BY_TECHNICIAN.includes(entry.status);
  if (!allowed) {
    throw new PermissionDeniedError(`edit a ${entry.status} time entry`, actor.role);
  }

  const changes: TimeEntryPatch = {};
  if (patch.job_id !== undefined && patch.job_id !== entry.job_id) {
    if (!managesEntries) throw new PermissionDeniedError('move a time entry to another job', actor.role);
    if (!(await ctx.store.getJob(patch.job_id))) throw new NotFoundError('job', patch.job_id);
    changes.job_id = patch.job_id;
  }
  if (patch.technician_id !== undefined && patch.technician_id !== entry.technician_id) {
    if (!managesEntries) throw new PermissionDeniedError('reassign a time entry', actor.role);
    if (patch.technician_id !== null && !(await ctx.store.getTechnician(patch.technician_id))) {
      throw new NotFoundError('technician', patch.technician_id);
    }
    changes.technician_id = patch.technician_id;
  }
  if (patch.date_worked !== undefined) changes.date_worked = patch.date_worked;
  if (patch.mileage !== undefined) changes.mileage = patch.mileage;
  if (patch.per_diem !== undefined) changes.per_diem = patch.per_diem;
  if (patch.personal_expenses !== undefined) changes.personal_expenses = patch.personal_expenses;
  if (patch.notes !== undefined) changes.notes = patch.notes;

  const timesChanged = patch.time_in !== undefined || patch.time_out !== undefined;
  if (timesChanged) {
    changes.time_in = patch.time_in === undefined ? entry.time_in : patch.time_in;
    changes.time_out = patch.time_out === undefined ? entry.time_out : patch.time_out;
  }
  if (patch.hours_worked !== undefined) {
    changes.hours_worked = patch.hours_worked;
  } else if (timesChanged) {
    changes.hours_worked = calculateHoursFromClockTimes(changes.time_in, changes.time_out);
  }
  if (entry.status !== 'draft') {
    assertAssignedWithHours({ ...entry, ...changes });
  }

  const updated = await writeEntry(ctx, actor, entry, 'update', changes);
  ctx.logger.info('Time entry updated', {
    actorId: actor.userId,
    entityId: id,
    metadata: { fields: Object.keys(changes) },
  });
  await recordEntryAudit(ctx, actor, 'time_entry_updated', entry, updated);
  return updated;
}

/**
 * Give an imported (unassigned) draft entry to a technician.
 */
export async function assignTechnician(
  ctx: WorkTrackingContext,
  actor: Actor,
  id: string,
  technicianId: string
): Promise<TimeEntry> {
  assertCapability(actor, 'assign:time_entries', 'assign time entries');
  const entry = await loadEntry(ctx, id);
  if (entry.status !== 'draft') {
    throw new InvalidTransitionError(entry.id, 'assign', entry.status, ['draft']);
  }
  if (!(await ctx.store.getTechnician(technicianId))) {
    throw new NotFoundError('technician', technicianId);
  }

  const updated = await writeEntry(ctx, actor, entry, 'assign', { technician_id: technicianId });
  await recordEntryAudit(ctx, actor, 'time_entry_assigned', entry, updated);
  return updated;
}

/**
 * Delete a draft entry.
 */
export async function removeTimeEntry(ctx: WorkTrackingContext, actor: Actor, id: string): Promise<void> {
  const entry = await loadEntry(ctx, id);
  if (!canActOnTechnicianRecord(actor, entry.technician_id, 'delete:time_entries', 'delete:own_time_entries')) {
    throw new PermissionDeniedError('delete this time entry', actor.role);
  }
  if (entry.status !== 'draft') {
    throw new InvalidTransitionError(entry.id, 'delete', entry.status, ['draft']);
  }

  const deleted = await ctx.store.deleteTimeEntry(entry.id, entry.version);
  if (!deleted) {
    const current = await ctx.store.getTimeEntry(entry.id);
    if (!current) throw new NotFoundError('time_entry', entry.id);
    if (current.status !== entry.status) throw new InvalidTransitionError(entry.id, 'delete', current.status);
    throw new ConflictError(`Time entry ${entry.id} was modified by someone else`, { entryId: entry.id });
  }

  ctx.logger.info('Time entry deleted', { actorId: actor.userId, entityId: id });
  await recordEntryAudit(ctx, actor, 'time_entry_deleted', entry, null);
}

export async function submitTimeEntry(ctx: WorkTrackingContext, actor: Actor, id: string): Promise<TimeEntry> {
  const entry = await loadEntry(ctx, id);
  assertActionAllowed(entry, 'submit');

  if (entry.technician_id === null) {
    throw new MissingAssignmentError(entry.id);
  }
  if (!canActOnTechnicianRecord(actor, entry.technician_id, 'submit:time_entries', 'submit:own_time_entries')) {
    throw new PermissionDeniedError("submit another technician's time entry", actor.role);
  }
  const hours = resolveHoursWorked(entry);
  if (hours === null || hours <= 0) {
    throw new MissingHoursError(entry.id);
  }

  const updated = await writeEntry(ctx, actor, entry, 'submit', {
    status: 'submitted',
    rejection_reason: null,
  });
  await recordEntryAudit(ctx, actor, 'time_entry_submitted', entry, updated);
  return updated;
}

export async function verifyTimeEntry(ctx: WorkTrackingContext, actor: Actor, id: string): Promise<TimeEntry> {
  assertCapability(actor, 'verify:time_entries', 'verify time entries');
  const entry = await loadEntry(ctx, id);
  assertActionAllowed(entry, 'verify');
  assertAssignedWithHours(entry);

  const updated = await writeEntry(ctx, actor, entry, 'verify', {
    status: 'verified',
    rejection_reason: null,
    verified_by: actor.userId,
    verified_at: ctx.now().toISOString(),
  });
  await recordEntryAudit(ctx, actor, 'time_entry_verified', entry, updated);
  return updated;
}

export async function rejectTimeEntry(
  ctx: WorkTrackingContext,
  actor: Actor,
  id: string,
  reason: string
): Promise<TimeEntry> {
  assertCapability(actor, 'verify:time_entries', 'reject time entries');
  const trimmed = parseInput(rejectionReasonSchema, reason, 'Invalid rejection');
  const entry = await loadEntry(ctx, id);
  assertActionAllowed(entry, 'reject');

  const updated = await writeEntry(ctx, actor, entry, 'reject', {
    status: 'draft',
    rejection_reason: trimmed,
  });
  await recordEntryAudit(ctx, actor, 'time_entry_rejected', entry, updated, trimmed);
  return updated;
}

export async function billTimeEntry(ctx: WorkTrackingContext, actor: Actor, id: string): Promise<TimeEntry> {
  assertCapability(actor, 'bill:time_entries', 'mark time entries billed');
  const entry = await loadEntry(ctx, id);
  assertActionAllowed(entry, 'bill');

  const updated = await writeEntry(ctx, actor, entry, 'bill', { status: 'billed' });
  await recordEntryAudit(ctx, actor, 'time_entry_billed', entry, updated);
  return updated;
}

export async function payTimeEntry(ctx: WorkTrackingContext, actor: Actor, id: string): Promise<TimeEntry> {
  assertCapability(actor, 'bill:time_entries', 'mark time entries paid');
  const entry = await loadEntry(ctx, id);
  assertActionAllowed(entry, 'pay');

  const updated = await writeEntry(ctx, actor, entry, 'pay', { status: 'paid' });
  await recordEntryAudit(ctx, actor, 'time_entry_paid', entry, updated);
  return updated;
}

/**
 * Apply one operation to each id on its own. A failing id never stops the
 * rest of the batch.
 */
async function runBulk(
  ctx: WorkTrackingContext,
  actor: Actor,
  ids: readonly string[],
  action: string,
  apply: (id: string) => Promise<TimeEntry>
): Promise<BulkResult> {
  const results: BulkItemResult[] = [];

  for (const id of ids) {
    try {
      const entry = await apply(id);
      results.push({ id, ok: true, entry });
    } catch (error) {
      if (isWorkTrackingError(error)) {
        results.push({ id, ok: false, code: error.code, message: error.message });
      } else {
        ctx.logger.error(`Unexpected error during bulk ${action}`, { actorId: actor.userId, entityId: id, error });
        results.push({
          id,
          ok: false,
          code: 'UNEXPECTED',
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  const succeeded = results.filter(r => r.ok).map(r => r.id);
  const failed = results.filter(r => !r.ok).map(r => r.id);
  ctx.logger.info(`Bulk ${action} finished`, {
    actorId: actor.userId,
    metadata: { requested: ids.length, succeeded: succeeded.length, failed: failed.length },
  });
  return { results, succeeded, failed };
}

export function bulkSubmit(ctx: WorkTrackingContext, actor: Actor, ids: readonly string[]): Promise<BulkResult> {
  return runBulk(ctx, actor, ids, 'submit', id => submitTimeEntry(ctx, actor, id));
}

export function bulkVerify(ctx: WorkTrackingContext, actor: Actor, ids: readonly string[]): Promise<BulkResult> {
  return runBulk(ctx, actor, ids, 'verify', id => verifyTimeEntry(ctx, actor, id));
}

export function bulkBill(ctx: WorkTrackingContext, actor: Actor, ids: readonly string[]): Promise<BulkResult> {
  return runBulk(ctx, actor, ids, 'bill', id => billTimeEntry(ctx, actor, id));
}

export function bulkPay(ctx: WorkTrackingContext, actor: Actor, ids: readonly string[]): Promise<BulkResult> {
  return runBulk(ctx, actor, ids, 'pay', id => payTimeEntry(ctx, actor, id));
}
