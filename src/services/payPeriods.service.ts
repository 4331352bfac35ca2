import type { Actor, PayPeriod, PayPeriodStatus } from '@/types/workTracking';
import { ConflictError, InvalidTransitionError, NotFoundError } from '@/lib/errors';
import { assertCapability } from '@/lib/permissions';
import { resolveHoursWorked, roundHours } from '@/lib/timeUtils';
import { sumBy } from '@/utils/currency';
import { PAYABLE_STATUSES, UNVERIFIED_STATUSES } from '@/utils/timeEntryTransitions';
import type { PayPeriodPatch, WorkTrackingContext } from './store';
import { parseInput, payPeriodInputSchema, type PayPeriodInput } from './validation';

function periodsOverlap(a: { start_date: string; end_date: string }, b: { start_date: string; end_date: string }) {
  return a.start_date <= b.end_date && b.start_date <= a.end_date;
}

async function loadPeriod(ctx: WorkTrackingContext, id: string): Promise<PayPeriod> {
  const period = await ctx.store.getPayPeriod(id);
  if (!period) {
    throw new NotFoundError('pay_period', id);
  }
  return period;
}

async function transitionPeriod(
  ctx: WorkTrackingContext,
  actor: Actor,
  period: PayPeriod,
  action: string,
  from: PayPeriodStatus,
  patch: PayPeriodPatch
): Promise<PayPeriod> {
  const updated = await ctx.store.updatePayPeriod(period.id, from, patch);
  if (!updated) {
    const current = await loadPeriod(ctx, period.id);
    throw new InvalidTransitionError(period.id, action, current.status, [from]);
  }

  await ctx.audit.record({
    actorId: actor.userId,
    action: `pay_period_${action === 'close' ? 'closed' : 'archived'}`,
    entityType: 'pay_period',
    entityId: period.id,
    before: { ...period },
    after: { ...updated },
  });
  ctx.logger.info(`Pay period ${action}d`, { actorId: actor.userId, entityId: period.id });
  return updated;
}

export async function listPayPeriods(ctx: WorkTrackingContext): Promise<PayPeriod[]> {
  const periods = await ctx.store.listPayPeriods();
  return [...periods].sort((a, b) => b.start_date.localeCompare(a.start_date));
}

export async function createPayPeriod(
  ctx: WorkTrackingContext,
  actor: Actor,
  input: PayPeriodInput
): Promise<PayPeriod> {
  assertCapability(actor, 'manage:pay_periods', 'create pay periods');
  const data = parseInput(payPeriodInputSchema, input, 'Invalid pay period');

  const existing = await ctx.store.listPayPeriods();
  const overlapping = existing.find(period => periodsOverlap(period, data));
  if (overlapping) {
    throw new ConflictError(`Pay period overlaps ${overlapping.name}`, { overlappingPeriodId: overlapping.id });
  }

  const period = await ctx.store.insertPayPeriod({
    start_date: data.start_date,
    end_date: data.end_date,
    name: data.name ?? `${data.start_date} - ${data.end_date}`,
    status: 'open',
    total_hours: null,
    closed_at: null,
  });

  await ctx.audit.record({
    actorId: actor.userId,
    action: 'pay_period_created',
    entityType: 'pay_period',
    entityId: period.id,
    before: null,
    after: { ...period },
  });
  return period;
}

/**
 * Close an open period once every entry inside it has been verified.
 * Stores the period's payable hours.
 */
export async function closePayPeriod(ctx: WorkTrackingContext, actor: Actor, periodId: string): Promise<PayPeriod> {
  assertCapability(actor, 'manage:pay_periods', 'close pay periods');
  const period = await loadPeriod(ctx, periodId);
  if (period.status !== 'open') {
    throw new InvalidTransitionError(period.id, 'close', period.status, ['open']);
  }

  const range = { fromDate: period.start_date, toDate: period.end_date };
  const unverified = await ctx.store.listTimeEntries({ ...range, statuses: UNVERIFIED_STATUSES });
  if (unverified.length > 0) {
    throw new InvalidTransitionError(
      period.id,
      'close',
      period.status,
      undefined,
      `${unverified.length} time entries are still draft or submitted`
    );
  }

  const payable = await ctx.store.listTimeEntries({ ...range, statuses: PAYABLE_STATUSES });
  return transitionPeriod(ctx, actor, period, 'close', 'open', {
    status: 'closed',
    total_hours: roundHours(sumBy(payable, e => resolveHoursWorked(e) ?? 0)),
    closed_at: ctx.now().toISOString(),
  });
}

export async function archivePayPeriod(ctx: WorkTrackingContext, actor: Actor, periodId: string): Promise<PayPeriod> {
  assertCapability(actor, 'manage:pay_periods', 'archive pay periods');
  const period = await loadPeriod(ctx, periodId);
  if (period.status !== 'closed') {
    throw new InvalidTransitionError(period.id, 'archive', period.status, ['closed']);
  }
  return transitionPeriod(ctx, actor, period, 'archive', 'closed', { status: 'archived' });
}
