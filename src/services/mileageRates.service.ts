import type { Actor, MileageRate } from '@/types/workTracking';
import { ConflictError } from '@/lib/errors';
import { assertCapability } from '@/lib/permissions';
import type { WorkTrackingContext } from './store';
import { mileageRateInputSchema, parseInput, type MileageRateInput } from './validation';

export async function listMileageRates(ctx: WorkTrackingContext): Promise<MileageRate[]> {
  const rates = await ctx.store.listMileageRates();
  return [...rates].sort((a, b) => b.effective_date.localeCompare(a.effective_date));
}

/**
 * Rate in force on a date, or null when none covers it.
 */
export async function rateAsOf(ctx: WorkTrackingContext, date: string): Promise<MileageRate | null> {
  const rate = await ctx.store.getMileageRateAsOf(date);
  if (!rate) {
    ctx.logger.warn('No mileage rate effective on date', { metadata: { date } });
  }
  return rate;
}

export async function addMileageRate(
  ctx: WorkTrackingContext,
  actor: Actor,
  input: MileageRateInput
): Promise<MileageRate> {
  assertCapability(actor, 'manage:mileage_rates', 'change mileage rates');
  const data = parseInput(mileageRateInputSchema, input, 'Invalid mileage rate');

  const existing = await ctx.store.listMileageRates();
  if (existing.some(rate => rate.effective_date === data.effective_date)) {
    throw new ConflictError(`A mileage rate already takes effect on ${data.effective_date}`, {
      effectiveDate: data.effective_date,
    });
  }

  const rate = await ctx.store.insertMileageRate({
    rate_per_mile: data.rate_per_mile,
    effective_date: data.effective_date,
    end_date: data.end_date ?? null,
    description: data.description ?? null,
  });

  ctx.logger.info('Mileage rate added', { actorId: actor.userId, entityId: rate.id });
  await ctx.audit.record({
    actorId: actor.userId,
    action: 'mileage_rate_created',
    entityType: 'mileage_rate',
    entityId: rate.id,
    before: null,
    after: { ...rate },
  });
  return rate;
}
