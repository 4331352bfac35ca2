import type { MileageRate } from '@/types/workTracking';

/**
 * Mileage rate in force on a work date.
 *
 * A row applies from its effective_date up to the next row's effective_date,
 * or up to its own end_date when one is set. Dates are YYYY-MM-DD, so string
 * comparison is calendar order.
 */
export function findEffectiveMileageRate(rates: readonly MileageRate[], dateWorked: string): MileageRate | null {
  let current: MileageRate | null = null;

  for (const rate of rates) {
    if (rate.effective_date > dateWorked) continue;
    if (!current || rate.effective_date > current.effective_date) {
      current = rate;
    }
  }

  if (current?.end_date && dateWorked > current.end_date) {
    return null;
  }
  return current;
}
