/**
 * Currency helpers. Amounts are cents; intermediate values may carry
 * fractional cents and are only rounded when presented.
 */

/**
 * Round to whole cents, halves away from zero. Never returns -0.
 */
export function roundCents(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

/**
 * Round a quantity (hours, miles) to 2 decimal places.
 */
export function roundToHundredths(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((sum, item) => sum + pick(item), 0);
}
