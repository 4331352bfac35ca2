import { roundCents } from '@/utils/currency';

export type HoursShare = {
  key: string;
  hours: number;
  amountCents: number;
};

/**
 * Split a whole-cent amount across participants in proportion to hours.
 *
 * Each share is rounded to cents; the rounding remainder goes to the
 * participant with the most hours (the earliest one on ties), so the
 * shares always add up to the amount. Negative amounts split the same way.
 */
export function allocateByHours(
  totalCents: number,
  participants: Array<{ key: string; hours: number }>
): HoursShare[] {
  const totalHours = participants.reduce((sum, p) => sum + Math.max(0, p.hours), 0);
  if (totalCents === 0 || totalHours <= 0) {
    return participants.map(p => ({ key: p.key, hours: p.hours, amountCents: 0 }));
  }

  const shares = participants.map(p => {
    const ratio = Math.max(0, p.hours) / totalHours;
    return { key: p.key, hours: p.hours, amountCents: roundCents(totalCents * ratio) };
  });

  const allocated = shares.reduce((sum, s) => sum + s.amountCents, 0);
  const remainder = totalCents - allocated;
  if (remainder !== 0) {
    let largest = 0;
    shares.forEach((share, idx) => {
      if (share.hours > shares[largest].hours) largest = idx;
    });
    shares[largest].amountCents += remainder;
  }

  return shares;
}
