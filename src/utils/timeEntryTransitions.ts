import type { TimeEntryStatus } from '@/types/workTracking';

export type TimeEntryAction = 'submit' | 'verify' | 'reject' | 'bill' | 'pay';

const ALLOWED_TIME_ENTRY_STATUS_TRANSITIONS: Record<TimeEntryStatus, readonly TimeEntryStatus[]> = {
  draft: ['submitted'],
  submitted: ['verified', 'draft'],
  verified: ['billed'],
  billed: ['paid'],
  paid: [],
};

export const TIME_ENTRY_ACTIONS: Record<TimeEntryAction, { from: TimeEntryStatus; to: TimeEntryStatus }> = {
  submit: { from: 'draft', to: 'submitted' },
  verify: { from: 'submitted', to: 'verified' },
  reject: { from: 'submitted', to: 'draft' },
  bill: { from: 'verified', to: 'billed' },
  pay: { from: 'billed', to: 'paid' },
};

/**
 * Statuses that count toward pay and reports. Billed and paid entries stay
 * payable so historical reports keep reproducing.
 */
export const PAYABLE_STATUSES: readonly TimeEntryStatus[] = ['verified', 'billed', 'paid'];

/** Statuses that block closing a pay period. */
export const UNVERIFIED_STATUSES: readonly TimeEntryStatus[] = ['draft', 'submitted'];

export function isTimeEntryStatusTransitionAllowed(fromStatus: TimeEntryStatus, toStatus: TimeEntryStatus): boolean {
  const allowed = ALLOWED_TIME_ENTRY_STATUS_TRANSITIONS[fromStatus];
  return Array.isArray(allowed) && allowed.includes(toStatus);
}

export function canApplyAction(status: TimeEntryStatus, action: TimeEntryAction): boolean {
  const { from, to } = TIME_ENTRY_ACTIONS[action];
  return status === from && isTimeEntryStatusTransitionAllowed(from, to);
}

export function isPayableStatus(status: TimeEntryStatus): boolean {
  return PAYABLE_STATUSES.includes(status);
}
