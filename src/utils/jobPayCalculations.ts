import type { Job, MileageRate, Technician, TimeEntry } from '@/types/workTracking';
import { IncompleteJobDataError } from '@/lib/errors';
import { resolveHoursWorked, roundHours } from '@/lib/timeUtils';
import { roundCents, roundToHundredths, sumBy } from '@/utils/currency';
import { allocateByHours } from '@/utils/hoursAllocation';
import { findEffectiveMileageRate } from '@/utils/mileageRates';
import { isPayableStatus } from '@/utils/timeEntryTransitions';

/**
 * Share of job net that forms the combined technician pool.
 * The other half is the company's.
 */
export const TECH_POOL_SHARE = 0.5;

export interface PayRules {
  techPoolShare: number;
}

export const DEFAULT_PAY_RULES: PayRules = {
  techPoolShare: TECH_POOL_SHARE,
};

export type PayWarningCode =
  | 'UNASSIGNED_ENTRY'
  | 'RATE_NOT_FOUND'
  | 'MISSING_HOURS'
  | 'UNKNOWN_TECHNICIAN'
  | 'JOB_CANCELLED';

export interface PayWarning {
  code: PayWarningCode;
  message: string;
  entryId?: string;
  technicianId?: string;
}

export interface PayResult {
  jobId: string;
  technicianId: string;
  technicianName: string;
  hours: number;
  minimumRate: number; // In cents per hour
  calculatedRate: number; // In cents per hour, from the proportional split
  effectiveRate: number; // In cents per hour, what base pay works out to
  weightedBasePay: number; // In cents, before the minimum-rate floor
  basePay: number; // In cents
  usingMinimum: boolean;
  mileage: number; // Miles
  mileagePay: number; // In cents
  perDiem: number; // In cents
  personalExpenses: number; // In cents
  profitShare: number; // In cents, informational only
  totalPay: number; // In cents (base + mileage + per diem + personal expenses)
  entryIds: string[];
  entryDates: string[];
}

export interface JobPayTotals {
  hours: number;
  basePay: number;
  mileagePay: number;
  perDiem: number;
  personalExpenses: number;
  profitShare: number;
  totalPay: number;
}

export interface JobPayCalculation {
  jobId: string;
  jobNet: number; // In cents
  techPool: number; // In cents
  totalHours: number;
  /** Base pay above the proportional split, paid because of minimum-rate floors */
  floorShortfall: number; // In cents
  technicians: PayResult[];
  totals: JobPayTotals;
  warnings: PayWarning[];
}

export interface JobPayInput {
  job: Job;
  entries: readonly TimeEntry[];
  technicians: readonly Technician[];
  mileageRates: readonly MileageRate[];
  rules?: PayRules;
}

/**
 * Per-technician accumulator while walking the job's entries.
 */
interface TechnicianAccumulator {
  technicianId: string;
  technicianName: string;
  minimumRate: number;
  hours: number;
  mileage: number;
  mileagePay: number;
  perDiem: number;
  personalExpenses: number;
  entryIds: string[];
  entryDates: Set<string>;
}

const EMPTY_TOTALS: JobPayTotals = {
  hours: 0,
  basePay: 0,
  mileagePay: 0,
  perDiem: 0,
  personalExpenses: 0,
  profitShare: 0,
  totalPay: 0,
};

/**
 * Job net = billing - expenses - commissions, in cents.
 */
export function calculateJobNet(job: Job): number {
  if (job.billing_amount === null) {
    throw new IncompleteJobDataError(job.id, 'billing_amount');
  }
  return job.billing_amount - job.expenses - job.commissions;
}

function compareEntries(a: TimeEntry, b: TimeEntry): number {
  if (a.date_worked !== b.date_worked) return a.date_worked < b.date_worked ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function emptyCalculation(jobId: string, jobNet: number, techPool: number, warnings: PayWarning[]): JobPayCalculation {
  return {
    jobId,
    jobNet: roundCents(jobNet),
    techPool: roundCents(techPool),
    totalHours: 0,
    floorShortfall: 0,
    technicians: [],
    totals: { ...EMPTY_TOTALS },
    warnings,
  };
}

/**
 * Group payable entries by technician, collecting hours, mileage pay and
 * reimbursements. Unassigned entries are skipped with a warning.
 */
function accumulateByTechnician(
  entries: readonly TimeEntry[],
  technicians: readonly Technician[],
  mileageRates: readonly MileageRate[],
  warnings: PayWarning[]
): TechnicianAccumulator[] {
  const technicianById = new Map(technicians.map(t => [t.id, t]));
  const groups = new Map<string, TechnicianAccumulator>();

  for (const entry of entries) {
    if (entry.technician_id === null) {
      warnings.push({
        code: 'UNASSIGNED_ENTRY',
        entryId: entry.id,
        message: `Time entry ${entry.id} has no technician and was left out of pay`,
      });
      continue;
    }

    let group = groups.get(entry.technician_id);
    if (!group) {
      const technician = technicianById.get(entry.technician_id);
      if (!technician) {
        warnings.push({
          code: 'UNKNOWN_TECHNICIAN',
          technicianId: entry.technician_id,
          message: `Technician ${entry.technician_id} not found; no minimum rate applied`,
        });
      }
      group = {
        technicianId: entry.technician_id,
        technicianName: technician?.name ?? `Technician ${entry.technician_id}`,
        minimumRate: technician?.hourly_rate ?? 0,
        hours: 0,
        mileage: 0,
        mileagePay: 0,
        perDiem: 0,
        personalExpenses: 0,
        entryIds: [],
        entryDates: new Set<string>(),
      };
      groups.set(entry.technician_id, group);
    }

    const hours = resolveHoursWorked(entry);
    if (hours === null) {
      warnings.push({
        code: 'MISSING_HOURS',
        entryId: entry.id,
        technicianId: entry.technician_id,
        message: `Time entry ${entry.id} has no hours; counted as 0`,
      });
    }

    if (entry.mileage > 0) {
      const rate = findEffectiveMileageRate(mileageRates, entry.date_worked);
      if (rate) {
        group.mileagePay += entry.mileage * rate.rate_per_mile;
      } else {
        warnings.push({
          code: 'RATE_NOT_FOUND',
          entryId: entry.id,
          technicianId: entry.technician_id,
          message: `No mileage rate effective on ${entry.date_worked}; mileage pay for entry ${entry.id} set to 0`,
        });
      }
    }

    group.hours += hours ?? 0;
    group.mileage += entry.mileage;
    group.perDiem += entry.per_diem;
    group.personalExpenses += entry.personal_expenses;
    group.entryIds.push(entry.id);
    group.entryDates.add(entry.date_worked);
  }

  return [...groups.values()];
}

/**
 * Calculate pay for every technician on a job.
 *
 * 1. Job net = billing - expenses - commissions
 * 2. Tech pool = job net x techPoolShare (never below zero)
 * 3. Weighted base = tech pool x (tech hours / total hours)
 * 4. If weighted base / hours is below the technician's minimum rate, base pay
 *    becomes minimum rate x hours. Other technicians are not reduced; the
 *    difference is reported as floorShortfall and borne by the company.
 * 5. Mileage pay uses the rate in force on each entry's work date
 * 6. Total pay = base + mileage + per diem + personal expenses
 * 7. Profit share = job net - total base pay, split by hours (reporting only)
 *
 * Pure: the same input always yields the same output.
 */
export function calculateJobPay(input: JobPayInput): JobPayCalculation {
  const { job, technicians, mileageRates } = input;
  const rules = input.rules ?? DEFAULT_PAY_RULES;
  const warnings: PayWarning[] = [];

  if (job.job_status === 'cancelled') {
    warnings.push({ code: 'JOB_CANCELLED', message: `Job ${job.id} is cancelled and excluded from pay` });
    return emptyCalculation(job.id, 0, 0, warnings);
  }

  const jobNet = calculateJobNet(job);
  const techPool = Math.max(0, jobNet * rules.techPoolShare);

  const payable = input.entries
    .filter(entry => entry.job_id === job.id && isPayableStatus(entry.status))
    .sort(compareEntries);

  const groups = accumulateByTechnician(payable, technicians, mileageRates, warnings);
  const totalHours = sumBy(groups, g => g.hours);

  if (totalHours <= 0) {
    return emptyCalculation(job.id, jobNet, techPool, warnings);
  }

  const rows: PayResult[] = groups.map(group => {
    const weightedBase = techPool * (group.hours / totalHours);
    const calculatedRate = group.hours > 0 ? weightedBase / group.hours : 0;

    let basePay = weightedBase;
    let usingMinimum = false;
    if (group.hours > 0 && calculatedRate < group.minimumRate) {
      basePay = group.minimumRate * group.hours;
      usingMinimum = true;
    }

    const roundedBase = roundCents(basePay);
    const mileagePay = roundCents(group.mileagePay);
    const perDiem = roundCents(group.perDiem);
    const personalExpenses = roundCents(group.personalExpenses);

    return {
      jobId: job.id,
      technicianId: group.technicianId,
      technicianName: group.technicianName,
      hours: roundHours(group.hours),
      minimumRate: group.minimumRate,
      calculatedRate: roundCents(calculatedRate),
      effectiveRate: group.hours > 0 ? roundCents(basePay / group.hours) : 0,
      weightedBasePay: roundCents(weightedBase),
      basePay: roundedBase,
      usingMinimum,
      mileage: roundToHundredths(group.mileage),
      mileagePay,
      perDiem,
      personalExpenses,
      profitShare: 0,
      totalPay: roundedBase + mileagePay + perDiem + personalExpenses,
      entryIds: group.entryIds,
      entryDates: [...group.entryDates].sort(),
    };
  });

  const totalBasePay = sumBy(rows, r => r.basePay);
  const profitPool = roundCents(jobNet) - totalBasePay;
  const shares = allocateByHours(
    profitPool,
    groups.map(g => ({ key: g.technicianId, hours: g.hours }))
  );
  rows.forEach((row, idx) => {
    row.profitShare = shares[idx].amountCents;
  });

  return {
    jobId: job.id,
    jobNet: roundCents(jobNet),
    techPool: roundCents(techPool),
    totalHours: roundHours(totalHours),
    floorShortfall: totalBasePay - sumBy(rows, r => r.weightedBasePay),
    technicians: rows,
    totals: summarizePayResults(rows),
    warnings,
  };
}

/**
 * Column sums over already-rounded rows, so totals reconcile to the cent.
 */
export function summarizePayResults(rows: readonly PayResult[]): JobPayTotals {
  return {
    hours: roundHours(sumBy(rows, r => r.hours)),
    basePay: sumBy(rows, r => r.basePay),
    mileagePay: sumBy(rows, r => r.mileagePay),
    perDiem: sumBy(rows, r => r.perDiem),
    personalExpenses: sumBy(rows, r => r.personalExpenses),
    profitShare: sumBy(rows, r => r.profitShare),
    totalPay: sumBy(rows, r => r.totalPay),
  };
}
