import { addDays, format, parseISO, startOfWeek } from 'date-fns';
import type { Job, JobStatus, Platform, TimeEntry, TimeEntryStatus } from '@/types/workTracking';
import { DATE_FORMAT, WEEK_STARTS_ON } from '@/lib/dateConfig';
import { resolveHoursWorked, roundHours } from '@/lib/timeUtils';
import { sumBy } from '@/utils/currency';
import {
  summarizePayResults,
  type JobPayCalculation,
  type JobPayTotals,
  type PayResult,
  type PayWarning,
} from '@/utils/jobPayCalculations';
import { isPayableStatus } from '@/utils/timeEntryTransitions';

export interface PayrollRow extends PayResult {
  ticketNumber: string | null;
  jobDescription: string;
  externalUrl: string | null;
  billingAmount: number | null; // In cents
  firstDate: string;
  dateDisplay: string;
}

export interface TechnicianPayroll {
  technicianId: string;
  technicianName: string;
  rows: PayrollRow[];
  totals: JobPayTotals;
}

export interface UnpayableJob {
  jobId: string;
  code: string;
  reason: string;
}

export type ReportWarning = PayWarning & { jobId: string };

export interface PayrollReport {
  fromDate: string;
  toDate: string;
  technicians: TechnicianPayroll[];
  grandTotals: JobPayTotals;
  unpayableJobs: UnpayableJob[];
  warnings: ReportWarning[];
}

export interface PayrollReportInput {
  fromDate: string;
  toDate: string;
  jobs: readonly Job[];
  calculations: readonly JobPayCalculation[];
  /** Entries worked inside the date range; they decide which (technician, job) pairs appear */
  entriesInRange: readonly TimeEntry[];
  unpayableJobs?: readonly UnpayableJob[];
  technicianId?: string;
}

export function isDateInRange(date: string, fromDate: string, toDate: string): boolean {
  return date >= fromDate && date <= toDate;
}

/**
 * "2026-01-05" for a single day, "2026-01-05 - 2026-01-07" for a span.
 */
export function formatDateDisplay(dates: readonly string[]): string {
  if (dates.length === 0) return '';
  const sorted = [...dates].sort();
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  return first === last ? first : `${first} - ${last}`;
}

/**
 * Roll job pay calculations up into a per-technician payroll report.
 *
 * Each job's calculation covers all of its payable entries; the date range
 * only decides which technicians the job shows up for. Technician totals
 * are sums of rows and grand totals are sums of technician totals.
 */
export function buildPayrollReport(input: PayrollReportInput): PayrollReport {
  const { fromDate, toDate } = input;
  const jobById = new Map(input.jobs.map(job => [job.id, job]));
  const calculationByJob = new Map(input.calculations.map(calc => [calc.jobId, calc]));

  // technician -> job ids, in first-seen order
  const pairs = new Map<string, Set<string>>();
  for (const entry of input.entriesInRange) {
    if (entry.technician_id === null) continue;
    if (!isPayableStatus(entry.status)) continue;
    if (!isDateInRange(entry.date_worked, fromDate, toDate)) continue;
    if (input.technicianId && entry.technician_id !== input.technicianId) continue;

    const jobIds = pairs.get(entry.technician_id) ?? new Set<string>();
    jobIds.add(entry.job_id);
    pairs.set(entry.technician_id, jobIds);
  }

  const technicians: TechnicianPayroll[] = [];
  for (const [technicianId, jobIds] of pairs) {
    const rows: PayrollRow[] = [];
    for (const jobId of jobIds) {
      const job = jobById.get(jobId);
      const result = calculationByJob.get(jobId)?.technicians.find(r => r.technicianId === technicianId);
      if (!job || !result) continue;

      rows.push({
        ...result,
        ticketNumber: job.ticket_number,
        jobDescription: job.description,
        externalUrl: job.external_url,
        billingAmount: job.billing_amount,
        firstDate: result.entryDates[0] ?? '',
        dateDisplay: formatDateDisplay(result.entryDates),
      });
    }
    if (rows.length === 0) continue;

    rows.sort((a, b) => a.firstDate.localeCompare(b.firstDate) || a.jobId.localeCompare(b.jobId));
    technicians.push({
      technicianId,
      technicianName: rows[0].technicianName,
      rows,
      totals: summarizePayResults(rows),
    });
  }

  technicians.sort(
    (a, b) => a.technicianName.localeCompare(b.technicianName) || a.technicianId.localeCompare(b.technicianId)
  );

  const warnings: ReportWarning[] = input.calculations.flatMap(calc =>
    calc.warnings.map(warning => ({ ...warning, jobId: calc.jobId }))
  );

  return {
    fromDate,
    toDate,
    technicians,
    grandTotals: sumTotals(technicians.map(t => t.totals)),
    unpayableJobs: [...(input.unpayableJobs ?? [])],
    warnings,
  };
}

function sumTotals(totals: readonly JobPayTotals[]): JobPayTotals {
  return {
    hours: roundHours(sumBy(totals, t => t.hours)),
    basePay: sumBy(totals, t => t.basePay),
    mileagePay: sumBy(totals, t => t.mileagePay),
    perDiem: sumBy(totals, t => t.perDiem),
    personalExpenses: sumBy(totals, t => t.personalExpenses),
    profitShare: sumBy(totals, t => t.profitShare),
    totalPay: sumBy(totals, t => t.totalPay),
  };
}

// ---------------------------------------------------------------------------
// Job billing
// ---------------------------------------------------------------------------

export interface JobBillingRow {
  jobId: string;
  platformId: string;
  ticketNumber: string | null;
  description: string;
  clientName: string | null;
  jobStatus: JobStatus;
  jobDate: string;
  billingAmount: number | null; // In cents
  expenses: number; // In cents
  commissions: number; // In cents
  net: number | null; // In cents, null until billing is known
  actualHours: number;
  entryCount: number;
}

export interface JobBillingReport {
  fromDate: string;
  toDate: string;
  jobs: JobBillingRow[];
  summary: {
    jobCount: number;
    totalBilling: number;
    totalNet: number;
    totalHours: number;
  };
}

export interface JobBillingFilters {
  status?: JobStatus;
  platformId?: string;
}

/**
 * The date a job is reported under: job_date, else the UTC day it was created
 * (the same day the store filters created_at by).
 */
export function effectiveJobDate(job: Job): string {
  return job.job_date ?? parseISO(job.created_at).toISOString().slice(0, 10);
}

/**
 * Income and expense view per job. Hours and entry counts come from
 * payable entries only.
 */
export function buildJobBillingReport(input: {
  fromDate: string;
  toDate: string;
  jobs: readonly Job[];
  entries: readonly TimeEntry[];
  filters?: JobBillingFilters;
}): JobBillingReport {
  const { fromDate, toDate, filters = {} } = input;

  const payableByJob = new Map<string, TimeEntry[]>();
  for (const entry of input.entries) {
    if (!isPayableStatus(entry.status)) continue;
    const list = payableByJob.get(entry.job_id) ?? [];
    list.push(entry);
    payableByJob.set(entry.job_id, list);
  }

  const rows: JobBillingRow[] = input.jobs
    .filter(job => {
      if (filters.status && job.job_status !== filters.status) return false;
      if (filters.platformId && job.platform_id !== filters.platformId) return false;
      return isDateInRange(effectiveJobDate(job), fromDate, toDate);
    })
    .map(job => {
      const entries = payableByJob.get(job.id) ?? [];
      return {
        jobId: job.id,
        platformId: job.platform_id,
        ticketNumber: job.ticket_number,
        description: job.description,
        clientName: job.client_name,
        jobStatus: job.job_status,
        jobDate: effectiveJobDate(job),
        billingAmount: job.billing_amount,
        expenses: job.expenses,
        commissions: job.commissions,
        net: job.billing_amount === null ? null : job.billing_amount - job.expenses - job.commissions,
        actualHours: roundHours(sumBy(entries, e => resolveHoursWorked(e) ?? 0)),
        entryCount: entries.length,
      };
    });

  rows.sort((a, b) => b.jobDate.localeCompare(a.jobDate) || a.jobId.localeCompare(b.jobId));

  return {
    fromDate,
    toDate,
    jobs: rows,
    summary: {
      jobCount: rows.length,
      totalBilling: sumBy(rows, r => r.billingAmount ?? 0),
      totalNet: sumBy(rows, r => r.net ?? 0),
      totalHours: roundHours(sumBy(rows, r => r.actualHours)),
    },
  };
}

// ---------------------------------------------------------------------------
// Technician hours
// ---------------------------------------------------------------------------

export type HoursGroupBy = 'day' | 'week' | 'job';

export interface HoursGroup {
  key: string;
  label: string;
  hours: number;
  payableHours: number;
  entryCount: number;
}

export interface TechnicianHoursReport {
  technicianId: string;
  fromDate: string;
  toDate: string;
  groupBy: HoursGroupBy;
  groups: HoursGroup[];
  totalHours: number;
  totalPayableHours: number;
}

function groupKey(entry: TimeEntry, groupBy: HoursGroupBy): string {
  switch (groupBy) {
    case 'day':
      return entry.date_worked;
    case 'week':
      return format(startOfWeek(parseISO(entry.date_worked), { weekStartsOn: WEEK_STARTS_ON }), DATE_FORMAT);
    case 'job':
      return entry.job_id;
  }
}

function groupLabel(key: string, groupBy: HoursGroupBy, jobById: Map<string, Job>): string {
  if (groupBy === 'week') return `Week of ${key}`;
  if (groupBy === 'job') {
    const job = jobById.get(key);
    return job?.ticket_number ?? job?.description ?? key;
  }
  return key;
}

/**
 * Hours logged by one technician, grouped by day, Monday-start week or job.
 * `hours` covers every entry; `payableHours` only verified, billed and paid ones.
 */
export function buildTechnicianHoursReport(input: {
  technicianId: string;
  fromDate: string;
  toDate: string;
  groupBy: HoursGroupBy;
  entries: readonly TimeEntry[];
  jobs: readonly Job[];
}): TechnicianHoursReport {
  const { technicianId, fromDate, toDate, groupBy } = input;
  const jobById = new Map(input.jobs.map(job => [job.id, job]));
  const groups = new Map<string, HoursGroup>();

  const entries = input.entries
    .filter(e => e.technician_id === technicianId && isDateInRange(e.date_worked, fromDate, toDate))
    .sort((a, b) => a.date_worked.localeCompare(b.date_worked) || a.id.localeCompare(b.id));

  for (const entry of entries) {
    const key = groupKey(entry, groupBy);
    const group = groups.get(key) ?? {
      key,
      label: groupLabel(key, groupBy, jobById),
      hours: 0,
      payableHours: 0,
      entryCount: 0,
    };
    const hours = resolveHoursWorked(entry) ?? 0;
    group.hours += hours;
    if (isPayableStatus(entry.status)) group.payableHours += hours;
    group.entryCount += 1;
    groups.set(key, group);
  }

  const rounded = [...groups.values()]
    .map(g => ({
      ...g,
      hours: roundHours(g.hours),
      payableHours: roundHours(g.payableHours),
    }))
    .sort((a, b) =>
      groupBy === 'job'
        ? a.label.localeCompare(b.label) || a.key.localeCompare(b.key)
        : a.key.localeCompare(b.key)
    );

  return {
    technicianId,
    fromDate,
    toDate,
    groupBy,
    groups: rounded,
    totalHours: roundHours(sumBy(rounded, g => g.hours)),
    totalPayableHours: roundHours(sumBy(rounded, g => g.payableHours)),
  };
}

// ---------------------------------------------------------------------------
// Platform summary
// ---------------------------------------------------------------------------

export interface PlatformSummaryRow {
  platformId: string;
  name: string;
  code: string | null;
  jobCount: number;
  totalBilling: number; // In cents
  totalHours: number;
}

export interface PlatformSummaryReport {
  fromDate: string;
  toDate: string;
  platforms: PlatformSummaryRow[];
  totals: { jobCount: number; totalBilling: number; totalHours: number };
}

/**
 * Jobs, billing and payable hours per platform for jobs dated in the range.
 * Platforms without a job in the range are left out.
 */
export function buildPlatformSummaryReport(input: {
  fromDate: string;
  toDate: string;
  platforms: readonly Platform[];
  jobs: readonly Job[];
  entries: readonly TimeEntry[];
}): PlatformSummaryReport {
  const { fromDate, toDate } = input;
  const platformById = new Map(input.platforms.map(p => [p.id, p]));

  const hoursByJob = new Map<string, number>();
  for (const entry of input.entries) {
    if (!isPayableStatus(entry.status)) continue;
    hoursByJob.set(entry.job_id, (hoursByJob.get(entry.job_id) ?? 0) + (resolveHoursWorked(entry) ?? 0));
  }

  const rows = new Map<string, PlatformSummaryRow>();
  for (const job of input.jobs) {
    if (!isDateInRange(effectiveJobDate(job), fromDate, toDate)) continue;

    const platform = platformById.get(job.platform_id);
    const row = rows.get(job.platform_id) ?? {
      platformId: job.platform_id,
      name: platform?.name ?? job.platform_id,
      code: platform?.code ?? null,
      jobCount: 0,
      totalBilling: 0,
      totalHours: 0,
    };
    row.jobCount += 1;
    row.totalBilling += job.billing_amount ?? 0;
    row.totalHours += hoursByJob.get(job.id) ?? 0;
    rows.set(job.platform_id, row);
  }

  const platforms = [...rows.values()]
    .map(row => ({ ...row, totalHours: roundHours(row.totalHours) }))
    .sort((a, b) => a.name.localeCompare(b.name) || a.platformId.localeCompare(b.platformId));

  return {
    fromDate,
    toDate,
    platforms,
    totals: {
      jobCount: sumBy(platforms, p => p.jobCount),
      totalBilling: sumBy(platforms, p => p.totalBilling),
      totalHours: roundHours(sumBy(platforms, p => p.totalHours)),
    },
  };
}

// ---------------------------------------------------------------------------
// Technician summary
// ---------------------------------------------------------------------------

export interface StatusTally {
  count: number;
  hours: number;
}

export interface TechnicianSummary {
  technicianId: string;
  byStatus: Record<TimeEntryStatus, StatusTally>;
  currentWeek: {
    weekStart: string;
    weekEnd: string;
    entries: number;
    hours: number;
  };
}

/**
 * Entry counts and hours per status over all of a technician's entries,
 * plus the Monday-start week containing `today`.
 */
export function buildTechnicianSummary(input: {
  technicianId: string;
  entries: readonly TimeEntry[];
  today: string;
}): TechnicianSummary {
  const entries = input.entries.filter(e => e.technician_id === input.technicianId);

  const tally = (status: TimeEntryStatus): StatusTally => {
    const matching = entries.filter(e => e.status === status);
    return { count: matching.length, hours: roundHours(sumBy(matching, e => resolveHoursWorked(e) ?? 0)) };
  };
  const byStatus: Record<TimeEntryStatus, StatusTally> = {
    draft: tally('draft'),
    submitted: tally('submitted'),
    verified: tally('verified'),
    billed: tally('billed'),
    paid: tally('paid'),
  };

  const weekStartDate = startOfWeek(parseISO(input.today), { weekStartsOn: WEEK_STARTS_ON });
  const weekStart = format(weekStartDate, DATE_FORMAT);
  const weekEnd = format(addDays(weekStartDate, 6), DATE_FORMAT);
  const weekEntries = entries.filter(e => isDateInRange(e.date_worked, weekStart, weekEnd));

  return {
    technicianId: input.technicianId,
    byStatus,
    currentWeek: {
      weekStart,
      weekEnd,
      entries: weekEntries.length,
      hours: roundHours(sumBy(weekEntries, e => resolveHoursWorked(e) ?? 0)),
    },
  };
}
