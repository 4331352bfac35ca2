import type { Actor } from '@/types/workTracking';
import { loadConfig, type WorkTrackingConfig } from '@/lib/config';
import { createLogger, type Logger } from '@/lib/logger';
import { createServiceClient } from '@/integrations/supabase/client';
import { SupabaseAuditSink } from '@/integrations/supabase/supabaseAuditSink';
import { SupabaseWorkTrackingStore } from '@/integrations/supabase/supabaseStore';
import type { AuditSink, WorkTrackingContext, WorkTrackingStore } from '@/services/store';
import * as lifecycle from '@/services/timeEntryLifecycle.service';
import * as payroll from '@/services/payroll.service';
import * as payPeriods from '@/services/payPeriods.service';
import * as mileageRates from '@/services/mileageRates.service';
import * as imports from '@/services/imports.service';
import type { HoursGroupBy, JobBillingFilters } from '@/utils/payrollAggregation';
import type {
  CreateTimeEntryInput,
  MileageRateInput,
  PayPeriodInput,
  UpdateTimeEntryInput,
} from '@/services/validation';

export interface WorkTrackingOptions {
  config?: WorkTrackingConfig;
  store?: WorkTrackingStore;
  audit?: AuditSink;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Wire the services to a store, an audit sink and the pay rules.
 * Without an explicit store the Supabase tables are used, which needs
 * SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */
export function createWorkTracking(options: WorkTrackingOptions = {}) {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger('work-tracking', config.logLevel);

  let store = options.store;
  let audit = options.audit;
  if (!store || !audit) {
    if (!config.supabase) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when no store is provided');
    }
    const client = createServiceClient(config.supabase.url, config.supabase.serviceRoleKey);
    store = store ?? new SupabaseWorkTrackingStore(client, logger.child('store'));
    audit = audit ?? new SupabaseAuditSink(client, logger.child('audit'));
  }

  const ctx: WorkTrackingContext = {
    store,
    audit,
    logger,
    payRules: { techPoolShare: config.techPoolShare },
    now: options.now ?? (() => new Date()),
  };

  return {
    context: ctx,

    createTimeEntry: (actor: Actor, input: CreateTimeEntryInput) => lifecycle.createTimeEntry(ctx, actor, input),
    updateTimeEntry: (actor: Actor, id: string, input: UpdateTimeEntryInput) =>
      lifecycle.updateTimeEntry(ctx, actor, id, input),
    assignTechnician: (actor: Actor, id: string, technicianId: string) =>
      lifecycle.assignTechnician(ctx, actor, id, technicianId),
    removeTimeEntry: (actor: Actor, id: string) => lifecycle.removeTimeEntry(ctx, actor, id),
    submit: (actor: Actor, id: string) => lifecycle.submitTimeEntry(ctx, actor, id),
    verify: (actor: Actor, id: string) => lifecycle.verifyTimeEntry(ctx, actor, id),
    reject: (actor: Actor, id: string, reason: string) => lifecycle.rejectTimeEntry(ctx, actor, id, reason),
    bill: (actor: Actor, id: string) => lifecycle.billTimeEntry(ctx, actor, id),
    pay: (actor: Actor, id: string) => lifecycle.payTimeEntry(ctx, actor, id),
    bulkSubmit: (actor: Actor, ids: readonly string[]) => lifecycle.bulkSubmit(ctx, actor, ids),
    bulkVerify: (actor: Actor, ids: readonly string[]) => lifecycle.bulkVerify(ctx, actor, ids),
    bulkBill: (actor: Actor, ids: readonly string[]) => lifecycle.bulkBill(ctx, actor, ids),
    bulkPay: (actor: Actor, ids: readonly string[]) => lifecycle.bulkPay(ctx, actor, ids),

    calculateJobPay: (jobId: string) => payroll.calculateJobPayForJob(ctx, jobId),
    payrollReport: (actor: Actor, fromDate: string, toDate: string, opts?: payroll.PayrollReportOptions) =>
      payroll.payrollReport(ctx, actor, fromDate, toDate, opts),
    payrollReportForPeriod: (actor: Actor, periodId: string, opts?: payroll.PayrollReportOptions) =>
      payroll.payrollReportForPeriod(ctx, actor, periodId, opts),
    jobBillingReport: (actor: Actor, fromDate: string, toDate: string, filters?: JobBillingFilters) =>
      payroll.jobBillingReport(ctx, actor, fromDate, toDate, filters),
    technicianHoursReport: (
      actor: Actor,
      technicianId: string,
      fromDate: string,
      toDate: string,
      groupBy?: HoursGroupBy
    ) => payroll.technicianHoursReport(ctx, actor, technicianId, fromDate, toDate, groupBy),
    platformSummaryReport: (actor: Actor, fromDate: string, toDate: string) =>
      payroll.platformSummaryReport(ctx, actor, fromDate, toDate),
    technicianSummary: (actor: Actor, technicianId?: string) =>
      payroll.technicianSummary(ctx, actor, technicianId),

    listPayPeriods: () => payPeriods.listPayPeriods(ctx),
    createPayPeriod: (actor: Actor, input: PayPeriodInput) => payPeriods.createPayPeriod(ctx, actor, input),
    closePayPeriod: (actor: Actor, periodId: string) => payPeriods.closePayPeriod(ctx, actor, periodId),
    archivePayPeriod: (actor: Actor, periodId: string) => payPeriods.archivePayPeriod(ctx, actor, periodId),

    listMileageRates: () => mileageRates.listMileageRates(ctx),
    rateAsOf: (date: string) => mileageRates.rateAsOf(ctx, date),
    addMileageRate: (actor: Actor, input: MileageRateInput) => mileageRates.addMileageRate(ctx, actor, input),

    importJobs: (actor: Actor, candidates: readonly unknown[]) => imports.importJobs(ctx, actor, candidates),
    importTimeEntries: (actor: Actor, candidates: readonly unknown[]) =>
      imports.importTimeEntries(ctx, actor, candidates),
  };
}

export type WorkTracking = ReturnType<typeof createWorkTracking>;

export * from '@/types/workTracking';
export * from '@/lib/errors';
export { loadConfig, type WorkTrackingConfig } from '@/lib/config';
export { createLogger, type Logger, type LogContext } from '@/lib/logger';
export type { AuditSink, WorkTrackingContext, WorkTrackingStore } from '@/services/store';
export type { BulkResult, BulkItemResult } from '@/services/timeEntryLifecycle.service';
export type { ImportResult } from '@/services/imports.service';
export { calculateJobPay, type JobPayCalculation, type PayResult, type PayWarning } from '@/utils/jobPayCalculations';
export type {
  PayrollReport,
  JobBillingReport,
  TechnicianHoursReport,
  PlatformSummaryReport,
  TechnicianSummary,
} from '@/utils/payrollAggregation';
export { calculateHoursFromClockTimes } from '@/lib/timeUtils';
