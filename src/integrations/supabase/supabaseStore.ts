import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { addDays, format, parseISO } from 'date-fns';
import { z } from 'zod';
import type {
  Job,
  MileageRate,
  PayPeriod,
  PayPeriodStatus,
  Platform,
  Technician,
  TimeEntry,
  TimeEntryStatus,
} from '@/types/workTracking';
import { DATE_FORMAT } from '@/lib/dateConfig';
import type { Logger } from '@/lib/logger';
import { findEffectiveMileageRate } from '@/utils/mileageRates';
import type {
  JobFilter,
  NewJob,
  NewMileageRate,
  NewPayPeriod,
  NewTimeEntry,
  PayPeriodPatch,
  TimeEntryFilter,
  TimeEntryPatch,
  WorkTrackingStore,
} from '@/services/store';
import {
  jobRowSchema,
  mileageRateRowSchema,
  payPeriodRowSchema,
  platformRowSchema,
  technicianRowSchema,
  timeEntryRowSchema,
} from './rows';

const TABLES = {
  jobs: 'jobs',
  platforms: 'platforms',
  technicians: 'technicians',
  timeEntries: 'time_entries',
  payPeriods: 'pay_periods',
  mileageRates: 'mileage_rate_history',
} as const;

/**
 * WorkTrackingStore over the Supabase tables in supabase/migrations.
 */
export class SupabaseWorkTrackingStore implements WorkTrackingStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly logger: Logger
  ) {}

  private fail(operation: string, error: PostgrestError): never {
    this.logger.error(`Supabase ${operation} failed`, {
      metadata: { code: error.code, details: error.details, hint: error.hint },
      error: error.message,
    });
    throw new Error(`Supabase ${operation} failed: ${error.message}`);
  }

  private one<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T | null {
    return data === null || data === undefined ? null : schema.parse(data);
  }

  private many<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T[] {
    return z.array(schema).parse(data ?? []);
  }

  // Jobs

  async getJob(id: string): Promise<Job | null> {
    const { data, error } = await this.supabase.from(TABLES.jobs).select('*').eq('id', id).maybeSingle();
    if (error) this.fail('getJob', error);
    return this.one(jobRowSchema, data);
  }

  async listJobs(filter: JobFilter = {}): Promise<Job[]> {
    let query = this.supabase.from(TABLES.jobs).select('*');

    if (filter.ids) query = query.in('id', [...filter.ids]);
    if (filter.platformId) query = query.eq('platform_id', filter.platformId);
    if (filter.status) query = query.eq('job_status', filter.status);
    if (filter.fromDate && filter.toDate) {
      // job_date when set, otherwise the creation day
      const createdBefore = format(addDays(parseISO(filter.toDate), 1), DATE_FORMAT);
      query = query.or(
        `and(job_date.gte.${filter.fromDate},job_date.lte.${filter.toDate}),` +
          `and(job_date.is.null,created_at.gte.${filter.fromDate},created_at.lt.${createdBefore})`
      );
    }

    const { data, error } = await query.order('job_date', { ascending: false, nullsFirst: false });
    if (error) this.fail('listJobs', error);
    return this.many(jobRowSchema, data);
  }

  async findJobByExternalUrl(externalUrl: string): Promise<Job | null> {
    const { data, error } = await this.supabase
      .from(TABLES.jobs)
      .select('*')
      .eq('external_url', externalUrl)
      .limit(1)
      .maybeSingle();
    if (error) this.fail('findJobByExternalUrl', error);
    return this.one(jobRowSchema, data);
  }

  async findJobByTicketNumber(platformId: string, ticketNumber: string): Promise<Job | null> {
    const { data, error } = await this.supabase
      .from(TABLES.jobs)
      .select('*')
      .eq('platform_id', platformId)
      .eq('ticket_number', ticketNumber)
      .limit(1)
      .maybeSingle();
    if (error) this.fail('findJobByTicketNumber', error);
    return this.one(jobRowSchema, data);
  }

  async insertJob(job: NewJob): Promise<Job> {
    const { data, error } = await this.supabase.from(TABLES.jobs).insert(job).select('*').single();
    if (error) this.fail('insertJob', error);
    return jobRowSchema.parse(data);
  }

  // Platforms and technicians

  async getPlatform(id: string): Promise<Platform | null> {
    const { data, error } = await this.supabase.from(TABLES.platforms).select('*').eq('id', id).maybeSingle();
    if (error) this.fail('getPlatform', error);
    return this.one(platformRowSchema, data);
  }

  async listPlatforms(): Promise<Platform[]> {
    const { data, error } = await this.supabase.from(TABLES.platforms).select('*').order('name', { ascending: true });
    if (error) this.fail('listPlatforms', error);
    return this.many(platformRowSchema, data);
  }

  async getTechnician(id: string): Promise<Technician | null> {
    const { data, error } = await this.supabase.from(TABLES.technicians).select('*').eq('id', id).maybeSingle();
    if (error) this.fail('getTechnician', error);
    return this.one(technicianRowSchema, data);
  }

  async listTechnicians(ids: readonly string[]): Promise<Technician[]> {
    const { data, error } = await this.supabase.from(TABLES.technicians).select('*').in('id', [...ids]);
    if (error) this.fail('listTechnicians', error);
    return this.many(technicianRowSchema, data);
  }

  // Time entries

  async getTimeEntry(id: string): Promise<TimeEntry | null> {
    const { data, error } = await this.supabase.from(TABLES.timeEntries).select('*').eq('id', id).maybeSingle();
    if (error) this.fail('getTimeEntry', error);
    return this.one(timeEntryRowSchema, data);
  }

  async listTimeEntries(filter: TimeEntryFilter): Promise<TimeEntry[]> {
    let query = this.supabase.from(TABLES.timeEntries).select('*');

    if (filter.jobIds) query = query.in('job_id', [...filter.jobIds]);
    if (filter.technicianId) query = query.eq('technician_id', filter.technicianId);
    if (filter.statuses) query = query.in('status', [...filter.statuses]);
    if (filter.fromDate) query = query.gte('date_worked', filter.fromDate);
    if (filter.toDate) query = query.lte('date_worked', filter.toDate);

    const { data, error } = await query.order('date_worked', { ascending: true }).order('id', { ascending: true });
    if (error) this.fail('listTimeEntries', error);
    return this.many(timeEntryRowSchema, data);
  }

  listTimeEntriesForJob(jobId: string, statuses: readonly TimeEntryStatus[]): Promise<TimeEntry[]> {
    return this.listTimeEntries({ jobIds: [jobId], statuses });
  }

  async insertTimeEntry(entry: NewTimeEntry): Promise<TimeEntry> {
    const { data, error } = await this.supabase
      .from(TABLES.timeEntries)
      .insert({ ...entry, version: 1 })
      .select('*')
      .single();
    if (error) this.fail('insertTimeEntry', error);
    return timeEntryRowSchema.parse(data);
  }

  async updateTimeEntry(id: string, expectedVersion: number, patch: TimeEntryPatch): Promise<TimeEntry | null> {
    const { data, error } = await this.supabase
      .from(TABLES.timeEntries)
      .update({ ...patch, version: expectedVersion + 1 })
      .eq('id', id)
      .eq('version', expectedVersion)
      .select('*')
      .maybeSingle();
    if (error) this.fail('updateTimeEntry', error);
    return this.one(timeEntryRowSchema, data);
  }

  async deleteTimeEntry(id: string, expectedVersion: number): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(TABLES.timeEntries)
      .delete()
      .eq('id', id)
      .eq('version', expectedVersion)
      .select('id');
    if (error) this.fail('deleteTimeEntry', error);
    return (data ?? []).length > 0;
  }

  // Pay periods

  async getPayPeriod(id: string): Promise<PayPeriod | null> {
    const { data, error } = await this.supabase.from(TABLES.payPeriods).select('*').eq('id', id).maybeSingle();
    if (error) this.fail('getPayPeriod', error);
    return this.one(payPeriodRowSchema, data);
  }

  async listPayPeriods(): Promise<PayPeriod[]> {
    const { data, error } = await this.supabase
      .from(TABLES.payPeriods)
      .select('*')
      .order('start_date', { ascending: false });
    if (error) this.fail('listPayPeriods', error);
    return this.many(payPeriodRowSchema, data);
  }

  async insertPayPeriod(period: NewPayPeriod): Promise<PayPeriod> {
    const { data, error } = await this.supabase.from(TABLES.payPeriods).insert(period).select('*').single();
    if (error) this.fail('insertPayPeriod', error);
    return payPeriodRowSchema.parse(data);
  }

  async updatePayPeriod(
    id: string,
    expectedStatus: PayPeriodStatus,
    patch: PayPeriodPatch
  ): Promise<PayPeriod | null> {
    const { data, error } = await this.supabase
      .from(TABLES.payPeriods)
      .update(patch)
      .eq('id', id)
      .eq('status', expectedStatus)
      .select('*')
      .maybeSingle();
    if (error) this.fail('updatePayPeriod', error);
    return this.one(payPeriodRowSchema, data);
  }

  // Mileage rates

  async listMileageRates(): Promise<MileageRate[]> {
    const { data, error } = await this.supabase
      .from(TABLES.mileageRates)
      .select('*')
      .order('effective_date', { ascending: true });
    if (error) this.fail('listMileageRates', error);
    return this.many(mileageRateRowSchema, data);
  }

  async getMileageRateAsOf(date: string): Promise<MileageRate | null> {
    const { data, error } = await this.supabase
      .from(TABLES.mileageRates)
      .select('*')
      .lte('effective_date', date)
      .order('effective_date', { ascending: false })
      .limit(1);
    if (error) this.fail('getMileageRateAsOf', error);
    return findEffectiveMileageRate(this.many(mileageRateRowSchema, data), date);
  }

  async insertMileageRate(rate: NewMileageRate): Promise<MileageRate> {
    const { data, error } = await this.supabase.from(TABLES.mileageRates).insert(rate).select('*').single();
    if (error) this.fail('insertMileageRate', error);
    return mileageRateRowSchema.parse(data);
  }
}
