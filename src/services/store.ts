/**
 * Storage and audit seams for the work tracking services.
 *
 * The services never talk to Supabase directly; they go through these
 * interfaces so the same business logic runs against the database and
 * against the in-memory store used in tests.
 */

import type {
  AuditEvent,
  Job,
  JobStatus,
  MileageRate,
  PayPeriod,
  PayPeriodStatus,
  Platform,
  Technician,
  TimeEntry,
  TimeEntryStatus,
} from '@/types/workTracking';
import type { Logger } from '@/lib/logger';
import type { PayRules } from '@/utils/jobPayCalculations';

export type NewJob = Omit<Job, 'id'>;
export type NewTimeEntry = Omit<TimeEntry, 'id' | 'version'>;
export type NewPayPeriod = Omit<PayPeriod, 'id'>;
export type NewMileageRate = Omit<MileageRate, 'id'>;

export type TimeEntryPatch = Partial<Omit<TimeEntry, 'id' | 'version' | 'created_by' | 'created_at'>>;
export type PayPeriodPatch = Partial<Omit<PayPeriod, 'id'>>;

export interface JobFilter {
  ids?: readonly string[];
  platformId?: string;
  status?: JobStatus;
  /** Matched against job_date, or the creation date when job_date is empty */
  fromDate?: string;
  toDate?: string;
}

export interface TimeEntryFilter {
  jobIds?: readonly string[];
  technicianId?: string;
  statuses?: readonly TimeEntryStatus[];
  fromDate?: string;
  toDate?: string;
}

export interface WorkTrackingStore {
  getJob(id: string): Promise<Job | null>;
  listJobs(filter?: JobFilter): Promise<Job[]>;
  findJobByExternalUrl(externalUrl: string): Promise<Job | null>;
  findJobByTicketNumber(platformId: string, ticketNumber: string): Promise<Job | null>;
  insertJob(job: NewJob): Promise<Job>;

  getPlatform(id: string): Promise<Platform | null>;
  listPlatforms(): Promise<Platform[]>;

  getTechnician(id: string): Promise<Technician | null>;
  listTechnicians(ids: readonly string[]): Promise<Technician[]>;

  getTimeEntry(id: string): Promise<TimeEntry | null>;
  listTimeEntries(filter: TimeEntryFilter): Promise<TimeEntry[]>;
  listTimeEntriesForJob(jobId: string, statuses: readonly TimeEntryStatus[]): Promise<TimeEntry[]>;
  insertTimeEntry(entry: NewTimeEntry): Promise<TimeEntry>;
  /**
   * Compare-and-swap: writes only while the stored version equals
   * expectedVersion, bumping it by one.
   * @returns the updated entry, or null when the version no longer matches
   */
  updateTimeEntry(id: string, expectedVersion: number, patch: TimeEntryPatch): Promise<TimeEntry | null>;
  /** @returns false when the version no longer matches */
  deleteTimeEntry(id: string, expectedVersion: number): Promise<boolean>;

  getPayPeriod(id: string): Promise<PayPeriod | null>;
  listPayPeriods(): Promise<PayPeriod[]>;
  insertPayPeriod(period: NewPayPeriod): Promise<PayPeriod>;
  /** Compare-and-swap on status; null when the period is no longer in expectedStatus */
  updatePayPeriod(id: string, expectedStatus: PayPeriodStatus, patch: PayPeriodPatch): Promise<PayPeriod | null>;

  listMileageRates(): Promise<MileageRate[]>;
  getMileageRateAsOf(date: string): Promise<MileageRate | null>;
  insertMileageRate(rate: NewMileageRate): Promise<MileageRate>;
}

export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}

export interface WorkTrackingContext {
  store: WorkTrackingStore;
  audit: AuditSink;
  logger: Logger;
  payRules: PayRules;
  now: () => Date;
}
