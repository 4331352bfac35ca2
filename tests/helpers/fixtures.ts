/**
 * Fixture builders for work tracking tests
 */
import type { Actor, Job, MileageRate, PayPeriod, Platform, Technician, TimeEntry } from '@/types/workTracking';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

export const adminActor: Actor = { userId: 'user-admin', role: 'admin', technicianId: null };
export const managerActor: Actor = { userId: 'user-manager', role: 'manager', technicianId: null };

export function technicianActor(technicianId: string | null, userId = `user-${technicianId ?? 'unlinked'}`): Actor {
  return { userId, role: 'technician', technicianId };
}

export function createPlatform(overrides: Partial<Platform> = {}): Platform {
  return {
    id: 'platform-fn',
    name: 'Field Nation',
    code: 'FN',
    status: 'active',
    ...overrides,
  };
}

export function createJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    platform_id: 'platform-fn',
    ticket_number: 'T-1001',
    description: 'Install access point',
    client_name: 'Acme',
    billing_type: 'flat_rate',
    billing_amount: 100000, // $1,000
    expenses: 10000, // $100
    commissions: 0,
    job_status: 'completed',
    job_date: '2026-01-05',
    external_url: null,
    created_at: TIMESTAMP,
    updated_at: TIMESTAMP,
    ...overrides,
  };
}

export function createTechnician(overrides: Partial<Technician> = {}): Technician {
  return {
    id: 'tech-a',
    name: 'Alex Rivera',
    email: null,
    hourly_rate: 2000, // $20/hr floor
    status: 'active',
    ...overrides,
  };
}

export function createTimeEntry(overrides: Partial<TimeEntry> = {}): TimeEntry {
  return {
    id: 'entry-1',
    job_id: 'job-1',
    technician_id: 'tech-a',
    date_worked: '2026-01-05',
    time_in: null,
    time_out: null,
    hours_worked: 8,
    mileage: 0,
    per_diem: 0,
    personal_expenses: 0,
    status: 'verified',
    rejection_reason: null,
    notes: null,
    verified_by: null,
    verified_at: null,
    created_by: 'user-manager',
    updated_by: null,
    created_at: TIMESTAMP,
    updated_at: TIMESTAMP,
    version: 1,
    ...overrides,
  };
}

export function createMileageRate(overrides: Partial<MileageRate> = {}): MileageRate {
  return {
    id: 'rate-2025',
    rate_per_mile: 67,
    effective_date: '2025-01-01',
    end_date: null,
    description: null,
    ...overrides,
  };
}

export function createPayPeriod(overrides: Partial<PayPeriod> = {}): PayPeriod {
  return {
    id: 'period-1',
    start_date: '2026-01-01',
    end_date: '2026-01-15',
    name: 'January 1-15',
    status: 'open',
    total_hours: null,
    closed_at: null,
    ...overrides,
  };
}
