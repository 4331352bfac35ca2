// Job, technician and time entry shapes mirror the Supabase tables.
// Currency columns are stored in cents.

export type BillingType = 'flat_rate' | 'hourly' | 'per_task';
export type JobStatus = 'pending' | 'assigned' | 'in_progress' | 'completed' | 'cancelled';
export type TimeEntryStatus = 'draft' | 'submitted' | 'verified' | 'billed' | 'paid';
export type TechnicianStatus = 'active' | 'inactive';
export type PayPeriodStatus = 'open' | 'closed' | 'archived';
export type UserRole = 'admin' | 'manager' | 'technician';

export interface Platform {
  id: string;
  name: string;
  code: string; // e.g. 'FN', 'WM'
  status: 'active' | 'inactive';
}

export interface Job {
  id: string;
  platform_id: string;
  ticket_number: string | null;
  description: string;
  client_name: string | null;
  billing_type: BillingType;
  billing_amount: number | null; // In cents; required before pay can be calculated
  expenses: number; // In cents
  commissions: number; // In cents
  job_status: JobStatus;
  job_date: string | null; // YYYY-MM-DD
  external_url: string | null;
  created_at: string;
  updated_at: string;
}

export interface Technician {
  id: string;
  name: string;
  email: string | null;
  hourly_rate: number; // In cents - the guaranteed minimum, not a wage
  status: TechnicianStatus;
}

export interface TimeEntry {
  id: string;
  job_id: string;
  technician_id: string | null; // null = imported, awaiting assignment
  date_worked: string; // YYYY-MM-DD
  time_in: string | null; // HH:MM or HH:MM:SS
  time_out: string | null;
  hours_worked: number | null;
  mileage: number; // Miles
  per_diem: number; // In cents
  personal_expenses: number; // In cents
  status: TimeEntryStatus;
  rejection_reason: string | null;
  notes: string | null;
  verified_by: string | null;
  verified_at: string | null;
  created_by: string;
  updated_by: string | null;
  created_at: string;
  updated_at: string;
  version: number; // Bumped on every write, used for compare-and-swap
}

export interface PayPeriod {
  id: string;
  start_date: string;
  end_date: string;
  name: string;
  status: PayPeriodStatus;
  total_hours: number | null;
  closed_at: string | null;
}

export interface MileageRate {
  id: string;
  rate_per_mile: number; // In cents, fractional cents allowed (65.5)
  effective_date: string;
  end_date: string | null;
  description: string | null;
}

/**
 * The authenticated caller, as resolved by the identity layer.
 */
export interface Actor {
  userId: string;
  role: UserRole;
  technicianId: string | null;
}

export interface AuditEvent {
  actorId: string;
  action: string;
  entityType: 'time_entry' | 'job' | 'pay_period' | 'mileage_rate';
  entityId: string | null;
  before: Record<string, unknown> | null;
  after: Record<string, unknown> | null;
  description?: string;
}
