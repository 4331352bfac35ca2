/**
 * Permission Types
 *
 * Roles come from the identity layer; capabilities are what the
 * services check before touching time entries, pay periods or rates.
 */
import type { UserRole } from '@/types/workTracking';

export type Role = UserRole;

/**
 * Format: action:resource (e.g., 'verify:time_entries').
 * The `own_` variants only cover records linked to the caller's technician.
 */
export type Capability =
  // Time entries
  | 'create:own_time_entries'
  | 'create:time_entries'
  | 'edit:own_time_entries'
  | 'edit:time_entries'
  | 'edit:paid_time_entries'
  | 'delete:own_time_entries'
  | 'delete:time_entries'
  | 'submit:own_time_entries'
  | 'submit:time_entries'
  | 'verify:time_entries'
  | 'assign:time_entries'
  | 'bill:time_entries'

  // Reporting
  | 'view:own_hours'
  | 'view:hours'
  | 'view:payroll'
  | 'view:job_billing'

  // Administration
  | 'manage:pay_periods'
  | 'manage:mileage_rates'
  | 'import:work';
