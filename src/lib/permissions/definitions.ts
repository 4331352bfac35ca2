/**
 * Permission Definitions
 *
 * SINGLE SOURCE OF TRUTH for role-to-capability mapping.
 */

import type { Role, Capability } from './types';

const TECHNICIAN_CAPABILITIES: readonly Capability[] = [
  'create:own_time_entries',
  'edit:own_time_entries',
  'delete:own_time_entries',
  'submit:own_time_entries',
  'view:own_hours',
];

const MANAGER_CAPABILITIES: readonly Capability[] = [
  ...TECHNICIAN_CAPABILITIES,
  'create:time_entries',
  'edit:time_entries',
  'delete:time_entries',
  'submit:time_entries',
  'verify:time_entries',
  'assign:time_entries',
  'bill:time_entries',
  'view:hours',
  'view:payroll',
  'view:job_billing',
  'manage:pay_periods',
  'import:work',
];

export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  technician: TECHNICIAN_CAPABILITIES,
  manager: MANAGER_CAPABILITIES,
  // Admins can also correct paid entries and change the mileage rate table
  admin: [...MANAGER_CAPABILITIES, 'edit:paid_time_entries', 'manage:mileage_rates'],
};

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}
