/**
 * Permissions Module
 *
 * Usage:
 * ```typescript
 * import { hasCapability, assertCapability } from '@/lib/permissions';
 *
 * if (hasCapability(actor.role, 'verify:time_entries')) {
 *   // ...
 * }
 * assertCapability(actor, 'manage:pay_periods', 'close pay periods');
 * ```
 */

import { PermissionDeniedError } from '@/lib/errors';
import type { Actor } from '@/types/workTracking';
import { hasCapability } from './definitions';
import type { Capability } from './types';

export type { Role, Capability } from './types';
export { ROLE_CAPABILITIES, hasCapability } from './definitions';

export function assertCapability(actor: Actor, capability: Capability, action: string): void {
  if (!hasCapability(actor.role, capability)) {
    throw new PermissionDeniedError(action, actor.role);
  }
}

/**
 * True when the actor holds the unrestricted capability, or the `own_` variant
 * and the record belongs to their technician.
 */
export function canActOnTechnicianRecord(
  actor: Actor,
  technicianId: string | null,
  anyCapability: Capability,
  ownCapability: Capability
): boolean {
  if (hasCapability(actor.role, anyCapability)) return true;
  return (
    hasCapability(actor.role, ownCapability) &&
    actor.technicianId !== null &&
    technicianId === actor.technicianId
  );
}
