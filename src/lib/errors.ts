export type WorkTrackingErrorCode =
  | 'INVALID_TRANSITION'
  | 'MISSING_ASSIGNMENT'
  | 'MISSING_HOURS'
  | 'PERMISSION_DENIED'
  | 'INCOMPLETE_JOB_DATA'
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'CONFLICT';

/**
 * Base class for every failure the services raise on purpose.
 * Anything else reaching a caller is a bug or an infrastructure error.
 */
export class WorkTrackingError extends Error {
  readonly code: WorkTrackingErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: WorkTrackingErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidTransitionError extends WorkTrackingError {
  constructor(
    entityId: string,
    action: string,
    currentStatus: string,
    expected?: readonly string[],
    reason?: string
  ) {
    const expectation = expected && expected.length > 0 ? ` (expected ${expected.join(' or ')})` : '';
    super(
      'INVALID_TRANSITION',
      reason
        ? `Cannot ${action} ${entityId}: ${reason}`
        : `Cannot ${action} ${entityId}: status is ${currentStatus}${expectation}`,
      { entityId, action, currentStatus, expected }
    );
  }
}

export class MissingAssignmentError extends WorkTrackingError {
  constructor(entryId: string) {
    super('MISSING_ASSIGNMENT', `Time entry ${entryId} must be assigned to a technician before submission`, {
      entryId,
    });
  }
}

export class MissingHoursError extends WorkTrackingError {
  constructor(entryId: string) {
    super('MISSING_HOURS', `Time entry ${entryId} has no hours worked`, { entryId });
  }
}

export class PermissionDeniedError extends WorkTrackingError {
  constructor(action: string, role: string) {
    super('PERMISSION_DENIED', `Role ${role} cannot ${action}`, { action, role });
  }
}

export class IncompleteJobDataError extends WorkTrackingError {
  constructor(jobId: string, missing: string) {
    super('INCOMPLETE_JOB_DATA', `Job ${jobId} is missing ${missing}`, { jobId, missing });
  }
}

export class NotFoundError extends WorkTrackingError {
  constructor(entityType: string, id: string) {
    super('NOT_FOUND', `${entityType} ${id} not found`, { entityType, id });
  }
}

export class ValidationFailedError extends WorkTrackingError {
  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_FAILED', message, { issues });
  }
}

export class ConflictError extends WorkTrackingError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFLICT', message, details);
  }
}

export function isWorkTrackingError(error: unknown): error is WorkTrackingError {
  return error instanceof WorkTrackingError;
}
