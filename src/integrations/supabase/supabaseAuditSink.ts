import type { SupabaseClient } from '@supabase/supabase-js';
import type { AuditEvent } from '@/types/workTracking';
import type { Logger } from '@/lib/logger';
import type { AuditSink } from '@/services/store';

/**
 * Writes audit events to the audit_logs table. A failed write is logged and
 * never fails the operation being audited.
 */
export class SupabaseAuditSink implements AuditSink {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly logger: Logger
  ) {}

  async record(event: AuditEvent): Promise<void> {
    try {
      const { error } = await this.supabase.from('audit_logs').insert({
        user_id: event.actorId,
        action: event.action,
        entity_type: event.entityType,
        entity_id: event.entityId,
        old_values: event.before,
        new_values: event.after,
        description: event.description ?? null,
      });

      if (error) {
        this.logger.error(`Failed to record audit event ${event.action}`, {
          actorId: event.actorId,
          entityId: event.entityId ?? undefined,
          error: error.message,
        });
      }
    } catch (err) {
      this.logger.error(`Error recording audit event ${event.action}`, {
        actorId: event.actorId,
        entityId: event.entityId ?? undefined,
        error: err,
      });
    }
  }
}
