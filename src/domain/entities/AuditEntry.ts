/**
 * AuditEntry entity - immutable audit log record
 * Records what happened, when, and to which entity
 */
export interface AuditEntry {
  id: number; // Auto-increment from SQLite
  eventType: AuditEventType;
  entityType: AuditEntityType;
  entityId: string;
  metadata: Record<string, unknown> | null;
  timestamp: Date;
}

export type AuditEntityType = 'device' | 'approval_request' | 'scan';

export type AuditEventType =
  | 'device_registered'
  | 'device_settings_updated'
  | 'scan_started'
  | 'scan_completed'
  | 'scan_cancelled'
  | 'device_scan_failed'
  | 'approval_requested'
  | 'approval_approved'
  | 'approval_rejected'
  | 'notification_sent'
  | 'notification_failed';

/**
 * Factory function to create a new AuditEntry
 */
export function createAuditEntry(params: {
  eventType: AuditEventType;
  entityType: AuditEntityType;
  entityId: string;
  metadata?: Record<string, unknown>;
}): Omit<AuditEntry, 'id' | 'timestamp'> {
  return {
    eventType: params.eventType,
    entityType: params.entityType,
    entityId: params.entityId,
    metadata: params.metadata || null,
  };
}
