import type { DatabaseAdapter, SqlParam } from '../DatabaseAdapter.js';
import {
  createAuditEntry,
  type AuditEntityType,
  type AuditEntry,
  type AuditEventType,
} from '../../domain/entities/AuditEntry.js';
import { logger } from '../logger.js';

type AuditRow = {
  id: number;
  event_type: AuditEventType;
  entity_type: AuditEntityType;
  entity_id: string;
  metadata: string | null;
  timestamp: string;
};

function parseMetadata(text: string | null): Record<string, unknown> | null {
  if (!text) {
    return null;
  }
  const parsed: unknown = JSON.parse(text);
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return { value: parsed };
}

/**
 * Repository for AuditEntry persistence
 */
export class AuditRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Log an audit event. Failures are logged, never thrown: a lost audit
   * row must not undo a committed scan or decision.
   */
  log(params: {
    eventType: AuditEventType;
    entityType: AuditEntityType;
    entityId: string;
    metadata?: Record<string, unknown>;
  }): void {
    try {
      const entry = createAuditEntry(params);

      const sql = `
        INSERT INTO audit_log (event_type, entity_type, entity_id, metadata, timestamp)
        VALUES (?, ?, ?, ?, ?)
      `;

      this.db.execute(sql, [
        entry.eventType,
        entry.entityType,
        entry.entityId,
        entry.metadata ? JSON.stringify(entry.metadata) : null,
        new Date().toISOString(),
      ]);

      logger.debug('Audit event logged', {
        eventType: entry.eventType,
        entityType: entry.entityType,
        entityId: entry.entityId,
      });
    } catch (error) {
      logger.error('Failed to log audit event', { params, error });
    }
  }

  /**
   * Get recent audit events, optionally narrowed to one entity
   */
  getRecent(params: { limit?: number; entityType?: AuditEntityType; entityId?: string } = {}): AuditEntry[] {
    const conditions: string[] = [];
    const values: SqlParam[] = [];

    if (params.entityType) {
      conditions.push('entity_type = ?');
      values.push(params.entityType);
    }
    if (params.entityId) {
      conditions.push('entity_id = ?');
      values.push(params.entityId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `
      SELECT * FROM audit_log
      ${where}
      ORDER BY id DESC
      LIMIT ?
    `;

    const rows = this.db.query<AuditRow>(sql, [...values, params.limit ?? 100]);
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  getByEventType(eventType: AuditEventType): AuditEntry[] {
    const rows = this.db.query<AuditRow>(
      'SELECT * FROM audit_log WHERE event_type = ? ORDER BY id DESC',
      [eventType]
    );
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  private mapRowToAuditEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      eventType: row.event_type,
      entityType: row.entity_type,
      entityId: row.entity_id,
      metadata: parseMetadata(row.metadata),
      timestamp: new Date(row.timestamp),
    };
  }
}
