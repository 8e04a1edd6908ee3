import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { ApprovalRequest, ApprovalStatus } from '../../domain/entities/ApprovalRequest.js';
import { isTier, type Tier } from '../../domain/tiers.js';
import { logger } from '../logger.js';

type ApprovalRequestRow = {
  id: string;
  device_id: string;
  from_tier: string;
  to_tier: string;
  file_count: number;
  created_at: string;
  status: ApprovalStatus;
  decided_by: string | null;
  decided_at: string | null;
  comment: string | null;
  notified_at: string | null;
};

function parseTier(value: string): Tier {
  if (!isTier(value)) {
    throw new Error(`Unknown tier stored in approval_requests table: ${value}`);
  }
  return value;
}

export class ApprovalRequestRepository {
  constructor(private db: DatabaseAdapter) {}

  create(request: ApprovalRequest): void {
    const sql = `
      INSERT INTO approval_requests (
        id, device_id, from_tier, to_tier, file_count, created_at, status,
        decided_by, decided_at, comment, notified_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      request.id,
      request.deviceId,
      request.transition.from,
      request.transition.to,
      request.fileCount,
      request.createdAt.toISOString(),
      request.status,
      request.decidedBy,
      request.decidedAt ? request.decidedAt.toISOString() : null,
      request.comment,
      request.notifiedAt ? request.notifiedAt.toISOString() : null,
    ]);

    logger.debug('Approval request created', { requestId: request.id, deviceId: request.deviceId });
  }

  /**
   * Moves a pending request to its final status.
   * Returns false when the request was no longer pending.
   */
  markDecided(params: {
    requestId: string;
    status: Exclude<ApprovalStatus, 'pending'>;
    decidedBy: string;
    decidedAt: Date;
    comment: string | null;
  }): boolean {
    const sql = `
      UPDATE approval_requests
      SET status = ?, decided_by = ?, decided_at = ?, comment = ?
      WHERE id = ? AND status = 'pending'
    `;

    const changes = this.db.execute(sql, [
      params.status,
      params.decidedBy,
      params.decidedAt.toISOString(),
      params.comment,
      params.requestId,
    ]);
    return changes === 1;
  }

  markNotified(requestId: string, notifiedAt: Date): void {
    this.db.execute('UPDATE approval_requests SET notified_at = ? WHERE id = ? AND notified_at IS NULL', [
      notifiedAt.toISOString(),
      requestId,
    ]);
  }

  getById(requestId: string): ApprovalRequest | null {
    const row = this.db.queryOne<ApprovalRequestRow>('SELECT * FROM approval_requests WHERE id = ?', [
      requestId,
    ]);
    return row ? this.mapRowToRequest(row) : null;
  }

  getPendingForDevice(deviceId: string): ApprovalRequest | null {
    const row = this.db.queryOne<ApprovalRequestRow>(
      `SELECT * FROM approval_requests WHERE device_id = ? AND status = 'pending'`,
      [deviceId]
    );
    return row ? this.mapRowToRequest(row) : null;
  }

  listPending(): ApprovalRequest[] {
    const rows = this.db.query<ApprovalRequestRow>(
      `SELECT * FROM approval_requests WHERE status = 'pending' ORDER BY created_at ASC, id ASC`
    );
    return rows.map((row) => this.mapRowToRequest(row));
  }

  /** Pending requests the notification dispatcher has not accepted yet */
  listUnnotified(): ApprovalRequest[] {
    const rows = this.db.query<ApprovalRequestRow>(
      `SELECT * FROM approval_requests
       WHERE status = 'pending' AND notified_at IS NULL
       ORDER BY created_at ASC, id ASC`
    );
    return rows.map((row) => this.mapRowToRequest(row));
  }

  private mapRowToRequest(row: ApprovalRequestRow): ApprovalRequest {
    return {
      id: row.id,
      deviceId: row.device_id,
      transition: { from: parseTier(row.from_tier), to: parseTier(row.to_tier) },
      fileCount: row.file_count,
      createdAt: new Date(row.created_at),
      status: row.status,
      decidedBy: row.decided_by,
      decidedAt: row.decided_at ? new Date(row.decided_at) : null,
      comment: row.comment,
      notifiedAt: row.notified_at ? new Date(row.notified_at) : null,
    };
  }
}
