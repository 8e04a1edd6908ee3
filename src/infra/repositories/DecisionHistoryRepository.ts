import type { DatabaseAdapter, SqlParam } from '../DatabaseAdapter.js';
import type { DecisionHistoryEntry } from '../../domain/entities/ApprovalRequest.js';
import type { DecisionVerdict } from '../../domain/entities/Device.js';
import { isTier, type Tier } from '../../domain/tiers.js';

type DecisionHistoryRow = {
  id: number;
  request_id: string;
  device_id: string;
  from_tier: string;
  to_tier: string;
  file_count: number;
  verdict: DecisionVerdict;
  decided_by: string;
  decided_at: string;
  requested_at: string;
  comment: string | null;
};

function parseTier(value: string): Tier {
  if (!isTier(value)) {
    throw new Error(`Unknown tier stored in decision_history table: ${value}`);
  }
  return value;
}

export type HistoryQuery = {
  deviceId?: string;
  limit?: number;
  beforeId?: number;
};

/**
 * Append-only store of resolved approval requests.
 * The table's triggers reject UPDATE and DELETE.
 */
export class DecisionHistoryRepository {
  constructor(private db: DatabaseAdapter) {}

  append(entry: Omit<DecisionHistoryEntry, 'id'>): void {
    const sql = `
      INSERT INTO decision_history (
        request_id, device_id, from_tier, to_tier, file_count, verdict,
        decided_by, decided_at, requested_at, comment
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      entry.requestId,
      entry.deviceId,
      entry.transition.from,
      entry.transition.to,
      entry.fileCount,
      entry.verdict,
      entry.decidedBy,
      entry.decidedAt.toISOString(),
      entry.requestedAt.toISOString(),
      entry.comment,
    ]);
  }

  /** Newest first. Pass the last id of a page as `beforeId` to read the page after it. */
  list(params: HistoryQuery = {}): DecisionHistoryEntry[] {
    const conditions: string[] = [];
    const values: SqlParam[] = [];

    if (params.deviceId) {
      conditions.push('device_id = ?');
      values.push(params.deviceId);
    }

    if (params.beforeId !== undefined) {
      conditions.push('id < ?');
      values.push(params.beforeId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = Math.min(params.limit ?? 100, 1000);

    const sql = `
      SELECT * FROM decision_history
      ${where}
      ORDER BY id DESC
      LIMIT ?
    `;

    const rows = this.db.query<DecisionHistoryRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToEntry(row));
  }

  private mapRowToEntry(row: DecisionHistoryRow): DecisionHistoryEntry {
    return {
      id: row.id,
      requestId: row.request_id,
      deviceId: row.device_id,
      transition: { from: parseTier(row.from_tier), to: parseTier(row.to_tier) },
      fileCount: row.file_count,
      verdict: row.verdict,
      decidedBy: row.decided_by,
      decidedAt: new Date(row.decided_at),
      requestedAt: new Date(row.requested_at),
      comment: row.comment,
    };
  }
}
