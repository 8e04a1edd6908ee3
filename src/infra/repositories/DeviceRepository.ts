import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { DeviceRecord } from '../../domain/entities/Device.js';
import { StaleVersionError } from '../../domain/errors.js';
import { isTier, type Tier } from '../../domain/tiers.js';
import { logger } from '../logger.js';

type DeviceRow = {
  id: string;
  enabled: number;
  current_tier: string;
  count_since_threshold: number;
  last_scan_at: string | null;
  production_start_date: string;
  bootstrap_mode: number;
  paused: number;
  exclude_2h: number;
  version: number;
  tier_started_at: string;
  total_files: number;
  historical_files: number;
  last_decision: 'approved' | 'rejected' | null;
  created_at: string;
  updated_at: string;
};

function parseTier(value: string): Tier {
  if (!isTier(value)) {
    throw new Error(`Unknown tier stored in devices table: ${value}`);
  }
  return value;
}

/**
 * Repository for device records. Only the DeviceStateManager holds one.
 */
export class DeviceRepository {
  constructor(private db: DatabaseAdapter) {}

  insert(record: DeviceRecord): void {
    const sql = `
      INSERT INTO devices (
        id, enabled, current_tier, count_since_threshold, last_scan_at, production_start_date,
        bootstrap_mode, paused, exclude_2h, version, tier_started_at, total_files,
        historical_files, last_decision, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      record.id,
      record.enabled ? 1 : 0,
      record.currentTier,
      record.countSinceThreshold,
      record.lastScanAt ? record.lastScanAt.toISOString() : null,
      record.productionStartDate.toISOString(),
      record.bootstrapMode ? 1 : 0,
      record.paused ? 1 : 0,
      record.exclude2h ? 1 : 0,
      record.version,
      record.tierStartedAt.toISOString(),
      record.totalFiles,
      record.historicalFiles,
      record.lastDecision,
      record.createdAt.toISOString(),
      record.updatedAt.toISOString(),
    ]);

    logger.debug('Device inserted', { deviceId: record.id, tier: record.currentTier });
  }

  /**
   * Writes `record` only if the stored version still equals `expectedVersion`.
   * Returns the stored record with its incremented version.
   */
  updateIfVersion(record: DeviceRecord, expectedVersion: number, now = new Date()): DeviceRecord {
    const next: DeviceRecord = { ...record, version: expectedVersion + 1, updatedAt: now };

    const sql = `
      UPDATE devices
      SET enabled = ?, current_tier = ?, count_since_threshold = ?, last_scan_at = ?,
          production_start_date = ?, bootstrap_mode = ?, paused = ?, exclude_2h = ?,
          version = ?, tier_started_at = ?, total_files = ?, historical_files = ?,
          last_decision = ?, updated_at = ?
      WHERE id = ? AND version = ?
    `;

    const changes = this.db.execute(sql, [
      next.enabled ? 1 : 0,
      next.currentTier,
      next.countSinceThreshold,
      next.lastScanAt ? next.lastScanAt.toISOString() : null,
      next.productionStartDate.toISOString(),
      next.bootstrapMode ? 1 : 0,
      next.paused ? 1 : 0,
      next.exclude2h ? 1 : 0,
      next.version,
      next.tierStartedAt.toISOString(),
      next.totalFiles,
      next.historicalFiles,
      next.lastDecision,
      next.updatedAt.toISOString(),
      next.id,
      expectedVersion,
    ]);

    if (changes === 0) {
      const current = this.getById(record.id);
      throw new StaleVersionError(record.id, expectedVersion, current ? current.version : null);
    }

    logger.debug('Device updated', { deviceId: next.id, version: next.version });
    return next;
  }

  getById(deviceId: string): DeviceRecord | null {
    const row = this.db.queryOne<DeviceRow>('SELECT * FROM devices WHERE id = ?', [deviceId]);
    return row ? this.mapRowToDevice(row) : null;
  }

  list(): DeviceRecord[] {
    const rows = this.db.query<DeviceRow>('SELECT * FROM devices ORDER BY id ASC');
    return rows.map((row) => this.mapRowToDevice(row));
  }

  private mapRowToDevice(row: DeviceRow): DeviceRecord {
    return {
      id: row.id,
      enabled: row.enabled === 1,
      currentTier: parseTier(row.current_tier),
      countSinceThreshold: row.count_since_threshold,
      lastScanAt: row.last_scan_at ? new Date(row.last_scan_at) : null,
      productionStartDate: new Date(row.production_start_date),
      bootstrapMode: row.bootstrap_mode === 1,
      paused: row.paused === 1,
      exclude2h: row.exclude_2h === 1,
      version: row.version,
      tierStartedAt: new Date(row.tier_started_at),
      totalFiles: row.total_files,
      historicalFiles: row.historical_files,
      lastDecision: row.last_decision,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
