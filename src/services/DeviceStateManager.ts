import type { ApprovalRequest } from '../domain/entities/ApprovalRequest.js';
import {
  createDeviceRecord,
  type DecisionVerdict,
  type DeviceRecord,
} from '../domain/entities/Device.js';
import type { FileMetadataSnapshot } from '../domain/entities/FileMetadataSnapshot.js';
import { splitAtCutoff, type FileCounts } from '../domain/cutoffCounter.js';
import { calculateProgress, summarizeTiers, type DeviceProgress } from '../domain/deviceProgress.js';
import { ConfigurationError, ConflictError, NotFoundError, StaleVersionError } from '../domain/errors.js';
import {
  resolveCutoff,
  transition,
  type TierEffect,
  type TierEvent,
  type TierRules,
} from '../domain/tierStateMachine.js';
import type { Tier } from '../domain/tiers.js';
import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { DeviceConfig } from '../infra/counterConfig.js';
import { logger } from '../infra/logger.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { DeviceRepository } from '../infra/repositories/DeviceRepository.js';

export interface ScanCommit {
  previous: DeviceRecord;
  record: DeviceRecord;
  counts: FileCounts;
  cutoff: Date;
  effects: TierEffect[];
}

export interface DecisionCommit {
  previous: DeviceRecord;
  record: DeviceRecord;
  effects: TierEffect[];
}

export interface DeviceStatus extends DeviceProgress {
  enabled: boolean;
  exclude2h: boolean;
  lastScanAt: Date | null;
  tierStartedAt: Date;
  totalFiles: number;
  historicalFiles: number;
  lastDecision: DeviceRecord['lastDecision'];
  version: number;
}

export interface StatusReport {
  devices: DeviceStatus[];
  tierSummary: Record<Tier, number>;
  lastScanAt: Date | null;
  pausedDevices: number;
  generatedAt: Date;
}

export interface DeviceStateManagerOptions {
  maxAttempts: number;
  clock?: () => Date;
}

function sameSettings(record: DeviceRecord, device: DeviceConfig): boolean {
  return (
    record.enabled === device.enabled &&
    record.bootstrapMode === device.bootstrapMode &&
    record.exclude2h === device.exclude2h &&
    record.productionStartDate.getTime() === device.productionStartDate.getTime()
  );
}

/**
 * DeviceStateManager - the only writer of device rows.
 * Every mutation reads, checks the expected version, applies a pure tier
 * transition and stores it with the version incremented, all in one
 * immediate transaction.
 */
export class DeviceStateManager {
  private readonly clock: () => Date;

  constructor(
    private db: DatabaseAdapter,
    private deviceRepo: DeviceRepository,
    private auditRepo: AuditRepository,
    private rules: TierRules,
    private options: DeviceStateManagerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  getRules(): TierRules {
    return this.rules;
  }

  /**
   * Commits one scan of a device. Counts are derived here from the stored
   * record, so a retry after a concurrent change never counts a file twice.
   * `onCommitted` runs inside the same transaction; if it throws, the scan
   * is rolled back with it.
   */
  commitScan(
    snapshot: FileMetadataSnapshot,
    expectedVersion: number,
    onCommitted?: (commit: ScanCommit) => void
  ): ScanCommit {
    return this.db.transaction(() => {
      const record = this.loadAtVersion(snapshot.deviceId, expectedVersion);

      if (record.lastScanAt && record.lastScanAt.getTime() >= snapshot.captureTime.getTime()) {
        throw new ConflictError(
          `Snapshot of ${record.id} captured at ${snapshot.captureTime.toISOString()} is not newer than the last committed scan`,
          { deviceId: record.id, lastScanAt: record.lastScanAt.toISOString() }
        );
      }

      const cutoff = resolveCutoff(record, snapshot.captureTime);
      const counts = splitAtCutoff(snapshot.timestamps, cutoff, snapshot.captureTime.getTime());

      const event: TierEvent = {
        kind: 'scan',
        scanTimestamp: snapshot.captureTime,
        newFiles: counts.newFiles,
        totalFiles: counts.totalFiles,
        historicalFiles: counts.historicalFiles,
      };

      const result = transition(record, event, this.rules);
      const stored = this.deviceRepo.updateIfVersion(result.record, expectedVersion, this.clock());

      const commit: ScanCommit = {
        previous: record,
        record: stored,
        counts,
        cutoff: new Date(cutoff),
        effects: result.effects,
      };
      onCommitted?.(commit);
      return commit;
    });
  }

  /**
   * Applies an approver's verdict for `request` to its device.
   * `onCommitted` records the decision inside the same transaction.
   */
  commitDecision(
    request: ApprovalRequest,
    verdict: DecisionVerdict,
    expectedVersion: number,
    onCommitted: (commit: DecisionCommit) => void
  ): DecisionCommit {
    return this.db.transaction(() => {
      const record = this.loadAtVersion(request.deviceId, expectedVersion);
      const decidedAt = this.clock();

      const result = transition(
        record,
        { kind: 'decision', verdict, transition: request.transition, decidedAt },
        this.rules
      );
      const stored = this.deviceRepo.updateIfVersion(result.record, expectedVersion, decidedAt);

      const commit: DecisionCommit = { previous: record, record: stored, effects: result.effects };
      onCommitted(commit);
      return commit;
    });
  }

  /**
   * Runs `attempt` against the device record, re-reading it and trying again
   * when another writer got there first. `initial` is the record the caller
   * already holds; null reads it fresh.
   */
  commitWithRetry<T>(
    deviceId: string,
    initial: DeviceRecord | null,
    attempt: (record: DeviceRecord) => T
  ): T {
    let record = initial ?? this.getDevice(deviceId);

    for (let attemptNumber = 1; ; attemptNumber += 1) {
      try {
        return attempt(record);
      } catch (error) {
        if (!(error instanceof StaleVersionError) || attemptNumber >= this.options.maxAttempts) {
          throw error;
        }
        logger.warn('Device changed concurrently, retrying commit', {
          deviceId,
          attempt: attemptNumber,
          expectedVersion: error.expectedVersion,
          actualVersion: error.actualVersion,
        });
        record = this.getDevice(deviceId);
      }
    }
  }

  /**
   * Creates records for configured devices seen for the first time and
   * applies changed settings to known ones. A persisted tier always wins
   * over the configured one.
   */
  registerDevices(devices: readonly DeviceConfig[]): DeviceRecord[] {
    return devices.map((device) => {
      const existing = this.deviceRepo.getById(device.id);

      if (!existing) {
        const record = createDeviceRecord(device.id, device, this.clock());
        this.db.transaction(() => {
          this.deviceRepo.insert(record);
          this.auditRepo.log({
            eventType: 'device_registered',
            entityType: 'device',
            entityId: record.id,
            metadata: { tier: record.currentTier, enabled: record.enabled },
          });
        });
        logger.info('Device registered', { deviceId: record.id, tier: record.currentTier });
        return record;
      }

      if (existing.currentTier !== device.currentTier) {
        logger.warn('Configured tier differs from persisted tier, keeping persisted tier', {
          deviceId: device.id,
          configuredTier: device.currentTier,
          persistedTier: existing.currentTier,
        });
      }

      if (sameSettings(existing, device)) {
        return existing;
      }

      return this.commitWithRetry(device.id, existing, (record) =>
        this.db.transaction(() => {
          const current = this.loadAtVersion(device.id, record.version);
          const result = transition(
            current,
            {
              kind: 'settings',
              settings: {
                enabled: device.enabled,
                productionStartDate: device.productionStartDate,
                bootstrapMode: device.bootstrapMode,
                exclude2h: device.exclude2h,
              },
            },
            this.rules
          );
          const stored = this.deviceRepo.updateIfVersion(result.record, record.version, this.clock());
          this.auditRepo.log({
            eventType: 'device_settings_updated',
            entityType: 'device',
            entityId: device.id,
            metadata: {
              enabled: stored.enabled,
              bootstrapMode: stored.bootstrapMode,
              exclude2h: stored.exclude2h,
              productionStartDate: stored.productionStartDate.toISOString(),
            },
          });
          logger.info('Device settings updated', { deviceId: device.id, version: stored.version });
          return stored;
        })
      );
    });
  }

  getDevice(deviceId: string): DeviceRecord {
    const record = this.deviceRepo.getById(deviceId);
    if (!record) {
      throw new NotFoundError('Device', deviceId);
    }
    return record;
  }

  listDevices(): DeviceRecord[] {
    return this.deviceRepo.list();
  }

  getDeviceStatus(deviceId: string): DeviceStatus {
    return this.toStatus(this.getDevice(deviceId));
  }

  getStatus(): StatusReport {
    const records = this.deviceRepo.list();
    const lastScanAt = records.reduce<Date | null>((latest, record) => {
      if (!record.lastScanAt) {
        return latest;
      }
      return !latest || record.lastScanAt > latest ? record.lastScanAt : latest;
    }, null);

    return {
      devices: records.map((record) => this.toStatus(record)),
      tierSummary: summarizeTiers(records),
      lastScanAt,
      pausedDevices: records.filter((record) => record.paused).length,
      generatedAt: this.clock(),
    };
  }

  private toStatus(record: DeviceRecord): DeviceStatus {
    return {
      ...calculateProgress(record, this.rules),
      enabled: record.enabled,
      exclude2h: record.exclude2h,
      lastScanAt: record.lastScanAt,
      tierStartedAt: record.tierStartedAt,
      totalFiles: record.totalFiles,
      historicalFiles: record.historicalFiles,
      lastDecision: record.lastDecision,
      version: record.version,
    };
  }

  private loadAtVersion(deviceId: string, expectedVersion: number): DeviceRecord {
    const record = this.deviceRepo.getById(deviceId);
    if (!record) {
      throw new ConfigurationError(`Device ${deviceId} is not registered`, { deviceId });
    }
    if (record.version !== expectedVersion) {
      throw new StaleVersionError(deviceId, expectedVersion, record.version);
    }
    return record;
  }
}
