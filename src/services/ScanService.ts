import { randomUUID } from 'node:crypto';
import { isAppError, ScanInProgressError } from '../domain/errors.js';
import type { Tier } from '../domain/tiers.js';
import type { DeviceConfig } from '../infra/counterConfig.js';
import type { SnapshotCollector } from '../infra/DirectorySnapshotCollector.js';
import { logger } from '../infra/logger.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { ApprovalWorkflow } from './ApprovalWorkflow.js';
import type { DeviceStateManager } from './DeviceStateManager.js';
import type { DispatchSummary, NotificationService } from './NotificationService.js';

export type DeviceScanOutcome =
  | {
      deviceId: string;
      status: 'committed';
      tier: Tier;
      countSinceThreshold: number;
      paused: boolean;
      newFiles: number;
      totalFiles: number;
      historicalFiles: number;
      deferredFiles: number;
      requestId: string | null;
    }
  | { deviceId: string; status: 'failed'; error: { code: string; message: string } }
  | { deviceId: string; status: 'skipped'; reason: 'disabled' | 'cancelled' };

export interface ScanReport {
  scanId: string;
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  devices: DeviceScanOutcome[];
  committed: number;
  failed: number;
  skipped: number;
  notifications: DispatchSummary;
}

export interface ScanServiceOptions {
  concurrency: number;
  clock?: () => Date;
}

function describeError(error: unknown): { code: string; message: string } {
  if (isAppError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * ScanService - one pass over the configured devices: snapshot, count,
 * commit, request approval where a threshold was crossed.
 * A failing device keeps its prior state and never stops the pass.
 */
export class ScanService {
  private running = false;
  private readonly clock: () => Date;

  constructor(
    private devices: readonly DeviceConfig[],
    private collector: SnapshotCollector,
    private deviceManager: DeviceStateManager,
    private approvalWorkflow: ApprovalWorkflow,
    private notificationService: NotificationService,
    private auditRepo: AuditRepository,
    private options: ScanServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Runs one scan pass. When `signal` aborts, devices not yet started are
   * reported as skipped; devices already committed stay committed.
   */
  async runPass(params: { signal?: AbortSignal } = {}): Promise<ScanReport> {
    if (this.running) {
      throw new ScanInProgressError();
    }
    this.running = true;

    try {
      return await this.executePass(params.signal);
    } finally {
      this.running = false;
    }
  }

  private async executePass(signal: AbortSignal | undefined): Promise<ScanReport> {
    const scanId = randomUUID();
    const startedAt = this.clock();
    // Workers may share a dispatch round; each round is counted once
    const dispatchRounds = new Set<Promise<DispatchSummary>>();
    const dispatch = (): Promise<DispatchSummary> => {
      const round = this.notificationService.dispatchPending();
      dispatchRounds.add(round);
      return round;
    };

    this.auditRepo.log({
      eventType: 'scan_started',
      entityType: 'scan',
      entityId: scanId,
      metadata: { devices: this.devices.length },
    });
    logger.info('Scan pass started', { scanId, devices: this.devices.length });

    // Requests whose notification was lost before a crash go out first
    await dispatch();

    const outcomes = new Map<string, DeviceScanOutcome>();
    const queue = this.devices.filter((device) => {
      if (!device.enabled) {
        outcomes.set(device.id, { deviceId: device.id, status: 'skipped', reason: 'disabled' });
        return false;
      }
      return true;
    });

    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < queue.length) {
        const device = queue[nextIndex];
        nextIndex += 1;

        if (signal?.aborted) {
          outcomes.set(device.id, { deviceId: device.id, status: 'skipped', reason: 'cancelled' });
          continue;
        }

        const outcome = await this.scanDevice(device, scanId);
        outcomes.set(device.id, outcome);

        if (outcome.status === 'committed' && outcome.requestId) {
          await dispatch();
        }
      }
    };

    const workers = Math.max(1, Math.min(this.options.concurrency, queue.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const notifications: DispatchSummary = { sent: 0, failed: 0 };
    for (const round of await Promise.all(dispatchRounds)) {
      notifications.sent += round.sent;
      notifications.failed += round.failed;
    }

    const devices = this.devices.flatMap((device) => {
      const outcome = outcomes.get(device.id);
      return outcome ? [outcome] : [];
    });

    const report: ScanReport = {
      scanId,
      startedAt,
      finishedAt: this.clock(),
      cancelled: signal?.aborted === true,
      devices,
      committed: devices.filter((outcome) => outcome.status === 'committed').length,
      failed: devices.filter((outcome) => outcome.status === 'failed').length,
      skipped: devices.filter((outcome) => outcome.status === 'skipped').length,
      notifications,
    };

    this.auditRepo.log({
      eventType: report.cancelled ? 'scan_cancelled' : 'scan_completed',
      entityType: 'scan',
      entityId: scanId,
      metadata: {
        committed: report.committed,
        failed: report.failed,
        skipped: report.skipped,
      },
    });
    logger.info(report.cancelled ? 'Scan pass cancelled' : 'Scan pass completed', {
      scanId,
      committed: report.committed,
      failed: report.failed,
      skipped: report.skipped,
    });

    return report;
  }

  private async scanDevice(device: DeviceConfig, scanId: string): Promise<DeviceScanOutcome> {
    try {
      const initial = this.deviceManager.getDevice(device.id);
      const snapshot = await this.collector.collect({
        deviceId: device.id,
        directory: device.directory,
        captureTime: this.clock(),
      });

      let requestId: string | null = null;
      const commit = this.deviceManager.commitWithRetry(device.id, initial, (record) => {
        requestId = null;
        return this.deviceManager.commitScan(snapshot, record.version, (result) => {
          for (const effect of result.effects) {
            if (effect.type === 'request_approval') {
              requestId = this.approvalWorkflow.createRequest(
                effect.deviceId,
                effect.transition,
                effect.fileCount
              ).id;
            }
          }
        });
      });

      logger.info('Device scanned', {
        scanId,
        deviceId: device.id,
        tier: commit.record.currentTier,
        newFiles: commit.counts.newFiles,
        countSinceThreshold: commit.record.countSinceThreshold,
        paused: commit.record.paused,
      });

      return {
        deviceId: device.id,
        status: 'committed',
        tier: commit.record.currentTier,
        countSinceThreshold: commit.record.countSinceThreshold,
        paused: commit.record.paused,
        newFiles: commit.counts.newFiles,
        totalFiles: commit.counts.totalFiles,
        historicalFiles: commit.counts.historicalFiles,
        deferredFiles: commit.counts.deferredFiles,
        requestId,
      };
    } catch (error) {
      const described = describeError(error);
      logger.error('Device scan failed, keeping prior state', {
        scanId,
        deviceId: device.id,
        directory: device.directory,
        ...described,
      });
      this.auditRepo.log({
        eventType: 'device_scan_failed',
        entityType: 'device',
        entityId: device.id,
        metadata: { scanId, ...described },
      });
      return { deviceId: device.id, status: 'failed', error: described };
    }
  }
}
