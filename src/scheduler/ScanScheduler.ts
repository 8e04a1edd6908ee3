import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { ScanService } from '../services/ScanService.js';
import type { Env } from '../infra/env.js';

/**
 * ScanScheduler - periodic scan passes using node-cron
 */
export class ScanScheduler {
  private task: ScheduledTask | null = null;
  private isPaused = false;
  private abortController: AbortController | null = null;
  private lastRunAt: number | null = null;

  constructor(
    private env: Pick<Env, 'SCAN_INTERVAL_MINUTES'>,
    private scanService: ScanService
  ) {}

  /**
   * Pause the scheduler; ticks are skipped until resume()
   */
  pause(): void {
    this.isPaused = true;
    logger.info('ScanScheduler paused');
  }

  resume(): void {
    this.isPaused = false;
    logger.info('ScanScheduler resumed');
  }

  /**
   * Start the periodic scan
   * Runs every SCAN_INTERVAL_MINUTES minutes
   */
  start(): void {
    const intervalMinutes = this.env.SCAN_INTERVAL_MINUTES;

    if (intervalMinutes < 1) {
      logger.warn('SCAN_INTERVAL_MINUTES is less than 1, skipping scheduler');
      return;
    }

    // Step values restart at every hour, so cron fires each minute and
    // tick() decides from the time elapsed since the last pass
    const cronExpression = '* * * * *';

    this.task = cron.schedule(cronExpression, async () => {
      await this.tick();
    });

    logger.info('ScanScheduler started', { intervalMinutes, cronExpression });
  }

  /**
   * Stop the scheduler and cancel a pass in progress. Devices already
   * committed by that pass stay committed.
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('ScanScheduler stopped');
    }
    this.abortController?.abort();
  }

  /**
   * One scheduler tick. Public so tests can drive it without cron.
   */
  async tick(now = Date.now()): Promise<void> {
    if (this.isPaused) {
      logger.info('Periodic scan skipped - scheduler is paused');
      return;
    }

    if (this.scanService.isRunning()) {
      logger.info('Periodic scan skipped - previous pass still running');
      return;
    }

    const intervalMs = this.env.SCAN_INTERVAL_MINUTES * 60_000;
    // Half a minute of slack for cron firing late
    if (this.lastRunAt !== null && now - this.lastRunAt < intervalMs - 30_000) {
      return;
    }
    this.lastRunAt = now;

    this.abortController = new AbortController();
    try {
      const report = await this.scanService.runPass({ signal: this.abortController.signal });
      logger.info('Periodic scan finished', {
        scanId: report.scanId,
        committed: report.committed,
        failed: report.failed,
        skipped: report.skipped,
      });
    } catch (error) {
      logger.error('Periodic scan failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.abortController = null;
    }
  }
}

/**
 * Factory function to create and start scheduler
 */
export function startScheduler(
  env: Pick<Env, 'SCAN_INTERVAL_MINUTES'>,
  scanService: ScanService
): ScanScheduler {
  const scheduler = new ScanScheduler(env, scanService);
  scheduler.start();
  return scheduler;
}
