import type { Env } from './infra/env.js';
import { loadCounterConfig, type CounterConfig } from './infra/counterConfig.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { DirectorySnapshotCollector, type SnapshotCollector } from './infra/DirectorySnapshotCollector.js';
import { logger } from './infra/logger.js';
import { createNotificationDispatcher } from './infra/notifications/createNotificationDispatcher.js';
import type { NotificationDispatcher } from './infra/notifications/NotificationDispatcher.js';
import { ApprovalRequestRepository } from './infra/repositories/ApprovalRequestRepository.js';
import { AuditRepository } from './infra/repositories/AuditRepository.js';
import { DecisionHistoryRepository } from './infra/repositories/DecisionHistoryRepository.js';
import { DeviceRepository } from './infra/repositories/DeviceRepository.js';
import { ApprovalWorkflow } from './services/ApprovalWorkflow.js';
import { DeviceStateManager } from './services/DeviceStateManager.js';
import { NotificationService } from './services/NotificationService.js';
import { ScanService } from './services/ScanService.js';

export type AppEnv = Pick<
  Env,
  | 'SQLITE_DB_PATH'
  | 'SCAN_DIRECTORY_TIMEOUT_MS'
  | 'SCAN_CONCURRENCY'
  | 'STALE_VERSION_MAX_ATTEMPTS'
  | 'NOTIFICATION_WEBHOOK_URL'
>;

export interface AppContext {
  config: CounterConfig;
  db: DatabaseAdapter;
  auditRepo: AuditRepository;
  deviceManager: DeviceStateManager;
  approvalWorkflow: ApprovalWorkflow;
  notificationService: NotificationService;
  scanService: ScanService;
}

export interface AppOverrides {
  collector?: SnapshotCollector;
  dispatcher?: NotificationDispatcher;
  clock?: () => Date;
}

/**
 * Wires repositories and services around one database connection and
 * registers the configured devices.
 */
export function createAppContext(
  env: AppEnv,
  config: CounterConfig,
  overrides: AppOverrides = {}
): AppContext {
  const clock = overrides.clock ?? (() => new Date());
  const db = new DatabaseAdapter(env);

  const deviceRepo = new DeviceRepository(db);
  const requestRepo = new ApprovalRequestRepository(db);
  const historyRepo = new DecisionHistoryRepository(db);
  const auditRepo = new AuditRepository(db);

  const deviceManager = new DeviceStateManager(db, deviceRepo, auditRepo, config.rules, {
    maxAttempts: env.STALE_VERSION_MAX_ATTEMPTS,
    clock,
  });
  const approvalWorkflow = new ApprovalWorkflow(
    db,
    requestRepo,
    historyRepo,
    deviceRepo,
    auditRepo,
    deviceManager,
    { clock }
  );
  const notificationService = new NotificationService(
    requestRepo,
    auditRepo,
    overrides.dispatcher ?? createNotificationDispatcher(env),
    config.approvalUrl,
    clock
  );
  const collector =
    overrides.collector ??
    new DirectorySnapshotCollector(config.fileFiltering, {
      timeoutMs: env.SCAN_DIRECTORY_TIMEOUT_MS,
    });
  const scanService = new ScanService(
    config.devices,
    collector,
    deviceManager,
    approvalWorkflow,
    notificationService,
    auditRepo,
    { concurrency: env.SCAN_CONCURRENCY, clock }
  );

  deviceManager.registerDevices(config.devices);
  logger.info('Devices registered', { devices: config.devices.length });

  return {
    config,
    db,
    auditRepo,
    deviceManager,
    approvalWorkflow,
    notificationService,
    scanService,
  };
}

/**
 * Loads the counter configuration from COUNTER_CONFIG_PATH and builds the context
 */
export async function loadAppContext(
  env: AppEnv & Pick<Env, 'COUNTER_CONFIG_PATH'>
): Promise<AppContext> {
  const config = await loadCounterConfig(env.COUNTER_CONFIG_PATH);
  logger.info('Counter configuration loaded', {
    path: env.COUNTER_CONFIG_PATH,
    devices: config.devices.length,
    rejectionPolicy: config.rules.rejectionPolicy,
  });
  return createAppContext(env, config);
}
