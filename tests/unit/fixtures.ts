import { createDeviceRecord, type DeviceRecord } from '../../src/domain/entities/Device.js';
import type { TierRules } from '../../src/domain/tierStateMachine.js';
import type { FileMetadataSnapshot } from '../../src/domain/entities/FileMetadataSnapshot.js';
import type { AppEnv } from '../../src/bootstrap.js';
import type { CounterConfig, DeviceConfig } from '../../src/infra/counterConfig.js';
import type { SnapshotCollector, SnapshotRequest } from '../../src/infra/DirectorySnapshotCollector.js';
import type {
  ApprovalNotice,
  NotificationDispatcher,
} from '../../src/infra/notifications/NotificationDispatcher.js';

export const PRODUCTION_START = new Date('2026-03-01T00:00:00.000Z');

/** `minutes` after `base` */
export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function makeRules(overrides: Partial<TierRules> = {}): TierRules {
  return {
    requirements: {
      '24h_to_12h': 250,
      '12h_to_6h': 500,
      '6h_to_3h': 1000,
      '3h_to_2h': 2000,
    },
    excludedTiers: [],
    rejectionPolicy: 'retain',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  const base = createDeviceRecord(
    'DEV-1',
    {
      enabled: true,
      currentTier: '24h',
      productionStartDate: PRODUCTION_START,
      bootstrapMode: false,
      exclude2h: false,
    },
    PRODUCTION_START
  );
  return { ...base, ...overrides };
}

export function makeDeviceConfig(overrides: Partial<DeviceConfig> = {}): DeviceConfig {
  return {
    id: 'DEV-1',
    directory: '/tmp/does-not-matter',
    enabled: true,
    currentTier: '24h',
    productionStartDate: PRODUCTION_START,
    bootstrapMode: false,
    exclude2h: false,
    ...overrides,
  };
}

/** Deterministic PRNG so randomized tests are reproducible */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const TEST_ENV: AppEnv = {
  SQLITE_DB_PATH: ':memory:',
  SCAN_DIRECTORY_TIMEOUT_MS: 5000,
  SCAN_CONCURRENCY: 1,
  STALE_VERSION_MAX_ATTEMPTS: 5,
  NOTIFICATION_WEBHOOK_URL: undefined,
};

export function makeCounterConfig(
  devices: DeviceConfig[],
  overrides: Partial<CounterConfig> = {}
): CounterConfig {
  return {
    scanPath: '/srv/production',
    devices,
    rules: makeRules(),
    fileFiltering: { includeExtensions: [], excludePatterns: [], minFileSizeBytes: 0 },
    approvalUrl: 'http://localhost:3000/approvals',
    ...overrides,
  };
}

/** Clock the tests move by hand */
export class TestClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  set(date: Date): void {
    this.current = date;
  }

  advanceMinutes(minutes: number): Date {
    this.current = minutesAfter(this.current, minutes);
    return this.now();
  }
}

/**
 * In-memory collector: timestamps per device, optional failure per device and
 * a hook that runs while a collection is in flight.
 */
export class FakeCollector implements SnapshotCollector {
  readonly files = new Map<string, number[]>();
  readonly failures = new Map<string, Error>();
  duringCollect: ((request: SnapshotRequest) => void | Promise<void>) | null = null;

  addFiles(deviceId: string, timestamps: number[]): void {
    this.files.set(deviceId, [...(this.files.get(deviceId) ?? []), ...timestamps]);
  }

  async collect(request: SnapshotRequest): Promise<FileMetadataSnapshot> {
    if (this.duringCollect) {
      await this.duringCollect(request);
    }
    const failure = this.failures.get(request.deviceId);
    if (failure) {
      throw failure;
    }
    const timestamps = [...(this.files.get(request.deviceId) ?? [])].sort((a, b) => a - b);
    return {
      deviceId: request.deviceId,
      directory: request.directory,
      timestamps,
      captureTime: request.captureTime,
      skippedEntries: 0,
      durationMs: 0,
    };
  }
}

export class RecordingDispatcher implements NotificationDispatcher {
  readonly notices: ApprovalNotice[] = [];
  failWith: Error | null = null;
  beforeDispatch: ((notice: ApprovalNotice) => void | Promise<void>) | null = null;

  async dispatch(notice: ApprovalNotice): Promise<void> {
    if (this.beforeDispatch) {
      await this.beforeDispatch(notice);
    }
    if (this.failWith) {
      throw this.failWith;
    }
    this.notices.push(notice);
  }

  getChannelName(): string {
    return 'recording';
  }
}

/** `count` timestamps spread one second apart, starting one second after `after` */
export function timestampsAfter(after: Date, count: number): number[] {
  return Array.from({ length: count }, (_, index) => after.getTime() + (index + 1) * 1000);
}

/** Promise with its resolver exposed, for ordering concurrent steps in tests */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
