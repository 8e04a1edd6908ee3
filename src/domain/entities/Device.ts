import type { Tier } from '../tiers.js';

export type DecisionVerdict = 'approve' | 'reject';

/**
 * Device entity - persisted burn-in state of one production device
 */
export interface DeviceRecord {
  id: string;
  enabled: boolean;
  currentTier: Tier;
  countSinceThreshold: number;
  /** Capture time of the last committed scan, null before the first one */
  lastScanAt: Date | null;
  productionStartDate: Date;
  bootstrapMode: boolean;
  /** True while an approval request is pending */
  paused: boolean;
  exclude2h: boolean;
  version: number;

  tierStartedAt: Date;
  totalFiles: number;
  historicalFiles: number;
  lastDecision: 'approved' | 'rejected' | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Settings a device takes from configuration */
export interface DeviceSettings {
  enabled: boolean;
  currentTier: Tier;
  productionStartDate: Date;
  bootstrapMode: boolean;
  exclude2h: boolean;
}

/**
 * Factory function for a device seen in configuration for the first time
 */
export function createDeviceRecord(id: string, settings: DeviceSettings, now = new Date()): DeviceRecord {
  return {
    id,
    enabled: settings.enabled,
    currentTier: settings.currentTier,
    countSinceThreshold: 0,
    lastScanAt: null,
    productionStartDate: settings.productionStartDate,
    bootstrapMode: settings.bootstrapMode,
    paused: false,
    exclude2h: settings.exclude2h,
    version: 1,
    tierStartedAt: now,
    totalFiles: 0,
    historicalFiles: 0,
    lastDecision: null,
    createdAt: now,
    updatedAt: now,
  };
}
