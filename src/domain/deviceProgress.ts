import type { DeviceRecord } from './entities/Device.js';
import { eligibleAdvancement, type TierRules } from './tierStateMachine.js';
import { advancementFrom, transitionKey, type Tier } from './tiers.js';

export type ProgressBand = 'building' | 'halfway' | 'close' | 'imminent' | 'complete' | 'blocked';

export interface DeviceProgress {
  deviceId: string;
  currentTier: Tier;
  nextTier: Tier | null;
  requirement: number | null;
  countSinceThreshold: number;
  remaining: number;
  /** 0 to 100, one decimal */
  percentage: number;
  band: ProgressBand;
  paused: boolean;
}

function bandFor(percentage: number): ProgressBand {
  if (percentage >= 90) return 'imminent';
  if (percentage >= 75) return 'close';
  if (percentage >= 50) return 'halfway';
  return 'building';
}

/**
 * Progress of a device toward its next tier, for status views
 */
export function calculateProgress(record: DeviceRecord, rules: TierRules): DeviceProgress {
  const base = {
    deviceId: record.id,
    currentTier: record.currentTier,
    countSinceThreshold: record.countSinceThreshold,
    paused: record.paused,
  };

  const advancement = advancementFrom(record.currentTier);
  if (!advancement) {
    return {
      ...base,
      nextTier: null,
      requirement: null,
      remaining: 0,
      percentage: 100,
      band: 'complete',
    };
  }

  const requirement = rules.requirements[transitionKey(advancement)] ?? null;
  const eligible = eligibleAdvancement(record, rules) !== null;

  if (requirement === null || !eligible) {
    return {
      ...base,
      nextTier: advancement.to,
      requirement,
      remaining: requirement === null ? 0 : Math.max(0, requirement - record.countSinceThreshold),
      percentage: 0,
      band: 'blocked',
    };
  }

  const percentage = Math.min(100, Math.round((record.countSinceThreshold / requirement) * 1000) / 10);

  return {
    ...base,
    nextTier: advancement.to,
    requirement,
    remaining: Math.max(0, requirement - record.countSinceThreshold),
    percentage,
    band: bandFor(percentage),
  };
}

/**
 * Number of devices per tier, every tier present
 */
export function summarizeTiers(records: readonly DeviceRecord[]): Record<Tier, number> {
  const summary: Record<Tier, number> = { '24h': 0, '12h': 0, '6h': 0, '3h': 0, '2h': 0 };
  for (const record of records) {
    summary[record.currentTier] += 1;
  }
  return summary;
}
