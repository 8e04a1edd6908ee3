import type { DecisionVerdict, DeviceRecord, DeviceSettings } from './entities/Device.js';
import { ConflictError, ValidationError } from './errors.js';
import {
  advancementFrom,
  formatTransition,
  isTerminalTier,
  nextTier,
  transitionKey,
  type Tier,
  type TierRequirements,
  type TierTransition,
} from './tiers.js';

export type RejectionPolicy = 'retain' | 'reset';

export interface TierRules {
  requirements: TierRequirements;
  /** Tiers a device never advances out of */
  excludedTiers: readonly Tier[];
  rejectionPolicy: RejectionPolicy;
}

export type TierEvent =
  | {
      kind: 'scan';
      scanTimestamp: Date;
      newFiles: number;
      totalFiles: number;
      historicalFiles: number;
    }
  | {
      kind: 'decision';
      verdict: DecisionVerdict;
      transition: TierTransition;
      decidedAt: Date;
    }
  | {
      kind: 'settings';
      settings: Omit<DeviceSettings, 'currentTier'>;
    };

export type TierEffect =
  | { type: 'request_approval'; deviceId: string; transition: TierTransition; fileCount: number }
  | { type: 'tier_changed'; deviceId: string; transition: TierTransition };

export interface TransitionResult {
  record: DeviceRecord;
  effects: TierEffect[];
}

/**
 * Threshold for leaving `tier`, or null when the tier is terminal or
 * has no configured requirement.
 */
export function requirementFor(tier: Tier, rules: TierRules): number | null {
  const transition = advancementFrom(tier);
  if (!transition) {
    return null;
  }
  return rules.requirements[transitionKey(transition)] ?? null;
}

/**
 * The advancement a device may be asked about right now, ignoring its count.
 * Null for the terminal tier, excluded tiers, and for the step into the
 * terminal tier when the device carries exclude2h.
 */
export function eligibleAdvancement(record: DeviceRecord, rules: TierRules): TierTransition | null {
  if (!record.enabled || rules.excludedTiers.includes(record.currentTier)) {
    return null;
  }

  const transition = advancementFrom(record.currentTier);
  if (!transition) {
    return null;
  }

  if (record.exclude2h && isTerminalTier(transition.to)) {
    return null;
  }

  return transition;
}

/**
 * Cutoff (epoch ms) after which files count as new for this record.
 *
 * First recorded scan: the production start date, or the capture time itself
 * in bootstrap mode so that every existing file is historical.
 * Later scans: the later of the last scan and the production start date.
 */
export function resolveCutoff(record: DeviceRecord, captureTime: Date): number {
  const productionStart = record.productionStartDate.getTime();

  if (!record.lastScanAt) {
    return record.bootstrapMode ? captureTime.getTime() : productionStart;
  }

  return Math.max(record.lastScanAt.getTime(), productionStart);
}

/**
 * Pauses the device and asks for approval when its count reached the
 * requirement of the next step.
 */
export function evaluateThreshold(record: DeviceRecord, rules: TierRules): TransitionResult {
  if (record.paused) {
    return { record, effects: [] };
  }

  const transition = eligibleAdvancement(record, rules);
  if (!transition) {
    return { record, effects: [] };
  }

  const requirement = rules.requirements[transitionKey(transition)];
  if (requirement === undefined || record.countSinceThreshold < requirement) {
    return { record, effects: [] };
  }

  return {
    record: { ...record, paused: true },
    effects: [
      {
        type: 'request_approval',
        deviceId: record.id,
        transition,
        fileCount: record.countSinceThreshold,
      },
    ],
  };
}

function applyScan(
  record: DeviceRecord,
  event: Extract<TierEvent, { kind: 'scan' }>,
  rules: TierRules
): TransitionResult {
  if (!Number.isInteger(event.newFiles) || event.newFiles < 0) {
    throw new ValidationError(`Invalid new file count ${event.newFiles} for device ${record.id}`);
  }

  const scanned: DeviceRecord = {
    ...record,
    lastScanAt: event.scanTimestamp,
    totalFiles: event.totalFiles,
    historicalFiles: event.historicalFiles,
  };

  if (record.paused) {
    // Counting halts until the pending request is decided
    return { record: scanned, effects: [] };
  }

  const isFirstScan = record.lastScanAt === null;
  const countSinceThreshold = isFirstScan
    ? record.bootstrapMode
      ? 0
      : event.newFiles
    : record.countSinceThreshold + event.newFiles;

  return evaluateThreshold({ ...scanned, countSinceThreshold }, rules);
}

function applyDecision(
  record: DeviceRecord,
  event: Extract<TierEvent, { kind: 'decision' }>,
  rules: TierRules
): TransitionResult {
  const { transition } = event;

  if (!record.paused) {
    throw new ConflictError(`Device ${record.id} is not awaiting approval`, {
      deviceId: record.id,
    });
  }

  if (record.currentTier !== transition.from || nextTier(transition.from) !== transition.to) {
    throw new ConflictError(
      `Transition ${formatTransition(transition)} does not apply to device ${record.id} at tier ${record.currentTier}`,
      { deviceId: record.id, currentTier: record.currentTier, transition }
    );
  }

  if (event.verdict === 'approve') {
    return {
      record: {
        ...record,
        currentTier: transition.to,
        countSinceThreshold: 0,
        paused: false,
        tierStartedAt: event.decidedAt,
        lastDecision: 'approved',
      },
      effects: [{ type: 'tier_changed', deviceId: record.id, transition }],
    };
  }

  return {
    record: {
      ...record,
      countSinceThreshold: rules.rejectionPolicy === 'reset' ? 0 : record.countSinceThreshold,
      paused: false,
      lastDecision: 'rejected',
    },
    effects: [],
  };
}

/**
 * Pure transition function: (record, event) -> next record plus intended
 * side effects. Never touches storage or notifications.
 */
export function transition(record: DeviceRecord, event: TierEvent, rules: TierRules): TransitionResult {
  switch (event.kind) {
    case 'scan':
      return applyScan(record, event, rules);
    case 'decision':
      return applyDecision(record, event, rules);
    case 'settings':
      return {
        record: {
          ...record,
          enabled: event.settings.enabled,
          bootstrapMode: event.settings.bootstrapMode,
          exclude2h: event.settings.exclude2h,
          productionStartDate: event.settings.productionStartDate,
        },
        effects: [],
      };
  }
}
