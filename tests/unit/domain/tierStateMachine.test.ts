import { describe, it, expect } from 'vitest';
import { ConflictError, ValidationError } from '../../../src/domain/errors.js';
import {
  eligibleAdvancement,
  requirementFor,
  resolveCutoff,
  transition,
  type TierEvent,
} from '../../../src/domain/tierStateMachine.js';
import { PRODUCTION_START, makeRecord, makeRules, minutesAfter } from '../fixtures.js';

function scan(newFiles: number, at = minutesAfter(PRODUCTION_START, 60)): TierEvent {
  return {
    kind: 'scan',
    scanTimestamp: at,
    newFiles,
    totalFiles: newFiles,
    historicalFiles: 0,
  };
}

describe('tierStateMachine', () => {
  const rules = makeRules();

  describe('scan events', () => {
    it('should accumulate new files while below the threshold', () => {
      const record = makeRecord({ lastScanAt: PRODUCTION_START, countSinceThreshold: 100 });

      const result = transition(record, scan(40), rules);

      expect(result.record.countSinceThreshold).toBe(140);
      expect(result.record.paused).toBe(false);
      expect(result.effects).toEqual([]);
    });

    it('should pause and request approval when the count reaches the requirement', () => {
      const record = makeRecord({ lastScanAt: PRODUCTION_START, countSinceThreshold: 200 });

      const result = transition(record, scan(50), rules);

      expect(result.record.countSinceThreshold).toBe(250);
      expect(result.record.paused).toBe(true);
      expect(result.effects).toEqual([
        {
          type: 'request_approval',
          deviceId: 'DEV-1',
          transition: { from: '24h', to: '12h' },
          fileCount: 250,
        },
      ]);
    });

    it('should keep the count frozen while paused but record the scan time', () => {
      const at = minutesAfter(PRODUCTION_START, 120);
      const record = makeRecord({
        lastScanAt: PRODUCTION_START,
        countSinceThreshold: 260,
        paused: true,
      });

      const result = transition(record, scan(30, at), rules);

      expect(result.record.countSinceThreshold).toBe(260);
      expect(result.record.lastScanAt).toEqual(at);
      expect(result.effects).toEqual([]);
    });

    it('should start from zero on the first scan in bootstrap mode', () => {
      const record = makeRecord({ bootstrapMode: true });

      const result = transition(record, scan(900), rules);

      expect(result.record.countSinceThreshold).toBe(0);
      expect(result.effects).toEqual([]);
    });

    it('should count files since production start on the first scan without bootstrap', () => {
      const record = makeRecord();

      const result = transition(record, scan(300), rules);

      expect(result.record.countSinceThreshold).toBe(300);
      expect(result.record.paused).toBe(true);
      expect(result.effects).toHaveLength(1);
    });

    it('should never request approval from the terminal tier', () => {
      const record = makeRecord({
        currentTier: '2h',
        lastScanAt: PRODUCTION_START,
        countSinceThreshold: 5000,
      });

      const result = transition(record, scan(100), rules);

      expect(result.record.countSinceThreshold).toBe(5100);
      expect(result.record.paused).toBe(false);
      expect(result.effects).toEqual([]);
    });

    it('should not request the step into the terminal tier for exclude2h devices', () => {
      const record = makeRecord({
        currentTier: '3h',
        exclude2h: true,
        lastScanAt: PRODUCTION_START,
        countSinceThreshold: 1990,
      });

      const result = transition(record, scan(20), rules);

      expect(result.record.paused).toBe(false);
      expect(result.effects).toEqual([]);
    });

    it('should still advance exclude2h devices below the last step', () => {
      const record = makeRecord({
        currentTier: '6h',
        exclude2h: true,
        lastScanAt: PRODUCTION_START,
        countSinceThreshold: 990,
      });

      const result = transition(record, scan(10), rules);

      expect(result.effects).toEqual([
        {
          type: 'request_approval',
          deviceId: 'DEV-1',
          transition: { from: '6h', to: '3h' },
          fileCount: 1000,
        },
      ]);
    });

    it('should not request approval from an excluded tier', () => {
      const record = makeRecord({ lastScanAt: PRODUCTION_START, countSinceThreshold: 240 });

      const result = transition(record, scan(20), makeRules({ excludedTiers: ['24h'] }));

      expect(result.record.countSinceThreshold).toBe(260);
      expect(result.effects).toEqual([]);
    });

    it('should reject a negative file count', () => {
      expect(() => transition(makeRecord(), scan(-1), rules)).toThrow(ValidationError);
    });
  });

  describe('decision events', () => {
    const decidedAt = minutesAfter(PRODUCTION_START, 600);
    const paused = makeRecord({
      lastScanAt: PRODUCTION_START,
      countSinceThreshold: 260,
      paused: true,
    });

    it('should advance one tier and reset the count on approval', () => {
      const result = transition(
        paused,
        { kind: 'decision', verdict: 'approve', transition: { from: '24h', to: '12h' }, decidedAt },
        rules
      );

      expect(result.record.currentTier).toBe('12h');
      expect(result.record.countSinceThreshold).toBe(0);
      expect(result.record.paused).toBe(false);
      expect(result.record.tierStartedAt).toEqual(decidedAt);
      expect(result.record.lastDecision).toBe('approved');
      expect(result.effects).toEqual([
        { type: 'tier_changed', deviceId: 'DEV-1', transition: { from: '24h', to: '12h' } },
      ]);
    });

    it('should keep the tier and the count on rejection with the retain policy', () => {
      const result = transition(
        paused,
        { kind: 'decision', verdict: 'reject', transition: { from: '24h', to: '12h' }, decidedAt },
        rules
      );

      expect(result.record.currentTier).toBe('24h');
      expect(result.record.countSinceThreshold).toBe(260);
      expect(result.record.paused).toBe(false);
      expect(result.record.lastDecision).toBe('rejected');
      expect(result.effects).toEqual([]);
    });

    it('should zero the count on rejection with the reset policy', () => {
      const result = transition(
        paused,
        { kind: 'decision', verdict: 'reject', transition: { from: '24h', to: '12h' }, decidedAt },
        makeRules({ rejectionPolicy: 'reset' })
      );

      expect(result.record.countSinceThreshold).toBe(0);
      expect(result.record.currentTier).toBe('24h');
    });

    it('should refuse a decision for a device that is not paused', () => {
      const running = { ...paused, paused: false };

      expect(() =>
        transition(
          running,
          { kind: 'decision', verdict: 'approve', transition: { from: '24h', to: '12h' }, decidedAt },
          rules
        )
      ).toThrow(ConflictError);
    });

    it('should refuse a decision for a transition the device is not at', () => {
      expect(() =>
        transition(
          paused,
          { kind: 'decision', verdict: 'approve', transition: { from: '12h', to: '6h' }, decidedAt },
          rules
        )
      ).toThrow(ConflictError);
    });
  });

  describe('settings events', () => {
    it('should apply settings without touching tier or count', () => {
      const record = makeRecord({ countSinceThreshold: 42, currentTier: '12h' });

      const result = transition(
        record,
        {
          kind: 'settings',
          settings: {
            enabled: false,
            bootstrapMode: true,
            exclude2h: true,
            productionStartDate: PRODUCTION_START,
          },
        },
        rules
      );

      expect(result.record).toEqual({ ...record, enabled: false, bootstrapMode: true, exclude2h: true });
    });
  });

  describe('resolveCutoff', () => {
    const captureTime = minutesAfter(PRODUCTION_START, 300);

    it('should use the production start on the first scan', () => {
      expect(resolveCutoff(makeRecord(), captureTime)).toBe(PRODUCTION_START.getTime());
    });

    it('should use the capture time on the first scan in bootstrap mode', () => {
      expect(resolveCutoff(makeRecord({ bootstrapMode: true }), captureTime)).toBe(
        captureTime.getTime()
      );
    });

    it('should use the later of the last scan and the production start', () => {
      const lastScanAt = minutesAfter(PRODUCTION_START, 100);
      expect(resolveCutoff(makeRecord({ lastScanAt }), captureTime)).toBe(lastScanAt.getTime());

      const earlyScan = minutesAfter(PRODUCTION_START, -100);
      expect(resolveCutoff(makeRecord({ lastScanAt: earlyScan }), captureTime)).toBe(
        PRODUCTION_START.getTime()
      );
    });
  });

  describe('eligibility helpers', () => {
    it('should report the requirement for each non-terminal tier', () => {
      expect(requirementFor('24h', rules)).toBe(250);
      expect(requirementFor('3h', rules)).toBe(2000);
      expect(requirementFor('2h', rules)).toBeNull();
    });

    it('should report no advancement for disabled devices', () => {
      expect(eligibleAdvancement(makeRecord({ enabled: false }), rules)).toBeNull();
    });
  });
});
