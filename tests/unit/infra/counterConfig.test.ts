import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/domain/errors.js';
import {
  parseConfigDate,
  parseCounterConfig,
  parseCounterConfigText,
} from '../../../src/infra/counterConfig.js';

function baseConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    scanPath: '/data/production',
    productionStartDate: '2026-03-01T00:00:00Z',
    devices: {
      'DEV-1': {},
      'DEV-2': { currentTier: '6h', exclude2h: true, path: 'shared/dev2' },
    },
    tierRequirements: {
      '24h_to_12h': 250,
      '12h_to_6h': 500,
      '6h_to_3h': 1000,
      '3h_to_2h': 2000,
    },
    ...overrides,
  };
}

describe('counterConfig', () => {
  describe('parseConfigDate', () => {
    it('should read a timestamp without offset as UTC', () => {
      expect(parseConfigDate('2026-03-01T06:30:00').toISOString()).toBe('2026-03-01T06:30:00.000Z');
    });

    it('should honour an explicit offset', () => {
      expect(parseConfigDate('2026-03-01T06:30:00+02:00').toISOString()).toBe(
        '2026-03-01T04:30:00.000Z'
      );
    });

    it('should read a date-only value as midnight UTC', () => {
      expect(parseConfigDate('2026-03-01').toISOString()).toBe('2026-03-01T00:00:00.000Z');
    });

    it('should reject a value that is not a date', () => {
      expect(() => parseConfigDate('next tuesday')).toThrow(ConfigurationError);
    });
  });

  describe('parseCounterConfig', () => {
    it('should resolve device defaults and directories', () => {
      const config = parseCounterConfig(baseConfig());

      expect(config.devices).toEqual([
        {
          id: 'DEV-1',
          enabled: true,
          currentTier: '24h',
          productionStartDate: new Date('2026-03-01T00:00:00.000Z'),
          bootstrapMode: false,
          exclude2h: false,
          directory: '/data/production/DEV-1/BIU',
        },
        {
          id: 'DEV-2',
          enabled: true,
          currentTier: '6h',
          productionStartDate: new Date('2026-03-01T00:00:00.000Z'),
          bootstrapMode: false,
          exclude2h: true,
          directory: '/data/production/shared/dev2',
        },
      ]);
      expect(config.rules.rejectionPolicy).toBe('retain');
      expect(config.rules.requirements['24h_to_12h']).toBe(250);
      expect(config.approvalUrl).toBeNull();
    });

    it('should let a device override the global start date and bootstrap mode', () => {
      const config = parseCounterConfig(
        baseConfig({
          bootstrapMode: true,
          devices: { 'DEV-1': { productionStartDate: '2026-04-01', bootstrapMode: false } },
        })
      );

      expect(config.devices[0].productionStartDate.toISOString()).toBe('2026-04-01T00:00:00.000Z');
      expect(config.devices[0].bootstrapMode).toBe(false);
    });

    it('should normalise file extensions', () => {
      const config = parseCounterConfig(
        baseConfig({ fileFiltering: { includeExtensions: ['TXT', '.Log'] } })
      );

      expect(config.fileFiltering).toEqual({
        includeExtensions: ['.txt', '.log'],
        excludePatterns: [],
        minFileSizeBytes: 0,
      });
    });

    it('should reject a missing tier requirement', () => {
      const config = baseConfig({
        tierRequirements: { '24h_to_12h': 250, '12h_to_6h': 500, '6h_to_3h': 1000 },
      });

      expect(() => parseCounterConfig(config)).toThrow('Missing tier requirements');
    });

    it('should reject an unknown tier requirement key', () => {
      const config = baseConfig({
        tierRequirements: {
          '24h_to_12h': 250,
          '12h_to_6h': 500,
          '6h_to_3h': 1000,
          '3h_to_2h': 2000,
          '24h_to_6h': 10,
        },
      });

      expect(() => parseCounterConfig(config)).toThrow('Unknown tier requirement keys');
    });

    it('should reject a non-positive requirement', () => {
      const config = baseConfig({
        tierRequirements: { '24h_to_12h': 0, '12h_to_6h': 500, '6h_to_3h': 1000, '3h_to_2h': 2000 },
      });

      expect(() => parseCounterConfig(config)).toThrow(ConfigurationError);
    });

    it('should reject a device without any production start date', () => {
      const config = baseConfig({ productionStartDate: undefined });

      expect(() => parseCounterConfig(config)).toThrow('Device DEV-1 has no production start date');
    });

    it('should reject an unknown tier name', () => {
      const config = baseConfig({ devices: { 'DEV-1': { currentTier: '1h' } } });

      expect(() => parseCounterConfig(config)).toThrow(ConfigurationError);
    });
  });

  describe('parseCounterConfigText', () => {
    it('should accept JSON5 with comments and unquoted keys', () => {
      const text = `
        // production floor
        {
          scanPath: '/data/production',
          productionStartDate: '2026-03-01T00:00:00Z',
          devices: { 'DEV-9': { enabled: false } },
          tierRequirements: { '24h_to_12h': 1, '12h_to_6h': 2, '6h_to_3h': 3, '3h_to_2h': 4 },
          approval: { rejectionPolicy: 'reset', approvalUrl: 'http://localhost:3000/approvals' },
        }
      `;

      const config = parseCounterConfigText(text);

      expect(config.devices[0].id).toBe('DEV-9');
      expect(config.devices[0].enabled).toBe(false);
      expect(config.rules.rejectionPolicy).toBe('reset');
      expect(config.approvalUrl).toBe('http://localhost:3000/approvals');
    });

    it('should report text that is not JSON5', () => {
      expect(() => parseCounterConfigText('{ scanPath: ', 'broken.json5')).toThrow(
        'Counter configuration broken.json5 is not valid JSON5'
      );
    });
  });
});
