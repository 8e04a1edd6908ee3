import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('should fill in defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      COUNTER_CONFIG_PATH: './config/counter.json5',
      SQLITE_DB_PATH: './data/burnin.db',
      LOG_LEVEL: 'info',
      SCAN_INTERVAL_MINUTES: 60,
      SCAN_DIRECTORY_TIMEOUT_MS: 30000,
      SCAN_CONCURRENCY: 1,
      STALE_VERSION_MAX_ATTEMPTS: 5,
    });
  });

  it('should coerce numbers and treat an empty webhook URL as unset', () => {
    const env = parseEnv({
      SCAN_INTERVAL_MINUTES: '0',
      SCAN_CONCURRENCY: '4',
      NOTIFICATION_WEBHOOK_URL: '',
    });

    expect(env.SCAN_INTERVAL_MINUTES).toBe(0);
    expect(env.SCAN_CONCURRENCY).toBe(4);
    expect(env.NOTIFICATION_WEBHOOK_URL).toBeUndefined();
  });

  it('should reject invalid values', () => {
    expect(() => parseEnv({ SCAN_CONCURRENCY: '0' })).toThrow(ZodError);
    expect(() => parseEnv({ NOTIFICATION_WEBHOOK_URL: 'not a url' })).toThrow(ZodError);
    expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });
});
