import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('should apply defaults', () => {
    const env = parseEnv({ HEALTH_API_URL: 'http://localhost:8080' });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      CACHE_DIR: './data/cache',
      HEALTH_QUERY_TIMEOUT_MS: 10000,
      HISTORY_WINDOW_DAYS: 70,
      AVERAGE_MAX_AGE_DAYS: 30,
      REFRESH_INTERVAL_MINUTES: 15,
      REFRESH_WINDOW_START_HOUR: 6,
      LOG_LEVEL: 'info',
    });
    expect(env.HEALTH_API_TOKEN).toBeUndefined();
  });

  it('should coerce numbers and treat empty optionals as unset', () => {
    const env = parseEnv({
      HEALTH_API_URL: 'http://localhost:8080',
      HEALTH_API_TOKEN: 'test-secret',
      PORT: '4100',
      REFRESH_INTERVAL_MINUTES: '30',
      NOTIFY_WEBHOOK_URL: '',
    });

    expect(env.PORT).toBe(4100);
    expect(env.REFRESH_INTERVAL_MINUTES).toBe(30);
    expect(env.HEALTH_API_TOKEN).toBe('test-secret');
    expect(env.NOTIFY_WEBHOOK_URL).toBeUndefined();
  });

  it('should require the health API URL', () => {
    expect(() => parseEnv({})).toThrow(ZodError);
  });

  it('should reject a refresh interval that cron cannot express', () => {
    expect(() =>
      parseEnv({ HEALTH_API_URL: 'http://localhost:8080', REFRESH_INTERVAL_MINUTES: '60' })
    ).toThrow(ZodError);
  });

  it('should reject an invalid webhook URL', () => {
    expect(() =>
      parseEnv({ HEALTH_API_URL: 'http://localhost:8080', NOTIFY_WEBHOOK_URL: 'not a url' })
    ).toThrow(ZodError);
  });
});
