/**
 * @file Tests for environment configuration
 */

import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      fusion: { intervalMs: 200, holdStaleSamples: true },
      history: { size: 1000 },
      responses: { tickMs: 500, sensitivity: 0.7, queueSize: 10 },
      session: { durationSeconds: 1200 },
      notifications: { guardianCooldownSeconds: 600 },
      mongo: { uri: undefined, dbName: 'affect_fusion' },
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      FUSION_INTERVAL_MS: '100',
      FUSION_HOLD_STALE_SAMPLES: 'false',
      RESPONSE_SENSITIVITY: '0.4',
      SESSION_DURATION_SECONDS: '600',
      MONGODB_URI: 'mongodb://localhost:27017',
      MONGODB_DB: 'test_db',
    });

    expect(config.fusion).toEqual({ intervalMs: 100, holdStaleSamples: false });
    expect(config.responses.sensitivity).toBe(0.4);
    expect(config.session.durationSeconds).toBe(600);
    expect(config.mongo).toEqual({ uri: 'mongodb://localhost:27017', dbName: 'test_db' });
  });

  it('should treat "0" as false', () => {
    expect(loadConfig({ FUSION_HOLD_STALE_SAMPLES: '0' }).fusion.holdStaleSamples).toBe(false);
    expect(loadConfig({ FUSION_HOLD_STALE_SAMPLES: 'yes' }).fusion.holdStaleSamples).toBe(true);
  });

  it('should fall back on malformed or out-of-range numbers', () => {
    const config = loadConfig({
      FUSION_INTERVAL_MS: 'fast',
      RESPONSE_SENSITIVITY: '1.5',
      STATE_HISTORY_SIZE: '0',
      GUARDIAN_COOLDOWN_SECONDS: '-5',
    });

    expect(config.fusion.intervalMs).toBe(200);
    expect(config.responses.sensitivity).toBe(0.7);
    expect(config.history.size).toBe(1000);
    expect(config.notifications.guardianCooldownSeconds).toBe(600);
  });
});
