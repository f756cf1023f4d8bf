/**
 * @file Runtime configuration from environment variables.
 *
 * Every value has a default; a malformed number falls back to it with a warning.
 */

import { logger } from '../utils/logger';

export interface CoreConfig {
  fusion: {
    intervalMs: number;
    holdStaleSamples: boolean;
  };
  history: {
    size: number;
  };
  responses: {
    tickMs: number;
    sensitivity: number;
    queueSize: number;
  };
  session: {
    durationSeconds: number;
  };
  notifications: {
    guardianCooldownSeconds: number;
  };
  mongo: {
    uri?: string;
    dbName: string;
  };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    logger.warn({ key, value: raw, fallback }, 'Invalid numeric config value, using default');
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  return raw !== 'false' && raw !== '0';
}

export function loadConfig(env: Env = process.env): CoreConfig {
  return {
    fusion: {
      intervalMs: readNumber(env, 'FUSION_INTERVAL_MS', 200, 1),
      holdStaleSamples: readBoolean(env, 'FUSION_HOLD_STALE_SAMPLES', true),
    },
    history: {
      size: readNumber(env, 'STATE_HISTORY_SIZE', 1000, 1),
    },
    responses: {
      tickMs: readNumber(env, 'RESPONSE_TICK_MS', 500, 1),
      sensitivity: readNumber(env, 'RESPONSE_SENSITIVITY', 0.7, 0, 1),
      queueSize: readNumber(env, 'RESPONSE_QUEUE_SIZE', 10, 1),
    },
    session: {
      durationSeconds: readNumber(env, 'SESSION_DURATION_SECONDS', 1200, 1),
    },
    notifications: {
      guardianCooldownSeconds: readNumber(env, 'GUARDIAN_COOLDOWN_SECONDS', 600),
    },
    mongo: {
      uri: env.MONGODB_URI || undefined,
      dbName: env.MONGODB_DB || 'affect_fusion',
    },
  };
}
