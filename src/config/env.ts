import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(PROJECT_ROOT, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'campuscoffee:'),
  },

  // ───── Review approval ─────
  approval: {
    minCount: optionalInt('APPROVAL_MIN_COUNT', 3),
  },

  // Users and POS are managed elsewhere; a seed file lets a standalone instance serve requests
  seedDataPath: optional('SEED_DATA_PATH', ''),
} as const;
