import { ConfigInvalid } from '../errors';

export type AppConfig = {
  port: number;
  redisUrl: string; // "memory://" keeps everything in process
  eventGraceHours: number;
  manifestCacheSeconds: number;
  playlistFetchTimeoutMs: number;
  epgFetchTimeoutMs: number;
  disableSslVerify: boolean;
  rateLimitRequests: number;
  rateLimitWindowSeconds: number;
  staticDir: string;
  schedulerTimeZone: string;
  eventZonePreference?: string[];
  storeMaxRetries: number;
  storeRetryDelayMs: number;
};

type Env = Record<string, string | undefined>;

export function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

function envInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = (env[key] || '').trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new ConfigInvalid(`${key} must be an integer >= ${min}, got "${raw}"`, key);
  return n;
}

function envList(env: Env, key: string): string[] | undefined {
  const raw = (env[key] || '').trim();
  if (!raw) return undefined;
  const items = raw.split(',').map((s) => s.trim().toUpperCase()).filter(Boolean);
  return items.length ? items : undefined;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    port: envInt(env, 'PORT', 7000, 1),
    redisUrl: (env.REDIS_URL || 'redis://localhost:6379/0').trim(),
    eventGraceHours: envInt(env, 'EVENT_GRACE_HOURS', 4),
    manifestCacheSeconds: envInt(env, 'MANIFEST_CACHE_SECONDS', 300, 1),
    playlistFetchTimeoutMs: envInt(env, 'PLAYLIST_FETCH_TIMEOUT_MS', 10000, 1),
    epgFetchTimeoutMs: envInt(env, 'EPG_FETCH_TIMEOUT_MS', 30000, 1),
    disableSslVerify: envBool(env.DISABLE_SSL_VERIFY),
    rateLimitRequests: envInt(env, 'RATE_LIMIT_REQUESTS', 10, 1),
    rateLimitWindowSeconds: envInt(env, 'RATE_LIMIT_WINDOW_SECONDS', 3600, 1),
    staticDir: (env.STATIC_DIR || 'static').trim(),
    schedulerTimeZone: (env.SCHEDULER_TIMEZONE || 'UTC').trim(),
    eventZonePreference: envList(env, 'EVENT_ZONE_PREFERENCE'),
    storeMaxRetries: envInt(env, 'STORE_MAX_RETRIES', 3, 1),
    storeRetryDelayMs: envInt(env, 'STORE_RETRY_DELAY_MS', 200),
  };
}
