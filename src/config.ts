import { DEFAULT_RADIALS_PER_RECORD } from './services/cache/completeness';
import { DEFAULT_CHUNK_POLL_MS } from './services/nexrad/chunkClient';
import { MAX_CONCURRENT_DOWNLOADS, TASK_HISTORY_LIMIT } from './services/nexrad/acquisitionScheduler';
import { MAX_RING_CAPACITY, MIN_RING_CAPACITY } from './services/nexrad/volumeRing';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './utils/backoff';

const MIB = 1024 * 1024;

export interface EngineConfig {
  /** Cache directory for the file-system store; null keeps everything in memory */
  cacheDir: string | null;
  budgetBytes: number;
  ringCapacity: number;
  maxConcurrentDownloads: number;
  decodeConcurrency: number;
  retry: RetryPolicy;
  radialsPerRecord: number;
  chunkPollIntervalMs: number;
  taskHistoryLimit: number;
  /** Decode the live scan after every Nth new record (0 disables) */
  livePartialDecodeEvery: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
  cacheDir: null,
  budgetBytes: 512 * MIB,
  ringCapacity: MAX_RING_CAPACITY,
  maxConcurrentDownloads: MAX_CONCURRENT_DOWNLOADS,
  decodeConcurrency: 2,
  retry: DEFAULT_RETRY_POLICY,
  radialsPerRecord: DEFAULT_RADIALS_PER_RECORD,
  chunkPollIntervalMs: DEFAULT_CHUNK_POLL_MS,
  taskHistoryLimit: TASK_HISTORY_LIMIT,
  livePartialDecodeEvery: 3,
};

function readPositiveInt(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number,
  check: (n: number) => boolean = () => true,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || !check(value)) {
    console.warn(`[Config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build a config from environment variables over the defaults:
 * RADAR_CACHE_DIR, RADAR_CACHE_BUDGET_MB, RADAR_CACHE_RING_SIZE and
 * RADAR_CACHE_MAX_DOWNLOADS.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  base: EngineConfig = DEFAULT_CONFIG,
): EngineConfig {
  const dir = env.RADAR_CACHE_DIR?.trim();
  return {
    ...base,
    cacheDir: dir ? dir : base.cacheDir,
    budgetBytes: readPositiveInt(env, 'RADAR_CACHE_BUDGET_MB', base.budgetBytes / MIB) * MIB,
    ringCapacity: readPositiveInt(
      env,
      'RADAR_CACHE_RING_SIZE',
      base.ringCapacity,
      (n) => n >= MIN_RING_CAPACITY && n <= MAX_RING_CAPACITY,
    ),
    maxConcurrentDownloads: readPositiveInt(env, 'RADAR_CACHE_MAX_DOWNLOADS', base.maxConcurrentDownloads),
  };
}
