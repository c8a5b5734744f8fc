/**
 * Scan-granular LRU eviction.
 *
 * Last-used times are persisted under the `access` namespace so LRU order
 * survives restarts. Scans never touched fall back to their last update time.
 * Eviction always removes a whole scan; partial scans are never left behind.
 */

import type { KeyValueStore } from './kvStore';
import { decodeAccess, encodeAccess } from './codec';
import { errorMessage, StorageQuotaExceededError } from './errors';
import { parseScanStorageKey, sameScan, scanStorageKey, type ScanKey } from './keys';
import type { RecordCache } from './recordCache';

export const ACCESS_NAMESPACE = 'access';

export interface EvictionOptions {
  budgetBytes: number;
  now?: () => number;
}

export class EvictionManager {
  private cache: RecordCache;
  private kv: KeyValueStore;
  private budgetBytes: number;
  private now: () => number;
  private lastUsed = new Map<string, number>();
  private pins = new Map<string, number>();

  constructor(cache: RecordCache, kv: KeyValueStore, options: EvictionOptions) {
    this.cache = cache;
    this.kv = kv;
    this.budgetBytes = options.budgetBytes;
    this.now = options.now ?? Date.now;
  }

  async load(): Promise<void> {
    this.lastUsed.clear();
    for (const id of await this.kv.list(ACCESS_NAMESPACE)) {
      const bytes = await this.kv.get(ACCESS_NAMESPACE, id);
      if (!bytes || !parseScanStorageKey(id)) continue;
      try {
        this.lastUsed.set(id, decodeAccess(id, bytes));
      } catch (err) {
        console.warn(`[Eviction] Dropping unreadable access entry ${id}:`, errorMessage(err));
      }
    }
  }

  get budget(): number {
    return this.budgetBytes;
  }

  /**
   * Mark a scan as used now. Called on assembly and on index reads.
   */
  async touch(key: ScanKey): Promise<void> {
    const id = scanStorageKey(key);
    const t = this.now();
    this.lastUsed.set(id, t);
    await this.kv.put(ACCESS_NAMESPACE, id, encodeAccess(t));
  }

  lastUsedAt(key: ScanKey): number {
    return this.lastUsed.get(scanStorageKey(key)) ?? this.cache.getScan(key).updatedAt;
  }

  /**
   * Keep a scan from being evicted until the returned release is called.
   */
  pin(key: ScanKey): () => void {
    const id = scanStorageKey(key);
    this.pins.set(id, (this.pins.get(id) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const count = (this.pins.get(id) ?? 1) - 1;
      if (count <= 0) this.pins.delete(id);
      else this.pins.set(id, count);
    };
  }

  /** Least recently used first. */
  lruOrder(): ScanKey[] {
    return this.cache.scanIndex
      .all()
      .map((meta) => ({ key: meta.key, used: this.lastUsedAt(meta.key) }))
      .sort((a, b) => a.used - b.used || a.key.scanStart - b.key.scanStart)
      .map((entry) => entry.key);
  }

  /**
   * Evict least recently used scans until the cache holds at most
   * `targetBytes`. Pinned, protected and busy scans are skipped.
   */
  async evictToSize(targetBytes: number, protect: ScanKey[] = []): Promise<ScanKey[]> {
    const evicted: ScanKey[] = [];
    for (const key of this.lruOrder()) {
      if (this.cache.totalSizeBytes() <= targetBytes) break;
      if (protect.some((p) => sameScan(p, key))) continue;
      if (this.pins.has(scanStorageKey(key)) || this.cache.isBusy(key)) continue;

      const bytes = this.cache.getScan(key).totalSizeBytes;
      await this.cache.deleteScan(key);
      await this.forget(key);
      evicted.push(key);
      console.info(`[Eviction] Evicted ${scanStorageKey(key)} (${bytes} bytes)`);
    }
    return evicted;
  }

  /** Bring the cache back under its budget. */
  async enforceBudget(protect: ScanKey[] = []): Promise<ScanKey[]> {
    return this.evictToSize(this.budgetBytes, protect);
  }

  /**
   * Evict down to `targetBytes` only once usage has passed `quotaBytes`.
   */
  async checkAndEvict(quotaBytes: number, targetBytes: number): Promise<ScanKey[]> {
    if (this.cache.totalSizeBytes() <= quotaBytes) return [];
    return this.evictToSize(targetBytes);
  }

  /**
   * Make room for `bytes` more in `scan`. Evicts other scans as needed and
   * throws StorageQuotaExceededError if the write still would not fit.
   */
  async reserve(scan: ScanKey, bytes: number): Promise<void> {
    if (this.cache.totalSizeBytes() + bytes <= this.budgetBytes) return;

    await this.evictToSize(Math.max(0, this.budgetBytes - bytes), [scan]);
    const required = this.cache.totalSizeBytes() + bytes;
    if (required > this.budgetBytes) {
      throw new StorageQuotaExceededError(required, this.budgetBytes);
    }
  }

  async clearAll(): Promise<void> {
    await this.cache.clearAll();
    this.lastUsed.clear();
  }

  // ── Private ────────────────────────────────────────────────────────

  private async forget(key: ScanKey): Promise<void> {
    const id = scanStorageKey(key);
    this.lastUsed.delete(id);
    await this.kv.delete(ACCESS_NAMESPACE, id);
  }
}
