/**
 * Per-scan rollup index.
 *
 * Scan metadata changes through `upsertOnRecordArrival`, plus the two
 * updates that add what is learned later (an exact record count, decoded
 * sweep timing). Callers serialize all three per scan (see RecordCache);
 * reads are synchronous against the in-memory mirror.
 */

import type { KeyValueStore } from './kvStore';
import { decodeScanEntry, encodeScanMetadata } from './codec';
import { computeState, isForwardTransition } from './completeness';
import { errorMessage } from './errors';
import {
  mergeTimeRanges,
  rangesOverlap,
  scanStorageKey,
  type RecordKey,
  type ScanKey,
  type TimeRange,
} from './keys';
import type { RecordIndex } from './recordIndex';
import { emptyScanMetadata, type ScanMetadata, type VolumeTiming } from './types';

export const SCAN_INDEX_NAMESPACE = 'scan_index';

/** Nominal volume duration, used when a scan only has a single time. */
export const NOMINAL_SCAN_DURATION_MS = 5 * 60 * 1000;
export const DEFAULT_AVAILABILITY_GAP_MS = 15 * 60 * 1000;

export interface RecordArrival {
  recordId: number;
  hasVcp: boolean;
  recordTime: number;
  sizeBytes: number;
  /** Replaces any count already held */
  expectedRecords?: number;
  vcpPattern?: number;
  fileName?: string;
}

function cloneScan(meta: ScanMetadata): ScanMetadata {
  const copy = { ...meta, presentRecords: [...meta.presentRecords] };
  if (meta.sweeps) copy.sweeps = meta.sweeps.map((sweep) => ({ ...sweep }));
  return copy;
}

export class ScanIndex {
  private scans = new Map<string, ScanMetadata>();
  /** scan storage key → legacy id still holding the v1 entry */
  private legacy = new Map<string, string>();

  private kv: KeyValueStore;
  private now: () => number;

  constructor(kv: KeyValueStore, now: () => number = Date.now) {
    this.kv = kv;
    this.now = now;
  }

  /**
   * Load persisted rollups. Must run after the record index has loaded:
   * legacy entries rebuild their present set from it.
   */
  async load(records: RecordIndex): Promise<void> {
    this.scans.clear();
    this.legacy.clear();

    const ids = await this.kv.list(SCAN_INDEX_NAMESPACE);
    for (const id of ids) {
      const bytes = await this.kv.get(SCAN_INDEX_NAMESPACE, id);
      if (!bytes) continue;
      try {
        const entry = decodeScanEntry(id, bytes);
        const meta = entry.meta;
        if (entry.version === 1) {
          meta.presentRecords = records.listByScan(meta.key).map((r) => r.key.recordId);
          meta.hasVcp = meta.hasVcp || meta.presentRecords.includes(0);
          meta.completeness = computeState(meta);
          if (meta.presentRecords.length !== entry.presentCount) {
            console.warn(
              `[ScanIndex] Legacy entry ${id} claimed ${entry.presentCount} records, found ${meta.presentRecords.length}`,
            );
          }
          this.legacy.set(scanStorageKey(meta.key), entry.legacyId);
        }
        this.scans.set(scanStorageKey(meta.key), meta);
      } catch (err) {
        console.warn(`[ScanIndex] Skipping unreadable entry ${id}:`, errorMessage(err));
      }
    }
  }

  /**
   * Always returns an entry; unknown scans come back as `Missing`.
   */
  get(key: ScanKey): ScanMetadata {
    const meta = this.scans.get(scanStorageKey(key));
    return meta ? cloneScan(meta) : emptyScanMetadata(key);
  }

  has(key: ScanKey): boolean {
    return this.scans.has(scanStorageKey(key));
  }

  /** True once the record is part of its scan's present set. */
  hasRecord(key: RecordKey): boolean {
    return this.scans.get(scanStorageKey(key.scan))?.presentRecords.includes(key.recordId) ?? false;
  }

  async upsertOnRecordArrival(key: ScanKey, arrival: RecordArrival): Promise<ScanMetadata> {
    const id = scanStorageKey(key);
    const previous = this.scans.get(id) ?? emptyScanMetadata(key);
    const isNewRecord = !previous.presentRecords.includes(arrival.recordId);

    const next: ScanMetadata = cloneScan(previous);
    if (isNewRecord) {
      next.presentRecords = [...previous.presentRecords, arrival.recordId].sort((a, b) => a - b);
      next.totalSizeBytes += arrival.sizeBytes;
    }
    next.hasVcp = previous.hasVcp || arrival.hasVcp;
    next.expectedRecords = arrival.expectedRecords ?? previous.expectedRecords;
    next.vcpPattern = previous.vcpPattern ?? arrival.vcpPattern;
    next.fileName = previous.fileName ?? arrival.fileName;
    if (previous.presentRecords.length === 0) {
      next.firstTime = arrival.recordTime;
      next.lastTime = arrival.recordTime;
    } else {
      next.firstTime = Math.min(previous.firstTime, arrival.recordTime);
      next.lastTime = Math.max(previous.lastTime, arrival.recordTime);
    }
    return this.commit(previous, next);
  }

  /**
   * Set the exact record count of a scan already indexed, e.g. from a whole
   * archive file covering records that arrived live. Returns undefined for
   * an unknown scan.
   */
  async setExpectedRecords(key: ScanKey, expectedRecords: number): Promise<ScanMetadata | undefined> {
    const previous = this.scans.get(scanStorageKey(key));
    if (!previous) return undefined;
    const next = cloneScan(previous);
    next.expectedRecords = expectedRecords;
    return this.commit(previous, next);
  }

  /**
   * Store the sweep timing read from a decoded volume. Returns undefined
   * for an unknown scan.
   */
  async setVolumeTiming(key: ScanKey, timing: VolumeTiming): Promise<ScanMetadata | undefined> {
    const previous = this.scans.get(scanStorageKey(key));
    if (!previous) return undefined;
    const next = cloneScan(previous);
    next.endTime = timing.endTime;
    next.sweeps = timing.sweeps.map((sweep) => ({ ...sweep }));
    return this.commit(previous, next);
  }

  /**
   * Rewrite a legacy entry in the current schema. No-op for current entries.
   */
  async upgradeIfLegacy(key: ScanKey): Promise<boolean> {
    const id = scanStorageKey(key);
    const meta = this.scans.get(id);
    if (!meta || !this.legacy.has(id)) return false;
    await this.persist(meta);
    return true;
  }

  isLegacy(key: ScanKey): boolean {
    return this.legacy.has(scanStorageKey(key));
  }

  /**
   * Scans whose [firstTime, lastTime] span overlaps [start, end], ordered by
   * scan start.
   */
  queryRange(start: number, end: number, site?: string): ScanMetadata[] {
    const range = { start, end };
    const hits: ScanMetadata[] = [];
    for (const meta of this.scans.values()) {
      if (site !== undefined && meta.key.site !== site) continue;
      if (meta.presentRecords.length === 0) continue;
      if (!rangesOverlap(range, { start: meta.firstTime, end: meta.lastTime })) continue;
      hits.push(cloneScan(meta));
    }
    return hits.sort((a, b) => a.key.scanStart - b.key.scanStart);
  }

  /**
   * Merged availability bands for the timeline.
   */
  availability(site: string, start: number, end: number, gapMs = DEFAULT_AVAILABILITY_GAP_MS): TimeRange[] {
    const spans = this.queryRange(start, end, site).map((meta) => ({
      start: meta.firstTime,
      end: meta.lastTime > meta.firstTime ? meta.lastTime : meta.firstTime + NOMINAL_SCAN_DURATION_MS,
    }));
    return mergeTimeRanges(spans, gapMs);
  }

  async delete(key: ScanKey): Promise<boolean> {
    const id = scanStorageKey(key);
    const existed = this.scans.delete(id);
    const legacyId = this.legacy.get(id);
    if (legacyId) {
      await this.kv.delete(SCAN_INDEX_NAMESPACE, legacyId);
      this.legacy.delete(id);
    }
    await this.kv.delete(SCAN_INDEX_NAMESPACE, id);
    return existed;
  }

  all(): ScanMetadata[] {
    return [...this.scans.values()].map(cloneScan);
  }

  totalSizeBytes(): number {
    let total = 0;
    for (const meta of this.scans.values()) total += meta.totalSizeBytes;
    return total;
  }

  get size(): number {
    return this.scans.size;
  }

  clear(): void {
    this.scans.clear();
    this.legacy.clear();
  }

  // ── Private ────────────────────────────────────────────────────────

  /** Apply the forward-only completeness rule, then persist. */
  private async commit(previous: ScanMetadata, next: ScanMetadata): Promise<ScanMetadata> {
    next.updatedAt = this.now();
    const state = computeState(next);
    if (isForwardTransition(previous.completeness, state)) {
      next.completeness = state;
    } else {
      console.warn(
        `[ScanIndex] Refusing completeness regression ${previous.completeness} → ${state} for ${scanStorageKey(next.key)}`,
      );
      next.completeness = previous.completeness;
    }
    await this.persist(next);
    return cloneScan(next);
  }

  private async persist(meta: ScanMetadata): Promise<void> {
    const id = scanStorageKey(meta.key);
    await this.kv.put(SCAN_INDEX_NAMESPACE, id, encodeScanMetadata(meta));
    const legacyId = this.legacy.get(id);
    if (legacyId) {
      await this.kv.delete(SCAN_INDEX_NAMESPACE, legacyId);
      this.legacy.delete(id);
      console.info(`[ScanIndex] Upgraded legacy entry ${legacyId} → ${id}`);
    }
    this.scans.set(id, meta);
  }
}
