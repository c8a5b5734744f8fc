/**
 * The record cache: record store, record index and scan index as one owned
 * unit.
 *
 * Everything that writes goes through here so the three stay consistent:
 * - record writes and scan deletions for the same scan are serialized with a
 *   per-scan lock (no global lock)
 * - a record's bytes are stored before its metadata, and its metadata before
 *   the scan rollup, so the index never points at bytes that do not exist.
 *   A record counts as stored once the rollup lists it; a write that fails
 *   before then is rolled back so a retry starts clean
 * - listeners hear about every scan change after it is persisted
 *
 * One instance is constructed per engine and injected into the scheduler,
 * assembler and eviction manager.
 */

import type { KeyValueStore } from './kvStore';
import { DEFAULT_RADIALS_PER_RECORD, deriveExpectedRecords, type VcpProbe } from './completeness';
import { errorMessage } from './errors';
import { makeRecordKey, recordStorageKey, scanStorageKey, type RecordKey, type ScanKey } from './keys';
import { RecordIndex } from './recordIndex';
import { RecordStore, type PutOutcome } from './recordStore';
import { ScanIndex } from './scanIndex';
import { KeyedLock } from './scanLocks';
import type { RecordMetadata, ScanMetadata, VolumeTiming } from './types';

export interface StoreRecordOptions {
  /** Record time (UTC ms). Defaults to the scan start. */
  recordTime?: number;
  /**
   * Exact total record count, e.g. from splitting a whole archive file.
   * Applied to the scan even when this record is already stored.
   */
  expectedRecords?: number;
  fileName?: string;
}

export interface StoreRecordResult {
  outcome: PutOutcome;
  scan: ScanMetadata;
}

/**
 * Runs before a record write, outside any scan lock. Throwing aborts the
 * write (e.g. StorageQuotaExceededError).
 */
export type WriteGuard = (scan: ScanKey, bytes: number) => Promise<void>;

export type RecordCacheEvent =
  | { type: 'record-stored'; key: RecordKey; scan: ScanMetadata }
  /** Metadata learned after the records: an exact count or sweep timing */
  | { type: 'scan-updated'; scan: ScanMetadata }
  | { type: 'scan-deleted'; key: ScanKey; recordsRemoved: number };

export type RecordCacheListener = (event: RecordCacheEvent) => void;

export interface RecordCacheOptions {
  /** Reads the VCP out of record 0 to derive the expected record count */
  probe?: VcpProbe;
  radialsPerRecord?: number;
  now?: () => number;
}

export class RecordCache {
  private kv: KeyValueStore;
  private store: RecordStore;
  private records: RecordIndex;
  private scans: ScanIndex;
  private locks = new KeyedLock();
  private listeners = new Set<RecordCacheListener>();
  private writeGuard: WriteGuard | null = null;
  private probe: VcpProbe | undefined;
  private radialsPerRecord: number;
  private now: () => number;
  private opened = false;

  constructor(kv: KeyValueStore, options: RecordCacheOptions = {}) {
    this.kv = kv;
    this.now = options.now ?? Date.now;
    this.probe = options.probe;
    this.radialsPerRecord = options.radialsPerRecord ?? DEFAULT_RADIALS_PER_RECORD;
    this.store = new RecordStore(kv);
    this.records = new RecordIndex(kv);
    this.scans = new ScanIndex(kv, this.now);
  }

  /**
   * Load both indexes into memory. Idempotent.
   */
  async open(): Promise<void> {
    if (this.opened) return;
    await this.records.load();
    await this.scans.load(this.records);
    this.opened = true;
    console.info(
      `[RecordCache] Opened: ${this.scans.size} scans, ${this.scans.totalSizeBytes()} bytes`,
    );
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get scanIndex(): ScanIndex {
    return this.scans;
  }

  get recordIndex(): RecordIndex {
    return this.records;
  }

  setWriteGuard(guard: WriteGuard | null): void {
    this.writeGuard = guard;
  }

  subscribe(listener: RecordCacheListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  /**
   * Persist one record and fold it into its scan's rollup. Storing a record
   * the rollup already lists is reported as `already-exists`; only an exact
   * record count passed with it is still applied.
   */
  async storeRecord(
    key: RecordKey,
    bytes: Uint8Array,
    options: StoreRecordOptions = {},
  ): Promise<StoreRecordResult> {
    this.assertOpen();
    const isNew = !this.scans.hasRecord(key);
    if (!isNew && !this.changesExpectedCount(key.scan, options.expectedRecords)) {
      return { outcome: 'already-exists', scan: this.scans.get(key.scan) };
    }

    if (isNew && this.writeGuard) {
      await this.writeGuard(key.scan, bytes.byteLength);
    }

    const result = await this.locks.runExclusive(scanStorageKey(key.scan), async () => {
      // Re-check under the lock: a concurrent writer may have won
      if (this.scans.hasRecord(key)) {
        return this.applyExpectedCount(key.scan, options.expectedRecords);
      }
      return { outcome: 'stored' as const, scan: await this.writeRecord(key, bytes, options), changed: true };
    });

    if (result.outcome === 'stored') {
      this.emit({ type: 'record-stored', key, scan: result.scan });
    } else if (result.changed) {
      this.emit({ type: 'scan-updated', scan: result.scan });
    }
    return { outcome: result.outcome, scan: result.scan };
  }

  /**
   * Persist the sweep timing of a decoded volume with its scan. Returns
   * false when the scan is no longer indexed.
   */
  async recordVolumeTiming(key: ScanKey, timing: VolumeTiming): Promise<boolean> {
    this.assertOpen();
    const scan = await this.locks.runExclusive(scanStorageKey(key), () => this.scans.setVolumeTiming(key, timing));
    if (!scan) return false;
    this.emit({ type: 'scan-updated', scan });
    return true;
  }

  async getRecord(key: RecordKey): Promise<Uint8Array | undefined> {
    return this.store.get(key);
  }

  /**
   * Stored bytes for every indexed record of a scan, ascending by id.
   * Records indexed but absent from the store are left out.
   */
  async getRecords(scan: ScanKey): Promise<{ recordId: number; bytes: Uint8Array }[]> {
    const out: { recordId: number; bytes: Uint8Array }[] = [];
    for (const meta of this.records.listByScan(scan)) {
      const bytes = await this.store.get(makeRecordKey(scan, meta.key.recordId));
      if (bytes) out.push({ recordId: meta.key.recordId, bytes });
    }
    return out;
  }

  getScan(key: ScanKey): ScanMetadata {
    return this.scans.get(key);
  }

  /**
   * Remove a scan completely: bytes, record metadata and rollup, in one step
   * under the scan's lock. Returns the number of records removed.
   */
  async deleteScan(key: ScanKey): Promise<number> {
    this.assertOpen();
    const removed = await this.locks.runExclusive(scanStorageKey(key), async () => {
      const count = await this.store.deleteScan(key);
      await this.records.deleteScan(key);
      await this.scans.delete(key);
      return count;
    });
    this.emit({ type: 'scan-deleted', key, recordsRemoved: removed });
    return removed;
  }

  /** True while a write or delete for the scan is in progress. */
  isBusy(key: ScanKey): boolean {
    return this.locks.isLocked(scanStorageKey(key));
  }

  totalSizeBytes(): number {
    return this.scans.totalSizeBytes();
  }

  async clearAll(): Promise<void> {
    await this.kv.clear();
    this.records.clear();
    this.scans.clear();
    console.info('[RecordCache] Cleared');
  }

  // ── Private ────────────────────────────────────────────────────────

  /** Caller holds the scan lock. */
  private async writeRecord(key: RecordKey, bytes: Uint8Array, options: StoreRecordOptions): Promise<ScanMetadata> {
    const hasVcp = key.recordId === 0;
    const meta: RecordMetadata = {
      key,
      recordTime: options.recordTime ?? key.scan.scanStart,
      sizeBytes: bytes.byteLength,
      hasVcp,
      storedAt: this.now(),
    };

    // A count read from the VCP only fills in an unknown one
    let expectedRecords = options.expectedRecords;
    let vcpPattern: number | undefined;
    if (hasVcp && this.probe) {
      const derived = this.deriveFromHeader(key, bytes, this.probe);
      if (derived) {
        if (this.scans.get(key.scan).expectedRecords === undefined) {
          expectedRecords = expectedRecords ?? derived.expectedRecords;
        }
        vcpPattern = derived.vcpPattern;
      }
    }

    let scan: ScanMetadata;
    try {
      // Orphaned bytes from an earlier failed write are kept (first write wins)
      await this.store.put(key, bytes);
      await this.records.put(meta);
      scan = await this.scans.upsertOnRecordArrival(key.scan, {
        recordId: key.recordId,
        hasVcp,
        recordTime: meta.recordTime,
        sizeBytes: meta.sizeBytes,
        expectedRecords,
        vcpPattern,
        fileName: options.fileName,
      });
    } catch (err) {
      await this.rollbackRecord(key, err);
      throw err;
    }
    console.debug(`[RecordCache] Stored ${recordStorageKey(key)} (${scan.completeness})`);
    return scan;
  }

  private async rollbackRecord(key: RecordKey, cause: unknown): Promise<void> {
    try {
      await this.records.delete(key);
      await this.store.delete(key);
    } catch (err) {
      console.error(
        `[RecordCache] Could not roll back ${recordStorageKey(key)} after "${errorMessage(cause)}":`,
        errorMessage(err),
      );
    }
  }

  private changesExpectedCount(scan: ScanKey, expectedRecords: number | undefined): boolean {
    return expectedRecords !== undefined && this.scans.get(scan).expectedRecords !== expectedRecords;
  }

  /** Caller holds the scan lock. */
  private async applyExpectedCount(
    key: ScanKey,
    expectedRecords: number | undefined,
  ): Promise<{ outcome: PutOutcome; scan: ScanMetadata; changed: boolean }> {
    if (expectedRecords !== undefined && this.changesExpectedCount(key, expectedRecords)) {
      const scan = await this.scans.setExpectedRecords(key, expectedRecords);
      if (scan) {
        console.debug(`[RecordCache] ${scanStorageKey(key)} expects ${expectedRecords} records (${scan.completeness})`);
        return { outcome: 'already-exists', scan, changed: true };
      }
    }
    return { outcome: 'already-exists', scan: this.scans.get(key), changed: false };
  }

  private deriveFromHeader(
    key: RecordKey,
    bytes: Uint8Array,
    probe: VcpProbe,
  ): { expectedRecords: number; vcpPattern: number } | undefined {
    try {
      return deriveExpectedRecords(bytes, probe, this.radialsPerRecord);
    } catch (err) {
      console.warn(`[RecordCache] Could not read VCP from ${recordStorageKey(key)}:`, errorMessage(err));
      return undefined;
    }
  }

  private emit(event: RecordCacheEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private assertOpen(): void {
    if (!this.opened) throw new Error('RecordCache is not open; call open() first');
  }
}
