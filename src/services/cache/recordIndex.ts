import type { KeyValueStore } from './kvStore';
import { decodeRecordMetadata, encodeRecordMetadata } from './codec';
import { errorMessage } from './errors';
import { recordStorageKey, scanStorageKey, type RecordKey, type ScanKey } from './keys';
import type { RecordMetadata } from './types';

export const RECORD_INDEX_NAMESPACE = 'record_index';

/**
 * Per-record metadata. Held in memory for synchronous lookups and written
 * through to the key-value store on every change.
 */
export class RecordIndex {
  /** scan storage key → recordId → metadata */
  private byScan = new Map<string, Map<number, RecordMetadata>>();

  private kv: KeyValueStore;

  constructor(kv: KeyValueStore) {
    this.kv = kv;
  }

  /**
   * Load the persisted index into memory. Corrupt entries are skipped.
   */
  async load(): Promise<void> {
    this.byScan.clear();
    const ids = await this.kv.list(RECORD_INDEX_NAMESPACE);
    for (const id of ids) {
      const bytes = await this.kv.get(RECORD_INDEX_NAMESPACE, id);
      if (!bytes) continue;
      try {
        this.insert(decodeRecordMetadata(id, bytes));
      } catch (err) {
        console.warn(`[RecordIndex] Skipping unreadable entry ${id}:`, errorMessage(err));
      }
    }
  }

  async put(meta: RecordMetadata): Promise<void> {
    await this.kv.put(RECORD_INDEX_NAMESPACE, recordStorageKey(meta.key), encodeRecordMetadata(meta));
    this.insert(meta);
  }

  get(key: RecordKey): RecordMetadata | undefined {
    return this.byScan.get(scanStorageKey(key.scan))?.get(key.recordId);
  }

  has(key: RecordKey): boolean {
    return this.get(key) !== undefined;
  }

  /** Ordered by recordId ascending. */
  listByScan(scan: ScanKey): RecordMetadata[] {
    const records = this.byScan.get(scanStorageKey(scan));
    if (!records) return [];
    return [...records.values()].sort((a, b) => a.key.recordId - b.key.recordId);
  }

  /**
   * Records of one site whose record time falls within [start, end],
   * ordered by (scanStart, recordId).
   */
  queryByTime(site: string, start: number, end: number, limit = Infinity): RecordMetadata[] {
    const hits: RecordMetadata[] = [];
    for (const records of this.byScan.values()) {
      for (const meta of records.values()) {
        if (meta.key.scan.site !== site) continue;
        if (meta.recordTime < start || meta.recordTime > end) continue;
        hits.push(meta);
      }
    }
    hits.sort((a, b) =>
      a.key.scan.scanStart - b.key.scan.scanStart || a.key.recordId - b.key.recordId);
    return hits.slice(0, limit);
  }

  async delete(key: RecordKey): Promise<boolean> {
    await this.kv.delete(RECORD_INDEX_NAMESPACE, recordStorageKey(key));
    const scanId = scanStorageKey(key.scan);
    const records = this.byScan.get(scanId);
    const existed = records?.delete(key.recordId) ?? false;
    if (records?.size === 0) this.byScan.delete(scanId);
    return existed;
  }

  /** Returns the number of entries removed. */
  async deleteScan(scan: ScanKey): Promise<number> {
    const scanId = scanStorageKey(scan);
    const records = this.byScan.get(scanId);
    if (!records) return 0;
    for (const meta of records.values()) {
      await this.kv.delete(RECORD_INDEX_NAMESPACE, recordStorageKey(meta.key));
    }
    this.byScan.delete(scanId);
    return records.size;
  }

  clear(): void {
    this.byScan.clear();
  }

  // ── Private ────────────────────────────────────────────────────────

  private insert(meta: RecordMetadata): void {
    const scanId = scanStorageKey(meta.key.scan);
    let records = this.byScan.get(scanId);
    if (!records) {
      records = new Map();
      this.byScan.set(scanId, records);
    }
    records.set(meta.key.recordId, meta);
  }
}
