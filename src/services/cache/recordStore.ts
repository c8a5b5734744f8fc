import type { KeyValueStore } from './kvStore';
import { recordStorageKey, scanStorageKey, type RecordKey, type ScanKey } from './keys';

export const RECORDS_NAMESPACE = 'records';

export type PutOutcome = 'stored' | 'already-exists';

/**
 * Raw compressed record blobs. First write wins: a second put for the same
 * key is reported as `already-exists` and leaves the stored bytes alone.
 */
export class RecordStore {
  private kv: KeyValueStore;

  constructor(kv: KeyValueStore) {
    this.kv = kv;
  }

  async put(key: RecordKey, bytes: Uint8Array): Promise<PutOutcome> {
    const stored = await this.kv.putIfAbsent(RECORDS_NAMESPACE, recordStorageKey(key), bytes);
    return stored ? 'stored' : 'already-exists';
  }

  async get(key: RecordKey): Promise<Uint8Array | undefined> {
    return (await this.kv.get(RECORDS_NAMESPACE, recordStorageKey(key))) ?? undefined;
  }

  async has(key: RecordKey): Promise<boolean> {
    return (await this.kv.get(RECORDS_NAMESPACE, recordStorageKey(key))) !== null;
  }

  async delete(key: RecordKey): Promise<void> {
    await this.kv.delete(RECORDS_NAMESPACE, recordStorageKey(key));
  }

  /**
   * Remove every record of a scan. Returns the number of records removed.
   */
  async deleteScan(scan: ScanKey): Promise<number> {
    const prefix = `${scanStorageKey(scan)}|`;
    const ids = (await this.kv.list(RECORDS_NAMESPACE)).filter((id) => id.startsWith(prefix));
    for (const id of ids) {
      await this.kv.delete(RECORDS_NAMESPACE, id);
    }
    return ids.length;
  }
}
