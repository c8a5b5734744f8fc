import { describe, expect, it, vi } from 'vitest';
import { StorageError } from '../src/services/cache/errors';
import { makeRecordKey, makeScanKey } from '../src/services/cache/keys';
import { MemoryKeyValueStore } from '../src/services/cache/kvStore';
import { RecordCache, type RecordCacheEvent } from '../src/services/cache/recordCache';
import { SCAN_INDEX_NAMESPACE } from '../src/services/cache/scanIndex';
import { openCache, recordBytes, SCAN, SCAN_START, SITE, storeRecords } from './helpers';

/** Memory store whose next put into `failNamespace` throws. */
class FailingKeyValueStore extends MemoryKeyValueStore {
  failNamespace: string | null = null;

  async put(namespace: string, id: string, value: Uint8Array): Promise<void> {
    if (namespace === this.failNamespace) {
      this.failNamespace = null;
      throw new StorageError('disk full');
    }
    return super.put(namespace, id, value);
  }
}

async function openWithoutVcp(): Promise<RecordCache> {
  const cache = new RecordCache(new MemoryKeyValueStore(), { probe: () => undefined, now: () => SCAN_START });
  await cache.open();
  return cache;
}

async function storeArchive(cache: RecordCache, count: number): Promise<void> {
  for (let id = 0; id < count; id++) {
    await cache.storeRecord(makeRecordKey(SCAN, id), recordBytes(id), { expectedRecords: count });
  }
}

describe('RecordCache', () => {
  it('requires open() before writes', async () => {
    const cache = new RecordCache(new MemoryKeyValueStore());
    await expect(cache.storeRecord(makeRecordKey(SCAN, 0), recordBytes(0))).rejects.toThrow('not open');
  });

  it('stores a record once', async () => {
    const cache = await openCache();
    const key = makeRecordKey(SCAN, 1);

    const first = await cache.storeRecord(key, recordBytes(1));
    const second = await cache.storeRecord(key, new Uint8Array([9, 9]));

    expect(first.outcome).toBe('stored');
    expect(second.outcome).toBe('already-exists');
    expect(await cache.getRecord(key)).toEqual(recordBytes(1));
    expect(cache.getScan(SCAN).totalSizeBytes).toBe(4);
  });

  it('converges concurrent writers of the same record', async () => {
    const cache = await openCache();
    const key = makeRecordKey(SCAN, 2);
    const outcomes = await Promise.all([
      cache.storeRecord(key, recordBytes(2)),
      cache.storeRecord(key, recordBytes(2)),
    ]);
    expect(outcomes.map((o) => o.outcome).sort()).toEqual(['already-exists', 'stored']);
    expect(cache.getScan(SCAN).presentRecords).toEqual([2]);
  });

  it('tracks a scan from partial to complete', async () => {
    const cache = await openCache();

    await storeRecords(cache, SCAN, [0, 1, 2]);
    let scan = cache.getScan(SCAN);
    expect(scan.completeness).toBe('PartialWithVcp');
    expect(scan.presentRecords).toEqual([0, 1, 2]);
    expect(scan.expectedRecords).toBe(8);
    expect(scan.vcpPattern).toBe(215);

    await storeRecords(cache, SCAN, [3, 4, 5, 6, 7]);
    scan = cache.getScan(SCAN);
    expect(scan.completeness).toBe('Complete');
    expect(scan.totalSizeBytes).toBe(32);
  });

  it('is PartialNoVcp until record 0 arrives', async () => {
    const cache = await openCache();
    await storeRecords(cache, SCAN, [3, 1]);
    expect(cache.getScan(SCAN).completeness).toBe('PartialNoVcp');
    expect(cache.getScan(SCAN).expectedRecords).toBeUndefined();

    await storeRecords(cache, SCAN, [0]);
    expect(cache.getScan(SCAN).completeness).toBe('PartialWithVcp');
    expect(cache.getScan(SCAN).expectedRecords).toBe(8);
  });

  it('returns records in ascending order regardless of arrival', async () => {
    const cache = await openCache();
    await storeRecords(cache, SCAN, [0, 2, 1, 3]);

    expect(cache.getScan(SCAN).presentRecords).toEqual([0, 1, 2, 3]);
    const records = await cache.getRecords(SCAN);
    expect(records.map((r) => r.recordId)).toEqual([0, 1, 2, 3]);
  });

  it('widens time bounds with record times', async () => {
    const cache = await openCache();
    await cache.storeRecord(makeRecordKey(SCAN, 1), recordBytes(1), { recordTime: SCAN_START + 60_000 });
    await cache.storeRecord(makeRecordKey(SCAN, 2), recordBytes(2), { recordTime: SCAN_START + 20_000 });
    const scan = cache.getScan(SCAN);
    expect(scan.firstTime).toBe(SCAN_START + 20_000);
    expect(scan.lastTime).toBe(SCAN_START + 60_000);
  });

  it('uses an explicit expected count from a whole archive file', async () => {
    const cache = await openCache();
    await cache.storeRecord(makeRecordKey(SCAN, 0), recordBytes(0), { expectedRecords: 2, fileName: 'KDMX/a' });
    await cache.storeRecord(makeRecordKey(SCAN, 1), recordBytes(1), { expectedRecords: 2 });
    const scan = cache.getScan(SCAN);
    expect(scan.expectedRecords).toBe(2);
    expect(scan.completeness).toBe('Complete');
    expect(scan.fileName).toBe('KDMX/a');
  });

  it('completes a scan fed live once the archive file arrives', async () => {
    const cache = await openWithoutVcp();
    const events: RecordCacheEvent['type'][] = [];
    await storeRecords(cache, SCAN, [0]);
    expect(cache.getScan(SCAN)).toMatchObject({ completeness: 'PartialWithVcp', expectedRecords: undefined });

    cache.subscribe((event) => events.push(event.type));
    await storeArchive(cache, 8);

    expect(cache.getScan(SCAN)).toMatchObject({
      completeness: 'Complete',
      expectedRecords: 8,
      presentRecords: [0, 1, 2, 3, 4, 5, 6, 7],
    });
    expect(events).toEqual(['scan-updated', ...Array<string>(7).fill('record-stored')]);
  });

  it('prefers the archive file\'s record count over the VCP estimate', async () => {
    const cache = await openCache();
    await storeRecords(cache, SCAN, [0]);
    expect(cache.getScan(SCAN).expectedRecords).toBe(8);

    const result = await cache.storeRecord(makeRecordKey(SCAN, 0), recordBytes(0), { expectedRecords: 3 });
    expect(result.outcome).toBe('already-exists');
    expect(result.scan.expectedRecords).toBe(3);

    await storeArchive(cache, 3);
    expect(cache.getScan(SCAN).completeness).toBe('Complete');
  });

  it('rolls back a record whose scan rollup could not be written', async () => {
    const kv = new FailingKeyValueStore();
    const cache = await openCache(kv);
    const key = makeRecordKey(SCAN, 0);

    kv.failNamespace = SCAN_INDEX_NAMESPACE;
    await expect(cache.storeRecord(key, recordBytes(0))).rejects.toThrow('disk full');
    expect(cache.recordIndex.listByScan(SCAN)).toEqual([]);
    expect(await cache.getRecord(key)).toBeUndefined();
    expect(cache.getScan(SCAN).completeness).toBe('Missing');

    const retry = await cache.storeRecord(key, recordBytes(0));
    expect(retry.outcome).toBe('stored');
    expect(retry.scan.presentRecords).toEqual([0]);
    expect((await openCache(kv)).getScan(SCAN).presentRecords).toEqual([0]);
  });

  it('stores a record its scan does not list yet, even if already indexed', async () => {
    const cache = await openCache();
    const key = makeRecordKey(SCAN, 1);
    await cache.recordIndex.put({ key, recordTime: SCAN_START, sizeBytes: 4, hasVcp: false, storedAt: 0 });

    const result = await cache.storeRecord(key, recordBytes(1));
    expect(result.outcome).toBe('stored');
    expect(result.scan.presentRecords).toEqual([1]);
  });

  it('keeps decoded sweep timing with the scan', async () => {
    const kv = new MemoryKeyValueStore();
    const cache = await openCache(kv);
    await storeRecords(cache, SCAN, [0]);
    const timing = {
      endTime: SCAN_START + 270_000,
      sweeps: [{ elevationNumber: 1, elevation: 0.5, startTime: SCAN_START, endTime: SCAN_START + 20_000 }],
    };

    expect(await cache.recordVolumeTiming(SCAN, timing)).toBe(true);
    expect(await cache.recordVolumeTiming(makeScanKey(SITE, 1000), timing)).toBe(false);
    expect((await openCache(kv)).getScan(SCAN)).toMatchObject({ ...timing, presentRecords: [0] });
  });

  it('survives a restart over the same store', async () => {
    const kv = new MemoryKeyValueStore();
    await storeRecords(await openCache(kv), SCAN, [0, 1, 2]);

    const reopened = await openCache(kv);
    expect(reopened.getScan(SCAN).presentRecords).toEqual([0, 1, 2]);
    expect(reopened.getScan(SCAN).completeness).toBe('PartialWithVcp');
    expect(reopened.recordIndex.listByScan(SCAN)).toHaveLength(3);
  });

  it('deletes a whole scan', async () => {
    const cache = await openCache();
    await storeRecords(cache, SCAN, [0, 1, 2]);

    expect(await cache.deleteScan(SCAN)).toBe(3);
    expect(cache.getScan(SCAN).completeness).toBe('Missing');
    expect(await cache.getRecord(makeRecordKey(SCAN, 1))).toBeUndefined();
    expect(cache.totalSizeBytes()).toBe(0);
  });

  it('notifies listeners of stored records and deletions', async () => {
    const cache = await openCache();
    const events: RecordCacheEvent['type'][] = [];
    cache.subscribe((event) => events.push(event.type));

    await storeRecords(cache, SCAN, [0, 0]);
    await cache.deleteScan(SCAN);
    expect(events).toEqual(['record-stored', 'scan-deleted']);
  });

  it('runs the write guard before new records only', async () => {
    const cache = await openCache();
    const guard = vi.fn(async () => {});
    cache.setWriteGuard(guard);

    await storeRecords(cache, SCAN, [0, 0]);
    expect(guard).toHaveBeenCalledTimes(1);
    expect(guard).toHaveBeenCalledWith(SCAN, 4);
  });

  it('does not write when the guard throws', async () => {
    const cache = await openCache();
    cache.setWriteGuard(async () => {
      throw new Error('full');
    });
    await expect(storeRecords(cache, SCAN, [0])).rejects.toThrow('full');
    expect(cache.getScan(SCAN).completeness).toBe('Missing');
  });

  it('queries records by time per site', async () => {
    const cache = await openCache();
    const other = makeScanKey('KTLX', SCAN_START);
    await cache.storeRecord(makeRecordKey(SCAN, 1), recordBytes(1), { recordTime: SCAN_START + 1000 });
    await cache.storeRecord(makeRecordKey(SCAN, 0), recordBytes(0), { recordTime: SCAN_START });
    await cache.storeRecord(makeRecordKey(other, 0), recordBytes(0));

    const hits = cache.recordIndex.queryByTime(SITE, SCAN_START, SCAN_START + 5000, 10);
    expect(hits.map((m) => m.key.recordId)).toEqual([0, 1]);
  });
});
