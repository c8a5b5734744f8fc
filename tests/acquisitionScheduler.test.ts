import pako from 'pako';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NetworkFailureError, StorageQuotaExceededError } from '../src/services/cache/errors';
import { makeScanKey } from '../src/services/cache/keys';
import { MemoryKeyValueStore } from '../src/services/cache/kvStore';
import type { RecordCache } from '../src/services/cache/recordCache';
import { AcquisitionScheduler, type SchedulerOptions } from '../src/services/nexrad/acquisitionScheduler';
import { createSessionStore } from '../src/stores/sessionStore';
import { archiveFile, FakeArchive, NO_DELAY_RETRY, openCache, SCAN, SCAN_START, SITE, waitFor } from './helpers';

const FIVE_MIN = 300_000;
const KEY = `${SITE}/${SCAN_START}`;

describe('AcquisitionScheduler', () => {
  let cache: RecordCache;
  let archive: FakeArchive;

  const scheduler = (options: Partial<SchedulerOptions> = {}) =>
    new AcquisitionScheduler(cache, { archive, retry: NO_DELAY_RETRY, now: () => 5, ...options });

  const task = (s: AcquisitionScheduler, id: string) => s.taskStore.getState().tasks[id];

  beforeEach(async () => {
    cache = await openCache();
    archive = new FakeArchive();
  });

  it('downloads a volume and stores its records', async () => {
    archive.add(SCAN_START, archiveFile(3));
    const s = scheduler();

    const queued = await s.requestRange(SITE, SCAN_START - 1, SCAN_START + 1);
    expect(queued.map((t) => [t.id, t.state, t.fileName])).toEqual([['ar-1', 'Queued', KEY]]);

    await s.whenIdle();
    expect(cache.getScan(SCAN)).toMatchObject({
      completeness: 'Complete',
      expectedRecords: 3,
      presentRecords: [0, 1, 2],
    });
    expect(task(s, 'ar-1')).toMatchObject({ state: 'Completed', attempts: 1, recordsStored: 3, finishedAt: 5 });
  });

  it('unpacks gzip-compressed volumes', async () => {
    archive.add(SCAN_START, pako.gzip(archiveFile(2)));
    const s = scheduler();
    await s.requestRange(SITE, SCAN_START, SCAN_START);
    await s.whenIdle();
    expect(cache.getScan(SCAN).presentRecords).toEqual([0, 1]);
  });

  it('normalizes the site', async () => {
    const s = scheduler();
    await s.requestRange(' kdmx ', 0, 1);
    expect(s.requestedRange).toEqual({ site: 'KDMX', start: 0, end: 1 });
  });

  it('rejects a range ending before it starts', async () => {
    await expect(scheduler().requestRange(SITE, 10, 5)).rejects.toBeInstanceOf(RangeError);
  });

  it('counts requests and bytes in the session', async () => {
    archive.add(SCAN_START, archiveFile(3));
    const session = createSessionStore(new MemoryKeyValueStore());
    const s = scheduler({ session });

    await s.requestRange(SITE, SCAN_START, SCAN_START);
    await s.whenIdle();
    expect(session.getState().network).toEqual({ activeRequests: 0, totalRequests: 1, bytesDownloaded: 30 });
  });

  describe('deduplication', () => {
    it('skips scans already complete', async () => {
      archive.add(SCAN_START, archiveFile(3));
      const s = scheduler();
      await s.requestRange(SITE, SCAN_START, SCAN_START);
      await s.whenIdle();

      expect(await s.requestRange(SITE, SCAN_START, SCAN_START)).toEqual([]);
      expect(archive.fetches).toEqual([KEY]);
    });

    it('does not queue a scan twice', async () => {
      archive.add(SCAN_START, archiveFile(3));
      archive.held.add(KEY);
      const s = scheduler();

      expect(await s.requestRange(SITE, SCAN_START, SCAN_START)).toHaveLength(1);
      expect(await s.requestRange(SITE, SCAN_START, SCAN_START)).toEqual([]);

      s.cancelRange();
      await s.whenIdle();
      expect(task(s, 'ar-1')?.state).toBe('Canceled');
    });
  });

  describe('retries', () => {
    it('fails after the last attempt with the error kind', async () => {
      archive.add(SCAN_START, archiveFile(3));
      archive.failures.set(KEY, [1, 2, 3].map(() => new NetworkFailureError('Service unavailable', 503)));
      const s = scheduler();

      await s.requestRange(SITE, SCAN_START, SCAN_START);
      await s.whenIdle();
      expect(task(s, 'ar-1')).toMatchObject({
        state: 'Failed',
        attempts: 3,
        errorKind: 'NetworkFailure',
        error: 'Service unavailable',
      });
      expect(archive.fetches).toHaveLength(3);
      expect(cache.getScan(SCAN).completeness).toBe('Missing');
    });

    it('completes when a retry succeeds', async () => {
      archive.add(SCAN_START, archiveFile(3));
      archive.failures.set(KEY, [new NetworkFailureError('reset'), new NetworkFailureError('Bad gateway', 502)]);
      const s = scheduler();

      await s.requestRange(SITE, SCAN_START, SCAN_START);
      await s.whenIdle();
      expect(task(s, 'ar-1')).toMatchObject({ state: 'Completed', attempts: 3, recordsStored: 3 });
    });

    it('does not retry a missing object', async () => {
      archive.add(SCAN_START, archiveFile(3));
      archive.files.delete(KEY);
      const s = scheduler();

      await s.requestRange(SITE, SCAN_START, SCAN_START);
      await s.whenIdle();
      expect(task(s, 'ar-1')).toMatchObject({ state: 'Failed', attempts: 1, errorKind: 'NetworkFailure' });
    });

    it('passes listing errors to the caller', async () => {
      vi.spyOn(archive, 'listScans').mockRejectedValue(new NetworkFailureError('Forbidden', 403));
      await expect(scheduler().requestRange(SITE, 0, 1)).rejects.toThrow('Forbidden');
    });
  });

  it('fails the task when storage is over quota', async () => {
    archive.add(SCAN_START, archiveFile(3));
    cache.setWriteGuard(async () => {
      throw new StorageQuotaExceededError(10, 5);
    });
    const s = scheduler();

    await s.requestRange(SITE, SCAN_START, SCAN_START);
    await s.whenIdle();
    expect(task(s, 'ar-1')).toMatchObject({ state: 'Failed', errorKind: 'StorageQuotaExceeded' });
    expect(cache.getScan(SCAN).completeness).toBe('Missing');
  });

  describe('range changes', () => {
    it('cancels work outside the new range and keeps stored records', async () => {
      archive.add(SCAN_START, archiveFile(3));
      const held = archive.add(SCAN_START + FIVE_MIN, archiveFile(3));
      archive.held.add(held.key);
      const s = scheduler();

      await s.requestRange(SITE, SCAN_START, SCAN_START + FIVE_MIN);
      await waitFor(() => task(s, 'ar-1')?.state === 'Completed' && task(s, 'ar-2')?.state === 'Active');

      expect(await s.requestRange(SITE, SCAN_START + 2 * FIVE_MIN, SCAN_START + 3 * FIVE_MIN)).toEqual([]);
      await s.whenIdle();

      expect(task(s, 'ar-2')?.state).toBe('Canceled');
      expect(cache.getScan(SCAN).completeness).toBe('Complete');
      expect(cache.getScan(makeScanKey(SITE, SCAN_START + FIVE_MIN)).completeness).toBe('Missing');
    });

    it('cancels queued tasks without fetching them', async () => {
      for (const offset of [0, FIVE_MIN]) {
        archive.held.add(archive.add(SCAN_START + offset, archiveFile(1)).key);
      }
      const s = scheduler({ maxConcurrentDownloads: 1 });

      await s.requestRange(SITE, SCAN_START, SCAN_START + FIVE_MIN);
      expect(task(s, 'ar-2')?.state).toBe('Queued');

      s.cancelRange();
      expect(task(s, 'ar-2')?.state).toBe('Canceled');
      await s.whenIdle();
      expect(task(s, 'ar-1')?.state).toBe('Canceled');
      expect(archive.fetches).toEqual([KEY]);
      expect(s.requestedRange).toBeNull();
    });
  });

  it('orders the queue snapshot active, queued, finished', async () => {
    archive.add(SCAN_START, archiveFile(1));
    archive.held.add(archive.add(SCAN_START + FIVE_MIN, archiveFile(1)).key);
    archive.held.add(archive.add(SCAN_START + 2 * FIVE_MIN, archiveFile(1)).key);
    const s = scheduler({ maxConcurrentDownloads: 1 });

    await s.requestRange(SITE, SCAN_START, SCAN_START + 2 * FIVE_MIN);
    await waitFor(() => task(s, 'ar-2')?.state === 'Active');
    expect(s.getQueueState().map((t) => [t.id, t.state])).toEqual([
      ['ar-2', 'Active'],
      ['ar-3', 'Queued'],
      ['ar-1', 'Completed'],
    ]);

    s.cancelRange();
    await s.whenIdle();
  });

  it('prunes finished tasks beyond the history limit', async () => {
    archive.add(SCAN_START, archiveFile(1));
    archive.add(SCAN_START + FIVE_MIN, archiveFile(1));
    let clock = 0;
    const s = scheduler({ maxConcurrentDownloads: 1, taskHistoryLimit: 1, now: () => ++clock });

    await s.requestRange(SITE, SCAN_START, SCAN_START + FIVE_MIN);
    await s.whenIdle();
    await waitFor(() => Object.keys(s.taskStore.getState().tasks).length === 1);
    expect(Object.keys(s.taskStore.getState().tasks)).toEqual(['ar-2']);
  });

  it('refuses real-time mode without a chunk source', () => {
    const s = scheduler();
    expect(() => s.startRealtime(SITE)).toThrow('No chunk source configured');
    expect(s.realtimeActive).toBe(false);
  });
});
