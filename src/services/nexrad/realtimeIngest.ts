/**
 * Real-time record ingest.
 *
 * Consumes the chunk feed for one site and stores each chunk as a record as
 * soon as it arrives, so partially received volumes are queryable right
 * away. One `realtime` task tracks each scan seen on the feed.
 *
 * Connecting mid-volume: the feed starts at its newest chunk, which is
 * usually not record 0. Record 0 is fetched on its own before anything else
 * of that scan is stored, so the scan gets its VCP (and expected record count)
 * as early as possible.
 *
 * Feed errors reconnect with backoff. When attempts run out the live phase
 * goes to `error` and open tasks fail.
 */

import { errorKindOf, errorMessage, isAbortError, throwIfAborted } from '../cache/errors';
import { makeRecordKey, makeScanKey, scanStorageKey, type RecordKey, type ScanKey } from '../cache/keys';
import type { RecordCache } from '../cache/recordCache';
import type { ScanMetadata } from '../cache/types';
import type { AcquisitionStore, TaskState } from '../../stores/acquisitionStore';
import type { SessionStore } from '../../stores/sessionStore';
import { backoffDelay, isRetryable, sleep, withRetry, type RetryPolicy } from '../../utils/backoff';
import type { ChunkSource, RealtimeChunk } from './types';

/** Called after each newly stored real-time record. */
export type RealtimeRecordListener = (key: RecordKey, scan: ScanMetadata) => void;

export interface RealtimeIngestOptions {
  store: AcquisitionStore;
  session?: SessionStore;
  retry: RetryPolicy;
  now: () => number;
  newTaskId: () => string;
}

export class RealtimeIngest {
  private cache: RecordCache;
  private source: ChunkSource;
  private store: AcquisitionStore;
  private session: SessionStore | undefined;
  private retry: RetryPolicy;
  private now: () => number;
  private newTaskId: () => string;

  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  /** Open task id per scan storage key */
  private openTasks = new Map<string, string>();
  private currentScan: string | null = null;

  constructor(cache: RecordCache, source: ChunkSource, options: RealtimeIngestOptions) {
    this.cache = cache;
    this.source = source;
    this.store = options.store;
    this.session = options.session;
    this.retry = options.retry;
    this.now = options.now;
    this.newTaskId = options.newTaskId;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(site: string, onRecord?: RealtimeRecordListener): void {
    if (this.loop) throw new Error('Real-time ingest is already running');

    const abortController = new AbortController();
    this.abortController = abortController;
    this.session?.getState().setLivePhase('acquiring');
    console.info(`[Realtime] Starting for ${site}`);

    this.loop = this.run(site, abortController.signal, onRecord).finally(() => {
      this.closeOpenTasks('Canceled');
      this.currentScan = null;
      if (this.abortController === abortController) this.abortController = null;
      this.loop = null;
    });
  }

  /** Stop the feed and wait for the loop to wind down. Stored records stay. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abortController?.abort();
    await loop;
    this.session?.getState().setLivePhase('idle');
    console.info('[Realtime] Stopped');
  }

  // ── Private ────────────────────────────────────────────────────────

  private async run(site: string, signal: AbortSignal, onRecord?: RealtimeRecordListener): Promise<void> {
    let failures = 0;
    while (!signal.aborted) {
      try {
        if (failures > 0) {
          await sleep(backoffDelay(this.retry, failures), signal);
        }
        for await (const chunk of this.source.chunks(site, signal)) {
          failures = 0;
          await this.ingest(chunk, signal, onRecord);
          this.session?.getState().setLivePhase('waiting-for-chunk');
        }
        // Feed closed on its own
        if (!signal.aborted) {
          this.session?.getState().setLivePhase('idle');
          console.info(`[Realtime] Feed for ${site} ended`);
        }
        return;
      } catch (err) {
        if (isAbortError(err) || signal.aborted) return;
        failures++;
        if (failures >= this.retry.maxAttempts || !isRetryable(err)) {
          const message = errorMessage(err);
          this.session?.getState().setLivePhase('error', message);
          this.failOpenTasks(err);
          console.error(`[Realtime] Giving up on ${site} after ${failures} attempt(s):`, message);
          return;
        }
        console.warn(`[Realtime] Feed error, reconnecting (${failures}):`, errorMessage(err));
        this.session?.getState().setLivePhase('acquiring');
      }
    }
  }

  private async ingest(chunk: RealtimeChunk, signal: AbortSignal, onRecord?: RealtimeRecordListener): Promise<void> {
    const scan = makeScanKey(chunk.site, chunk.scanStart);
    const scanId = scanStorageKey(scan);

    if (this.currentScan !== scanId) {
      // A new volume on the feed closes the previous one
      if (this.currentScan) this.finishTask(this.currentScan, 'Completed');
      this.currentScan = scanId;
      this.session?.getState().setLiveScan(scan.scanStart);
      this.openTask(scan);
      if (chunk.recordId !== 0 && !this.cache.recordIndex.has(makeRecordKey(scan, 0))) {
        await this.backfillRecord0(scan, signal, onRecord);
      }
    }

    this.session?.getState().setLivePhase('streaming');
    await this.storeChunk(makeRecordKey(scan, chunk.recordId), chunk.bytes, chunk.recordTime, onRecord);

    const completeness = this.cache.getScan(scan).completeness;
    if (chunk.chunkType === 'end' || completeness === 'Complete') {
      this.finishTask(scanId, 'Completed');
    }
  }

  private async backfillRecord0(scan: ScanKey, signal: AbortSignal, onRecord?: RealtimeRecordListener): Promise<void> {
    const taskId = this.openTasks.get(scanStorageKey(scan));
    let bytes: Uint8Array;
    try {
      bytes = await withRetry(
        async (attempt) => {
          if (taskId) this.store.getState().updateTask(taskId, { attempts: attempt });
          this.session?.getState().requestStarted();
          let received = 0;
          try {
            const data = await this.source.fetchRecord(scan, 0, signal);
            received = data.byteLength;
            return data;
          } finally {
            this.session?.getState().requestFinished(received);
          }
        },
        this.retry,
        { signal },
      );
    } catch (err) {
      if (isAbortError(err)) throw err;
      // The scan stays without its VCP; later chunks are still kept
      console.warn(`[Realtime] Could not fetch record 0 of ${scanStorageKey(scan)}:`, errorMessage(err));
      return;
    }
    throwIfAborted(signal);
    await this.storeChunk(makeRecordKey(scan, 0), bytes, undefined, onRecord);
  }

  private async storeChunk(
    key: RecordKey,
    bytes: Uint8Array,
    recordTime: number | undefined,
    onRecord?: RealtimeRecordListener,
  ): Promise<void> {
    const scanId = scanStorageKey(key.scan);
    const taskId = this.openTasks.get(scanId);
    try {
      const result = await this.cache.storeRecord(key, bytes, { recordTime });
      if (result.outcome !== 'stored') return;
      if (taskId) {
        const task = this.store.getState().tasks[taskId];
        this.store.getState().updateTask(taskId, { recordsStored: (task?.recordsStored ?? 0) + 1 });
      }
      onRecord?.(key, result.scan);
    } catch (err) {
      if (isAbortError(err)) throw err;
      // A failed write loses this scan's task, not the feed
      console.error(`[Realtime] Failed to store record ${key.recordId} of ${scanId}:`, errorMessage(err));
      if (taskId) this.finishTask(scanId, 'Failed', err);
    }
  }

  private openTask(scan: ScanKey): void {
    const id = this.newTaskId();
    const now = this.now();
    const state = this.store.getState();
    state.addTask({
      id,
      kind: 'realtime',
      scan,
      state: 'Queued',
      attempts: 0,
      recordsStored: 0,
      queuedAt: now,
    });
    state.transition(id, 'Active', { startedAt: now });
    this.openTasks.set(scanStorageKey(scan), id);
  }

  private finishTask(scanId: string, to: TaskState, err?: unknown): void {
    const taskId = this.openTasks.get(scanId);
    if (!taskId) return;
    this.openTasks.delete(scanId);
    this.store.getState().transition(taskId, to, {
      finishedAt: this.now(),
      ...(err === undefined ? {} : { errorKind: errorKindOf(err), error: errorMessage(err) }),
    });
  }

  private failOpenTasks(err: unknown): void {
    for (const scanId of [...this.openTasks.keys()]) {
      this.finishTask(scanId, 'Failed', err);
    }
  }

  private closeOpenTasks(to: TaskState): void {
    for (const scanId of [...this.openTasks.keys()]) {
      this.finishTask(scanId, to);
    }
  }
}
