/**
 * Acquisition scheduler for radar records.
 *
 * Archive mode:
 * - Lists archive volumes for the requested site and range
 * - Skips scans the cache already holds completely
 * - Downloads one volume per task, up to `maxConcurrentDownloads` at a time
 * - Splits each file into records and stores them through the record cache,
 *   record 0 first
 * - Moving the range cancels queued and active tasks outside it; records
 *   already stored stay
 *
 * Real-time mode is delegated to RealtimeIngest and shares the same task
 * store, so one queue snapshot covers both.
 *
 * Network failures retry with exponential backoff; when attempts run out the
 * task fails with the error kind attached. No task failure stops the loop.
 */

import { errorKindOf, errorMessage, isAbortError, throwIfAborted } from '../cache/errors';
import { makeRecordKey, makeScanKey, normalizeSite, sameScan, scanStorageKey, type ScanKey } from '../cache/keys';
import type { RecordCache } from '../cache/recordCache';
import {
  createAcquisitionStore,
  isTerminal,
  orderedTasks,
  type AcquisitionStore,
  type AcquisitionTask,
} from '../../stores/acquisitionStore';
import type { SessionStore } from '../../stores/sessionStore';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../../utils/backoff';
import { formatUTCRange } from '../../utils/time';
import { splitArchiveIntoRecords } from './archiveSplitter';
import { maybeGunzip } from './decoder';
import { RealtimeIngest, type RealtimeRecordListener } from './realtimeIngest';
import type { ArchiveScanRef, ArchiveSource, ChunkSource } from './types';

export const MAX_CONCURRENT_DOWNLOADS = 2;
export const TASK_HISTORY_LIMIT = 50;

interface ArchiveJob {
  taskId: string;
  scan: ScanKey;
  ref: ArchiveScanRef;
  abortController: AbortController;
}

export interface SchedulerOptions {
  archive: ArchiveSource;
  chunks?: ChunkSource;
  maxConcurrentDownloads?: number;
  retry?: RetryPolicy;
  taskHistoryLimit?: number;
  store?: AcquisitionStore;
  /** Receives network counters and live phase */
  session?: SessionStore;
  now?: () => number;
}

export interface RequestedRange {
  site: string;
  start: number;
  end: number;
}

export class AcquisitionScheduler {
  private cache: RecordCache;
  private archive: ArchiveSource;
  private store: AcquisitionStore;
  private session: SessionStore | undefined;
  private retry: RetryPolicy;
  private maxConcurrent: number;
  private historyLimit: number;
  private now: () => number;
  private realtime: RealtimeIngest | null;

  private activeDownloads = new Map<string, ArchiveJob>();
  private jobQueue: ArchiveJob[] = [];
  private range: RequestedRange | null = null;
  private listingAbort: AbortController | null = null;
  private nextTaskId = 1;

  constructor(cache: RecordCache, options: SchedulerOptions) {
    this.cache = cache;
    this.archive = options.archive;
    this.store = options.store ?? createAcquisitionStore();
    this.session = options.session;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.maxConcurrent = options.maxConcurrentDownloads ?? MAX_CONCURRENT_DOWNLOADS;
    this.historyLimit = options.taskHistoryLimit ?? TASK_HISTORY_LIMIT;
    this.now = options.now ?? Date.now;
    this.realtime = options.chunks
      ? new RealtimeIngest(cache, options.chunks, {
        store: this.store,
        session: this.session,
        retry: this.retry,
        now: this.now,
        newTaskId: () => this.allocateTaskId('rt'),
      })
      : null;
  }

  get taskStore(): AcquisitionStore {
    return this.store;
  }

  get requestedRange(): RequestedRange | null {
    return this.range;
  }

  /**
   * Make [start, end] the wanted archive range for `site`.
   *
   * Work outside the new range is cancelled. Returns the tasks queued for
   * scans not yet complete; scans already complete are skipped.
   */
  async requestRange(site: string, start: number, end: number): Promise<AcquisitionTask[]> {
    if (end < start) throw new RangeError(`Range end ${end} is before start ${start}`);
    const siteId = normalizeSite(site);
    const wanted: RequestedRange = { site: siteId, start, end };
    this.range = wanted;
    console.info(`[Acquisition] Range ${siteId} ${formatUTCRange(start, end)}`);

    this.cancelOutside(wanted);

    this.listingAbort?.abort();
    const listingAbort = new AbortController();
    this.listingAbort = listingAbort;

    let refs: ArchiveScanRef[];
    try {
      refs = await withRetry(
        () => this.archive.listScans(siteId, start, end, listingAbort.signal),
        this.retry,
        {
          signal: listingAbort.signal,
          onRetry: (attempt, err, delay) =>
            console.warn(`[Acquisition] Listing retry ${attempt} in ${delay}ms:`, errorMessage(err)),
        },
      );
    } catch (err) {
      // Superseded by a newer request
      if (isAbortError(err)) return [];
      throw err;
    } finally {
      if (this.listingAbort === listingAbort) this.listingAbort = null;
    }

    // A newer request may have replaced this one while listing
    if (this.range !== wanted) return [];

    const queued: AcquisitionTask[] = [];
    for (const ref of refs) {
      const scan = makeScanKey(siteId, ref.scanStart);
      if (this.cache.getScan(scan).completeness === 'Complete') continue;
      if (this.hasPendingArchiveTask(scan)) continue;

      const task: AcquisitionTask = {
        id: this.allocateTaskId('ar'),
        kind: 'archive',
        scan,
        state: 'Queued',
        attempts: 0,
        recordsStored: 0,
        fileName: ref.key,
        queuedAt: this.now(),
      };
      this.store.getState().addTask(task);
      this.jobQueue.push({ taskId: task.id, scan, ref, abortController: new AbortController() });
      queued.push(task);
    }

    this.drainQueue();
    return queued;
  }

  /**
   * Cancel all archive work. Stored records are kept.
   */
  cancelRange(): void {
    this.range = null;
    this.listingAbort?.abort();
    this.listingAbort = null;

    for (const job of this.jobQueue) {
      this.cancelTask(job);
    }
    this.jobQueue = [];

    for (const job of this.activeDownloads.values()) {
      job.abortController.abort();
    }
  }

  startRealtime(site: string, onRecord?: RealtimeRecordListener): void {
    if (!this.realtime) throw new Error('No chunk source configured for real-time mode');
    this.realtime.start(normalizeSite(site), onRecord);
  }

  async stopRealtime(): Promise<void> {
    await this.realtime?.stop();
  }

  get realtimeActive(): boolean {
    return this.realtime?.isRunning ?? false;
  }

  /** Active first, then queued, then finished (most recent first). */
  getQueueState(): AcquisitionTask[] {
    return orderedTasks(this.store.getState());
  }

  subscribe(listener: (tasks: AcquisitionTask[]) => void): () => void {
    return this.store.subscribe((state) => listener(orderedTasks(state)));
  }

  /**
   * Resolves once no archive task is queued or active.
   */
  whenIdle(): Promise<void> {
    if (this.archiveIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      const unsubscribe = this.store.subscribe(() => {
        if (this.archiveIdle()) {
          unsubscribe();
          resolve();
        }
      });
    });
  }

  async shutdown(): Promise<void> {
    this.cancelRange();
    await this.stopRealtime();
  }

  // ── Private ────────────────────────────────────────────────────────

  private allocateTaskId(prefix: string): string {
    return `${prefix}-${this.nextTaskId++}`;
  }

  private archiveIdle(): boolean {
    return !Object.values(this.store.getState().tasks)
      .some((t) => t.kind === 'archive' && !isTerminal(t.state));
  }

  private hasPendingArchiveTask(scan: ScanKey): boolean {
    return this.jobQueue.some((j) => sameScan(j.scan, scan))
      || [...this.activeDownloads.values()].some((j) => sameScan(j.scan, scan));
  }

  private inRange(scan: ScanKey, range: RequestedRange): boolean {
    return scan.site === range.site && scan.scanStart >= range.start && scan.scanStart <= range.end;
  }

  private cancelOutside(range: RequestedRange): void {
    const keep: ArchiveJob[] = [];
    for (const job of this.jobQueue) {
      if (this.inRange(job.scan, range)) keep.push(job);
      else this.cancelTask(job);
    }
    this.jobQueue = keep;

    for (const job of this.activeDownloads.values()) {
      if (!this.inRange(job.scan, range)) {
        job.abortController.abort();
      }
    }
  }

  private cancelTask(job: ArchiveJob): void {
    job.abortController.abort();
    this.store.getState().transition(job.taskId, 'Canceled', { finishedAt: this.now() });
  }

  /**
   * Start queued jobs up to the concurrency limit. Called after queue
   * changes and after each job finishes.
   */
  private drainQueue(): void {
    while (this.activeDownloads.size < this.maxConcurrent && this.jobQueue.length > 0) {
      const job = this.jobQueue.shift();
      if (!job) break;
      if (job.abortController.signal.aborted) continue;

      this.activeDownloads.set(job.taskId, job);
      void this.runArchiveJob(job).finally(() => {
        this.activeDownloads.delete(job.taskId);
        this.store.getState().pruneFinished(this.historyLimit);
        this.drainQueue();
      });
    }
  }

  private async runArchiveJob(job: ArchiveJob): Promise<void> {
    const { taskId, scan, ref, abortController } = job;
    const signal = abortController.signal;
    const tasks = this.store.getState();
    if (!tasks.transition(taskId, 'Active', { startedAt: this.now() })) return;

    try {
      const raw = await withRetry(
        async (attempt) => {
          this.store.getState().updateTask(taskId, { attempts: attempt });
          this.session?.getState().requestStarted();
          let received = 0;
          try {
            const bytes = await this.archive.fetchScan(ref, signal);
            received = bytes.byteLength;
            return bytes;
          } finally {
            this.session?.getState().requestFinished(received);
          }
        },
        this.retry,
        {
          signal,
          onRetry: (attempt, err, delay) =>
            console.warn(`[Acquisition] Retry ${attempt} for ${ref.key} in ${delay}ms:`, errorMessage(err)),
        },
      );
      throwIfAborted(signal);

      const records = splitArchiveIntoRecords(maybeGunzip(raw));
      let stored = 0;
      for (const record of records) {
        throwIfAborted(signal);
        const result = await this.cache.storeRecord(makeRecordKey(scan, record.recordId), record.bytes, {
          expectedRecords: records.length,
          fileName: ref.key,
        });
        if (result.outcome === 'stored') {
          stored++;
          this.store.getState().updateTask(taskId, { recordsStored: stored });
        }
      }

      this.store.getState().transition(taskId, 'Completed', { finishedAt: this.now() });
      console.debug(`[Acquisition] ${ref.key}: ${stored}/${records.length} records stored`);
    } catch (err) {
      if (isAbortError(err)) {
        this.store.getState().transition(taskId, 'Canceled', { finishedAt: this.now() });
        return;
      }
      const errorKind = errorKindOf(err);
      this.store.getState().transition(taskId, 'Failed', {
        finishedAt: this.now(),
        errorKind,
        error: errorMessage(err),
      });
      console.error(`[Acquisition] Failed: ${scanStorageKey(scan)} (${errorKind})`, errorMessage(err));
    }
  }
}
