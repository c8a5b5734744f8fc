/**
 * RadarCacheEngine: the one entry point the UI talks to.
 *
 * Owns the record cache and everything wired around it. Nothing here is a
 * global except the opt-in default instance at the bottom.
 */

import { DEFAULT_CONFIG, loadConfigFromEnv, type EngineConfig } from './config';
import { errorMessage, isAbortError } from './services/cache/errors';
import { FileSystemKeyValueStore } from './services/cache/fileSystemKvStore';
import { normalizeSite, scanStorageKey, type RecordKey, type ScanKey, type TimeRange } from './services/cache/keys';
import { MemoryKeyValueStore, type KeyValueStore } from './services/cache/kvStore';
import { RecordCache } from './services/cache/recordCache';
import { EvictionManager } from './services/cache/evictionManager';
import type { ScanMetadata } from './services/cache/types';
import { AcquisitionScheduler } from './services/nexrad/acquisitionScheduler';
import { S3ChunkSource } from './services/nexrad/chunkClient';
import { DecodePool } from './services/nexrad/decodePool';
import { level2Decoder, type DecodedVolume } from './services/nexrad/decoder';
import { S3ArchiveSource } from './services/nexrad/s3Client';
import type {
  ArchiveSource,
  AssemblyMode,
  AssemblyResult,
  ChunkSource,
  RadarDecoder,
  Volume,
} from './services/nexrad/types';
import { VolumeAssembler } from './services/nexrad/volumeAssembler';
import { VolumeRing } from './services/nexrad/volumeRing';
import {
  createAcquisitionStore,
  orderedTasks,
  type AcquisitionStore,
  type AcquisitionTask,
} from './stores/acquisitionStore';
import { createSessionStore, type SessionStore } from './stores/sessionStore';

export type EngineEvent<T> =
  | { type: 'scan-updated'; scan: ScanMetadata }
  | { type: 'task-updated'; tasks: AcquisitionTask[] }
  | { type: 'volume-ready'; volume: Volume<T> }
  | { type: 'scan-evicted'; key: ScanKey; recordsRemoved: number };

export type EngineListener<T> = (event: EngineEvent<T>) => void;

export interface EngineOptions<T> {
  decoder: RadarDecoder<T>;
  config?: Partial<EngineConfig>;
  /** Defaults to the file-system store under `cacheDir`, or memory without one */
  kv?: KeyValueStore;
  archive?: ArchiveSource;
  chunks?: ChunkSource;
  now?: () => number;
}

export class RadarCacheEngine<T> {
  private config: EngineConfig;
  private kv: KeyValueStore;
  private cache: RecordCache;
  private eviction: EvictionManager;
  private pool: DecodePool<T>;
  private ring: VolumeRing<T>;
  private assembler: VolumeAssembler<T>;
  private scheduler: AcquisitionScheduler;
  private acquisition: AcquisitionStore;
  private session: SessionStore;

  private listeners = new Set<EngineListener<T>>();
  private unsubscribers: (() => void)[] = [];
  private opened = false;
  private liveRecordCount = 0;

  constructor(options: EngineOptions<T>) {
    const now = options.now ?? Date.now;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.kv = options.kv
      ?? (this.config.cacheDir ? new FileSystemKeyValueStore(this.config.cacheDir) : new MemoryKeyValueStore());

    const decoder = options.decoder;
    this.cache = new RecordCache(this.kv, {
      probe: (record0) => decoder.probeVcp(record0),
      radialsPerRecord: this.config.radialsPerRecord,
      now,
    });
    this.eviction = new EvictionManager(this.cache, this.kv, { budgetBytes: this.config.budgetBytes, now });
    this.pool = new DecodePool(decoder, this.config.decodeConcurrency);
    this.ring = new VolumeRing<T>(this.config.ringCapacity);
    this.assembler = new VolumeAssembler(this.cache, this.pool, {
      ring: this.ring,
      pin: (key) => this.eviction.pin(key),
      describe: (data) => decoder.describe?.(data),
      now,
    });

    this.acquisition = createAcquisitionStore();
    this.session = createSessionStore(this.kv);
    this.scheduler = new AcquisitionScheduler(this.cache, {
      archive: options.archive ?? new S3ArchiveSource({ now }),
      chunks: options.chunks ?? new S3ChunkSource({ pollIntervalMs: this.config.chunkPollIntervalMs }),
      maxConcurrentDownloads: this.config.maxConcurrentDownloads,
      retry: this.config.retry,
      taskHistoryLimit: this.config.taskHistoryLimit,
      store: this.acquisition,
      session: this.session,
      now,
    });
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  async open(): Promise<void> {
    if (this.opened) return;
    await this.cache.open();
    await this.eviction.load();
    await this.session.persist.rehydrate();

    this.cache.setWriteGuard((scan, bytes) => this.eviction.reserve(scan, bytes));
    this.unsubscribers.push(
      this.cache.subscribe((event) => {
        if (event.type === 'record-stored' || event.type === 'scan-updated') {
          this.emit({ type: 'scan-updated', scan: event.scan });
        } else {
          this.emit({ type: 'scan-evicted', key: event.key, recordsRemoved: event.recordsRemoved });
        }
      }),
      this.acquisition.subscribe((state) => {
        this.emit({ type: 'task-updated', tasks: orderedTasks(state) });
      }),
    );

    const site = this.session.getState().site;
    if (site) this.ring.setSite(site);
    this.opened = true;
    console.info(`[Engine] Open${site ? ` (site ${site})` : ''}`);
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    await this.scheduler.shutdown();
    this.pool.cancelAll();
    this.assembler.dispose();
    this.cache.setWriteGuard(null);
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.opened = false;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get sessionStore(): SessionStore {
    return this.session;
  }

  get acquisitionStore(): AcquisitionStore {
    return this.acquisition;
  }

  get activeSite(): string | null {
    return this.session.getState().site;
  }

  /**
   * Switch the active site. Clears the volume ring and stops all
   * acquisition for the previous site; its stored records stay. Pending
   * getVolume() calls reject with CancelledError.
   */
  async setSite(site: string): Promise<void> {
    this.assertOpen();
    const siteId = normalizeSite(site);
    if (this.session.getState().site === siteId) return;

    this.scheduler.cancelRange();
    await this.scheduler.stopRealtime();
    this.pool.cancelAll();
    this.ring.setSite(siteId);
    this.session.getState().setSite(siteId);
    this.session.getState().setRange(null);
    console.info(`[Engine] Site ${siteId}`);
  }

  // ── Queries ────────────────────────────────────────────────────────

  /** Scans of the active site overlapping [start, end], by scan start. */
  async queryTimelineRange(start: number, end: number): Promise<ScanMetadata[]> {
    this.assertOpen();
    const site = this.activeSite;
    if (!site) return [];
    const scans = this.cache.scanIndex.queryRange(start, end, site);
    await Promise.all(scans.map((scan) => this.eviction.touch(scan.key)));
    return scans;
  }

  availability(start: number, end: number, gapMs?: number): TimeRange[] {
    this.assertOpen();
    const site = this.activeSite;
    if (!site) return [];
    return this.cache.scanIndex.availability(site, start, end, gapMs);
  }

  async getScan(key: ScanKey): Promise<ScanMetadata> {
    this.assertOpen();
    await this.cache.scanIndex.upgradeIfLegacy(key);
    if (this.cache.scanIndex.has(key)) await this.eviction.touch(key);
    return this.cache.getScan(key);
  }

  /**
   * Assemble a scan for display. `best-effort` for most-recent and live
   * views, `complete-only` for fixed-tilt and archival playback.
   */
  async getVolume(key: ScanKey, mode: AssemblyMode = 'best-effort'): Promise<AssemblyResult<T>> {
    this.assertOpen();
    if (this.cache.scanIndex.has(key)) await this.eviction.touch(key);
    const before = this.ring.get(key);
    const result = await this.assembler.assemble(key, mode);
    if (result.kind === 'volume' && result.volume !== before) {
      this.emit({ type: 'volume-ready', volume: result.volume });
    }
    return result;
  }

  flaggedScans(): ScanKey[] {
    return this.assembler.flaggedScans();
  }

  // ── Acquisition ────────────────────────────────────────────────────

  getAcquisitionQueueState(): AcquisitionTask[] {
    return this.scheduler.getQueueState();
  }

  async requestRange(start: number, end: number): Promise<AcquisitionTask[]> {
    this.assertOpen();
    const site = this.requireSite();
    this.session.getState().setRange({ start, end });
    return this.scheduler.requestRange(site, start, end);
  }

  cancelRange(): void {
    this.scheduler.cancelRange();
    this.session.getState().setRange(null);
  }

  /** Resolves once no archive download is queued or running. */
  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  startRealtime(): void {
    this.assertOpen();
    const site = this.requireSite();
    this.liveRecordCount = 0;
    this.scheduler.startRealtime(site, (key, scan) => this.onLiveRecord(key, scan));
  }

  async stopRealtime(): Promise<void> {
    await this.scheduler.stopRealtime();
  }

  get realtimeActive(): boolean {
    return this.scheduler.realtimeActive;
  }

  // ── Storage ────────────────────────────────────────────────────────

  cacheSizeBytes(): number {
    return this.cache.totalSizeBytes();
  }

  async evictToSize(targetBytes: number): Promise<ScanKey[]> {
    this.assertOpen();
    return this.eviction.evictToSize(targetBytes);
  }

  async clearCache(): Promise<void> {
    this.assertOpen();
    this.scheduler.cancelRange();
    this.ring.clear();
    await this.eviction.clearAll();
  }

  // ── Events ─────────────────────────────────────────────────────────

  subscribe(listener: EngineListener<T>): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  // ── Private ────────────────────────────────────────────────────────

  private onLiveRecord(key: RecordKey, scan: ScanMetadata): void {
    this.liveRecordCount++;
    const every = this.config.livePartialDecodeEvery;
    const due = scan.completeness === 'Complete'
      || (every > 0 && scan.hasVcp && this.liveRecordCount % every === 0);
    if (due) void this.decodeLive(key.scan);
  }

  private async decodeLive(key: ScanKey): Promise<void> {
    try {
      await this.getVolume(key, 'best-effort');
    } catch (err) {
      if (isAbortError(err)) return;
      console.warn(`[Engine] Live decode of ${scanStorageKey(key)} failed:`, errorMessage(err));
    }
  }

  private emit(event: EngineEvent<T>): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private requireSite(): string {
    const site = this.activeSite;
    if (!site) throw new Error('No site selected; call setSite() first');
    return site;
  }

  private assertOpen(): void {
    if (!this.opened) throw new Error('RadarCacheEngine is not open; call open() first');
  }
}

/**
 * Engine over the bundled Level II decoder.
 */
export function createRadarCacheEngine(
  options: Omit<EngineOptions<DecodedVolume>, 'decoder'> = {},
): RadarCacheEngine<DecodedVolume> {
  return new RadarCacheEngine({ ...options, decoder: level2Decoder });
}

// ── Default instance ──────────────────────────────────────────────────

let instance: RadarCacheEngine<DecodedVolume> | null = null;

export function getRadarCacheEngine(): RadarCacheEngine<DecodedVolume> {
  if (!instance) {
    instance = createRadarCacheEngine({ config: loadConfigFromEnv() });
  }
  return instance;
}

export async function resetRadarCacheEngine(): Promise<void> {
  const current = instance;
  instance = null;
  await current?.close();
}
