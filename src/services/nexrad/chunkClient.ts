/**
 * Real-time chunk feed from the public Level II chunks bucket.
 *
 * Layout: `{site}/{volume}/{YYYYMMDD-HHMMSS}-{seq}-{S|I|E}`, where `volume`
 * cycles 1..999 and every chunk of one volume shares the volume start stamp.
 * Chunk `seq` 1 (type S) is record 0; the E chunk closes the volume.
 */

import { NetworkFailureError } from '../cache/errors';
import { scanStorageKey, type ScanKey } from '../cache/keys';
import { sleep } from '../../utils/backoff';
import { parseCompactUTC } from '../../utils/time';
import { fetchObject, listObjects, type S3Object } from './s3Listing';
import type { ChunkSource, ChunkType, RealtimeChunk } from './types';

export const CHUNK_BUCKET = 'unidata-nexrad-level2-chunks';
export const CHUNK_BUCKET_URL = `https://${CHUNK_BUCKET}.s3.amazonaws.com`;
export const DEFAULT_CHUNK_POLL_MS = 5000;

const MAX_VOLUME_NUMBER = 999;

const CHUNK_TYPES: Record<string, ChunkType> = {
  S: 'start',
  I: 'intermediate',
  E: 'end',
};

export interface ChunkName {
  key: string;
  volume: number;
  scanStart: number;
  seq: number;
  chunkType: ChunkType;
  lastModified: number;
}

/**
 * Parse `KDMX/123/20231114-221320-005-I`. Returns null for anything else.
 */
export function parseChunkKey(obj: Pick<S3Object, 'key' | 'lastModified'>): ChunkName | null {
  const match = obj.key.match(/^[A-Z0-9]{4}\/(\d+)\/(\d{8}-\d{6})-(\d{3})-([SIE])$/);
  if (!match) return null;
  const [, volume, stamp, seq, type] = match;
  const scanStart = parseCompactUTC(stamp);
  const chunkType = CHUNK_TYPES[type];
  if (scanStart === null || !chunkType) return null;
  return {
    key: obj.key,
    volume: parseInt(volume, 10),
    scanStart,
    seq: parseInt(seq, 10),
    chunkType,
    lastModified: obj.lastModified,
  };
}

export function nextVolumeNumber(volume: number): number {
  return volume >= MAX_VOLUME_NUMBER ? 1 : volume + 1;
}

export interface S3ChunkOptions {
  bucketUrl?: string;
  pollIntervalMs?: number;
}

export class S3ChunkSource implements ChunkSource {
  private bucketUrl: string;
  private pollIntervalMs: number;
  /** Volume directory per scan seen on the feed */
  private knownVolumes = new Map<string, string>();

  constructor(options: S3ChunkOptions = {}) {
    this.bucketUrl = options.bucketUrl ?? CHUNK_BUCKET_URL;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CHUNK_POLL_MS;
  }

  async *chunks(site: string, signal: AbortSignal): AsyncGenerator<RealtimeChunk> {
    let volume = await this.findLatestVolume(site, signal);
    if (volume === null) {
      throw new NetworkFailureError(`No real-time volumes listed for ${site}`);
    }
    console.info(`[S3] Latest chunk volume for ${site}: ${volume}`);

    // null until the first listing: start at the newest chunk
    let nextSeq: number | null = null;
    // A reused directory may still hold the previous cycle's chunks
    let minScanStart = 0;

    while (!signal.aborted) {
      const prefix = `${site}/${volume}/`;
      const names = await this.listChunks(prefix, signal);
      if (nextSeq === null) {
        nextSeq = names.length > 0 ? names[names.length - 1].seq : 1;
      }

      let advanced = false;
      let volumeEnded = false;
      for (const name of names) {
        if (name.seq < nextSeq || name.scanStart < minScanStart) continue;
        const bytes = await fetchObject(this.bucketUrl, name.key, signal);
        this.knownVolumes.set(scanStorageKey({ site, scanStart: name.scanStart }), prefix);
        yield {
          site,
          scanStart: name.scanStart,
          recordId: name.seq - 1,
          chunkType: name.chunkType,
          bytes,
          recordTime: name.lastModified || undefined,
        };
        nextSeq = name.seq + 1;
        advanced = true;
        if (name.chunkType === 'end') {
          volumeEnded = true;
          minScanStart = name.scanStart + 1;
          break;
        }
      }

      if (volumeEnded) {
        volume = nextVolumeNumber(volume);
        nextSeq = 1;
        continue;
      }
      if (!advanced) {
        await sleep(this.pollIntervalMs, signal);
      }
    }
  }

  async fetchRecord(scan: ScanKey, recordId: number, signal?: AbortSignal): Promise<Uint8Array> {
    const prefix = this.knownVolumes.get(scanStorageKey(scan));
    if (!prefix) {
      throw new NetworkFailureError(`No chunk volume known for ${scanStorageKey(scan)}`, 404);
    }
    const names = await this.listChunks(prefix, signal);
    const name = names.find((n) => n.seq === recordId + 1 && n.scanStart === scan.scanStart);
    if (!name) {
      throw new NetworkFailureError(`Record ${recordId} of ${scanStorageKey(scan)} is not in the feed`, 404);
    }
    return fetchObject(this.bucketUrl, name.key, signal);
  }

  /**
   * Volume directories are numbered 1..999 and reused in a cycle, so ordered
   * by number their start times form a rotated sorted array. Binary search
   * for the rotation point using each directory's first chunk.
   */
  async findLatestVolume(site: string, signal?: AbortSignal): Promise<number | null> {
    const listing = await listObjects(this.bucketUrl, `${site}/`, { delimiter: '/', signal });
    const volumes = listing.commonPrefixes
      .map((p) => parseInt(p.split('/')[1] ?? '', 10))
      .filter((n) => Number.isFinite(n))
      .sort((a, b) => a - b);
    if (volumes.length === 0) return null;

    const firstStart = await this.volumeStart(site, volumes[0], signal);
    if (firstStart === null) return volumes[volumes.length - 1];

    let lo = 0;
    let hi = volumes.length - 1;
    while (lo < hi) {
      const mid = Math.ceil((lo + hi) / 2);
      const start = await this.volumeStart(site, volumes[mid], signal);
      if (start !== null && start >= firstStart) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return volumes[lo];
  }

  // ── Private ────────────────────────────────────────────────────────

  private async volumeStart(site: string, volume: number, signal?: AbortSignal): Promise<number | null> {
    const listing = await listObjects(this.bucketUrl, `${site}/${volume}/`, { maxKeys: 1, signal });
    const first = listing.objects[0];
    return first ? parseChunkKey(first)?.scanStart ?? null : null;
  }

  private async listChunks(prefix: string, signal?: AbortSignal): Promise<ChunkName[]> {
    const listing = await listObjects(this.bucketUrl, prefix, { signal });
    const names: ChunkName[] = [];
    for (const obj of listing.objects) {
      const name = parseChunkKey(obj);
      if (name) names.push(name);
    }
    return names.sort((a, b) => a.seq - b.seq);
  }
}
