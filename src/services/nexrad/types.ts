import type { VcpSummary } from '../cache/completeness';
import type { ScanKey } from '../cache/keys';
import type { VolumeTiming } from '../cache/types';

// ── Upstream sources ──────────────────────────────────────────────────

/** One volume file in the archive bucket. */
export interface ArchiveScanRef {
  /** Object key, e.g. `2023/11/14/KDMX/KDMX20231114_221320_V06` */
  key: string;
  site: string;
  /** Volume start parsed from the file name (UTC ms) */
  scanStart: number;
  size: number;
}

export interface ArchiveSource {
  /** Scans whose start falls within [start, end], ordered by start. */
  listScans(site: string, start: number, end: number, signal?: AbortSignal): Promise<ArchiveScanRef[]>;
  fetchScan(ref: ArchiveScanRef, signal?: AbortSignal): Promise<Uint8Array>;
}

export type ChunkType = 'start' | 'intermediate' | 'end';

/** One real-time record as delivered by the chunk feed. */
export interface RealtimeChunk {
  site: string;
  scanStart: number;
  recordId: number;
  chunkType: ChunkType;
  bytes: Uint8Array;
  recordTime?: number;
}

export interface ChunkSource {
  /**
   * Live chunks for a site, starting at the newest available one. Each call
   * starts a fresh sequence; aborting the signal ends the iteration.
   */
  chunks(site: string, signal: AbortSignal): AsyncIterable<RealtimeChunk>;
  /** Fetch one specific record of a volume the feed has already announced. */
  fetchRecord(scan: ScanKey, recordId: number, signal?: AbortSignal): Promise<Uint8Array>;
}

// ── Decoding ──────────────────────────────────────────────────────────

/**
 * Opaque Level II decoder. `decode` receives the records of one scan
 * concatenated in ascending id order, record 0 first.
 */
export interface RadarDecoder<T> {
  decode(bytes: Uint8Array): T | Promise<T>;
  /** Read the VCP from record 0 alone; undefined when it cannot be read. */
  probeVcp(record0: Uint8Array): VcpSummary | undefined;
  /** Sweep timing of a decoded volume, persisted into the scan index. */
  describe?(data: T): VolumeTiming | undefined;
}

// ── Volumes ───────────────────────────────────────────────────────────

export interface Volume<T> {
  scan: ScanKey;
  /** Records the volume was built from, ascending */
  recordIds: number[];
  /** Known gaps; empty for a complete volume */
  missingRecordIds: number[];
  partial: boolean;
  data: T;
  assembledAt: number;
}

/**
 * - `best-effort`: most-recent / live views. Scans with the VCP but gaps
 *   still produce a volume, marked partial.
 * - `complete-only`: fixed-tilt and archival playback. Anything short of
 *   complete is reported as incomplete.
 */
export type AssemblyMode = 'best-effort' | 'complete-only';

export type AssemblyResult<T> =
  | { kind: 'volume'; volume: Volume<T> }
  | { kind: 'incomplete'; scan: ScanKey; missingRecordIds: number[]; expectedRecords?: number }
  | { kind: 'decode-error'; scan: ScanKey; message: string };
