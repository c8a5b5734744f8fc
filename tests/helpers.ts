import type { VcpSummary } from '../src/services/cache/completeness';
import { CancelledError, NetworkFailureError } from '../src/services/cache/errors';
import { makeScanKey, scanStorageKey, type ScanKey } from '../src/services/cache/keys';
import { MemoryKeyValueStore } from '../src/services/cache/kvStore';
import { RecordCache } from '../src/services/cache/recordCache';
import type { VolumeTiming } from '../src/services/cache/types';
import type {
  ArchiveScanRef,
  ArchiveSource,
  ChunkSource,
  RadarDecoder,
  RealtimeChunk,
} from '../src/services/nexrad/types';
import type { RetryPolicy } from '../src/utils/backoff';

export const SITE = 'KDMX';
export const SCAN_START = 1_700_000_000_000;
export const SCAN = makeScanKey(SITE, SCAN_START);

export const NO_DELAY_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, factor: 2 };

/** 1 + ceil(360/120) + ceil(360/120) + ceil(120/120) = 8 records */
export const EIGHT_RECORD_VCP: VcpSummary = {
  pattern: 215,
  cuts: [
    { elevation: 0.5, radials: 360 },
    { elevation: 0.9, radials: 360 },
    { elevation: 1.3, radials: 120 },
  ],
};

/** Record bytes filled with the record id, so concatenation order is visible. */
export function recordBytes(recordId: number, size = 4): Uint8Array {
  return new Uint8Array(size).fill(recordId);
}

/** Reads the eight-record VCP from any record whose first byte is 0. */
export function fakeProbe(record0: Uint8Array): VcpSummary | undefined {
  return record0[0] === 0 ? EIGHT_RECORD_VCP : undefined;
}

export async function openCache(
  kv = new MemoryKeyValueStore(),
  now: () => number = () => SCAN_START,
): Promise<RecordCache> {
  const cache = new RecordCache(kv, { probe: fakeProbe, now });
  await cache.open();
  return cache;
}

export async function storeRecords(cache: RecordCache, scan: ScanKey, ids: number[], size = 4): Promise<void> {
  for (const id of ids) {
    await cache.storeRecord({ scan, recordId: id }, recordBytes(id, size));
  }
}

/**
 * Decoder returning the bytes it was given as a plain array. Throws for any
 * input containing `poison`.
 */
export class FakeDecoder implements RadarDecoder<number[]> {
  calls = 0;
  poison: number | null = null;
  /** When set, decodes never finish */
  held = false;
  /** Returned by describe() for every volume */
  timing: VolumeTiming | undefined = undefined;

  decode(bytes: Uint8Array): number[] | Promise<number[]> {
    this.calls++;
    if (this.held) return new Promise<number[]>(() => {});
    if (this.poison !== null && bytes.includes(this.poison)) {
      throw new Error('bad radial header');
    }
    return Array.from(bytes);
  }

  probeVcp(record0: Uint8Array): VcpSummary | undefined {
    return fakeProbe(record0);
  }

  describe(): VolumeTiming | undefined {
    return this.timing;
  }
}

/** Archive II-like file: one `BZh9` block per record, payload filled with the record id. */
export function archiveFile(recordCount: number, payloadSize = 6): Uint8Array {
  const parts: number[] = [];
  for (let id = 0; id < recordCount; id++) {
    parts.push(0x42, 0x5a, 0x68, 0x39);
    for (let i = 0; i < payloadSize; i++) parts.push(id);
  }
  return new Uint8Array(parts);
}

function abortable<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    signal?.addEventListener('abort', () => reject(new CancelledError()), { once: true });
  });
}

export class FakeArchive implements ArchiveSource {
  refs: ArchiveScanRef[] = [];
  files = new Map<string, Uint8Array>();
  /** Errors thrown by successive fetches of a key before it succeeds */
  failures = new Map<string, Error[]>();
  /** Keys whose fetch never completes until aborted */
  held = new Set<string>();
  fetches: string[] = [];
  listCalls = 0;

  add(scanStart: number, data: Uint8Array, site = SITE): ArchiveScanRef {
    const ref: ArchiveScanRef = { key: `${site}/${scanStart}`, site, scanStart, size: data.byteLength };
    this.refs.push(ref);
    this.files.set(ref.key, data);
    return ref;
  }

  async listScans(site: string, start: number, end: number): Promise<ArchiveScanRef[]> {
    this.listCalls++;
    return this.refs
      .filter((r) => r.site === site && r.scanStart >= start && r.scanStart <= end)
      .sort((a, b) => a.scanStart - b.scanStart);
  }

  async fetchScan(ref: ArchiveScanRef, signal?: AbortSignal): Promise<Uint8Array> {
    this.fetches.push(ref.key);
    if (this.held.has(ref.key)) return abortable(signal);
    const pending = this.failures.get(ref.key);
    const failure = pending?.shift();
    if (failure) throw failure;
    const data = this.files.get(ref.key);
    if (!data) throw new NetworkFailureError(`Not found: ${ref.key}`, 404);
    return data;
  }
}

/**
 * Chunk feed over a fixed list. After the list is exhausted the feed stays
 * open until aborted, unless `endWhenDrained` is set.
 */
export class FakeChunkSource implements ChunkSource {
  chunkList: RealtimeChunk[] = [];
  /** Records served by fetchRecord, keyed `{scan}|{recordId}` */
  records = new Map<string, Uint8Array>();
  recordFetches: string[] = [];
  endWhenDrained = true;
  /** Errors thrown by successive calls to chunks() before it yields */
  connectFailures: Error[] = [];
  connects = 0;

  async *chunks(_site: string, signal: AbortSignal): AsyncGenerator<RealtimeChunk> {
    this.connects++;
    const failure = this.connectFailures.shift();
    if (failure) throw failure;
    for (const chunk of this.chunkList) {
      if (signal.aborted) return;
      yield chunk;
    }
    if (!this.endWhenDrained) await abortable<void>(signal);
  }

  async fetchRecord(scan: ScanKey, recordId: number): Promise<Uint8Array> {
    const id = `${scanStorageKey(scan)}|${recordId}`;
    this.recordFetches.push(id);
    const bytes = this.records.get(id);
    if (!bytes) throw new NetworkFailureError(`Record ${id} not available`, 404);
    return bytes;
  }
}

export function chunk(recordId: number, chunkType: RealtimeChunk['chunkType'] = 'intermediate'): RealtimeChunk {
  return {
    site: SITE,
    scanStart: SCAN_START,
    recordId,
    chunkType,
    bytes: recordBytes(recordId),
    recordTime: SCAN_START + recordId * 1000,
  };
}

/** Poll until `predicate` holds, yielding to the event loop between checks. */
export async function waitFor(predicate: () => boolean, maxTicks = 1000): Promise<void> {
  for (let i = 0; i < maxTicks; i++) {
    if (predicate()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error('Condition not met');
}
