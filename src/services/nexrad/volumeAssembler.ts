/**
 * Rebuilds decodable volumes from cached records.
 *
 * Records are always concatenated in ascending id order with record 0
 * first: later records only make sense against the VCP it establishes.
 *
 * Per mode (each fixed for the lifetime of the caller):
 * - `best-effort`: a scan with its VCP but with gaps still decodes, and the
 *   volume comes back `partial` with the gaps listed.
 * - `complete-only`: only complete scans decode; anything else is
 *   `incomplete` with the missing ids.
 *
 * A scan whose bytes the decoder rejects is flagged and reported. It is not
 * retried or evicted; the flag clears when a new record for it arrives.
 *
 * Sweep timing read from a decoded volume is written back to the scan
 * index, so timeline queries see end times without decoding again.
 */

import { missingRecordIds } from '../cache/completeness';
import { errorMessage, isAbortError } from '../cache/errors';
import { scanStorageKey, type ScanKey } from '../cache/keys';
import type { RecordCache } from '../cache/recordCache';
import type { ScanMetadata, VolumeTiming } from '../cache/types';
import { reassembleRecords } from './archiveSplitter';
import type { DecodePool } from './decodePool';
import type { AssemblyMode, AssemblyResult, Volume } from './types';
import type { VolumeRing } from './volumeRing';

export interface AssemblerOptions<T> {
  /** Successful volumes are inserted here and served from it while fresh */
  ring?: VolumeRing<T>;
  /** Keeps the scan from being evicted while it is assembled; returns the release */
  pin?: (key: ScanKey) => () => void;
  /** Reads sweep timing out of decoded data */
  describe?: (data: T) => VolumeTiming | undefined;
  now?: () => number;
}

export class VolumeAssembler<T> {
  private cache: RecordCache;
  private pool: DecodePool<T>;
  private ring: VolumeRing<T> | undefined;
  private pin: ((key: ScanKey) => () => void) | undefined;
  private describe: ((data: T) => VolumeTiming | undefined) | undefined;
  private now: () => number;
  private inFlight = new Map<string, Promise<AssemblyResult<T>>>();
  private flagged = new Map<string, { scan: ScanKey; message: string }>();
  private unsubscribe: () => void;

  constructor(cache: RecordCache, pool: DecodePool<T>, options: AssemblerOptions<T> = {}) {
    this.cache = cache;
    this.pool = pool;
    this.ring = options.ring;
    this.pin = options.pin;
    this.describe = options.describe;
    this.now = options.now ?? Date.now;

    this.unsubscribe = cache.subscribe((event) => {
      if (event.type === 'scan-updated') return;
      const id = scanStorageKey(event.type === 'record-stored' ? event.key.scan : event.key);
      this.flagged.delete(id);
      if (event.type === 'scan-deleted') this.ring?.remove(event.key);
    });
  }

  /**
   * Assemble a scan. Concurrent calls for the same scan and mode share one
   * assembly.
   */
  assemble(key: ScanKey, mode: AssemblyMode = 'best-effort'): Promise<AssemblyResult<T>> {
    const flightKey = `${scanStorageKey(key)}|${mode}`;
    const existing = this.inFlight.get(flightKey);
    if (existing) return existing;

    const release = this.pin?.(key);
    const promise = this.run(key, mode).finally(() => {
      this.inFlight.delete(flightKey);
      release?.();
    });
    this.inFlight.set(flightKey, promise);
    return promise;
  }

  isFlagged(key: ScanKey): boolean {
    return this.flagged.has(scanStorageKey(key));
  }

  flaggedScans(): ScanKey[] {
    return [...this.flagged.values()].map((f) => f.scan);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  dispose(): void {
    this.unsubscribe();
    this.inFlight.clear();
  }

  // ── Private ────────────────────────────────────────────────────────

  private async run(key: ScanKey, mode: AssemblyMode): Promise<AssemblyResult<T>> {
    const scan = this.cache.getScan(key);

    const cached = this.fromRing(scan, mode);
    if (cached) return { kind: 'volume', volume: cached };

    const flag = this.flagged.get(scanStorageKey(key));
    if (flag) return { kind: 'decode-error', scan: key, message: flag.message };

    switch (scan.completeness) {
      case 'Missing':
        // Nothing stored: list every expected id, or nothing when unknown
        return this.incomplete(
          scan,
          scan.expectedRecords === undefined ? [] : Array.from({ length: scan.expectedRecords }, (_, i) => i),
        );
      case 'PartialNoVcp':
        return this.incomplete(scan, missingRecordIds(scan));
      case 'PartialWithVcp':
        if (mode === 'complete-only') return this.incomplete(scan, missingRecordIds(scan));
        return this.decode(scan, mode);
      case 'Complete':
        return this.decode(scan, mode);
    }
  }

  private fromRing(scan: ScanMetadata, mode: AssemblyMode): Volume<T> | undefined {
    const volume = this.ring?.get(scan.key);
    if (!volume) return undefined;
    if (mode === 'complete-only' && volume.partial) return undefined;
    // Stale if records arrived since it was built
    if (volume.recordIds.length !== scan.presentRecords.length) return undefined;
    return volume;
  }

  private async decode(scan: ScanMetadata, mode: AssemblyMode): Promise<AssemblyResult<T>> {
    const records = await this.cache.getRecords(scan.key);
    const recordIds = records.map((r) => r.recordId);

    // Indexed records whose bytes are gone count as missing
    const hasRecord0 = recordIds[0] === 0;
    const missing = missingRecordIds({ ...scan, presentRecords: recordIds, hasVcp: hasRecord0 });
    if (!hasRecord0 || (mode === 'complete-only' && missing.length > 0)) {
      return this.incomplete(scan, missing);
    }

    const bytes = reassembleRecords(records.map((r) => r.bytes));
    let data: T;
    try {
      data = await this.pool.decode(bytes);
    } catch (err) {
      if (isAbortError(err)) throw err;
      const message = errorMessage(err);
      this.flagged.set(scanStorageKey(scan.key), { scan: scan.key, message });
      console.warn(`[Assembler] Decode failed for ${scanStorageKey(scan.key)}:`, message);
      return { kind: 'decode-error', scan: scan.key, message };
    }

    const volume: Volume<T> = {
      scan: scan.key,
      recordIds,
      missingRecordIds: missing,
      partial: missing.length > 0 || scan.expectedRecords === undefined,
      data,
      assembledAt: this.now(),
    };
    this.ring?.insert(volume);
    await this.storeTiming(scan, data);
    return { kind: 'volume', volume };
  }

  private async storeTiming(scan: ScanMetadata, data: T): Promise<void> {
    const timing = this.describe?.(data);
    if (!timing || (scan.endTime === timing.endTime && scan.sweeps?.length === timing.sweeps.length)) return;
    try {
      await this.cache.recordVolumeTiming(scan.key, timing);
    } catch (err) {
      // The volume is still good; the timing is written again on the next decode
      console.warn(`[Assembler] Could not store sweep timing for ${scanStorageKey(scan.key)}:`, errorMessage(err));
    }
  }

  private incomplete(scan: ScanMetadata, missing: number[]): AssemblyResult<T> {
    return {
      kind: 'incomplete',
      scan: scan.key,
      missingRecordIds: missing,
      expectedRecords: scan.expectedRecords,
    };
  }
}
