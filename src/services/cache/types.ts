import type { RecordKey, ScanKey } from './keys';

/**
 * Derived per-scan state. Ordered: each state only ever moves forward until
 * the scan is evicted, which resets it to `Missing`.
 */
export type CompletenessState = 'Missing' | 'PartialNoVcp' | 'PartialWithVcp' | 'Complete';

export interface RecordMetadata {
  key: RecordKey;
  /** Record time (UTC ms); falls back to the scan start when the source gives none */
  recordTime: number;
  sizeBytes: number;
  /** True for record 0, which carries the VCP header */
  hasVcp: boolean;
  storedAt: number;
}

export interface ScanMetadata {
  key: ScanKey;
  hasVcp: boolean;
  /** VCP number read from record 0 */
  vcpPattern?: number;
  /** Total records in the volume, once derivable from the VCP */
  expectedRecords?: number;
  /** Sorted ascending, no duplicates */
  presentRecords: number[];
  completeness: CompletenessState;
  firstTime: number;
  lastTime: number;
  totalSizeBytes: number;
  /** Source object name (archive file key), when known */
  fileName?: string;
  /** Time of the last radial, filled in once the scan has been decoded */
  endTime?: number;
  sweeps?: SweepTiming[];
  updatedAt: number;
}

/** Collection window of one elevation cut, read from a decoded volume. */
export interface SweepTiming {
  /** 1-based position of the cut within the volume */
  elevationNumber: number;
  /** Degrees */
  elevation: number;
  startTime: number;
  endTime: number;
}

export interface VolumeTiming {
  endTime: number;
  sweeps: SweepTiming[];
}

export function emptyScanMetadata(key: ScanKey): ScanMetadata {
  return {
    key,
    hasVcp: false,
    presentRecords: [],
    completeness: 'Missing',
    firstTime: key.scanStart,
    lastTime: key.scanStart,
    totalSizeBytes: 0,
    updatedAt: 0,
  };
}
