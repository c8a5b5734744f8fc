/**
 * Completeness tracking for scans.
 *
 * All functions here are pure. Completeness is recomputed from the present
 * record set on every arrival and is never trusted from storage.
 */

import type { CompletenessState, ScanMetadata } from './types';

export const DEFAULT_RADIALS_PER_RECORD = 120;

const ORDER: Record<CompletenessState, number> = {
  Missing: 0,
  PartialNoVcp: 1,
  PartialWithVcp: 2,
  Complete: 3,
};

export interface VcpCut {
  /** Elevation angle in degrees */
  elevation: number;
  /** Radials per full rotation at this cut (360, or 720 for super-resolution) */
  radials: number;
}

export interface VcpSummary {
  pattern: number;
  cuts: VcpCut[];
}

export type VcpProbe = (record0: Uint8Array) => VcpSummary | undefined;

type CompletenessInput = Pick<ScanMetadata, 'presentRecords' | 'hasVcp' | 'expectedRecords'>;

export function computeState(scan: CompletenessInput): CompletenessState {
  if (scan.presentRecords.length === 0) return 'Missing';
  if (!scan.hasVcp) return 'PartialNoVcp';
  if (scan.expectedRecords === undefined) return 'PartialWithVcp';

  const present = new Set(scan.presentRecords);
  for (let id = 0; id < scan.expectedRecords; id++) {
    if (!present.has(id)) return 'PartialWithVcp';
  }
  return 'Complete';
}

export function isForwardTransition(from: CompletenessState, to: CompletenessState): boolean {
  return ORDER[to] >= ORDER[from];
}

/**
 * One metadata record, plus one record per `radialsPerRecord` radials of
 * every elevation cut.
 */
export function expectedRecordsFor(
  summary: VcpSummary,
  radialsPerRecord = DEFAULT_RADIALS_PER_RECORD,
): number {
  let total = 1;
  for (const cut of summary.cuts) {
    total += Math.ceil(cut.radials / radialsPerRecord);
  }
  return total;
}

/**
 * Read the VCP out of record 0 and derive the expected record count.
 * Returns undefined when the header cannot be read.
 */
export function deriveExpectedRecords(
  record0: Uint8Array,
  probe: VcpProbe,
  radialsPerRecord = DEFAULT_RADIALS_PER_RECORD,
): { expectedRecords: number; vcpPattern: number } | undefined {
  const summary = probe(record0);
  if (!summary || summary.cuts.length === 0) return undefined;
  return {
    expectedRecords: expectedRecordsFor(summary, radialsPerRecord),
    vcpPattern: summary.pattern,
  };
}

/**
 * Record ids known to be absent. With an expected count this is every gap in
 * `0..expected-1`; without one it is record 0 (when the VCP has not arrived)
 * plus the gaps below the highest present id.
 */
export function missingRecordIds(scan: CompletenessInput): number[] {
  const present = new Set(scan.presentRecords);
  const upper = scan.expectedRecords
    ?? (scan.presentRecords.length > 0 ? scan.presentRecords[scan.presentRecords.length - 1] + 1 : 0);

  const missing: number[] = [];
  for (let id = 0; id < upper; id++) {
    if (!present.has(id)) missing.push(id);
  }
  if (!scan.hasVcp && !missing.includes(0)) missing.unshift(0);
  return missing;
}
