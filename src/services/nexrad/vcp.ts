/**
 * Volume Coverage Pattern definitions for the common NEXRAD VCPs.
 * The table itself lives in `data/vcps.json`.
 */

import vcpTable from '../../data/vcps.json';
import type { VcpSummary } from '../cache/completeness';

export interface VcpElevation {
  angle: number;
  /** "CS" (contiguous surveillance) or "CD" (contiguous Doppler) */
  waveform: string;
  prf: string;
  /** Super-resolution cuts are sampled at 0.5° azimuth (720 radials) */
  superRes: boolean;
}

export interface VcpDefinition {
  name: string;
  description: string;
  elevations: VcpElevation[];
}

const VCP_TABLE: Record<string, VcpDefinition> = vcpTable;

export function getVcpDefinition(pattern: number): VcpDefinition | undefined {
  return VCP_TABLE[String(pattern)];
}

export function knownVcpPatterns(): number[] {
  return Object.keys(VCP_TABLE).map(Number).sort((a, b) => a - b);
}

/**
 * Cut list for a known pattern, or undefined for patterns not in the table.
 */
export function vcpSummaryFromPattern(pattern: number): VcpSummary | undefined {
  const def = getVcpDefinition(pattern);
  if (!def) return undefined;
  return {
    pattern,
    cuts: def.elevations.map((e) => ({
      elevation: e.angle,
      radials: e.superRes ? 720 : 360,
    })),
  };
}
