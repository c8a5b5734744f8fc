import { Level2Radar } from 'nexrad-level-2-data';
import pako from 'pako';
import type { VcpSummary } from '../cache/completeness';
import type { SweepTiming, VolumeTiming } from '../cache/types';
import type { RadarDecoder } from './types';
import { vcpSummaryFromPattern } from './vcp';

export interface DecodedVolume {
  radar: Level2Radar;
  timestamp: number;
  siteId: string;
  vcp: number;
  elevations: number[];
  sweeps: SweepTiming[];
  /** Time of the last radial; the volume timestamp when no radial carries one */
  endTime: number;
}

const MS_PER_DAY = 86400000;

/** Modified Julian date (day 1 = 1970-01-01) plus ms of day, as UTC ms. */
function julianToMs(date: number, msOfDay: number): number {
  return (date - 1) * MS_PER_DAY + msOfDay;
}

/**
 * Decompress gzip data if needed. Archive objects are sometimes .gz compressed.
 * Gzip magic bytes: 0x1f 0x8b
 */
export function maybeGunzip(bytes: Uint8Array): Uint8Array {
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    return pako.ungzip(bytes);
  }
  return bytes;
}

function parseRadar(bytes: Uint8Array): Level2Radar {
  // nexrad-level-2-data requires a Buffer (instanceof check), not a plain Uint8Array
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return new Level2Radar(buf, { logger: false });
}

/**
 * Decode a NEXRAD Level II volume from concatenated records.
 */
export function decodeVolume(bytes: Uint8Array): DecodedVolume {
  const radar = parseRadar(maybeGunzip(bytes));

  const header = radar.header ?? {};
  const siteId = header.icao ?? header.ICAO ?? '';
  const vcp = radar.vcp?.record?.pattern_number ?? 0;
  const elevationIndices = radar.listElevations();

  // Physical elevation angles from the first radial of each cut
  const elevations = elevationIndices.map((idx) => {
    const angle = radar.data?.[idx]?.[0]?.record?.elevation_angle;
    return typeof angle === 'number' ? Math.round(angle * 10) / 10 : idx;
  });

  let timestamp = 0;
  if (header.date !== undefined && header.time !== undefined) {
    const julianDays = typeof header.date === 'number' ? header.date : parseInt(header.date, 10);
    const msOfDay = typeof header.time === 'number' ? header.time : parseInt(header.time, 10);
    timestamp = julianToMs(julianDays, msOfDay);
  }

  const sweeps = readSweepTiming(radar, elevationIndices);
  const endTime = sweeps.reduce((latest, sweep) => Math.max(latest, sweep.endTime), timestamp);

  return { radar, timestamp, siteId, vcp, elevations, sweeps, endTime };
}

/**
 * First and last radial time of every cut. Cuts whose radials carry no
 * collection time are left out.
 */
function readSweepTiming(radar: Level2Radar, elevationIndices: number[]): SweepTiming[] {
  const sweeps: SweepTiming[] = [];
  for (const idx of elevationIndices) {
    let start = Infinity;
    let end = -Infinity;
    let angle: number | undefined;
    for (const radial of radar.data?.[idx] ?? []) {
      const record = radial.record;
      if (record?.julian_date === undefined || record.mseconds === undefined) continue;
      const time = julianToMs(record.julian_date, record.mseconds);
      start = Math.min(start, time);
      end = Math.max(end, time);
      angle = angle ?? record.elevation_angle;
    }
    if (start === Infinity) continue;
    sweeps.push({
      elevationNumber: idx,
      elevation: angle === undefined ? 0 : Math.round(angle * 10) / 10,
      startTime: start,
      endTime: end,
    });
  }
  return sweeps;
}

export function volumeTiming(volume: DecodedVolume): VolumeTiming | undefined {
  if (volume.sweeps.length === 0) return undefined;
  return { endTime: volume.endTime, sweeps: volume.sweeps };
}

/**
 * Read the VCP message carried by record 0.
 *
 * Patterns in the VCP table expand from the table, which knows which cuts
 * are super-resolution. Any other pattern takes its cut list from the
 * message and counts every cut at 720 radials, so its expected record count
 * is an upper bound until a whole archive file gives the exact one.
 */
export function probeVcp(record0: Uint8Array): VcpSummary | undefined {
  let radar: Level2Radar;
  try {
    radar = parseRadar(record0);
  } catch {
    return undefined;
  }
  const message = radar.vcp?.record;
  const pattern = message?.pattern_number;
  if (pattern === undefined || pattern <= 0) return undefined;

  const known = vcpSummaryFromPattern(pattern);
  if (known) return known;

  const cuts = (message?.elevations ?? []).map((cut) => ({
    elevation: cut.elevation_angle ?? 0,
    radials: 720,
  }));
  return cuts.length > 0 ? { pattern, cuts } : undefined;
}

export const level2Decoder: RadarDecoder<DecodedVolume> = {
  decode: decodeVolume,
  probeVcp,
  describe: volumeTiming,
};
