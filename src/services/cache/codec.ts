/**
 * Versioned encoding of index metadata.
 *
 * Every value carries its schema version in `v`. Each version has its own
 * read adapter; writes always use the current version. Entries written by
 * older builds are upgraded lazily the first time they are touched.
 *
 * Version history:
 *   1: scan entries keyed `{site}_{unixSeconds}`, times in seconds, present
 *      records stored only as a count. Record entries have no `v` field and
 *      no record time.
 *   2: millisecond keys and times, explicit present-record set. Decoded
 *      sweep timing (`endTime`, `sweeps`) is optional within it.
 */

import { decodeJson, encodeJson } from './kvStore';
import {
  parseRecordStorageKey,
  parseScanStorageKey,
  scanKeyFromLegacy,
  type RecordKey,
  type ScanKey,
} from './keys';
import { StorageError } from './errors';
import { computeState } from './completeness';
import type { RecordMetadata, ScanMetadata, SweepTiming } from './types';

export const SCHEMA_VERSION = 2;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(obj: JsonObject, field: string): number {
  const value = obj[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new StorageError(`Corrupt metadata: "${field}" is not a number`);
  }
  return value;
}

function optNum(obj: JsonObject, field: string): number | undefined {
  return obj[field] === undefined || obj[field] === null ? undefined : num(obj, field);
}

function bool(obj: JsonObject, field: string): boolean {
  return obj[field] === true;
}

function optStr(obj: JsonObject, field: string): string | undefined {
  const value = obj[field];
  return typeof value === 'string' ? value : undefined;
}

function optSweeps(obj: JsonObject, id: string): SweepTiming[] | undefined {
  const value = obj.sweeps;
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new StorageError(`Corrupt metadata for ${id}: bad sweeps`);
  return value.map((entry: unknown) => {
    if (!isObject(entry)) throw new StorageError(`Corrupt metadata for ${id}: bad sweeps`);
    return {
      elevationNumber: num(entry, 'elevationNumber'),
      elevation: num(entry, 'elevation'),
      startTime: num(entry, 'startTime'),
      endTime: num(entry, 'endTime'),
    };
  });
}

function parseObject(id: string, bytes: Uint8Array): JsonObject {
  let value: unknown;
  try {
    value = decodeJson(bytes);
  } catch (err) {
    throw new StorageError(`Corrupt metadata for ${id}`, { cause: err });
  }
  if (!isObject(value)) throw new StorageError(`Corrupt metadata for ${id}: not an object`);
  return value;
}

// ── Record metadata ───────────────────────────────────────────────────

export function encodeRecordMetadata(meta: RecordMetadata): Uint8Array {
  return encodeJson({
    v: SCHEMA_VERSION,
    recordTime: meta.recordTime,
    sizeBytes: meta.sizeBytes,
    hasVcp: meta.hasVcp,
    storedAt: meta.storedAt,
  });
}

export function decodeRecordMetadata(id: string, bytes: Uint8Array): RecordMetadata {
  const key: RecordKey | null = parseRecordStorageKey(id);
  if (!key) throw new StorageError(`Malformed record key: ${id}`);
  const obj = parseObject(id, bytes);

  if (obj.v === undefined || obj.v === 1) {
    return {
      key,
      recordTime: key.scan.scanStart,
      sizeBytes: num(obj, 'size_bytes'),
      hasVcp: bool(obj, 'has_vcp'),
      storedAt: num(obj, 'stored_at'),
    };
  }
  if (obj.v === 2) {
    return {
      key,
      recordTime: num(obj, 'recordTime'),
      sizeBytes: num(obj, 'sizeBytes'),
      hasVcp: bool(obj, 'hasVcp'),
      storedAt: num(obj, 'storedAt'),
    };
  }
  throw new StorageError(`Unsupported record metadata version ${String(obj.v)} for ${id}`);
}

// ── Scan metadata ─────────────────────────────────────────────────────

export function encodeScanMetadata(meta: ScanMetadata): Uint8Array {
  // completeness is derived; it is recomputed on load and never stored
  return encodeJson({
    v: SCHEMA_VERSION,
    hasVcp: meta.hasVcp,
    vcpPattern: meta.vcpPattern,
    expectedRecords: meta.expectedRecords,
    presentRecords: meta.presentRecords,
    firstTime: meta.firstTime,
    lastTime: meta.lastTime,
    totalSizeBytes: meta.totalSizeBytes,
    fileName: meta.fileName,
    endTime: meta.endTime,
    sweeps: meta.sweeps,
    updatedAt: meta.updatedAt,
  });
}

export type DecodedScanEntry =
  | { version: 2; meta: ScanMetadata }
  /** Present set must be rebuilt from the record index before use. */
  | { version: 1; meta: ScanMetadata; legacyId: string; presentCount: number };

/**
 * Parse a legacy `{site}_{unixSeconds}` id.
 */
export function parseLegacyScanId(id: string): ScanKey | null {
  const match = id.match(/^([A-Za-z0-9]{4})_(\d+)$/);
  if (!match) return null;
  try {
    return scanKeyFromLegacy(match[1], Number(match[2]));
  } catch {
    return null;
  }
}

export function decodeScanEntry(id: string, bytes: Uint8Array): DecodedScanEntry {
  const obj = parseObject(id, bytes);

  if (obj.v === undefined || obj.v === 1) {
    const key = parseLegacyScanId(id);
    if (!key) throw new StorageError(`Malformed legacy scan key: ${id}`);
    const firstSecs = optNum(obj, 'first_time_secs');
    const lastSecs = optNum(obj, 'last_time_secs');
    const meta: ScanMetadata = {
      key,
      hasVcp: bool(obj, 'has_vcp'),
      expectedRecords: optNum(obj, 'expected_records'),
      presentRecords: [],
      completeness: 'Missing',
      firstTime: firstSecs !== undefined ? firstSecs * 1000 : key.scanStart,
      lastTime: lastSecs !== undefined ? lastSecs * 1000 : key.scanStart,
      totalSizeBytes: num(obj, 'total_size_bytes'),
      fileName: optStr(obj, 'file_name'),
      updatedAt: (optNum(obj, 'updated_at_secs') ?? 0) * 1000,
    };
    return { version: 1, meta, legacyId: id, presentCount: num(obj, 'present_records') };
  }

  if (obj.v === 2) {
    const key = parseScanStorageKey(id);
    if (!key) throw new StorageError(`Malformed scan key: ${id}`);
    const present = obj.presentRecords;
    if (!Array.isArray(present) || !present.every((n): n is number => Number.isSafeInteger(n) && n >= 0)) {
      throw new StorageError(`Corrupt metadata for ${id}: bad presentRecords`);
    }
    const meta: ScanMetadata = {
      key,
      hasVcp: bool(obj, 'hasVcp'),
      vcpPattern: optNum(obj, 'vcpPattern'),
      expectedRecords: optNum(obj, 'expectedRecords'),
      presentRecords: [...new Set(present)].sort((a, b) => a - b),
      completeness: 'Missing',
      firstTime: num(obj, 'firstTime'),
      lastTime: num(obj, 'lastTime'),
      totalSizeBytes: num(obj, 'totalSizeBytes'),
      fileName: optStr(obj, 'fileName'),
      endTime: optNum(obj, 'endTime'),
      sweeps: optSweeps(obj, id),
      updatedAt: num(obj, 'updatedAt'),
    };
    meta.completeness = computeState(meta);
    return { version: 2, meta };
  }

  throw new StorageError(`Unsupported scan metadata version ${String(obj.v)} for ${id}`);
}

// ── Access times ──────────────────────────────────────────────────────

export function encodeAccess(lastUsed: number): Uint8Array {
  return encodeJson({ v: SCHEMA_VERSION, lastUsed });
}

export function decodeAccess(id: string, bytes: Uint8Array): number {
  return num(parseObject(id, bytes), 'lastUsed');
}
