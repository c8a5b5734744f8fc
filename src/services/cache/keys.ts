/**
 * Identity types for cached radar data.
 *
 * A scan is one volume from one site, identified by its start time (UTC ms).
 * A record is one compressed LDM block within that scan; record 0 carries the
 * volume metadata (VCP and site info).
 */

export interface ScanKey {
  site: string;
  scanStart: number;
}

export interface RecordKey {
  scan: ScanKey;
  recordId: number;
}

export interface TimeRange {
  start: number;
  end: number;
}

const SITE_PATTERN = /^[A-Z0-9]{4}$/;

/**
 * Upper-cased 4-character ICAO site id. Throws RangeError for anything else.
 */
export function normalizeSite(site: string): string {
  const normalized = site.trim().toUpperCase();
  if (!SITE_PATTERN.test(normalized)) {
    throw new RangeError(`Invalid site id: "${site}"`);
  }
  return normalized;
}

export function makeScanKey(site: string, scanStart: number): ScanKey {
  const normalized = normalizeSite(site);
  if (!Number.isSafeInteger(scanStart) || scanStart < 0) {
    throw new RangeError(`Invalid scan start: ${scanStart}`);
  }
  return { site: normalized, scanStart };
}

export function makeRecordKey(scan: ScanKey, recordId: number): RecordKey {
  if (!Number.isSafeInteger(recordId) || recordId < 0) {
    throw new RangeError(`Invalid record id: ${recordId}`);
  }
  return { scan, recordId };
}

/**
 * Legacy keys stored the scan start in whole seconds.
 */
export function scanKeyFromLegacy(site: string, scanStartSecs: number): ScanKey {
  return makeScanKey(site, scanStartSecs * 1000);
}

// ── Storage keys ──────────────────────────────────────────────────────

/** `KDMX|1700000000000` */
export function scanStorageKey(key: ScanKey): string {
  return `${key.site}|${key.scanStart}`;
}

/** `KDMX|1700000000000|12` */
export function recordStorageKey(key: RecordKey): string {
  return `${scanStorageKey(key.scan)}|${key.recordId}`;
}

export function parseScanStorageKey(value: string): ScanKey | null {
  const parts = value.split('|');
  if (parts.length !== 2) return null;
  const scanStart = parseInteger(parts[1]);
  if (scanStart === null) return null;
  try {
    return makeScanKey(parts[0], scanStart);
  } catch {
    return null;
  }
}

export function parseRecordStorageKey(value: string): RecordKey | null {
  const lastSep = value.lastIndexOf('|');
  if (lastSep < 0) return null;
  const scan = parseScanStorageKey(value.slice(0, lastSep));
  const recordId = parseInteger(value.slice(lastSep + 1));
  if (!scan || recordId === null) return null;
  return { scan, recordId };
}

function parseInteger(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

export function sameScan(a: ScanKey, b: ScanKey): boolean {
  return a.site === b.site && a.scanStart === b.scanStart;
}

export function compareScanKeys(a: ScanKey, b: ScanKey): number {
  if (a.scanStart !== b.scanStart) return a.scanStart - b.scanStart;
  return a.site < b.site ? -1 : a.site > b.site ? 1 : 0;
}

// ── Time ranges ───────────────────────────────────────────────────────

export function rangeContains(range: TimeRange, t: number): boolean {
  return t >= range.start && t <= range.end;
}

export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}

/**
 * Merge ranges whose gap is at most `gapMs` into contiguous availability bands.
 * Input order does not matter; output is sorted by start.
 */
export function mergeTimeRanges(ranges: TimeRange[], gapMs: number): TimeRange[] {
  if (ranges.length === 0) return [];

  const sorted = ranges
    .map((r) => ({ start: r.start, end: r.end }))
    .sort((a, b) => a.start - b.start);

  const merged: TimeRange[] = [sorted[0]];
  for (let i = 1; i < sorted.length; i++) {
    const current = sorted[i];
    const last = merged[merged.length - 1];
    if (current.start <= last.end + gapMs) {
      last.end = Math.max(last.end, current.end);
    } else {
      merged.push(current);
    }
  }
  return merged;
}
