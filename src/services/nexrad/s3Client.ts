import { normalizeSite } from '../cache/keys';
import { utcDaysBetween } from '../../utils/time';
import { fetchObject, listObjects } from './s3Listing';
import type { ArchiveScanRef, ArchiveSource } from './types';

export const ARCHIVE_BUCKET = 'unidata-nexrad-level2';
export const ARCHIVE_BUCKET_URL = `https://${ARCHIVE_BUCKET}.s3.amazonaws.com`;

const DAY_MS = 86_400_000;

function formatDatePath(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}/${m}/${d}`;
}

export function parseArchiveTimestamp(filename: string): number | null {
  // Format: KXXX20130520_235959_V06
  const match = filename.match(/(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})/);
  if (!match) return null;
  const [, year, month, day, hour, min, sec] = match;
  return Date.UTC(+year, +month - 1, +day, +hour, +min, +sec);
}

export interface S3ArchiveOptions {
  bucketUrl?: string;
  now?: () => number;
}

/**
 * Archive volumes from the public Level II bucket.
 *
 * Day listings are cached per site; a finished UTC day never changes, so
 * only the current day is listed again on each request.
 */
export class S3ArchiveSource implements ArchiveSource {
  private bucketUrl: string;
  private now: () => number;
  private dayListings = new Map<string, ArchiveScanRef[]>();

  constructor(options: S3ArchiveOptions = {}) {
    this.bucketUrl = options.bucketUrl ?? ARCHIVE_BUCKET_URL;
    this.now = options.now ?? Date.now;
  }

  /**
   * All volume files for a site on one UTC day, ordered by time.
   * MDM (metadata) and NWS_ files are skipped.
   */
  async listDay(site: string, day: Date, signal?: AbortSignal): Promise<ArchiveScanRef[]> {
    const datePath = formatDatePath(day);
    const cacheKey = `${site}/${datePath}`;
    const cached = this.dayListings.get(cacheKey);
    if (cached) return cached;

    const listing = await listObjects(this.bucketUrl, `${datePath}/${site}/`, { signal });
    const refs: ArchiveScanRef[] = [];
    for (const obj of listing.objects) {
      const filename = obj.key.split('/').pop() ?? '';
      if (filename.includes('MDM') || filename.startsWith('NWS_')) continue;

      const scanStart = parseArchiveTimestamp(filename);
      if (scanStart === null) continue;

      refs.push({ key: obj.key, site, scanStart, size: obj.size });
    }
    refs.sort((a, b) => a.scanStart - b.scanStart);

    const dayEnd = day.getTime() + DAY_MS;
    if (dayEnd <= this.now()) {
      this.dayListings.set(cacheKey, refs);
    }
    return refs;
  }

  async listScans(site: string, start: number, end: number, signal?: AbortSignal): Promise<ArchiveScanRef[]> {
    const siteId = normalizeSite(site);
    const days = utcDaysBetween(start, end);
    const perDay = await Promise.all(days.map((d) => this.listDay(siteId, d, signal)));
    return perDay
      .flat()
      .filter((ref) => ref.scanStart >= start && ref.scanStart <= end)
      .sort((a, b) => a.scanStart - b.scanStart);
  }

  /**
   * Fetch a single volume file. Supports AbortSignal for cancellation.
   */
  async fetchScan(ref: ArchiveScanRef, signal?: AbortSignal): Promise<Uint8Array> {
    return fetchObject(this.bucketUrl, ref.key, signal);
  }
}
