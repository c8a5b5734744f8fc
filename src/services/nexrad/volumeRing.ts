import { scanStorageKey, type ScanKey } from '../cache/keys';
import type { Volume } from './types';

export const MIN_RING_CAPACITY = 2;
export const MAX_RING_CAPACITY = 3;

/**
 * The most recently assembled volumes, one site at a time.
 *
 * FIFO by insertion: when full, inserting drops the oldest volume. Inserting
 * a volume for a scan already held replaces that slot with the new volume
 * (volumes themselves are never mutated). Switching site empties the ring;
 * only setSite() switches it, and another site's volume is not held.
 *
 * Each decoded volume holds every elevation and moment (tens of MB), hence
 * the small capacity.
 */
export class VolumeRing<T> {
  private slots = new Map<string, Volume<T>>();
  private capacity: number;
  private site: string | null = null;

  constructor(capacity = MAX_RING_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < MIN_RING_CAPACITY || capacity > MAX_RING_CAPACITY) {
      throw new RangeError(
        `Ring capacity must be ${MIN_RING_CAPACITY}-${MAX_RING_CAPACITY}, got ${capacity}`,
      );
    }
    this.capacity = capacity;
  }

  get(key: ScanKey): Volume<T> | undefined {
    return this.slots.get(scanStorageKey(key));
  }

  has(key: ScanKey): boolean {
    return this.slots.has(scanStorageKey(key));
  }

  /**
   * Returns false, leaving the ring as it was, for a volume of a site other
   * than the current one. The first insert into a ring with no site sets it.
   */
  insert(volume: Volume<T>): boolean {
    if (this.site === null) this.site = volume.scan.site;
    if (volume.scan.site !== this.site) return false;

    const id = scanStorageKey(volume.scan);
    if (this.slots.has(id)) {
      this.slots.delete(id);
    }

    while (this.slots.size >= this.capacity) {
      const oldestId = this.slots.keys().next().value;
      if (oldestId === undefined) break;
      this.slots.delete(oldestId);
    }

    this.slots.set(id, volume);
    return true;
  }

  /**
   * Make `site` current, emptying the ring when it differs. Returns true
   * when a previously active site was replaced.
   */
  setSite(site: string): boolean {
    if (this.site === site) return false;
    const hadSite = this.site !== null;
    this.site = site;
    this.slots.clear();
    return hadSite;
  }

  get currentSite(): string | null {
    return this.site;
  }

  remove(key: ScanKey): boolean {
    return this.slots.delete(scanStorageKey(key));
  }

  /** Held scans, oldest first. */
  scans(): ScanKey[] {
    return [...this.slots.values()].map((v) => v.scan);
  }

  clear(): void {
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }
}
