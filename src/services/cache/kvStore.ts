/**
 * Persistent byte store underneath the record cache.
 *
 * Entries are addressed by (namespace, id). Namespaces used by the cache:
 * - `records`      raw compressed record bytes
 * - `record_index` per-record metadata (JSON)
 * - `scan_index`   per-scan rollups (JSON)
 * - `access`       last-used times for LRU eviction (JSON)
 *
 * Values are opaque bytes; callers own the encoding.
 */
export interface KeyValueStore {
  /** Returns `null` when the entry does not exist. */
  get(namespace: string, id: string): Promise<Uint8Array | null>;

  /** Store or overwrite an entry. */
  put(namespace: string, id: string, value: Uint8Array): Promise<void>;

  /**
   * Store an entry only if none exists. Returns false when an entry was
   * already present; the existing value is left untouched.
   */
  putIfAbsent(namespace: string, id: string, value: Uint8Array): Promise<boolean>;

  delete(namespace: string, id: string): Promise<void>;

  /** All ids under a namespace, in no particular order. */
  list(namespace: string): Promise<string[]>;

  /** Wipe every namespace. */
  clear(): Promise<void>;
}

/**
 * In-memory {@link KeyValueStore}. Used by tests and by engines that run
 * without a cache directory.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private data = new Map<string, Map<string, Uint8Array>>();

  async get(namespace: string, id: string): Promise<Uint8Array | null> {
    return this.data.get(namespace)?.get(id) ?? null;
  }

  async put(namespace: string, id: string, value: Uint8Array): Promise<void> {
    this.bucket(namespace).set(id, value.slice());
  }

  async putIfAbsent(namespace: string, id: string, value: Uint8Array): Promise<boolean> {
    const bucket = this.bucket(namespace);
    if (bucket.has(id)) return false;
    bucket.set(id, value.slice());
    return true;
  }

  async delete(namespace: string, id: string): Promise<void> {
    this.data.get(namespace)?.delete(id);
  }

  async list(namespace: string): Promise<string[]> {
    return [...(this.data.get(namespace)?.keys() ?? [])];
  }

  async clear(): Promise<void> {
    this.data.clear();
  }

  private bucket(namespace: string): Map<string, Uint8Array> {
    let bucket = this.data.get(namespace);
    if (!bucket) {
      bucket = new Map();
      this.data.set(namespace, bucket);
    }
    return bucket;
  }
}

// ── JSON helpers ──────────────────────────────────────────────────────

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function decodeJson(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes));
}
