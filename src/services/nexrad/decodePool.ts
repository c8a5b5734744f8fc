/**
 * Bounded concurrency for volume decodes.
 *
 * At most `limit` decodes run at once; the rest wait in arrival order.
 * cancelAll() rejects everything outstanding and starts a new generation, so
 * decodes still running from the old one finish into the void.
 */

import { CancelledError } from '../cache/errors';
import type { RadarDecoder } from './types';

interface DecodeJob<T> {
  bytes: Uint8Array;
  resolve: (result: T) => void;
  reject: (error: Error) => void;
}

type DecodeOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export class DecodePool<T> {
  private decoder: RadarDecoder<T>;
  private limit: number;
  private running = new Set<DecodeJob<T>>();
  private waiting: DecodeJob<T>[] = [];
  private generation = 0;

  constructor(decoder: RadarDecoder<T>, limit = 2) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Decode concurrency must be a positive integer, got ${limit}`);
    }
    this.decoder = decoder;
    this.limit = limit;
  }

  /** Rejects with the decoder's error, or CancelledError after cancelAll(). */
  decode(bytes: Uint8Array): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const job: DecodeJob<T> = { bytes, resolve, reject };
      if (this.running.size < this.limit) this.start(job);
      else this.waiting.push(job);
    });
  }

  cancelAll(): void {
    const outstanding = [...this.running, ...this.waiting];
    this.generation++;
    this.running.clear();
    this.waiting = [];
    for (const job of outstanding) job.reject(new CancelledError());
  }

  get queueSize(): number {
    return this.waiting.length;
  }

  get busyCount(): number {
    return this.running.size;
  }

  // ── Private ────────────────────────────────────────────────────────

  private start(job: DecodeJob<T>): void {
    this.running.add(job);
    void this.run(job, this.generation);
  }

  private async run(job: DecodeJob<T>, generation: number): Promise<void> {
    let outcome: DecodeOutcome<T>;
    try {
      // Let the caller's burst of decode() calls return before any work starts
      await new Promise<void>((resolve) => setImmediate(resolve));
      outcome = { ok: true, value: await this.decoder.decode(job.bytes) };
    } catch (err) {
      outcome = { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }

    if (generation !== this.generation) return;
    this.running.delete(job);
    if (outcome.ok) job.resolve(outcome.value);
    else job.reject(outcome.error);

    const next = this.waiting.shift();
    if (next) this.start(next);
  }
}
