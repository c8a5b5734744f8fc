import { link, mkdir, open, readdir, readFile, rename, rm, unlink } from 'node:fs/promises';
import * as path from 'node:path';
import type { KeyValueStore } from './kvStore';

/**
 * File-system {@link KeyValueStore}.
 *
 * Layout: `<root>/<namespace>/<encoded-id>.bin`. Ids are percent-encoded so
 * the `|` separators in storage keys stay filename-safe. Every write goes
 * through a temp file, so a crash never leaves a half-written entry behind.
 */
export class FileSystemKeyValueStore implements KeyValueStore {
  private root: string;

  constructor(root: string) {
    this.root = root;
  }

  async get(namespace: string, id: string): Promise<Uint8Array | null> {
    try {
      const data = await readFile(this.pathFor(namespace, id));
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return null;
      throw err;
    }
  }

  async put(namespace: string, id: string, value: Uint8Array): Promise<void> {
    const finalPath = this.pathFor(namespace, id);
    const tmpPath = await this.writeTemp(finalPath, value);
    await rename(tmpPath, finalPath);
  }

  async putIfAbsent(namespace: string, id: string, value: Uint8Array): Promise<boolean> {
    const finalPath = this.pathFor(namespace, id);
    const tmpPath = await this.writeTemp(finalPath, value);
    try {
      // link() fails with EEXIST instead of replacing, unlike rename()
      await link(tmpPath, finalPath);
      return true;
    } catch (err) {
      if (isErrnoCode(err, 'EEXIST')) return false;
      throw err;
    } finally {
      await unlink(tmpPath);
    }
  }

  async delete(namespace: string, id: string): Promise<void> {
    try {
      await unlink(this.pathFor(namespace, id));
    } catch (err) {
      if (!isErrnoCode(err, 'ENOENT')) throw err;
    }
  }

  async list(namespace: string): Promise<string[]> {
    try {
      const files = await readdir(path.join(this.root, namespace));
      return files
        .filter((f) => f.endsWith('.bin'))
        .map((f) => decodeURIComponent(f.slice(0, -'.bin'.length)));
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return [];
      throw err;
    }
  }

  async clear(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }

  // ── Private ────────────────────────────────────────────────────────

  private pathFor(namespace: string, id: string): string {
    return path.join(this.root, namespace, `${encodeURIComponent(id)}.bin`);
  }

  private async writeTemp(finalPath: string, value: Uint8Array): Promise<string> {
    await mkdir(path.dirname(finalPath), { recursive: true });
    const tmpPath = `${finalPath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
    const handle = await open(tmpPath, 'w');
    try {
      await handle.writeFile(value);
      await handle.sync();
    } finally {
      await handle.close();
    }
    return tmpPath;
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
