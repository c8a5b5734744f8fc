/**
 * Archive II files are a volume header followed by LDM records, each a
 * bzip2 stream. Splitting at every `BZh1`..`BZh9` magic yields one record per
 * stream. The volume header travels with record 0 and each stream's length
 * prefix with the record before it, so concatenating the pieces in order
 * reproduces the file byte for byte.
 */

export interface SplitRecord {
  recordId: number;
  bytes: Uint8Array;
}

const B = 0x42;
const Z = 0x5a;
const H = 0x68;
const LEVEL_1 = 0x31;
const LEVEL_9 = 0x39;

function isBzip2Magic(data: Uint8Array, i: number): boolean {
  return data[i] === B && data[i + 1] === Z && data[i + 2] === H
    && data[i + 3] >= LEVEL_1 && data[i + 3] <= LEVEL_9;
}

function findMagic(data: Uint8Array, from: number): number {
  for (let i = from; i + 3 < data.length; i++) {
    if (isBzip2Magic(data, i)) return i;
  }
  return data.length;
}

export function splitArchiveIntoRecords(data: Uint8Array): SplitRecord[] {
  const records: SplitRecord[] = [];
  let pos = 0;

  while (pos < data.length) {
    // Anything before the first stream belongs to record 0
    const streamStart = pos === 0 ? findMagic(data, 0) : pos;
    // Skip the magic at streamStart itself
    const end = findMagic(data, streamStart + 4);
    records.push({ recordId: records.length, bytes: data.subarray(pos, end) });
    pos = end;
  }

  return records;
}

export function reassembleRecords(records: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const r of records) total += r.byteLength;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const r of records) {
    out.set(r, offset);
    offset += r.byteLength;
  }
  return out;
}
