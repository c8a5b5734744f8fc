/**
 * Minimal S3 ListObjectsV2 client for the public NEXRAD buckets.
 *
 * No DOMParser in Node, and the listing XML is flat and regular, so tags are
 * pulled out with regular expressions.
 */

import { NetworkFailureError } from '../cache/errors';

export interface S3Object {
  key: string;
  size: number;
  lastModified: number;
}

export interface S3Listing {
  objects: S3Object[];
  /** Sub-"directories" when listing with a delimiter, e.g. `KDMX/12/` */
  commonPrefixes: string[];
}

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

function decodeXml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

function tagValues(xml: string, tag: string): string[] {
  const pattern = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, 'g');
  const values: string[] = [];
  for (const match of xml.matchAll(pattern)) {
    values.push(match[1]);
  }
  return values;
}

function firstTag(xml: string, tag: string): string | undefined {
  return tagValues(xml, tag)[0];
}

/**
 * List every object under `prefix`, following continuation tokens.
 */
export async function listObjects(
  bucketUrl: string,
  prefix: string,
  options: { delimiter?: string; maxKeys?: number; signal?: AbortSignal } = {},
): Promise<S3Listing> {
  const listing: S3Listing = { objects: [], commonPrefixes: [] };
  let continuationToken: string | null = null;

  do {
    const params = new URLSearchParams({
      'list-type': '2',
      prefix,
      ...(options.delimiter ? { delimiter: options.delimiter } : {}),
      ...(options.maxKeys ? { 'max-keys': String(options.maxKeys) } : {}),
      ...(continuationToken ? { 'continuation-token': continuationToken } : {}),
    });

    const response = await fetch(`${bucketUrl}?${params}`, { signal: options.signal });
    if (!response.ok) {
      throw new NetworkFailureError(
        `S3 listing failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const xml = await response.text();

    for (const item of tagValues(xml, 'Contents')) {
      const key = firstTag(item, 'Key');
      if (!key) continue;
      const modified = Date.parse(firstTag(item, 'LastModified') ?? '');
      listing.objects.push({
        key: decodeXml(key),
        size: parseInt(firstTag(item, 'Size') ?? '0', 10),
        lastModified: Number.isNaN(modified) ? 0 : modified,
      });
    }
    for (const item of tagValues(xml, 'CommonPrefixes')) {
      const p = firstTag(item, 'Prefix');
      if (p) listing.commonPrefixes.push(decodeXml(p));
    }

    // Single page wanted when max-keys is set
    if (options.maxKeys) break;

    const isTruncated = firstTag(xml, 'IsTruncated') === 'true';
    const nextToken = firstTag(xml, 'NextContinuationToken');
    continuationToken = isTruncated && nextToken ? decodeXml(nextToken) : null;
  } while (continuationToken);

  return listing;
}

/**
 * Fetch one object's bytes.
 */
export async function fetchObject(bucketUrl: string, key: string, signal?: AbortSignal): Promise<Uint8Array> {
  const response = await fetch(`${bucketUrl}/${key}`, { signal });
  if (!response.ok) {
    throw new NetworkFailureError(`Failed to fetch ${key}: ${response.status}`, response.status);
  }
  return new Uint8Array(await response.arrayBuffer());
}
