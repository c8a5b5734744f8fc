/**
 * In-process stand-in for a public S3 bucket: answers ListObjectsV2 queries
 * (prefix, delimiter, max-keys, continuation tokens) and object GETs.
 * Install with `vi.stubGlobal('fetch', bucket.fetch)`.
 */

export interface FakeObject {
  key: string;
  body?: Uint8Array;
  lastModified?: number;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export class FakeBucket {
  objects: FakeObject[] = [];
  /** Keys per listing page */
  pageSize = 1000;
  /** When set, every request answers with this status */
  failStatus: number | null = null;
  requests: string[] = [];

  put(key: string, body: Uint8Array = new Uint8Array([1, 2, 3]), lastModified = 0): void {
    this.objects.push({ key, body, lastModified });
  }

  fetch = async (input: unknown): Promise<Response> => {
    const url = new URL(String(input));
    this.requests.push(url.pathname + url.search);
    if (this.failStatus !== null) {
      return new Response('failure', { status: this.failStatus, statusText: 'Unavailable' });
    }
    if (url.searchParams.get('list-type') === '2') {
      return new Response(this.list(url.searchParams), { status: 200 });
    }
    const key = decodeURIComponent(url.pathname.slice(1));
    const obj = this.objects.find((o) => o.key === key);
    if (!obj) return new Response('NoSuchKey', { status: 404, statusText: 'Not Found' });
    return new Response(obj.body ?? new Uint8Array(), { status: 200 });
  };

  private list(params: URLSearchParams): string {
    const prefix = params.get('prefix') ?? '';
    const delimiter = params.get('delimiter');
    const maxKeys = Number(params.get('max-keys') ?? this.pageSize);
    const offset = Number(params.get('continuation-token') ?? 0);

    const contents: FakeObject[] = [];
    const prefixes = new Set<string>();
    for (const obj of [...this.objects].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))) {
      if (!obj.key.startsWith(prefix)) continue;
      const rest = obj.key.slice(prefix.length);
      const cut = delimiter ? rest.indexOf(delimiter) : -1;
      if (delimiter && cut >= 0) {
        prefixes.add(prefix + rest.slice(0, cut + delimiter.length));
      } else {
        contents.push(obj);
      }
    }

    const limit = Math.min(maxKeys, this.pageSize);
    const page = contents.slice(offset, offset + limit);
    const truncated = offset + limit < contents.length;
    const body = [
      `<IsTruncated>${truncated}</IsTruncated>`,
      ...page.map((o) =>
        `<Contents><Key>${escapeXml(o.key)}</Key>`
        + `<LastModified>${new Date(o.lastModified ?? 0).toISOString()}</LastModified>`
        + `<Size>${o.body?.byteLength ?? 0}</Size></Contents>`),
      ...[...prefixes].map((p) => `<CommonPrefixes><Prefix>${escapeXml(p)}</Prefix></CommonPrefixes>`),
      truncated ? `<NextContinuationToken>${offset + limit}</NextContinuationToken>` : '',
    ];
    return `<?xml version="1.0" encoding="UTF-8"?><ListBucketResult>${body.join('')}</ListBucketResult>`;
  }
}
