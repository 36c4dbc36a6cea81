import type { Checksum, ChecksumAlgorithm, Entry, RemoteReference } from '../types.js';
import type { FileInfo, FilesClient } from './client.js';
import { withRetry, type RetryPolicy } from './retry.js';

export interface ListingOptions {
  signal?: AbortSignal;
}

const CHECKSUM_ALGORITHMS: Record<string, ChecksumAlgorithm> = {
  sha256: 'sha256',
  'sha-256': 'sha256',
  blake3: 'blake3',
};

function toChecksum(info: FileInfo): Checksum | undefined {
  if (!info.checksum || !info.checksumType) return undefined;
  const algorithm = CHECKSUM_ALGORITHMS[info.checksumType.toLowerCase()];
  if (!algorithm) return undefined;
  return { algorithm, value: info.checksum.toLowerCase() };
}

export function toEntry(info: FileInfo): Entry {
  const entry: Entry = {
    name: info.name,
    kind: info.type === 'dir' ? 'directory' : 'file',
    size: info.type === 'dir' ? 0 : info.length,
    modifiedAt: new Date(info.lastModified),
  };
  const checksum = toChecksum(info);
  if (checksum) entry.checksum = checksum;
  return entry;
}

export function isSelfEntry(info: FileInfo): boolean {
  return info.type === 'dir' && info.name === '.';
}

export class ListingClient {
  private readonly client: FilesClient;
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;

  constructor(client: FilesClient, pageSize: number, retry: RetryPolicy) {
    this.client = client;
    this.pageSize = pageSize;
    this.retry = retry;
  }

  /**
   * Immediate children of a directory, fetched page by page as the caller
   * iterates. An empty directory yields nothing.
   *
   * Servers may return fewer entries than `limit` even when more remain, so
   * only an empty page ends the listing.
   */
  async *list(directory: RemoteReference, options: ListingOptions = {}): AsyncGenerator<Entry, void, undefined> {
    const { signal } = options;
    let offset = 0;

    for (;;) {
      const currentOffset = offset;
      const page = await withRetry(
        () => this.client.listPage(directory, { limit: this.pageSize, offset: currentOffset, signal }),
        this.retry,
        { signal },
      );

      if (page.length === 0) return;
      for (const info of page) {
        if (isSelfEntry(info)) continue;
        yield toEntry(info);
      }
      offset += page.length;
    }
  }
}
