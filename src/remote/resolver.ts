import { RemoteRequestError } from '../errors.js';
import type { RemoteHandle, RemoteReference } from '../types.js';
import type { FilesClient } from './client.js';
import { formatReference } from './reference.js';
import { isSelfEntry, toEntry } from './listing.js';
import { withRetry, type RetryPolicy } from './retry.js';

export class RemotePathResolver {
  private readonly client: FilesClient;
  private readonly retry: RetryPolicy;

  constructor(client: FilesClient, retry: RetryPolicy) {
    this.client = client;
    this.retry = retry;
  }

  /**
   * Ask the remote once (retrying transient failures) whether
   * the reference names a file or a directory.
   */
  async resolve(ref: RemoteReference, options: { signal?: AbortSignal } = {}): Promise<RemoteHandle> {
    const { signal } = options;
    const page = await withRetry(
      () => this.client.listPage(ref, { limit: 1, offset: 0, signal }),
      this.retry,
      { signal },
    );

    const first = page[0];
    if (!first) {
      throw new RemoteRequestError(`Remote returned no metadata for ${formatReference(ref)}`);
    }

    if (isSelfEntry(first)) {
      const entry = toEntry(first);
      return { system: ref.system, path: ref.path, kind: 'directory', size: 0, modifiedAt: entry.modifiedAt };
    }

    if (first.type === 'file') {
      const entry = toEntry(first);
      const handle: RemoteHandle = {
        system: ref.system,
        path: ref.path,
        kind: 'file',
        size: entry.size,
        modifiedAt: entry.modifiedAt,
        ...(entry.checksum ? { checksum: entry.checksum } : {}),
      };
      return handle;
    }

    throw new RemoteRequestError(
      `Cannot tell whether ${formatReference(ref)} is a file or a directory (first entry "${first.name}")`,
    );
  }
}
