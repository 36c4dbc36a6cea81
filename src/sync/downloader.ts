import { open, rename, rm, stat, utimes } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomBytes } from 'node:crypto';
import {
  IntegrityError,
  LocalIOError,
  RunCancelledError,
  errorKindOf,
  errorMessage,
  toLocalError,
} from '../errors.js';
import { checksumMatches, createHasher } from '../crypto/checksum.js';
import { classifyFetchFailure, type FilesClient } from '../remote/client.js';
import { withRetry, type RetryPolicy } from '../remote/retry.js';
import type { Outcome, OutcomeSubject, TransferTask } from '../types.js';

export interface DownloadExecutorOptions {
  retry: RetryPolicy;
  preserveTimestamps: boolean;
}

export interface DownloadOptions {
  signal?: AbortSignal;
  force?: boolean;
}

type LocalState = 'missing' | 'up-to-date' | 'stale';

export function tempPathFor(destination: string): string {
  const suffix = randomBytes(6).toString('hex');
  return join(dirname(destination), `.${basename(destination)}.${suffix}.part`);
}

export function isTempArtifact(name: string): boolean {
  return /^\..+\.[0-9a-f]{12}\.part$/.test(name);
}

/**
 * Downloads one remote file to a local path: temp file in the same
 * directory, verified size (and checksum when known), then rename.
 */
export class DownloadExecutor {
  private readonly client: FilesClient;
  private readonly options: DownloadExecutorOptions;

  constructor(client: FilesClient, options: DownloadExecutorOptions) {
    this.client = client;
    this.options = options;
  }

  /**
   * Resolves to the task's outcome. Rejects only with LocalIOError or
   * RunCancelledError, which end the whole run.
   */
  async download(task: TransferTask, options: DownloadOptions = {}): Promise<Outcome> {
    const { signal, force = false } = options;
    const subject: OutcomeSubject = {
      kind: 'file',
      remotePath: task.source.path,
      localPath: task.destination,
    };

    try {
      const local = await this.inspectLocal(task);
      if (local === 'up-to-date' && !force) {
        return { status: 'skipped', subject, detail: 'up to date' };
      }

      const bytes = await withRetry(
        () => this.transfer(task, signal),
        this.options.retry,
        { signal },
      );
      return { status: 'succeeded', subject, detail: local === 'missing' ? 'new' : 'modified', bytes };
    } catch (err) {
      if (err instanceof LocalIOError || err instanceof RunCancelledError) {
        throw err;
      }
      return { status: 'failed', subject, errorKind: errorKindOf(err), reason: errorMessage(err) };
    }
  }

  private async inspectLocal(task: TransferTask): Promise<LocalState> {
    let stats: Stats;
    try {
      stats = await stat(task.destination);
    } catch (err) {
      const local = toLocalError(err, task.destination);
      if (local instanceof LocalIOError) throw local;
      return 'missing';
    }

    if (!stats.isFile() || stats.size !== task.expectedSize) {
      return 'stale';
    }
    const localSeconds = Math.floor(stats.mtimeMs / 1000);
    const remoteSeconds = Math.floor(task.source.modifiedAt.getTime() / 1000);
    return localSeconds >= remoteSeconds ? 'up-to-date' : 'stale';
  }

  private async transfer(task: TransferTask, signal: AbortSignal | undefined): Promise<number> {
    const { source, destination, expectedSize } = task;
    const tempPath = tempPathFor(destination);
    const stream = await this.client.openFile(source, signal);
    let releaseBody = async (): Promise<void> => {
      await stream.body?.cancel();
    };
    const cancelBody = async (): Promise<void> => {
      try {
        await releaseBody();
      } catch {
        // body already errored or closed
      }
    };

    if (stream.contentLength !== null && stream.contentLength !== expectedSize) {
      stream.deadline.clear();
      await cancelBody();
      throw new IntegrityError(source.path, `server announced ${stream.contentLength} bytes, expected ${expectedSize}`);
    }

    const hasher = source.checksum ? createHasher(source.checksum.algorithm) : null;
    let written = 0;

    try {
      const file = await open(tempPath, 'wx').catch((err: unknown) => {
        throw toLocalError(err, tempPath);
      });
      try {
        if (stream.body) {
          const reader = stream.body.getReader();
          releaseBody = () => reader.cancel();
          for (;;) {
            const chunk = await reader.read().catch((err: unknown) => {
              throw classifyFetchFailure(err, stream.deadline, signal, `Download of ${source.path}`);
            });
            if (chunk.done) break;

            stream.deadline.refresh();
            written += chunk.value.byteLength;
            if (written > expectedSize) {
              throw new IntegrityError(source.path, `received more than the expected ${expectedSize} bytes`);
            }
            hasher?.update(chunk.value);
            await file.write(chunk.value).catch((err: unknown) => {
              throw toLocalError(err, tempPath);
            });
          }
        }
      } finally {
        await file.close();
      }

      if (written !== expectedSize) {
        throw new IntegrityError(source.path, `received ${written} bytes, expected ${expectedSize}`);
      }
      if (hasher && source.checksum) {
        const actual = hasher.digestHex();
        if (!checksumMatches(actual, source.checksum.value)) {
          throw new IntegrityError(source.path, `${source.checksum.algorithm} mismatch (got ${actual})`);
        }
      }

      try {
        if (this.options.preserveTimestamps) {
          await utimes(tempPath, source.modifiedAt, source.modifiedAt);
        }
        await rename(tempPath, destination);
      } catch (err) {
        throw toLocalError(err, destination);
      }
      return written;
    } catch (err) {
      await cancelBody();
      await rm(tempPath, { force: true });
      throw err;
    } finally {
      stream.deadline.clear();
    }
  }
}
