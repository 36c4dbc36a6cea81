import { stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { InvalidReferenceError, SyncError, errorMessage } from '../errors.js';
import type { FilesSyncConfig } from '../config.js';
import {
  FilesClient,
  ListingClient,
  RemotePathResolver,
  formatReference,
  parseSource,
  remoteBasename,
  serviceRoot,
  type FetchLike,
  type RetryPolicy,
} from '../remote/index.js';
import type { Credentials, RunSummary } from '../types.js';
import { DownloadExecutor } from './downloader.js';
import { SyncRun } from './run.js';
import { TreeSynchronizer, type DirectoryState } from './synchronizer.js';

export interface SyncRequest {
  reference: string;
  destination: string;
  recursive: boolean;
  newName?: string;
  force?: boolean;
  exclude?: string[];
  maxConcurrency?: number;
}

export interface SyncSessionOptions {
  config: FilesSyncConfig;
  credentials: Credentials;
  fetch?: FetchLike;
  onDirectoryState?: (relativePath: string, state: DirectoryState) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function retryPolicyFrom(config: FilesSyncConfig): RetryPolicy {
  return {
    maxAttempts: config.sync.maxRetries + 1,
    baseDelayMs: config.sync.retryBaseDelayMs,
    maxDelayMs: config.sync.retryMaxDelayMs,
  };
}

/**
 * One invocation: resolve the reference, then download the file or mirror
 * the directory tree, recording every outcome on `run`.
 */
export class SyncSession {
  private readonly config: FilesSyncConfig;
  private readonly serviceUrl: string;
  private readonly client: FilesClient;
  private readonly resolver: RemotePathResolver;
  private readonly listing: ListingClient;
  private readonly downloader: DownloadExecutor;
  private readonly onDirectoryState: SyncSessionOptions['onDirectoryState'];

  constructor(options: SyncSessionOptions) {
    this.config = options.config;
    this.serviceUrl = serviceRoot(options.credentials.baseUrl);
    this.client = new FilesClient({
      baseUrl: options.credentials.baseUrl,
      token: options.credentials.accessToken,
      timeoutMs: options.config.sync.requestTimeoutMs,
      fetch: options.fetch,
    });

    const retry = retryPolicyFrom(options.config);
    this.resolver = new RemotePathResolver(this.client, retry);
    this.listing = new ListingClient(this.client, options.config.sync.pageSize, retry);
    this.downloader = new DownloadExecutor(this.client, {
      retry,
      preserveTimestamps: options.config.sync.preserveTimestamps,
    });
    this.onDirectoryState = options.onDirectoryState;
  }

  async run(request: SyncRequest, run: SyncRun = new SyncRun(), signal?: AbortSignal): Promise<RunSummary> {
    try {
      await this.execute(request, run, signal);
    } catch (err) {
      const expected = err instanceof SyncError || err instanceof UsageError;
      run.fail(expected ? err : new Error(`Unexpected failure: ${errorMessage(err)}`, { cause: err }));
    }
    return run.finalize();
  }

  private async execute(request: SyncRequest, run: SyncRun, signal?: AbortSignal): Promise<void> {
    const { reference: ref, serviceUrl } = parseSource(request.reference);
    // the token is only ever sent to the configured service
    if (serviceUrl !== null && serviceUrl !== this.serviceUrl) {
      throw new InvalidReferenceError(request.reference, `URL is not under the configured service ${this.serviceUrl}`);
    }
    const destination = resolve(request.destination);
    await this.assertDirectory(destination);

    const handle = await this.resolver.resolve(ref, { signal });
    const localName = request.newName ?? remoteBasename(ref);
    if (localName === '' || localName.includes('/') || localName === '.' || localName === '..') {
      throw new UsageError(`"${localName}" is not a usable local name`);
    }
    const localPath = join(destination, localName);

    if (handle.kind === 'file') {
      const outcome = await this.downloader.download(
        { source: handle, destination: localPath, expectedSize: handle.size },
        { signal, force: request.force },
      );
      run.record(outcome);
      return;
    }

    if (!request.recursive) {
      throw new UsageError(`${formatReference(ref)} is a directory; pass --recursive to mirror it`);
    }

    const synchronizer = new TreeSynchronizer(this.listing, this.downloader, run, {
      maxConcurrency: request.maxConcurrency ?? this.config.sync.maxConcurrency,
      exclude: [...this.config.sync.exclude, ...(request.exclude ?? [])],
      force: request.force,
      onDirectoryState: this.onDirectoryState,
    });
    await synchronizer.synchronize(handle, localPath, { signal });
  }

  private async assertDirectory(path: string): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) {
      throw new UsageError(`Destination ${path} is not an existing directory`);
    }
  }
}
