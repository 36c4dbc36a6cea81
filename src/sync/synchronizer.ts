import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import picomatch from 'picomatch';
import {
  LocalIOError,
  RunCancelledError,
  errorKindOf,
  errorMessage,
  toLocalError,
} from '../errors.js';
import type { ListingClient } from '../remote/listing.js';
import { joinRemotePath } from '../remote/reference.js';
import type { Entry, OutcomeSubject, RemoteHandle } from '../types.js';
import { isTempArtifact, type DownloadExecutor } from './downloader.js';
import type { SyncRun } from './run.js';

export type DirectoryState = 'pending' | 'listing' | 'dispatching' | 'done';

interface DirectoryNode {
  handle: RemoteHandle;
  localPath: string;
  /** Path relative to the synchronized root, '' for the root itself. */
  relativePath: string;
  state: DirectoryState;
  /** Unfinished children plus one while the listing is still open. */
  pending: number;
  parent: DirectoryNode | null;
}

type Job =
  | { type: 'directory'; node: DirectoryNode }
  | { type: 'file'; entry: Entry; parent: DirectoryNode };

export interface TreeSynchronizerOptions {
  maxConcurrency: number;
  exclude?: string[];
  force?: boolean;
  onDirectoryState?: (relativePath: string, state: DirectoryState) => void;
}

const UNSAFE_NAME = /[/\\\0]/;

export function isSafeEntryName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !UNSAFE_NAME.test(name);
}

/**
 * Mirrors a remote directory tree. Traversal runs off an explicit job stack
 * (depth-first) with at most `maxConcurrency` jobs in flight; every
 * outcome is recorded on the run.
 */
export class TreeSynchronizer {
  private readonly listing: ListingClient;
  private readonly downloader: DownloadExecutor;
  private readonly run: SyncRun;
  private readonly maxConcurrency: number;
  private readonly isExcluded: (relativePath: string) => boolean;
  private readonly force: boolean;
  private readonly onDirectoryState: TreeSynchronizerOptions['onDirectoryState'];

  private jobs: Job[] = [];
  private fatal: Error | null = null;
  private readonly controller = new AbortController();

  constructor(listing: ListingClient, downloader: DownloadExecutor, run: SyncRun, options: TreeSynchronizerOptions) {
    this.listing = listing;
    this.downloader = downloader;
    this.run = run;
    this.maxConcurrency = Math.max(1, options.maxConcurrency);
    const exclude = options.exclude ?? [];
    this.isExcluded = exclude.length > 0 ? picomatch(exclude, { dot: true }) : () => false;
    this.force = options.force ?? false;
    this.onDirectoryState = options.onDirectoryState;
  }

  /**
   * Mirror `root` into `localRoot`. Rejects with LocalIOError or
   * RunCancelledError once in-flight work has settled.
   */
  async synchronize(root: RemoteHandle, localRoot: string, options: { signal?: AbortSignal } = {}): Promise<void> {
    const { signal } = options;
    const onAbort = (): void => {
      this.stop(new RunCancelledError());
    };
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.fatal = null;
    this.jobs = [{ type: 'directory', node: this.createNode(root, localRoot, '', null) }];

    try {
      await this.drain();
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.jobs = [];
    }

    if (this.fatal) {
      throw this.fatal;
    }
  }

  private createNode(handle: RemoteHandle, localPath: string, relativePath: string, parent: DirectoryNode | null): DirectoryNode {
    const node: DirectoryNode = { handle, localPath, relativePath, state: 'pending', pending: 1, parent };
    this.onDirectoryState?.(relativePath, 'pending');
    return node;
  }

  private setState(node: DirectoryNode, state: DirectoryState): void {
    node.state = state;
    this.onDirectoryState?.(node.relativePath, state);
  }

  private stop(error: Error): void {
    if (this.fatal) return;
    this.fatal = error;
    this.controller.abort(error);
  }

  private async drain(): Promise<void> {
    const active = new Set<Promise<void>>();

    for (;;) {
      while (!this.fatal && active.size < this.maxConcurrency) {
        const job = this.jobs.pop();
        if (!job) break;
        const running: Promise<void> = this.execute(job).finally(() => {
          active.delete(running);
        });
        active.add(running);
      }
      if (active.size === 0) return;
      await Promise.race(active);
    }
  }

  private async execute(job: Job): Promise<void> {
    try {
      if (job.type === 'directory') {
        await this.visitDirectory(job.node);
      } else {
        await this.transferFile(job.entry, job.parent);
      }
    } catch (err) {
      if (err instanceof LocalIOError || err instanceof RunCancelledError) {
        this.stop(err);
      } else {
        this.stop(new Error(`Unexpected failure: ${errorMessage(err)}`, { cause: err }));
      }
    }
  }

  private async visitDirectory(node: DirectoryNode): Promise<void> {
    const subject = this.subjectFor('directory', node.handle.path, node.localPath);
    this.setState(node, 'listing');

    try {
      for await (const entry of this.listing.list(node.handle, { signal: this.controller.signal })) {
        if (node.state === 'listing') {
          await this.enterDispatching(node, subject);
        }
        if (this.fatal) return;
        this.dispatch(entry, node);
      }
      if (node.state === 'listing') {
        await this.enterDispatching(node, subject);
      }
    } catch (err) {
      if (err instanceof LocalIOError || err instanceof RunCancelledError) throw err;
      this.run.record({ status: 'failed', subject, errorKind: errorKindOf(err), reason: errorMessage(err) });
    } finally {
      this.childDone(node);
    }
  }

  private async enterDispatching(node: DirectoryNode, subject: OutcomeSubject): Promise<void> {
    this.setState(node, 'dispatching');

    let existed = false;
    try {
      const stats = await stat(node.localPath);
      existed = stats.isDirectory();
    } catch {
      existed = false;
    }

    if (existed) {
      await this.sweepTempFiles(node.localPath);
      this.run.record({ status: 'skipped', subject, detail: 'exists' });
      return;
    }

    try {
      await mkdir(node.localPath, { recursive: true });
    } catch (err) {
      throw toLocalError(err, node.localPath);
    }
    this.run.record({ status: 'succeeded', subject, detail: 'created', bytes: 0 });
  }

  /** Remove `.part` files left by an interrupted earlier run. */
  private async sweepTempFiles(localPath: string): Promise<void> {
    try {
      const names = await readdir(localPath);
      for (const name of names.filter(isTempArtifact)) {
        await rm(join(localPath, name), { force: true });
      }
    } catch (err) {
      throw toLocalError(err, localPath);
    }
  }

  private dispatch(entry: Entry, parent: DirectoryNode): void {
    const remotePath = joinRemotePath(parent.handle.path, entry.name);
    const localPath = join(parent.localPath, entry.name);

    if (!isSafeEntryName(entry.name)) {
      this.run.record({
        status: 'failed',
        subject: this.subjectFor(entry.kind, remotePath, parent.localPath),
        errorKind: 'remote-request',
        reason: `Refusing unsafe entry name ${JSON.stringify(entry.name)}`,
      });
      return;
    }

    const relativePath = parent.relativePath ? `${parent.relativePath}/${entry.name}` : entry.name;
    if (this.isExcluded(relativePath)) {
      this.run.record({ status: 'skipped', subject: this.subjectFor(entry.kind, remotePath, localPath), detail: 'excluded' });
      return;
    }

    parent.pending++;
    if (entry.kind === 'directory') {
      const handle: RemoteHandle = {
        system: parent.handle.system,
        path: remotePath,
        kind: 'directory',
        size: 0,
        modifiedAt: entry.modifiedAt,
      };
      this.jobs.push({ type: 'directory', node: this.createNode(handle, localPath, relativePath, parent) });
    } else {
      this.jobs.push({ type: 'file', entry, parent });
    }
  }

  private async transferFile(entry: Entry, parent: DirectoryNode): Promise<void> {
    try {
      const source: RemoteHandle = {
        system: parent.handle.system,
        path: joinRemotePath(parent.handle.path, entry.name),
        kind: 'file',
        size: entry.size,
        modifiedAt: entry.modifiedAt,
        ...(entry.checksum ? { checksum: entry.checksum } : {}),
      };
      const outcome = await this.downloader.download(
        { source, destination: join(parent.localPath, entry.name), expectedSize: entry.size },
        { signal: this.controller.signal, force: this.force },
      );
      this.run.record(outcome);
    } finally {
      this.childDone(parent);
    }
  }

  private childDone(node: DirectoryNode): void {
    let current: DirectoryNode | null = node;
    while (current) {
      current.pending--;
      if (current.pending > 0) return;
      this.setState(current, 'done');
      current = current.parent;
    }
  }

  private subjectFor(kind: OutcomeSubject['kind'], remotePath: string, localPath: string): OutcomeSubject {
    return { kind, remotePath, localPath };
  }
}
