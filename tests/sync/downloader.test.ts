import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FilesClient, type FetchLike } from '../../src/remote/client.js';
import { DownloadExecutor, isTempArtifact, tempPathFor } from '../../src/sync/downloader.js';
import { sha256 } from '@noble/hashes/sha256';
import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';
import { RunCancelledError } from '../../src/errors.js';
import type { RemoteHandle, TransferTask } from '../../src/types.js';
import {
  DEFAULT_MODIFIED,
  TEST_BASE_URL,
  TEST_TOKEN,
  createFakeAgave,
  dir,
  file,
  type FakeAgave,
  type FakeDir,
} from '../helpers/fake-agave.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'files-sync-download-test-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

const encoder = new TextEncoder();

function executorFor(fake: FakeAgave): DownloadExecutor {
  const client = new FilesClient({ baseUrl: TEST_BASE_URL, token: TEST_TOKEN, timeoutMs: 1000, fetch: fake.fetch });
  return new DownloadExecutor(client, {
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    preserveTimestamps: true,
  });
}

function taskFor(name: string, size: number, extra: Partial<RemoteHandle> = {}): TransferTask {
  const source: RemoteHandle = {
    system: 'sys',
    path: `/${name}`,
    kind: 'file',
    size,
    modifiedAt: new Date(DEFAULT_MODIFIED),
    ...extra,
  };
  return { source, destination: join(tmpDir, name), expectedSize: size };
}

function setup(root: FakeDir): { fake: FakeAgave; executor: DownloadExecutor } {
  const fake = createFakeAgave({ sys: root });
  return { fake, executor: executorFor(fake) };
}

describe('DownloadExecutor', () => {
  it('writes the exact bytes and leaves no temp file behind', async () => {
    const { executor } = setup(dir({ 'office-ipsum.txt': file('Lorem ipsum dolor sit amet') }));
    const outcome = await executor.download(taskFor('office-ipsum.txt', 26));

    expect(outcome).toEqual({
      status: 'succeeded',
      subject: { kind: 'file', remotePath: '/office-ipsum.txt', localPath: join(tmpDir, 'office-ipsum.txt') },
      detail: 'new',
      bytes: 26,
    });
    expect(await readFile(join(tmpDir, 'office-ipsum.txt'), 'utf-8')).toBe('Lorem ipsum dolor sit amet');
    expect(await readdir(tmpDir)).toEqual(['office-ipsum.txt']);
  });

  it('sets the local modification time to the remote one', async () => {
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    await executor.download(taskFor('a.txt', 3));
    const stats = await stat(join(tmpDir, 'a.txt'));
    expect(Math.floor(stats.mtimeMs / 1000)).toBe(Math.floor(Date.parse(DEFAULT_MODIFIED) / 1000));
  });

  it('handles a zero-byte file', async () => {
    const { executor } = setup(dir({ 'empty.txt': file('') }));
    const outcome = await executor.download(taskFor('empty.txt', 0));
    expect(outcome).toMatchObject({ status: 'succeeded', bytes: 0 });
    expect((await stat(join(tmpDir, 'empty.txt'))).size).toBe(0);
  });

  it('skips a file that is already up to date', async () => {
    const { fake, executor } = setup(dir({ 'a.txt': file('abc') }));
    await executor.download(taskFor('a.txt', 3));
    const second = await executor.download(taskFor('a.txt', 3));

    expect(second).toMatchObject({ status: 'skipped', detail: 'up to date' });
    expect(fake.requests.filter((r) => r.startsWith('media'))).toHaveLength(1);
  });

  it('downloads again when forced', async () => {
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    await executor.download(taskFor('a.txt', 3));
    const forced = await executor.download(taskFor('a.txt', 3), { force: true });
    expect(forced).toMatchObject({ status: 'succeeded', detail: 'modified', bytes: 3 });
  });

  it('replaces a local copy with a different size', async () => {
    const { executor } = setup(dir({ 'a.txt': file('new content') }));
    await writeFile(join(tmpDir, 'a.txt'), 'old');
    const outcome = await executor.download(taskFor('a.txt', 11));
    expect(outcome).toMatchObject({ status: 'succeeded', detail: 'modified' });
    expect(await readFile(join(tmpDir, 'a.txt'), 'utf-8')).toBe('new content');
  });

  it('retries after a transient server error', async () => {
    const { fake, executor } = setup(dir({ 'a.txt': file('abc') }));
    fake.failNext('media', 'sys', '/a.txt', 503);
    const outcome = await executor.download(taskFor('a.txt', 3));
    expect(outcome).toMatchObject({ status: 'succeeded', bytes: 3 });
    expect(fake.requests).toEqual(['media sys/a.txt', 'media sys/a.txt']);
  });

  it('fails a short body as an integrity error and removes the temp file', async () => {
    const { executor } = setup(dir({ 'a.txt': file('short') }));
    const outcome = await executor.download(taskFor('a.txt', 10));

    expect(outcome).toMatchObject({
      status: 'failed',
      errorKind: 'integrity',
      reason: 'Integrity check failed for /a.txt: received 5 bytes, expected 10',
    });
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it('stops reading once the body exceeds the expected size', async () => {
    const { executor } = setup(dir({ 'a.txt': file('much longer') }));
    const outcome = await executor.download(taskFor('a.txt', 2));
    expect(outcome).toMatchObject({
      status: 'failed',
      errorKind: 'integrity',
      reason: 'Integrity check failed for /a.txt: received more than the expected 2 bytes',
    });
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it('keeps an existing local file when the replacement fails verification', async () => {
    const { executor } = setup(dir({ 'a.txt': file('short') }));
    await writeFile(join(tmpDir, 'a.txt'), 'previous');
    const outcome = await executor.download(taskFor('a.txt', 10));
    expect(outcome.status).toBe('failed');
    expect(await readFile(join(tmpDir, 'a.txt'), 'utf-8')).toBe('previous');
  });

  it('accepts a matching sha256 checksum', async () => {
    const digest = bytesToHex(sha256(encoder.encode('abc')));
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    const outcome = await executor.download(
      taskFor('a.txt', 3, { checksum: { algorithm: 'sha256', value: digest } }),
    );
    expect(outcome.status).toBe('succeeded');
  });

  it('rejects content whose checksum does not match', async () => {
    const expected = bytesToHex(sha256(encoder.encode('xyz')));
    const actual = bytesToHex(sha256(encoder.encode('abc')));
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    const outcome = await executor.download(
      taskFor('a.txt', 3, { checksum: { algorithm: 'sha256', value: expected } }),
    );
    expect(outcome).toMatchObject({
      status: 'failed',
      errorKind: 'integrity',
      reason: `Integrity check failed for /a.txt: sha256 mismatch (got ${actual})`,
    });
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it('verifies blake3 checksums too', async () => {
    const digest = bytesToHex(blake3(encoder.encode('abc')));
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    const outcome = await executor.download(
      taskFor('a.txt', 3, { checksum: { algorithm: 'blake3', value: digest } }),
    );
    expect(outcome.status).toBe('succeeded');
  });

  it('reports a missing remote file as a failed outcome', async () => {
    const { executor } = setup(dir());
    const outcome = await executor.download(taskFor('gone.txt', 3));
    expect(outcome).toMatchObject({ status: 'failed', errorKind: 'not-found' });
  });

  it('reports a local directory in the way as a local conflict', async () => {
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    await mkdir(join(tmpDir, 'a.txt'));
    const outcome = await executor.download(taskFor('a.txt', 3));
    expect(outcome).toMatchObject({ status: 'failed', errorKind: 'local-conflict' });
    expect(await readdir(tmpDir)).toEqual(['a.txt']);
  });

  it('rejects when the run is cancelled', async () => {
    const { executor } = setup(dir({ 'a.txt': file('abc') }));
    const controller = new AbortController();
    controller.abort();
    await expect(executor.download(taskFor('a.txt', 3), { signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError,
    );
  });
});

describe('response body release', () => {
  function openEndedServer(headers: Record<string, string>): { fetch: FetchLike; state: { cancelled: boolean } } {
    const state = { cancelled: false };
    const fetch: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(encoder.encode('abc'));
          },
          cancel() {
            state.cancelled = true;
          },
        }),
        { status: 200, headers },
      );
    return { fetch, state };
  }

  function executorWith(fetch: FetchLike): DownloadExecutor {
    const client = new FilesClient({ baseUrl: TEST_BASE_URL, token: TEST_TOKEN, timeoutMs: 1000, fetch });
    return new DownloadExecutor(client, {
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
      preserveTimestamps: true,
    });
  }

  it('cancels the body when the announced length is wrong', async () => {
    const { fetch, state } = openEndedServer({ 'Content-Length': '99' });
    const outcome = await executorWith(fetch).download(taskFor('a.txt', 3));

    expect(outcome).toMatchObject({ status: 'failed', errorKind: 'integrity' });
    expect(state.cancelled).toBe(true);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it('cancels the body when the temp file cannot be created', async () => {
    const { fetch, state } = openEndedServer({});
    const task = taskFor('a.txt', 3);
    const outcome = await executorWith(fetch).download({ ...task, destination: join(tmpDir, 'missing', 'a.txt') });

    expect(outcome).toMatchObject({ status: 'failed', errorKind: 'local-conflict' });
    expect(state.cancelled).toBe(true);
  });
});

describe('temp file names', () => {
  it('are hidden siblings of the destination', () => {
    const temp = tempPathFor(join('/data', 'report.csv'));
    expect(temp).toMatch(/^\/data\/\.report\.csv\.[0-9a-f]{12}\.part$/);
    expect(isTempArtifact(temp.slice('/data/'.length))).toBe(true);
  });

  it('are not confused with ordinary files', () => {
    expect(isTempArtifact('report.csv')).toBe(false);
    expect(isTempArtifact('.report.csv.part')).toBe(false);
  });
});
