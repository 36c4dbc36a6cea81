import { describe, it, expect } from 'vitest';
import { FilesClient } from '../../src/remote/client.js';
import { ListingClient, toEntry } from '../../src/remote/listing.js';
import type { RetryPolicy } from '../../src/remote/retry.js';
import { NotFoundError } from '../../src/errors.js';
import type { Entry } from '../../src/types.js';
import { TEST_BASE_URL, TEST_TOKEN, createFakeAgave, dir, file, type FakeAgave } from '../helpers/fake-agave.js';

const retry: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

function listingFor(fake: FakeAgave, pageSize: number): ListingClient {
  const client = new FilesClient({ baseUrl: TEST_BASE_URL, token: TEST_TOKEN, timeoutMs: 1000, fetch: fake.fetch });
  return new ListingClient(client, pageSize, retry);
}

async function collect(entries: AsyncIterable<Entry>): Promise<Entry[]> {
  const out: Entry[] = [];
  for await (const entry of entries) out.push(entry);
  return out;
}

describe('ListingClient', () => {
  it('pages through a directory and drops the self entry', async () => {
    const fake = createFakeAgave({
      sys: dir({ big: dir({ 'a.txt': file('a'), 'b.txt': file('bb'), 'c.txt': file('ccc') }) }),
    });
    const entries = await collect(listingFor(fake, 2).list({ system: 'sys', path: '/big' }));

    expect(entries.map((e) => e.name)).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(entries.map((e) => e.size)).toEqual([1, 2, 3]);
    expect(fake.requests).toEqual([
      'listings sys/big?limit=2&offset=0',
      'listings sys/big?limit=2&offset=2',
      'listings sys/big?limit=2&offset=4',
    ]);
  });

  it('keeps paging when the server returns fewer entries than requested', async () => {
    const children: Record<string, ReturnType<typeof file>> = {};
    for (let i = 0; i < 7; i++) children[`f${i}.txt`] = file(`file ${i}`);
    const fake = createFakeAgave({ sys: dir({ many: dir(children) }) });
    fake.setPageCap(3);

    const entries = await collect(listingFor(fake, 100).list({ system: 'sys', path: '/many' }));
    expect(entries.map((e) => e.name)).toEqual(['f0.txt', 'f1.txt', 'f2.txt', 'f3.txt', 'f4.txt', 'f5.txt', 'f6.txt']);
    expect(fake.requests).toEqual([
      'listings sys/many?limit=100&offset=0',
      'listings sys/many?limit=100&offset=3',
      'listings sys/many?limit=100&offset=6',
      'listings sys/many?limit=100&offset=8',
    ]);
  });

  it('yields nothing for an empty directory', async () => {
    const fake = createFakeAgave({ sys: dir({ 'empty-directory': dir() }) });
    const entries = await collect(listingFor(fake, 100).list({ system: 'sys', path: '/empty-directory' }));
    expect(entries).toEqual([]);
    expect(fake.requests).toEqual([
      'listings sys/empty-directory?limit=100&offset=0',
      'listings sys/empty-directory?limit=100&offset=1',
    ]);
  });

  it('retries a page that failed transiently', async () => {
    const fake = createFakeAgave({ sys: dir({ d: dir({ 'x.txt': file('x') }) }) });
    fake.failNext('listings', 'sys', '/d', 503);
    const entries = await collect(listingFor(fake, 100).list({ system: 'sys', path: '/d' }));
    expect(entries.map((e) => e.name)).toEqual(['x.txt']);
    expect(fake.requests).toHaveLength(3);
  });

  it('surfaces a missing directory', async () => {
    const fake = createFakeAgave({ sys: dir() });
    await expect(collect(listingFor(fake, 100).list({ system: 'sys', path: '/nope' }))).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

describe('toEntry', () => {
  it('keeps a recognised checksum in lowercase', () => {
    const entry = toEntry({
      name: 'a.txt',
      type: 'file',
      length: 3,
      lastModified: '2024-01-02T09:04:05.000Z',
      checksum: 'ABCDEF',
      checksumType: 'SHA-256',
    });
    expect(entry).toEqual({
      name: 'a.txt',
      kind: 'file',
      size: 3,
      modifiedAt: new Date('2024-01-02T09:04:05.000Z'),
      checksum: { algorithm: 'sha256', value: 'abcdef' },
    });
  });

  it('ignores checksums of unknown algorithms', () => {
    const entry = toEntry({ name: 'a.txt', type: 'file', length: 3, lastModified: '2024-01-02T09:04:05.000Z', checksum: 'x', checksumType: 'md5' });
    expect(entry.checksum).toBeUndefined();
  });

  it('reports directories with size zero', () => {
    const entry = toEntry({ name: 'sub', type: 'dir', length: 4096, lastModified: '2024-01-02T09:04:05.000Z' });
    expect(entry.kind).toBe('directory');
    expect(entry.size).toBe(0);
  });
});
