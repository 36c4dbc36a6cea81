import { describe, it, expect } from 'vitest';
import { FilesClient } from '../../src/remote/client.js';
import { RemotePathResolver } from '../../src/remote/resolver.js';
import { AccessError, NotFoundError } from '../../src/errors.js';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';
import {
  DEFAULT_MODIFIED,
  TEST_BASE_URL,
  TEST_TOKEN,
  createFakeAgave,
  dir,
  file,
  type FakeAgave,
} from '../helpers/fake-agave.js';

function resolverFor(fake: FakeAgave): RemotePathResolver {
  const client = new FilesClient({ baseUrl: TEST_BASE_URL, token: TEST_TOKEN, timeoutMs: 1000, fetch: fake.fetch });
  return new RemotePathResolver(client, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 });
}

describe('RemotePathResolver', () => {
  const digest = bytesToHex(sha256(new TextEncoder().encode('lorem ipsum')));
  const fake = createFakeAgave({
    sys: dir({
      'office-ipsum.txt': file('lorem ipsum', { checksum: digest }),
      'good-directory': dir({ 'a.txt': file('a') }, '2023-05-06T07:08:09.000Z'),
    }),
  });

  it('resolves a file with its size, time and checksum', async () => {
    const handle = await resolverFor(fake).resolve({ system: 'sys', path: '/office-ipsum.txt' });
    expect(handle).toEqual({
      system: 'sys',
      path: '/office-ipsum.txt',
      kind: 'file',
      size: 11,
      modifiedAt: new Date(DEFAULT_MODIFIED),
      checksum: { algorithm: 'sha256', value: digest },
    });
  });

  it('resolves a directory from its self entry', async () => {
    const handle = await resolverFor(fake).resolve({ system: 'sys', path: '/good-directory' });
    expect(handle).toEqual({
      system: 'sys',
      path: '/good-directory',
      kind: 'directory',
      size: 0,
      modifiedAt: new Date('2023-05-06T07:08:09.000Z'),
    });
  });

  it('asks for a single-entry page', async () => {
    const fake = createFakeAgave({ sys: dir({ d: dir() }) });
    await resolverFor(fake).resolve({ system: 'sys', path: '/d' });
    expect(fake.requests).toEqual(['listings sys/d?limit=1&offset=0']);
  });

  it('fails with NotFoundError for a missing path', async () => {
    await expect(resolverFor(fake).resolve({ system: 'sys', path: '/missing' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails with AccessError when permission is denied', async () => {
    fake.failNext('listings', 'sys', '/good-directory', 403);
    await expect(resolverFor(fake).resolve({ system: 'sys', path: '/good-directory' })).rejects.toBeInstanceOf(
      AccessError,
    );
  });

  it('fails for an unknown storage system', async () => {
    await expect(resolverFor(fake).resolve({ system: 'other', path: '/a' })).rejects.toBeInstanceOf(NotFoundError);
  });
});
