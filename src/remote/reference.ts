import { InvalidReferenceError } from '../errors.js';
import type { RemoteReference } from '../types.js';

export const REFERENCE_SCHEME = 'agave://';

const SYSTEM_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const FILES_URL_PATH = /^(.*?)\/files\/v2\/(?:media|listings)\/system\/([^/]+)(\/.*)?$/;

export interface ParsedSource {
  reference: RemoteReference;
  /** Service root the URL points at; null for agave:// references. */
  serviceUrl: string | null;
}

/**
 * Normalize a remote path: always absolute, single slashes, no "." segments
 * and no trailing slash. Returns null when the path climbs with "..".
 */
export function normalizeRemotePath(path: string): string | null {
  const segments: string[] = [];
  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') return null;
    segments.push(segment);
  }
  return '/' + segments.join('/');
}

export function parseReference(input: string): RemoteReference {
  const trimmed = input.trim();
  if (trimmed === '') {
    throw new InvalidReferenceError(input, 'reference is empty');
  }
  if (!trimmed.startsWith(REFERENCE_SCHEME)) {
    throw new InvalidReferenceError(input, `expected ${REFERENCE_SCHEME}<system>/<path>`);
  }
  if (trimmed.includes('\0')) {
    throw new InvalidReferenceError(input, 'reference contains a NUL byte');
  }

  const rest = trimmed.slice(REFERENCE_SCHEME.length);
  const slash = rest.indexOf('/');
  const system = slash === -1 ? rest : rest.slice(0, slash);
  const rawPath = slash === -1 ? '' : rest.slice(slash);

  if (!SYSTEM_PATTERN.test(system)) {
    throw new InvalidReferenceError(input, system === '' ? 'storage system is missing' : `"${system}" is not a valid storage system id`);
  }

  const path = normalizeRemotePath(rawPath);
  if (path === null) {
    throw new InvalidReferenceError(input, 'path may not contain ".." segments');
  }

  return { system, path };
}

export function formatReference(ref: RemoteReference): string {
  return `${REFERENCE_SCHEME}${ref.system}${ref.path === '/' ? '' : ref.path}`;
}

export function joinRemotePath(parent: string, name: string): string {
  return parent === '/' ? `/${name}` : `${parent}/${name}`;
}

/** Last path segment, or the system id for the root of a system. */
export function remoteBasename(ref: RemoteReference): string {
  if (ref.path === '/') return ref.system;
  return ref.path.slice(ref.path.lastIndexOf('/') + 1);
}

export function isUrlSource(input: string): boolean {
  return /^https?:\/\//i.test(input.trim());
}

/** Origin plus path prefix, without trailing slashes. */
export function serviceRoot(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '');
  } catch {
    return url.replace(/\/+$/, '');
  }
}

function decodeSegment(input: string, segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidReferenceError(input, `"${segment}" is not a valid URL path segment`);
  }
}

/**
 * Parse a files/v2 media or listings URL, e.g.
 * https://agave.example.org/files/v2/media/system/data-sd2e/a/b.txt.
 */
export function parseFilesUrl(input: string): ParsedSource {
  const trimmed = input.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidReferenceError(input, 'not a valid URL');
  }

  const match = url.pathname.match(FILES_URL_PATH);
  if (!match) {
    throw new InvalidReferenceError(input, 'expected a .../files/v2/media/system/<system>/<path> URL');
  }

  const system = decodeSegment(input, match[2] ?? '');
  if (!SYSTEM_PATTERN.test(system)) {
    throw new InvalidReferenceError(input, `"${system}" is not a valid storage system id`);
  }

  const segments = (match[3] ?? '').split('/').map((segment) => decodeSegment(input, segment));
  if (segments.some((segment) => segment.includes('\0'))) {
    throw new InvalidReferenceError(input, 'reference contains a NUL byte');
  }
  const path = normalizeRemotePath(segments.join('/'));
  if (path === null) {
    throw new InvalidReferenceError(input, 'path may not contain ".." segments');
  }

  return {
    reference: { system, path },
    serviceUrl: `${url.origin}${match[1] ?? ''}`.replace(/\/+$/, ''),
  };
}

/** Accepts both agave://<system>/<path> and files/v2 URLs. */
export function parseSource(input: string): ParsedSource {
  if (isUrlSource(input)) {
    return parseFilesUrl(input);
  }
  return { reference: parseReference(input), serviceUrl: null };
}
