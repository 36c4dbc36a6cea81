import { z } from 'zod';
import {
  AccessError,
  NotFoundError,
  RemoteRequestError,
  RunCancelledError,
  TransientNetworkError,
  errorMessage,
} from '../errors.js';
import type { RemoteReference } from '../types.js';
import { Deadline } from './deadline.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FilesClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

const fileInfoSchema = z.object({
  name: z.string(),
  path: z.string().optional(),
  type: z.enum(['file', 'dir']),
  length: z.number().nonnegative().default(0),
  lastModified: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'lastModified is not a date',
  }),
  checksum: z.string().nullish(),
  checksumType: z.string().nullish(),
});

const listingResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().nullish(),
  result: z.array(fileInfoSchema),
});

export type FileInfo = z.infer<typeof fileInfoSchema>;

export interface ListPageOptions {
  limit: number;
  offset: number;
  signal?: AbortSignal;
}

export interface RemoteFileStream {
  body: ReadableStream<Uint8Array> | null;
  contentLength: number | null;
  /** Idle deadline guarding the body; refresh per chunk, clear when done. */
  deadline: Deadline;
}

/**
 * Turn a failed fetch or body read into a sync error: cancellation when the
 * run's signal fired, otherwise a retryable network failure.
 */
export function classifyFetchFailure(
  err: unknown,
  deadline: Deadline,
  signal: AbortSignal | undefined,
  what: string,
): Error {
  if (signal?.aborted) {
    return new RunCancelledError();
  }
  if (deadline.timedOut) {
    return new TransientNetworkError(`${what} timed out`, { cause: err });
  }
  return new TransientNetworkError(`${what} failed: ${errorMessage(err)}`, { cause: err });
}

export function encodeRemotePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Single-attempt client for the Agave files v2 API. Retrying is the
 * caller's decision, see withRetry.
 */
export class FilesClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: FilesClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  listingUrl(ref: RemoteReference, limit: number, offset: number): string {
    const query = new URLSearchParams({ limit: String(limit), offset: String(offset) });
    return `${this.baseUrl}/files/v2/listings/system/${encodeURIComponent(ref.system)}${encodeRemotePath(ref.path)}?${query.toString()}`;
  }

  mediaUrl(ref: RemoteReference): string {
    return `${this.baseUrl}/files/v2/media/system/${encodeURIComponent(ref.system)}${encodeRemotePath(ref.path)}`;
  }

  async listPage(ref: RemoteReference, options: ListPageOptions): Promise<FileInfo[]> {
    const deadline = new Deadline(this.timeoutMs, options.signal);
    const url = this.listingUrl(ref, options.limit, options.offset);

    try {
      const response = await this.send(url, deadline, options.signal, `Listing ${ref.path}`);
      this.assertOk(response, ref);

      let json: unknown;
      try {
        json = await response.json();
      } catch (err) {
        if (deadline.signal.aborted) {
          throw classifyFetchFailure(err, deadline, options.signal, `Listing ${ref.path}`);
        }
        throw new RemoteRequestError(`Listing ${ref.path} returned malformed JSON`);
      }

      const parsed = listingResponseSchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape';
        throw new RemoteRequestError(`Listing ${ref.path} returned an unexpected response (${where})`);
      }
      return parsed.data.result;
    } finally {
      deadline.clear();
    }
  }

  /**
   * Open a file for download. The returned deadline stays armed; the
   * caller owns it from here on.
   */
  async openFile(ref: RemoteReference, signal?: AbortSignal): Promise<RemoteFileStream> {
    const deadline = new Deadline(this.timeoutMs, signal);
    try {
      const response = await this.send(this.mediaUrl(ref), deadline, signal, `Download of ${ref.path}`);
      this.assertOk(response, ref);

      const header = response.headers.get('Content-Length');
      const contentLength = header !== null && /^\d+$/.test(header) ? Number(header) : null;
      deadline.refresh();
      return { body: response.body, contentLength, deadline };
    } catch (err) {
      deadline.clear();
      throw err;
    }
  }

  private async send(
    url: string,
    deadline: Deadline,
    signal: AbortSignal | undefined,
    what: string,
  ): Promise<Response> {
    const headers = new Headers();
    headers.set('Authorization', `Bearer ${this.token}`);

    try {
      return await this.fetchImpl(url, { method: 'GET', headers, signal: deadline.signal });
    } catch (err) {
      throw classifyFetchFailure(err, deadline, signal, what);
    }
  }

  private assertOk(response: Response, ref: RemoteReference): void {
    if (response.ok) return;

    const { status } = response;
    if (status === 404) {
      throw new NotFoundError(`${ref.system}:${ref.path}`);
    }
    if (status === 401 || status === 403) {
      throw new AccessError(`${ref.system}:${ref.path}`, status);
    }
    // Don't retry client errors (4xx) except 408 and 429
    if (status === 408 || status === 429 || status >= 500) {
      throw new TransientNetworkError(`HTTP ${status} ${response.statusText} for ${ref.path}`, { status });
    }
    throw new RemoteRequestError(`HTTP ${status} ${response.statusText} for ${ref.path}`, status);
  }
}
