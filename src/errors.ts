export type SyncErrorKind =
  | 'invalid-reference'
  | 'not-found'
  | 'access'
  | 'transient-network'
  | 'integrity'
  | 'local-io'
  | 'remote-request'
  | 'cancelled';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidReferenceError extends SyncError {
  readonly kind = 'invalid-reference';
  public readonly reference: string;

  constructor(reference: string, problem: string) {
    super(`Invalid remote reference "${reference}": ${problem}`);
    this.reference = reference;
  }
}

export class NotFoundError extends SyncError {
  readonly kind = 'not-found';
  public readonly remotePath: string;

  constructor(remotePath: string) {
    super(`Remote path not found: ${remotePath}`);
    this.remotePath = remotePath;
  }
}

export class AccessError extends SyncError {
  readonly kind = 'access';
  public readonly remotePath: string;
  public readonly status: number;

  constructor(remotePath: string, status: number) {
    super(`Access denied to ${remotePath} (HTTP ${status})`);
    this.remotePath = remotePath;
    this.status = status;
  }
}

export class TransientNetworkError extends SyncError {
  readonly kind = 'transient-network';
  public readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class IntegrityError extends SyncError {
  readonly kind = 'integrity';

  constructor(remotePath: string, problem: string) {
    super(`Integrity check failed for ${remotePath}: ${problem}`);
  }
}

export class LocalIOError extends SyncError {
  readonly kind = 'local-io';
  public readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.code = code;
  }
}

export class RemoteRequestError extends SyncError {
  readonly kind = 'remote-request';
  public readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export class RunCancelledError extends SyncError {
  readonly kind = 'cancelled';

  constructor() {
    super('Sync cancelled');
  }
}

// errno codes that mean the local side cannot keep going at all
const FATAL_LOCAL_CODES = new Set([
  'ENOSPC',
  'EDQUOT',
  'EROFS',
  'EACCES',
  'EPERM',
  'EIO',
  'EMFILE',
  'ENFILE',
]);

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Promote filesystem failures that affect the whole run to LocalIOError.
 * Anything else is returned unchanged and stays local to one item.
 */
export function toLocalError(err: unknown, localPath: string): unknown {
  const code = errnoCode(err);
  if (code && FATAL_LOCAL_CODES.has(code)) {
    return new LocalIOError(`Local filesystem error at ${localPath}: ${errorMessage(err)}`, code, err);
  }
  return err;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientNetworkError;
}

export function errorKindOf(err: unknown): SyncErrorKind | 'local-conflict' | 'unknown' {
  if (err instanceof SyncError) return err.kind;
  if (errnoCode(err) !== undefined) return 'local-conflict';
  return 'unknown';
}
