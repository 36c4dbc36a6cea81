import type { SyncErrorKind } from './errors.js';

export type RemoteKind = 'file' | 'directory';

export interface RemoteReference {
  readonly system: string;
  readonly path: string;
}

export type ChecksumAlgorithm = 'sha256' | 'blake3';

export interface Checksum {
  algorithm: ChecksumAlgorithm;
  value: string;
}

export interface RemoteHandle extends RemoteReference {
  readonly kind: RemoteKind;
  readonly size: number;
  readonly modifiedAt: Date;
  readonly checksum?: Checksum;
}

export interface Entry {
  name: string;
  kind: RemoteKind;
  size: number;
  modifiedAt: Date;
  checksum?: Checksum;
}

export interface TransferTask {
  source: RemoteHandle;
  destination: string;
  expectedSize: number;
}

export interface OutcomeSubject {
  kind: RemoteKind;
  remotePath: string;
  localPath: string;
}

export type Outcome =
  | {
      status: 'succeeded';
      subject: OutcomeSubject;
      detail: 'new' | 'modified' | 'created';
      bytes: number;
    }
  | {
      status: 'skipped';
      subject: OutcomeSubject;
      detail: 'up to date' | 'exists' | 'excluded';
    }
  | {
      status: 'failed';
      subject: OutcomeSubject;
      errorKind: SyncErrorKind | 'local-conflict' | 'unknown';
      reason: string;
    };

export type OutcomeStatus = Outcome['status'];

export type RunStatus = 'all-succeeded' | 'partial-failure' | 'total-failure';

export interface RunSummary {
  runId: string;
  status: RunStatus;
  exitCode: number;
  succeeded: number;
  skipped: number;
  failed: number;
  bytes: number;
  failures: Array<Extract<Outcome, { status: 'failed' }>>;
  fatalError?: string;
}

export interface Credentials {
  accessToken: string;
  baseUrl: string;
}
