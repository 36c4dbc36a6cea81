export { SyncSession, UsageError, retryPolicyFrom, type SyncRequest } from './session.js';
export { SyncRun, EXIT_CODES, classifyRun } from './run.js';
export { TreeSynchronizer, isSafeEntryName, type DirectoryState } from './synchronizer.js';
export { DownloadExecutor, isTempArtifact } from './downloader.js';
export { HistoryDB, trackRun, describeOutcome, type RunTracker } from './history.js';
