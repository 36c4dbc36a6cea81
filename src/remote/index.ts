export { FilesClient, classifyFetchFailure, encodeRemotePath, type FetchLike, type FileInfo } from './client.js';
export { Deadline } from './deadline.js';
export { ListingClient } from './listing.js';
export {
  parseReference,
  parseSource,
  serviceRoot,
  formatReference,
  joinRemotePath,
  normalizeRemotePath,
  remoteBasename,
  REFERENCE_SCHEME,
  type ParsedSource,
} from './reference.js';
export { RemotePathResolver } from './resolver.js';
export { withRetry, backoffDelay, type RetryPolicy } from './retry.js';
