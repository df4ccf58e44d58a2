/**
 * @mooring/client: Secure update client.
 *
 * Refreshes a repository's signed metadata in the order the trust model
 * requires, resolves target paths through delegations, and downloads
 * artifacts only when their length and hashes match trusted metadata.
 *
 * @packageDocumentation
 */

export { Updater } from './updater';
export type { UpdaterOptions } from './updater';

export { DEFAULT_UPDATER_CONFIG, resolveUpdaterConfig } from './config';
export type { UpdaterConfig } from './config';

export { HttpFetcher, metadataFileName } from './fetcher';
export type { Fetcher, HttpFetcherOptions } from './fetcher';

export { TrustedMetadataSet } from './trusted-metadata-set';
export type { TrustPhase, TrustedMetadataSetOptions, LoadSnapshotOptions } from './trusted-metadata-set';
