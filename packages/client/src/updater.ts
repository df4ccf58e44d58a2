/**
 * The updater: one refresh of the trusted metadata, then target lookups
 * and artifact downloads against it.
 *
 * @packageDocumentation
 */

import {
  FetchError,
  LengthOrHashMismatchError,
  LoadOrderError,
  Logger,
  MaxDelegationDepthExceededError,
  MooringErrorCode,
  RepositoryError,
  StoreError,
  ValidationError,
  defaultLogger,
} from '@mooring/types';
import { getRolesForTarget, verifyLengthAndHashes } from '@mooring/metadata';
import type { Metadata, TargetFile, Targets, Timestamp } from '@mooring/metadata';
import type { ArtifactStore, MetadataStore } from '@mooring/store';

import { resolveUpdaterConfig } from './config';
import type { UpdaterConfig } from './config';
import type { Fetcher } from './fetcher';
import { TrustedMetadataSet } from './trusted-metadata-set';

export interface UpdaterOptions {
  /** Where trusted metadata is cached between runs. */
  metadataStore: MetadataStore;
  fetcher: Fetcher;
  /** Required for {@link Updater.downloadTarget} and {@link Updater.findCachedTarget}. */
  artifactStore?: ArtifactStore;
  /**
   * Root bytes to start from instead of the cached root. They are
   * persisted as the cached root once their self-signature verifies.
   */
  bootstrapRoot?: Uint8Array;
  config?: Partial<UpdaterConfig>;
  logger?: Logger;
}

/** One role waiting to be visited during a target lookup. */
interface PendingRole {
  role: string;
  parent: string;
  depth: number;
}

/**
 * Client entry point.
 *
 * @example
 * ```typescript
 * const updater = new Updater({
 *   metadataStore: new FileMetadataStore(cacheDir),
 *   artifactStore: new FileArtifactStore(downloadDir),
 *   fetcher: new HttpFetcher({ metadataBaseUrl, targetsBaseUrl }),
 *   bootstrapRoot,
 * });
 * await updater.refresh();
 * const info = await updater.getTargetInfo('app/v2.tgz');
 * if (info) {
 *   const location = (await updater.findCachedTarget(info)) ?? (await updater.downloadTarget(info));
 * }
 * ```
 */
export class Updater {
  readonly config: UpdaterConfig;
  private readonly metadataStore: MetadataStore;
  private readonly artifactStore: ArtifactStore | undefined;
  private readonly fetcher: Fetcher;
  private readonly bootstrapRoot: Uint8Array | undefined;
  private readonly logger: Logger;
  private trustedSet: TrustedMetadataSet | undefined;
  private refreshStarted = false;

  constructor(options: UpdaterOptions) {
    this.config = resolveUpdaterConfig(options.config);
    this.metadataStore = options.metadataStore;
    this.artifactStore = options.artifactStore;
    this.fetcher = options.fetcher;
    this.bootstrapRoot = options.bootstrapRoot ? new Uint8Array(options.bootstrapRoot) : undefined;
    this.logger = options.logger ?? defaultLogger.child('updater');
  }

  /** The trust state built by {@link refresh}, once it has started. */
  get trusted(): TrustedMetadataSet | undefined {
    return this.trustedSet;
  }

  // ── Refresh ───────────────────────────────────────────────────────────────

  /**
   * Bring root, timestamp, snapshot and top-level targets up to date.
   *
   * Each document is persisted only after it validates. May be called once
   * per updater; create a new updater for a new trust context.
   *
   * @throws {RepositoryError} Any validation failure, or a missing cached root.
   * @throws {FetchError} When timestamp, snapshot or targets cannot be fetched.
   * @throws {LoadOrderError} On a second call.
   */
  async refresh(): Promise<void> {
    if (this.refreshStarted) {
      throw new LoadOrderError('refresh() may only be called once per Updater', {
        hint: 'Create a new Updater to refresh again.',
      });
    }
    this.refreshStarted = true;

    const trusted = await this.loadInitialRoot();
    this.trustedSet = trusted;
    await this.rotateRoot(trusted);
    const timestamp = await this.updateTimestamp(trusted);
    await this.updateSnapshot(trusted, timestamp);
    await this.loadTargetsRole(trusted, 'targets', 'root');
    this.logger.info('Refresh complete', {
      root: trusted.root.signed.version,
      timestamp: timestamp.signed.version,
      snapshot: trusted.snapshot?.signed.version,
      targets: trusted.targets?.signed.version,
    });
  }

  private async loadInitialRoot(): Promise<TrustedMetadataSet> {
    const options = { referenceTime: this.config.referenceTime, logger: this.logger.child('trusted-set') };
    if (this.bootstrapRoot !== undefined) {
      const trusted = await TrustedMetadataSet.create(this.bootstrapRoot, options);
      await this.metadataStore.save('root', this.bootstrapRoot);
      return trusted;
    }
    const cached = await this.metadataStore.load('root');
    if (cached === undefined) {
      throw new RepositoryError('No trusted root available', {
        hint: 'Pass bootstrapRoot, or point metadataStore at a cache with a root.json.',
      });
    }
    return TrustedMetadataSet.create(cached, options);
  }

  private async rotateRoot(trusted: TrustedMetadataSet): Promise<void> {
    for (let accepted = 0; accepted < this.config.maxRootRotations; accepted++) {
      const version = trusted.root.signed.version + 1;
      const data = await this.fetchRootCandidate(version);
      if (data === undefined) {
        return;
      }
      await trusted.loadRoot(data);
      await this.metadataStore.save('root', data);
      this.logger.info('Rotated root', { version });
    }

    const version = trusted.root.signed.version + 1;
    if ((await this.fetchRootCandidate(version)) !== undefined) {
      throw new RepositoryError(
        `Root version ${version} is available after ${this.config.maxRootRotations} rotations`,
        { context: { maxRootRotations: this.config.maxRootRotations }, hint: 'Raise maxRootRotations or re-bootstrap from a newer root.' },
        MooringErrorCode.ROTATION_LIMIT_EXCEEDED,
      );
    }
  }

  /** A fetch failure for the next root means there is no next root. */
  private async fetchRootCandidate(version: number): Promise<Uint8Array | undefined> {
    try {
      return await this.fetcher.fetchMetadata('root', this.config.rootMaxLength, version);
    } catch (err: unknown) {
      if (!(err instanceof FetchError)) {
        throw err;
      }
      if (!err.notFound) {
        this.logger.warn('Root rotation ended by a fetch failure', { version, error: err.toJSON() });
      }
      return undefined;
    }
  }

  private async updateTimestamp(trusted: TrustedMetadataSet): Promise<Metadata<Timestamp>> {
    const cached = await this.loadCached('timestamp');
    if (cached !== undefined) {
      await this.tryCached('timestamp', () => trusted.loadTimestamp(cached));
    }

    const data = await this.fetcher.fetchMetadata('timestamp', this.config.timestampMaxLength);
    const before = trusted.timestamp;
    const timestamp = await trusted.loadTimestamp(data);
    if (timestamp !== before) {
      await this.metadataStore.save('timestamp', data);
      this.logger.info('Accepted timestamp', { version: timestamp.signed.version });
    }
    return timestamp;
  }

  private async updateSnapshot(trusted: TrustedMetadataSet, timestamp: Metadata<Timestamp>): Promise<void> {
    const cached = await this.loadCached('snapshot');
    if (cached !== undefined) {
      const fromCache = await this.tryCached('snapshot', () => trusted.loadSnapshot(cached, { cached: true }));
      if (fromCache !== undefined) {
        this.logger.debug('Snapshot unchanged, using cached copy', { version: fromCache.signed.version });
        return;
      }
    }

    const meta = timestamp.signed.snapshotMeta;
    const version = trusted.root.signed.consistentSnapshot ? meta.version : undefined;
    const data = await this.fetcher.fetchMetadata('snapshot', meta.length ?? this.config.snapshotMaxLength, version);
    const snapshot = await trusted.loadSnapshot(data);
    await this.metadataStore.save('snapshot', data);
    this.logger.info('Accepted snapshot', { version: snapshot.signed.version });
  }

  /**
   * Trusted targets of a role: already loaded, else the cached copy if it
   * validates, else fetched, validated and persisted.
   */
  private async loadTargetsRole(
    trusted: TrustedMetadataSet,
    roleName: string,
    parentName: string,
  ): Promise<Metadata<Targets>> {
    const existing = trusted.getTargets(roleName);
    if (existing !== undefined) {
      return existing;
    }
    const load = (data: Uint8Array): Promise<Metadata<Targets>> =>
      roleName === 'targets' ? trusted.loadTargets(data) : trusted.loadDelegatedTargets(data, roleName, parentName);

    const cached = await this.loadCached(roleName);
    if (cached !== undefined) {
      const fromCache = await this.tryCached(roleName, () => load(cached));
      if (fromCache !== undefined) {
        return fromCache;
      }
    }

    const meta = trusted.snapshot?.signed.meta.get(`${roleName}.json`);
    if (meta === undefined) {
      throw new RepositoryError(`Snapshot does not list ${roleName}.json`, { context: { role: roleName } });
    }
    const version = trusted.root.signed.consistentSnapshot ? meta.version : undefined;
    const data = await this.fetcher.fetchMetadata(roleName, meta.length ?? this.config.targetsMaxLength, version);
    const targets = await load(data);
    await this.metadataStore.save(roleName, data);
    this.logger.info('Accepted targets', { role: roleName, version: targets.signed.version });
    return targets;
  }

  private async loadCached(roleName: string): Promise<Uint8Array | undefined> {
    try {
      return await this.metadataStore.load(roleName);
    } catch (err: unknown) {
      if (!(err instanceof StoreError)) {
        throw err;
      }
      this.logger.warn('Cannot read cached metadata', { role: roleName, error: err.toJSON() });
      return undefined;
    }
  }

  /** Run a load of cached bytes; a repository error just means the cache is stale. */
  private async tryCached<T>(roleName: string, load: () => Promise<T>): Promise<T | undefined> {
    try {
      return await load();
    } catch (err: unknown) {
      if (!(err instanceof RepositoryError)) {
        throw err;
      }
      this.logger.debug('Cached metadata not usable', { role: roleName, error: err.toJSON() });
      return undefined;
    }
  }

  // ── Target lookup ─────────────────────────────────────────────────────────

  /**
   * Resolve `targetPath` through the delegation graph.
   *
   * Roles are visited depth-first in declared order, starting at top-level
   * targets. A terminating delegation, once matched, discards every
   * alternative outside its subtree.
   *
   * @returns The target entry, or `undefined` when no trusted role lists it.
   * @throws {MaxDelegationDepthExceededError} When the lookup needs more roles
   *   than `maxDelegations` or a chain deeper than `maxDelegationDepth`.
   */
  async getTargetInfo(targetPath: string): Promise<TargetFile | undefined> {
    const trusted = await this.ensureRefreshed();
    const log = this.logger.child('lookup', { targetPath });
    const stack: PendingRole[] = [{ role: 'targets', parent: 'root', depth: 0 }];
    const visited = new Set<string>();
    let visits = 0;

    for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
      const { role, parent, depth } = next;
      const key = JSON.stringify([role, parent]);
      if (visited.has(key)) {
        continue;
      }
      if (visits >= this.config.maxDelegations) {
        throw new MaxDelegationDepthExceededError(
          `Looking up ${targetPath} needs more than ${this.config.maxDelegations} roles`,
          { context: { targetPath, maxDelegations: this.config.maxDelegations } },
        );
      }
      if (depth > this.config.maxDelegationDepth) {
        throw new MaxDelegationDepthExceededError(
          `Delegation chain to ${role} is deeper than ${this.config.maxDelegationDepth}`,
          { context: { targetPath, role, maxDelegationDepth: this.config.maxDelegationDepth } },
        );
      }
      visited.add(key);
      visits++;

      const targets = await this.loadTargetsRole(trusted, role, parent);
      const found = targets.signed.targets.get(targetPath);
      if (found !== undefined) {
        log.debug('Found target', { role, visits });
        return found;
      }

      const delegations = targets.signed.delegations;
      if (delegations === undefined) {
        continue;
      }
      const children: PendingRole[] = [];
      for (const child of getRolesForTarget(delegations, targetPath)) {
        children.push({ role: child.name, parent: role, depth: depth + 1 });
        if (child.terminating) {
          stack.length = 0;
          break;
        }
      }
      // reversed so the first declared child is popped first
      stack.push(...children.reverse());
    }

    log.debug('Target not found', { visits });
    return undefined;
  }

  private async ensureRefreshed(): Promise<TrustedMetadataSet> {
    if (!this.refreshStarted) {
      await this.refresh();
    }
    const trusted = this.trustedSet;
    if (trusted === undefined || trusted.targets === undefined) {
      throw new LoadOrderError('refresh() did not complete', {
        hint: 'Create a new Updater and call refresh() again.',
      });
    }
    return trusted;
  }

  // ── Artifacts ─────────────────────────────────────────────────────────────

  /**
   * Location of a locally stored copy of a target whose bytes still match
   * its length and hashes.
   *
   * @param storagePath - Key in the artifact store. Defaults to the target path.
   */
  async findCachedTarget(info: TargetFile, storagePath: string = info.path): Promise<string | undefined> {
    const store = this.requireArtifactStore();
    const data = await store.load(storagePath);
    if (data === undefined) {
      return undefined;
    }
    try {
      verifyLengthAndHashes(data, info, info.path);
    } catch (err: unknown) {
      if (!(err instanceof LengthOrHashMismatchError)) {
        throw err;
      }
      this.logger.debug('Cached target is stale', { targetPath: info.path, error: err.toJSON() });
      return undefined;
    }
    return store.locate(storagePath);
  }

  /**
   * Download a target, verify it against `info` and save it.
   *
   * @param storagePath - Key in the artifact store. Defaults to the target path.
   * @returns Where the artifact store saved it.
   * @throws {LengthOrHashMismatchError} When the downloaded bytes do not match.
   */
  async downloadTarget(info: TargetFile, storagePath: string = info.path): Promise<string> {
    const store = this.requireArtifactStore();
    const trusted = this.trustedSet;
    if (trusted === undefined) {
      throw new LoadOrderError('downloadTarget() needs a refreshed Updater', {
        hint: 'Call refresh() or getTargetInfo() first.',
      });
    }

    let remotePath = info.path;
    if (trusted.root.signed.consistentSnapshot && this.config.prefixTargetsWithHash) {
      const [digest] = Object.values(info.hashes);
      const slash = remotePath.lastIndexOf('/');
      remotePath = `${remotePath.slice(0, slash + 1)}${digest}.${remotePath.slice(slash + 1)}`;
    }

    const data = await this.fetcher.fetchTarget(remotePath, info.length);
    verifyLengthAndHashes(data, info, info.path);
    const location = await store.save(storagePath, data);
    this.logger.info('Downloaded target', { targetPath: info.path, location });
    return location;
  }

  private requireArtifactStore(): ArtifactStore {
    if (this.artifactStore === undefined) {
      throw new ValidationError('No artifactStore configured', 'artifactStore');
    }
    return this.artifactStore;
  }
}
