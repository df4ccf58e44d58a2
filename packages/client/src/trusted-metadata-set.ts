/**
 * The trusted metadata set: at most one trusted document per role, loaded
 * in a fixed order, each load checked against what is already trusted.
 *
 * Phases advance `root → timestamp → snapshot → targets`. Root, timestamp
 * and snapshot may be loaded repeatedly while their phase is current
 * (rotation, cached-then-remote); delegated targets load once the
 * top-level targets are trusted. Any other order is a {@link LoadOrderError}.
 *
 * A load either validates completely and replaces its slot, or throws and
 * leaves every slot unchanged.
 *
 * @packageDocumentation
 */

import {
  LoadOrderError,
  Logger,
  RepositoryError,
  RollbackAttackError,
  ExpiredMetadataError,
  defaultLogger,
} from '@mooring/types';
import {
  canonicalSignedBytes,
  decodeRoot,
  decodeSnapshot,
  decodeTargets,
  decodeTimestamp,
  isExpired,
  verifyDelegate,
  verifyLengthAndHashes,
} from '@mooring/metadata';
import type { Metadata, Root, Signed, Snapshot, Targets, Timestamp } from '@mooring/metadata';
import { constantTimeEqual } from '@mooring/crypto';

export type TrustPhase = 'root' | 'timestamp' | 'snapshot' | 'targets';

export interface TrustedMetadataSetOptions {
  /** Instant all expiry checks use. Defaults to now. */
  referenceTime?: Date;
  logger?: Logger;
}

export interface LoadSnapshotOptions {
  /**
   * The bytes come from the local store and were checked against their
   * length and hashes when first downloaded; skip that check.
   */
  cached?: boolean;
}

export class TrustedMetadataSet {
  readonly referenceTime: Date;
  private readonly logger: Logger;
  private currentPhase: TrustPhase = 'root';

  private trustedRoot: Metadata<Root>;
  private trustedTimestamp: Metadata<Timestamp> | undefined;
  private trustedSnapshot: Metadata<Snapshot> | undefined;
  private readonly trustedTargets = new Map<string, Metadata<Targets>>();

  // Signed and rollback-checked but not trusted (expired, or not the version
  // the timestamp names): still the floor for the next rollback check.
  private timestampBaseline: Metadata<Timestamp> | undefined;
  private snapshotBaseline: Metadata<Snapshot> | undefined;

  private constructor(root: Metadata<Root>, referenceTime: Date, logger: Logger) {
    this.trustedRoot = root;
    this.referenceTime = referenceTime;
    this.logger = logger;
  }

  /**
   * Start a trust context from root bytes the caller already trusts
   * (shipped with the application or cached from a previous run).
   *
   * The root must be signed by a threshold of its own root role. Its expiry
   * is not checked here: an expired root can still be rotated away from.
   *
   * @throws {DeserializationError | UnsignedMetadataError}
   */
  static async create(rootBytes: Uint8Array, options: TrustedMetadataSetOptions = {}): Promise<TrustedMetadataSet> {
    const root = decodeRoot(rootBytes);
    await verifyDelegate(root.signed, 'root', root);
    const referenceTime = new Date((options.referenceTime ?? new Date()).getTime());
    const logger = options.logger ?? defaultLogger.child('trusted-set');
    logger.debug('Trusted initial root', { version: root.signed.version });
    return new TrustedMetadataSet(root, referenceTime, logger);
  }

  // ── Accessors ─────────────────────────────────────────────────────────────

  get phase(): TrustPhase {
    return this.currentPhase;
  }

  get root(): Metadata<Root> {
    return this.trustedRoot;
  }

  get timestamp(): Metadata<Timestamp> | undefined {
    return this.trustedTimestamp;
  }

  get snapshot(): Metadata<Snapshot> | undefined {
    return this.trustedSnapshot;
  }

  get targets(): Metadata<Targets> | undefined {
    return this.trustedTargets.get('targets');
  }

  /** The trusted document of any role, top-level or delegated. */
  get(roleName: string): Metadata<Signed> | undefined {
    switch (roleName) {
      case 'root':
        return this.trustedRoot;
      case 'timestamp':
        return this.trustedTimestamp;
      case 'snapshot':
        return this.trustedSnapshot;
      default:
        return this.trustedTargets.get(roleName);
    }
  }

  has(roleName: string): boolean {
    return this.get(roleName) !== undefined;
  }

  /** The trusted top-level (`targets`) or delegated targets document of a role. */
  getTargets(roleName: string): Metadata<Targets> | undefined {
    return this.trustedTargets.get(roleName);
  }

  // ── Loads ─────────────────────────────────────────────────────────────────

  /**
   * Rotate to the next root version.
   *
   * The new root must be exactly one version ahead and signed by a
   * threshold of both the current and its own root role. Expiry is not
   * checked: intermediate roots are commonly expired.
   *
   * @throws {LoadOrderError} Once a timestamp has been loaded.
   * @throws {RollbackAttackError | UnsignedMetadataError | DeserializationError}
   */
  async loadRoot(data: Uint8Array): Promise<Metadata<Root>> {
    this.requirePhase('loadRoot', ['root']);
    const newRoot = decodeRoot(data);
    const expected = this.trustedRoot.signed.version + 1;
    if (newRoot.signed.version !== expected) {
      throw new RollbackAttackError(
        `Expected root version ${expected}, got ${newRoot.signed.version}`,
        { context: { role: 'root', expected, actual: newRoot.signed.version } },
      );
    }
    await verifyDelegate(this.trustedRoot.signed, 'root', newRoot);
    await verifyDelegate(newRoot.signed, 'root', newRoot);

    this.trustedRoot = newRoot;
    this.logger.debug('Trusted new root', { version: newRoot.signed.version });
    return newRoot;
  }

  /**
   * Load a timestamp.
   *
   * Returns the trusted timestamp afterwards. Loading a timestamp identical
   * to the trusted one is a no-op and returns the same object.
   *
   * @throws {ExpiredMetadataError} When the final root or the timestamp has expired.
   * @throws {RollbackAttackError} On a version or snapshot-version regression,
   *   or an equal version with different content.
   */
  async loadTimestamp(data: Uint8Array): Promise<Metadata<Timestamp>> {
    this.requirePhase('loadTimestamp', ['root', 'timestamp']);
    if (isExpired(this.trustedRoot.signed, this.referenceTime)) {
      throw new ExpiredMetadataError('Final root is expired', {
        context: { role: 'root', version: this.trustedRoot.signed.version },
      });
    }

    const newTimestamp = decodeTimestamp(data);
    await verifyDelegate(this.trustedRoot.signed, 'timestamp', newTimestamp);

    const previous = this.trustedTimestamp ?? this.timestampBaseline;
    if (previous !== undefined) {
      const oldVersion = previous.signed.version;
      const newVersion = newTimestamp.signed.version;
      if (newVersion < oldVersion) {
        throw new RollbackAttackError(`Timestamp version ${newVersion} is older than ${oldVersion}`, {
          context: { role: 'timestamp', trusted: oldVersion, actual: newVersion },
        });
      }
      if (newVersion === oldVersion) {
        if (!sameSignedContent(previous, newTimestamp)) {
          throw new RollbackAttackError(`Timestamp version ${newVersion} changed content without a version bump`, {
            context: { role: 'timestamp', version: newVersion },
          });
        }
        if (previous === this.trustedTimestamp) {
          return previous;
        }
      }
      const oldSnapshotVersion = previous.signed.snapshotMeta.version;
      const newSnapshotVersion = newTimestamp.signed.snapshotMeta.version;
      if (newSnapshotVersion < oldSnapshotVersion) {
        throw new RollbackAttackError(
          `Timestamp references snapshot version ${newSnapshotVersion}, older than ${oldSnapshotVersion}`,
          { context: { role: 'snapshot', trusted: oldSnapshotVersion, actual: newSnapshotVersion } },
        );
      }
    }

    if (isExpired(newTimestamp.signed, this.referenceTime)) {
      this.timestampBaseline = newTimestamp;
      throw expired('timestamp', newTimestamp.signed);
    }

    this.trustedTimestamp = newTimestamp;
    this.timestampBaseline = undefined;
    this.currentPhase = 'timestamp';
    this.logger.debug('Trusted timestamp', { version: newTimestamp.signed.version });
    return newTimestamp;
  }

  /**
   * Load the snapshot the trusted timestamp refers to.
   *
   * May be called again until the top-level targets are loaded; each new
   * snapshot must not drop or downgrade a file the previous one recorded.
   *
   * @throws {LengthOrHashMismatchError | UnsignedMetadataError | RollbackAttackError | RepositoryError | ExpiredMetadataError}
   */
  async loadSnapshot(data: Uint8Array, options: LoadSnapshotOptions = {}): Promise<Metadata<Snapshot>> {
    this.requirePhase('loadSnapshot', ['timestamp', 'snapshot']);
    const timestamp = this.requireTrusted(this.trustedTimestamp, 'timestamp');
    const snapshotMeta = timestamp.signed.snapshotMeta;

    if (!options.cached) {
      verifyLengthAndHashes(data, snapshotMeta, 'snapshot.json');
    }
    const newSnapshot = decodeSnapshot(data);
    await verifyDelegate(this.trustedRoot.signed, 'snapshot', newSnapshot);

    const previous = this.trustedSnapshot ?? this.snapshotBaseline;
    if (previous !== undefined) {
      for (const [fileName, oldMeta] of previous.signed.meta) {
        const newMeta = newSnapshot.signed.meta.get(fileName);
        if (newMeta === undefined) {
          throw new RepositoryError(`New snapshot is missing ${fileName}`, {
            context: { role: 'snapshot', file: fileName },
          });
        }
        if (newMeta.version < oldMeta.version) {
          throw new RollbackAttackError(
            `${fileName} version ${newMeta.version} is older than ${oldMeta.version}`,
            { context: { role: 'snapshot', file: fileName, trusted: oldMeta.version, actual: newMeta.version } },
          );
        }
      }
    }

    // the floor for the next load, trusted or not
    if (this.trustedSnapshot === undefined) {
      this.snapshotBaseline = newSnapshot;
    }

    if (newSnapshot.signed.version !== snapshotMeta.version) {
      throw new RollbackAttackError(
        `Expected snapshot version ${snapshotMeta.version}, got ${newSnapshot.signed.version}`,
        { context: { role: 'snapshot', expected: snapshotMeta.version, actual: newSnapshot.signed.version } },
      );
    }

    if (isExpired(newSnapshot.signed, this.referenceTime)) {
      throw expired('snapshot', newSnapshot.signed);
    }

    this.trustedSnapshot = newSnapshot;
    this.snapshotBaseline = undefined;
    this.currentPhase = 'snapshot';
    this.logger.debug('Trusted snapshot', { version: newSnapshot.signed.version, cached: options.cached === true });
    return newSnapshot;
  }

  /**
   * Load the top-level targets, signed by root's targets role.
   *
   * @throws {RepositoryError} When the snapshot does not list targets.json.
   */
  async loadTargets(data: Uint8Array): Promise<Metadata<Targets>> {
    this.requirePhase('loadTargets', ['snapshot']);
    const targets = await this.validateTargets(data, 'targets', this.trustedRoot.signed);
    this.trustedTargets.set('targets', targets);
    this.currentPhase = 'targets';
    return targets;
  }

  /**
   * Load a delegated targets role with the keys its already-trusted parent
   * assigns to it.
   *
   * @throws {LoadOrderError} When the parent is not trusted yet or the role is already loaded.
   */
  async loadDelegatedTargets(data: Uint8Array, roleName: string, parentName: string): Promise<Metadata<Targets>> {
    this.requirePhase('loadDelegatedTargets', ['targets']);
    const parent = this.trustedTargets.get(parentName);
    if (parent === undefined) {
      throw new LoadOrderError(`Cannot load ${roleName} before its parent ${parentName}`, {
        context: { role: roleName, parent: parentName },
      });
    }
    if (this.trustedTargets.has(roleName)) {
      throw new LoadOrderError(`${roleName} is already trusted`, { context: { role: roleName } });
    }
    const targets = await this.validateTargets(data, roleName, parent.signed);
    this.trustedTargets.set(roleName, targets);
    return targets;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async validateTargets(data: Uint8Array, roleName: string, delegator: Root | Targets): Promise<Metadata<Targets>> {
    const snapshot = this.requireTrusted(this.trustedSnapshot, 'snapshot');
    const fileName = `${roleName}.json`;
    const meta = snapshot.signed.meta.get(fileName);
    if (meta === undefined) {
      throw new RepositoryError(`Snapshot does not list ${fileName}`, {
        context: { role: roleName, snapshotVersion: snapshot.signed.version },
      });
    }

    verifyLengthAndHashes(data, meta, fileName);
    const targets = decodeTargets(data);
    await verifyDelegate(delegator, roleName, targets);

    if (targets.signed.version !== meta.version) {
      throw new RollbackAttackError(`Expected ${roleName} version ${meta.version}, got ${targets.signed.version}`, {
        context: { role: roleName, expected: meta.version, actual: targets.signed.version },
      });
    }
    if (isExpired(targets.signed, this.referenceTime)) {
      throw expired(roleName, targets.signed);
    }
    this.logger.debug('Trusted targets', { role: roleName, version: targets.signed.version });
    return targets;
  }

  private requirePhase(operation: string, allowed: readonly TrustPhase[]): void {
    if (!allowed.includes(this.currentPhase)) {
      throw new LoadOrderError(`${operation} is not allowed in the ${this.currentPhase} phase`, {
        context: { operation, phase: this.currentPhase, allowed: [...allowed] },
      });
    }
  }

  private requireTrusted<T extends Signed>(md: Metadata<T> | undefined, roleName: string): Metadata<T> {
    if (md === undefined) {
      throw new LoadOrderError(`No trusted ${roleName} loaded`, { context: { role: roleName } });
    }
    return md;
  }
}

function sameSignedContent(a: Metadata, b: Metadata): boolean {
  return constantTimeEqual(canonicalSignedBytes(a.signed), canonicalSignedBytes(b.signed));
}

function expired(roleName: string, signed: Signed): ExpiredMetadataError {
  return new ExpiredMetadataError(`${roleName} expired at ${signed.expires.toISOString()}`, {
    context: { role: roleName, version: signed.version },
  });
}
