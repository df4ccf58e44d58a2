/**
 * In-process repository for client tests.
 *
 * Holds the repository's metadata as model objects, signs them with the
 * current signers of each role whenever they are fetched, and serves them
 * through the {@link Fetcher} interface. Nothing leaves the process.
 */

import { generateKeyPair } from '@mooring/crypto';
import { FetchError, MooringErrorCode } from '@mooring/types';
import {
  createSigner,
  encodeMetadata,
  newMetaFile,
  newMetadata,
  newRoot,
  newSnapshot,
  newTargets,
  newTimestamp,
  signMetadata,
  targetFileFromData,
  isTopLevelRoleName,
  allBinNames,
} from '@mooring/metadata';
import type { DelegatedRole, Delegations, Root, Signed, Signer, Snapshot, Targets, Timestamp } from '@mooring/metadata';

import { lengthExceeded, metadataFileName } from '../fetcher';
import type { Fetcher } from '../fetcher';

/** Every document the simulator creates expires here unless a test changes it. */
export const SIM_EXPIRES = new Date('2031-01-01T00:00:00Z');

/** Reference time tests run the client at. */
export const SIM_NOW = new Date('2030-01-01T00:00:00Z');

export async function newSigner(): Promise<Signer> {
  return createSigner(await generateKeyPair());
}

export class RepositorySimulator implements Fetcher {
  root: Root;
  timestamp: Timestamp;
  snapshot: Snapshot;
  targets: Targets;
  readonly delegated = new Map<string, Targets>();
  /** Signers used when a role's document is served. */
  readonly signers = new Map<string, Signer[]>();
  /** Published root documents; index 0 is version 1. */
  readonly signedRoots: Uint8Array[] = [];
  /** Artifact bytes by the path they are served under. */
  readonly artifacts = new Map<string, Uint8Array>();
  /** Every request, as `role`, `role@version` or `target:path`. */
  readonly fetches: string[] = [];
  /** Requests (keyed like {@link fetches}) that fail with the given error. */
  readonly failures = new Map<string, FetchError>();
  /** Record length and hashes of snapshot and targets files in their referrers. */
  computeMetaHashes = false;

  private constructor() {
    this.root = newRoot({ expires: SIM_EXPIRES });
    this.timestamp = newTimestamp({ expires: SIM_EXPIRES });
    this.snapshot = newSnapshot({ expires: SIM_EXPIRES });
    this.targets = newTargets({ expires: SIM_EXPIRES });
  }

  /** A repository at version 1 of every role, one key per top-level role. */
  static async create(options: { consistentSnapshot?: boolean } = {}): Promise<RepositorySimulator> {
    const sim = new RepositorySimulator();
    sim.root.consistentSnapshot = options.consistentSnapshot ?? true;
    for (const role of ['root', 'timestamp', 'snapshot', 'targets']) {
      sim.addSigner(role, await newSigner());
    }
    await sim.publishRoot();
    return sim;
  }

  /** Add a signer for a role; for top-level roles also authorize its key in root. */
  addSigner(roleName: string, signer: Signer): void {
    this.signers.set(roleName, [...(this.signers.get(roleName) ?? []), signer]);
    if (isTopLevelRoleName(roleName)) {
      this.root.keys.set(signer.keyid, signer.key);
      this.root.roles.get(roleName)?.keyids.push(signer.keyid);
    }
  }

  /** Replace a role's signers (and, for top-level roles, its authorized keys). */
  rotateKeys(roleName: string, signers: Signer[], threshold = 1): void {
    this.signers.set(roleName, []);
    if (isTopLevelRoleName(roleName)) {
      this.root.roles.set(roleName, { keyids: [], threshold, unrecognized: {} });
    }
    for (const signer of signers) {
      this.addSigner(roleName, signer);
    }
  }

  // ── Publishing ────────────────────────────────────────────────────────────

  async sign(roleName: string, signed: Signed, signers = this.signers.get(roleName) ?? []): Promise<Uint8Array> {
    let md = newMetadata(signed);
    for (const signer of signers) {
      md = await signMetadata(md, signer, { append: true });
    }
    return encodeMetadata(md);
  }

  /** Sign the current root with the current root signers and publish it under its version. */
  async publishRoot(signers?: Signer[]): Promise<Uint8Array> {
    const data = await this.sign('root', this.root, signers);
    this.signedRoots[this.root.version - 1] = data;
    return data;
  }

  /** Bump the root version and publish it. */
  async bumpRoot(signers?: Signer[]): Promise<Uint8Array> {
    this.root.version += 1;
    return this.publishRoot(signers);
  }

  /** Point the timestamp at the current snapshot and bump its version. */
  async updateTimestamp(): Promise<void> {
    const meta = newMetaFile(this.snapshot.version);
    if (this.computeMetaHashes) {
      const data = await this.sign('snapshot', this.snapshot);
      const file = targetFileFromData('snapshot.json', data);
      meta.length = file.length;
      meta.hashes = file.hashes;
    }
    this.timestamp.snapshotMeta = meta;
    this.timestamp.version += 1;
  }

  /** Record every targets role's version in the snapshot, bump it, then update the timestamp. */
  async updateSnapshot(): Promise<void> {
    for (const [roleName, targets] of this.allTargets()) {
      const meta = newMetaFile(targets.version);
      if (this.computeMetaHashes) {
        const file = targetFileFromData(roleName, await this.sign(roleName, targets));
        meta.length = file.length;
        meta.hashes = file.hashes;
      }
      this.snapshot.meta.set(`${roleName}.json`, meta);
    }
    this.snapshot.version += 1;
    await this.updateTimestamp();
  }

  /** Add an artifact to a targets role and serve it under its plain and hash-prefixed paths. */
  addTarget(roleName: string, targetPath: string, data: Uint8Array): void {
    const targets = this.getTargetsRole(roleName);
    const file = targetFileFromData(targetPath, data);
    targets.targets.set(targetPath, file);
    const slash = targetPath.lastIndexOf('/');
    const prefixed = `${targetPath.slice(0, slash + 1)}${file.hashes.sha256}.${targetPath.slice(slash + 1)}`;
    this.artifacts.set(targetPath, data);
    this.artifacts.set(prefixed, data);
  }

  /**
   * Delegate from `parentName` to a new role signed by `signer`.
   * The new role starts empty at version 1.
   */
  addDelegation(
    parentName: string,
    role: Pick<DelegatedRole, 'name'> & Partial<Omit<DelegatedRole, 'name'>>,
    signer: Signer,
  ): Targets {
    const parent = this.getTargetsRole(parentName);
    const delegations: Delegations = parent.delegations ?? { keys: new Map(), roles: [], unrecognized: {} };
    delegations.keys.set(signer.keyid, signer.key);
    const entry: DelegatedRole = {
      keyids: [signer.keyid],
      threshold: 1,
      terminating: false,
      unrecognized: {},
      ...role,
    };
    if (entry.paths === undefined && entry.pathHashPrefixes === undefined) {
      entry.paths = ['*'];
    }
    delegations.roles = [...(delegations.roles ?? []), entry];
    parent.delegations = delegations;
    const child = newTargets({ expires: SIM_EXPIRES });
    this.delegated.set(role.name, child);
    this.signers.set(role.name, [signer]);
    return child;
  }

  /** Delegate from `parentName` to `2^bitLength` hash bins, all signed by `signer`. */
  addSuccinctRoles(parentName: string, bitLength: number, namePrefix: string, signer: Signer): string[] {
    const succinctRoles = { keyids: [signer.keyid], threshold: 1, bitLength, namePrefix, unrecognized: {} };
    this.getTargetsRole(parentName).delegations = {
      keys: new Map([[signer.keyid, signer.key]]),
      succinctRoles,
      unrecognized: {},
    };
    const names = [...allBinNames(succinctRoles)];
    for (const name of names) {
      this.delegated.set(name, newTargets({ expires: SIM_EXPIRES }));
      this.signers.set(name, [signer]);
    }
    return names;
  }

  getTargetsRole(roleName: string): Targets {
    const targets = roleName === 'targets' ? this.targets : this.delegated.get(roleName);
    if (targets === undefined) {
      throw new Error(`Simulator has no targets role ${roleName}`);
    }
    return targets;
  }

  private allTargets(): [string, Targets][] {
    return [['targets', this.targets], ...this.delegated];
  }

  // ── Fetcher ───────────────────────────────────────────────────────────────

  async fetchMetadata(roleName: string, maxLength: number, version?: number): Promise<Uint8Array> {
    const key = version === undefined ? roleName : `${roleName}@${version}`;
    this.fetches.push(key);
    const failure = this.failures.get(key);
    if (failure !== undefined) {
      throw failure;
    }
    const data = await this.serveMetadata(roleName, version);
    if (data === undefined) {
      throw new FetchError(MooringErrorCode.FETCH_NOT_FOUND, `${metadataFileName(roleName, version)} not found`);
    }
    if (data.length > maxLength) {
      throw lengthExceeded(metadataFileName(roleName, version), maxLength);
    }
    return data;
  }

  async fetchTarget(targetPath: string, maxLength: number): Promise<Uint8Array> {
    const key = `target:${targetPath}`;
    this.fetches.push(key);
    const failure = this.failures.get(key);
    if (failure !== undefined) {
      throw failure;
    }
    const data = this.artifacts.get(targetPath);
    if (data === undefined) {
      throw new FetchError(MooringErrorCode.FETCH_NOT_FOUND, `${targetPath} not found`);
    }
    if (data.length > maxLength) {
      throw lengthExceeded(targetPath, maxLength);
    }
    return data;
  }

  private async serveMetadata(roleName: string, version?: number): Promise<Uint8Array | undefined> {
    if (roleName === 'root') {
      return version === undefined ? this.signedRoots[this.signedRoots.length - 1] : this.signedRoots[version - 1];
    }
    if (roleName === 'timestamp') {
      return version === undefined ? this.sign('timestamp', this.timestamp) : undefined;
    }
    const signed: Snapshot | Targets | undefined =
      roleName === 'snapshot' ? this.snapshot : roleName === 'targets' ? this.targets : this.delegated.get(roleName);
    if (signed === undefined || (version !== undefined && version !== signed.version)) {
      return undefined;
    }
    return this.sign(roleName, signed);
  }
}
