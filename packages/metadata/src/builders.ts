import { digest, toHex } from '@mooring/crypto';
import type { HashAlgorithm } from '@mooring/crypto';

import { SPECIFICATION_VERSION, TOP_LEVEL_ROLE_NAMES } from './types';
import type {
  Metadata,
  MetaFile,
  Role,
  Root,
  Signed,
  Snapshot,
  TargetFile,
  Targets,
  Timestamp,
  TopLevelRoleName,
} from './types';

// Factories for repository-side tooling and tests. Every payload starts at
// version 1 with the current spec version and no unrecognized fields.

export interface NewSignedOptions {
  version?: number;
  expires: Date;
}

function base(options: NewSignedOptions) {
  return {
    specVersion: SPECIFICATION_VERSION,
    version: options.version ?? 1,
    expires: options.expires,
    unrecognized: {},
  };
}

export function newRole(keyids: string[] = [], threshold = 1): Role {
  return { keyids, threshold, unrecognized: {} };
}

export function newRoot(options: NewSignedOptions & { consistentSnapshot?: boolean }): Root {
  const roles = new Map<TopLevelRoleName, Role>();
  for (const name of TOP_LEVEL_ROLE_NAMES) {
    roles.set(name, newRole());
  }
  return {
    type: 'root',
    ...base(options),
    consistentSnapshot: options.consistentSnapshot ?? true,
    keys: new Map(),
    roles,
  };
}

export function newMetaFile(version = 1): MetaFile {
  return { version, unrecognized: {} };
}

export function newTimestamp(options: NewSignedOptions): Timestamp {
  return { type: 'timestamp', ...base(options), snapshotMeta: newMetaFile() };
}

export function newSnapshot(options: NewSignedOptions): Snapshot {
  return { type: 'snapshot', ...base(options), meta: new Map([['targets.json', newMetaFile()]]) };
}

export function newTargets(options: NewSignedOptions): Targets {
  return { type: 'targets', ...base(options), targets: new Map() };
}

/** Wrap a payload in an unsigned envelope. */
export function newMetadata<T extends Signed>(signed: T): Metadata<T> {
  return { signed, signatures: [], unrecognized: {} };
}

/** Describe artifact bytes as a target entry. */
export function targetFileFromData(
  path: string,
  data: Uint8Array,
  algorithms: HashAlgorithm[] = ['sha256'],
): TargetFile {
  const hashes: Record<string, string> = {};
  for (const algorithm of algorithms) {
    hashes[algorithm] = toHex(digest(algorithm, data));
  }
  return { path, length: data.length, hashes, unrecognized: {} };
}
