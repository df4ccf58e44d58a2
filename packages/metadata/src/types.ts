// ─── Protocol constants ────────────────────────────────────────────────────────

/** Version of the metadata format this client writes and understands. */
export const SPECIFICATION_VERSION = '1.0.31';

/** Names of the four top-level roles. */
export type TopLevelRoleName = 'root' | 'timestamp' | 'snapshot' | 'targets';

export const TOP_LEVEL_ROLE_NAMES: readonly TopLevelRoleName[] = [
  'root',
  'timestamp',
  'snapshot',
  'targets',
] as const;

export function isTopLevelRoleName(name: string): name is TopLevelRoleName {
  return TOP_LEVEL_ROLE_NAMES.some((role) => role === name);
}

/** Value of the `_type` field for each kind of signed payload. */
export type SignedType = TopLevelRoleName;

/**
 * Fields present in a document but not part of the known schema.
 *
 * They are kept verbatim and re-emitted on encode so that signatures over
 * canonical bytes keep verifying.
 */
export type UnrecognizedFields = Readonly<Record<string, unknown>>;

// ─── Keys and roles ────────────────────────────────────────────────────────────

/** Scheme-specific key material. `public` is always present. */
export interface KeyValue {
  public: string;
  [field: string]: unknown;
}

/** A public key as carried in Root or in a delegation block. */
export interface Key {
  keytype: string;
  scheme: string;
  keyval: KeyValue;
  unrecognized: UnrecognizedFields;
}

/** The key ids authorized for a role and how many of them must sign. */
export interface Role {
  keyids: string[];
  threshold: number;
  unrecognized: UnrecognizedFields;
}

// ─── File info ─────────────────────────────────────────────────────────────────

/** Version and optional length/hashes of a metadata file, as recorded by its referrer. */
export interface MetaFile {
  version: number;
  length?: number;
  /** Algorithm name to lowercase hex digest. */
  hashes?: Record<string, string>;
  unrecognized: UnrecognizedFields;
}

/** Length, hashes and opaque custom data of one artifact. */
export interface TargetFile {
  /** Target path; the key under which the entry appears in `targets`. */
  path: string;
  length: number;
  hashes: Record<string, string>;
  custom?: Readonly<Record<string, unknown>>;
  unrecognized: UnrecognizedFields;
}

// ─── Delegations ───────────────────────────────────────────────────────────────

/** A named delegated targets role. */
export interface DelegatedRole extends Role {
  name: string;
  terminating: boolean;
  /** Shell-style patterns over the whole target path. */
  paths?: string[];
  /** Hex prefixes of SHA-256(target path). */
  pathHashPrefixes?: string[];
}

/**
 * Hashed-bin delegation: `2^bitLength` bins named `<namePrefix>-<hex index>`,
 * all signed by the same keys and all terminating.
 */
export interface SuccinctRoles extends Role {
  bitLength: number;
  namePrefix: string;
}

/** Keys and delegated roles of a targets role. Exactly one of `roles` / `succinctRoles` is set. */
export interface Delegations {
  keys: Map<string, Key>;
  /** Delegated roles in declared (priority) order. */
  roles?: DelegatedRole[];
  succinctRoles?: SuccinctRoles;
  unrecognized: UnrecognizedFields;
}

// ─── Signed payloads ───────────────────────────────────────────────────────────

/** Fields common to every signed payload. */
export interface SignedBase {
  specVersion: string;
  version: number;
  expires: Date;
  unrecognized: UnrecognizedFields;
}

export interface Root extends SignedBase {
  type: 'root';
  consistentSnapshot: boolean;
  keys: Map<string, Key>;
  /** Always holds an entry for each of the four top-level role names. */
  roles: Map<TopLevelRoleName, Role>;
}

export interface Timestamp extends SignedBase {
  type: 'timestamp';
  /** The `snapshot.json` entry of `meta`. */
  snapshotMeta: MetaFile;
}

export interface Snapshot extends SignedBase {
  type: 'snapshot';
  /** `<role>.json` to the version (and optional length/hashes) of that file. */
  meta: Map<string, MetaFile>;
}

export interface Targets extends SignedBase {
  type: 'targets';
  targets: Map<string, TargetFile>;
  delegations?: Delegations;
}

export type Signed = Root | Timestamp | Snapshot | Targets;

/** Maps a `_type` value to its payload interface. */
export interface SignedByType {
  root: Root;
  timestamp: Timestamp;
  snapshot: Snapshot;
  targets: Targets;
}

// ─── Envelope ──────────────────────────────────────────────────────────────────

/** One signature over the canonical bytes of `signed`. */
export interface Signature {
  keyid: string;
  /** Hex-encoded signature bytes. */
  sig: string;
}

/** A signed envelope. Signature order is preserved as received. */
export interface Metadata<T extends Signed = Signed> {
  signed: T;
  signatures: Signature[];
  unrecognized: UnrecognizedFields;
}

// ─── Verification ──────────────────────────────────────────────────────────────

/** Outcome of checking an envelope's signatures against a role. */
export interface VerificationResult {
  /** Whether at least `threshold` distinct authorized keys verified. */
  verified: boolean;
  threshold: number;
  /** Authorized key ids with a valid signature. */
  signed: Set<string>;
  /** Authorized key ids without a valid signature. */
  unsigned: Set<string>;
}

/** A role and the key map its key ids resolve against. */
export interface RoleKeys {
  role: Role;
  keys: ReadonlyMap<string, Key>;
}

/** A child role to visit during target resolution. */
export interface DelegationMatch {
  name: string;
  terminating: boolean;
}

/** Expected length and hashes of a file, as recorded by whoever refers to it. */
export interface FileInfo {
  length?: number;
  hashes?: Readonly<Record<string, string>>;
}
