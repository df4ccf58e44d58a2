/**
 * Decoding and canonical encoding of metadata documents.
 *
 * Decoding is strict about the known schema (a missing or mistyped required
 * field is a {@link DeserializationError}) and lenient about everything
 * else: unknown fields are kept in `unrecognized` and written back out on
 * encode, so re-encoding a decoded document reproduces the canonical bytes
 * its signatures were made over.
 *
 * @packageDocumentation
 */

import { encodeCanonical, utf8Decode } from '@mooring/crypto';
import {
  DeserializationError,
  isNonEmptyString,
  isNonNegativeInteger,
  isPlainObject,
  isPositiveInteger,
  isStringArray,
  assertNever,
} from '@mooring/types';

import {
  SPECIFICATION_VERSION,
  TOP_LEVEL_ROLE_NAMES,
  isTopLevelRoleName,
} from './types';
import type {
  Delegations,
  DelegatedRole,
  Key,
  MetaFile,
  Metadata,
  Role,
  Root,
  Signature,
  Signed,
  SignedBase,
  SignedByType,
  SignedType,
  Snapshot,
  SuccinctRoles,
  TargetFile,
  Targets,
  Timestamp,
  TopLevelRoleName,
} from './types';

type Json = Record<string, unknown>;

const EXPIRES_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

// ─── Field readers ─────────────────────────────────────────────────────────────

/**
 * Destructive reader over one JSON object: every `take*` removes the field,
 * and whatever is left at the end becomes the unrecognized fields.
 */
class FieldReader {
  private readonly rest: Json;

  constructor(value: unknown, private readonly path: string) {
    if (!isPlainObject(value)) {
      throw new DeserializationError(`${path} must be a JSON object`);
    }
    this.rest = { ...value };
  }

  private take(field: string): unknown {
    const value = this.rest[field];
    delete this.rest[field];
    return value;
  }

  fail(field: string, expected: string): never {
    throw new DeserializationError(`${this.path}.${field} must be ${expected}`, {
      hint: 'The document does not follow the metadata schema.',
    });
  }

  has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.rest, field);
  }

  string(field: string): string {
    const value = this.take(field);
    return typeof value === 'string' ? value : this.fail(field, 'a string');
  }

  boolean(field: string): boolean {
    const value = this.take(field);
    return typeof value === 'boolean' ? value : this.fail(field, 'a boolean');
  }

  positiveInteger(field: string): number {
    const value = this.take(field);
    return isPositiveInteger(value) ? value : this.fail(field, 'an integer >= 1');
  }

  nonNegativeInteger(field: string): number {
    const value = this.take(field);
    return isNonNegativeInteger(value) ? value : this.fail(field, 'an integer >= 0');
  }

  optionalNonNegativeInteger(field: string): number | undefined {
    return this.has(field) ? this.nonNegativeInteger(field) : undefined;
  }

  strings(field: string): string[] {
    const value = this.take(field);
    return isStringArray(value) ? value : this.fail(field, 'an array of strings');
  }

  object(field: string): Json {
    const value = this.take(field);
    return isPlainObject(value) ? value : this.fail(field, 'an object');
  }

  array(field: string): unknown[] {
    const value = this.take(field);
    return Array.isArray(value) ? value : this.fail(field, 'an array');
  }

  child(field: string): string {
    return `${this.path}.${field}`;
  }

  remaining(): Json {
    return Object.fromEntries(Object.entries(this.rest));
  }
}

function readHashes(reader: FieldReader, field: string): Record<string, string> {
  const raw = reader.object(field);
  const hashes: Record<string, string> = {};
  for (const [alg, digest] of Object.entries(raw)) {
    if (typeof digest !== 'string') {
      reader.fail(field, 'an object of hex strings');
    }
    hashes[alg] = digest;
  }
  if (Object.keys(hashes).length === 0) {
    reader.fail(field, 'a non-empty object');
  }
  return hashes;
}

function readMap<T>(raw: Json, parse: (name: string, value: unknown) => T): Map<string, T> {
  const result = new Map<string, T>();
  for (const [name, value] of Object.entries(raw)) {
    result.set(name, parse(name, value));
  }
  return result;
}

// ─── Component decoders ────────────────────────────────────────────────────────

export function keyFromJson(value: unknown, path: string): Key {
  const r = new FieldReader(value, path);
  const keytype = r.string('keytype');
  const scheme = r.string('scheme');
  const keyvalReader = new FieldReader(r.object('keyval'), r.child('keyval'));
  const publicValue = keyvalReader.string('public');
  return {
    keytype,
    scheme,
    keyval: { ...keyvalReader.remaining(), public: publicValue },
    unrecognized: r.remaining(),
  };
}

function readRoleFields(r: FieldReader): Pick<Role, 'keyids' | 'threshold'> {
  const keyids = r.strings('keyids');
  if (new Set(keyids).size !== keyids.length) {
    r.fail('keyids', 'free of duplicates');
  }
  const threshold = r.positiveInteger('threshold');
  return { keyids, threshold };
}

function roleFromJson(value: unknown, path: string): Role {
  const r = new FieldReader(value, path);
  const fields = readRoleFields(r);
  return { ...fields, unrecognized: r.remaining() };
}

export function metaFileFromJson(value: unknown, path: string): MetaFile {
  const r = new FieldReader(value, path);
  const version = r.positiveInteger('version');
  const length = r.optionalNonNegativeInteger('length');
  const hashes = r.has('hashes') ? readHashes(r, 'hashes') : undefined;
  return { version, length, hashes, unrecognized: r.remaining() };
}

export function targetFileFromJson(targetPath: string, value: unknown, path: string): TargetFile {
  const r = new FieldReader(value, path);
  const length = r.nonNegativeInteger('length');
  const hashes = readHashes(r, 'hashes');
  const custom = r.has('custom') ? r.object('custom') : undefined;
  return { path: targetPath, length, hashes, custom, unrecognized: r.remaining() };
}

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

function delegatedRoleFromJson(value: unknown, path: string): DelegatedRole {
  const r = new FieldReader(value, path);
  const name = r.string('name');
  if (!isNonEmptyString(name)) {
    r.fail('name', 'a non-empty string');
  }
  const fields = readRoleFields(r);
  const terminating = r.boolean('terminating');
  const hasPaths = r.has('paths');
  const hasPrefixes = r.has('path_hash_prefixes');
  if (hasPaths === hasPrefixes) {
    throw new DeserializationError(
      `${path} must set exactly one of paths and path_hash_prefixes`
    );
  }
  const paths = hasPaths ? r.strings('paths') : undefined;
  const pathHashPrefixes = hasPrefixes ? r.strings('path_hash_prefixes') : undefined;
  if (pathHashPrefixes?.some((prefix) => !HEX_DIGITS.test(prefix))) {
    r.fail('path_hash_prefixes', 'an array of hexadecimal prefixes');
  }
  return { name, ...fields, terminating, paths, pathHashPrefixes, unrecognized: r.remaining() };
}

function succinctRolesFromJson(value: unknown, path: string): SuccinctRoles {
  const r = new FieldReader(value, path);
  const fields = readRoleFields(r);
  const bitLength = r.positiveInteger('bit_length');
  if (bitLength > 32) {
    r.fail('bit_length', 'between 1 and 32');
  }
  const namePrefix = r.string('name_prefix');
  return { ...fields, bitLength, namePrefix, unrecognized: r.remaining() };
}

function delegationsFromJson(value: unknown, path: string): Delegations {
  const r = new FieldReader(value, path);
  const keys = readMap(r.object('keys'), (keyid, v) => keyFromJson(v, `${path}.keys.${keyid}`));
  const hasRoles = r.has('roles');
  const hasSuccinct = r.has('succinct_roles');
  if (hasRoles === hasSuccinct) {
    throw new DeserializationError(`${path} must set exactly one of roles and succinct_roles`);
  }

  let roles: DelegatedRole[] | undefined;
  let succinctRoles: SuccinctRoles | undefined;
  if (hasRoles) {
    roles = r.array('roles').map((v, i) => delegatedRoleFromJson(v, `${path}.roles[${i}]`));
    const seen = new Set<string>();
    for (const role of roles) {
      if (seen.has(role.name)) {
        throw new DeserializationError(`${path}.roles contains duplicate role ${role.name}`);
      }
      if (isTopLevelRoleName(role.name)) {
        throw new DeserializationError(`${path}.roles may not delegate to top-level role ${role.name}`);
      }
      seen.add(role.name);
    }
  } else {
    succinctRoles = succinctRolesFromJson(r.object('succinct_roles'), r.child('succinct_roles'));
  }
  return { keys, roles, succinctRoles, unrecognized: r.remaining() };
}

// ─── Signed payload decoders ───────────────────────────────────────────────────

function parseExpires(r: FieldReader): Date {
  const raw = r.string('expires');
  const m = EXPIRES_RE.exec(raw);
  if (!m) {
    r.fail('expires', 'formatted as YYYY-MM-DDTHH:MM:SSZ');
  }
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (formatExpires(date) !== raw) {
    r.fail('expires', 'a real calendar date');
  }
  return date;
}

function readSignedBase(r: FieldReader): Omit<SignedBase, 'unrecognized'> {
  const specVersion = r.string('spec_version');
  const parts = specVersion.split('.');
  const supportedMajor = SPECIFICATION_VERSION.split('.')[0];
  if (parts.length < 2 || parts.length > 3 || parts[0] !== supportedMajor) {
    throw new DeserializationError(`Unsupported spec_version ${specVersion}`, {
      hint: `This client understands spec_version ${supportedMajor}.x`,
    });
  }
  const version = r.positiveInteger('version');
  const expires = parseExpires(r);
  return { specVersion, version, expires };
}

function rootFromJson(r: FieldReader): Root {
  const base = readSignedBase(r);
  const consistentSnapshot = r.boolean('consistent_snapshot');
  const keys = readMap(r.object('keys'), (keyid, v) => keyFromJson(v, `signed.keys.${keyid}`));
  const rawRoles = r.object('roles');
  const roles = new Map<TopLevelRoleName, Role>();
  for (const name of TOP_LEVEL_ROLE_NAMES) {
    if (!Object.prototype.hasOwnProperty.call(rawRoles, name)) {
      throw new DeserializationError(`signed.roles is missing the ${name} role`);
    }
    roles.set(name, roleFromJson(rawRoles[name], `signed.roles.${name}`));
  }
  const extra = Object.keys(rawRoles).filter((name) => !isTopLevelRoleName(name));
  if (extra.length > 0) {
    throw new DeserializationError(`signed.roles has unknown roles: ${extra.join(', ')}`);
  }
  return { type: 'root', ...base, consistentSnapshot, keys, roles, unrecognized: r.remaining() };
}

function timestampFromJson(r: FieldReader): Timestamp {
  const base = readSignedBase(r);
  const meta = r.object('meta');
  const names = Object.keys(meta);
  if (names.length !== 1 || names[0] !== 'snapshot.json') {
    throw new DeserializationError('signed.meta of a timestamp must hold exactly snapshot.json');
  }
  const snapshotMeta = metaFileFromJson(meta['snapshot.json'], 'signed.meta.snapshot.json');
  return { type: 'timestamp', ...base, snapshotMeta, unrecognized: r.remaining() };
}

function snapshotFromJson(r: FieldReader): Snapshot {
  const base = readSignedBase(r);
  const meta = readMap(r.object('meta'), (name, v) => metaFileFromJson(v, `signed.meta.${name}`));
  return { type: 'snapshot', ...base, meta, unrecognized: r.remaining() };
}

function targetsFromJson(r: FieldReader): Targets {
  const base = readSignedBase(r);
  const targets = readMap(r.object('targets'), (targetPath, v) =>
    targetFileFromJson(targetPath, v, `signed.targets.${targetPath}`),
  );
  const delegations = r.has('delegations')
    ? delegationsFromJson(r.object('delegations'), 'signed.delegations')
    : undefined;
  return { type: 'targets', ...base, targets, delegations, unrecognized: r.remaining() };
}

function signedFromJson(value: unknown): Signed {
  const r = new FieldReader(value, 'signed');
  const type = r.string('_type');
  switch (type) {
    case 'root':
      return rootFromJson(r);
    case 'timestamp':
      return timestampFromJson(r);
    case 'snapshot':
      return snapshotFromJson(r);
    case 'targets':
      return targetsFromJson(r);
    default:
      throw new DeserializationError(`Unknown metadata type ${type}`);
  }
}

function signatureFromJson(value: unknown, path: string): Signature {
  const r = new FieldReader(value, path);
  return { keyid: r.string('keyid'), sig: r.string('sig') };
}

// ─── Public decode API ─────────────────────────────────────────────────────────

/**
 * Decode metadata bytes into a typed envelope.
 *
 * @throws {DeserializationError} On malformed UTF-8 or JSON, or any schema violation.
 *
 * @example
 * ```typescript
 * const md = decodeMetadata(bytes);
 * if (md.signed.type === 'targets') console.log(md.signed.targets.size);
 * ```
 */
export function decodeMetadata(bytes: Uint8Array): Metadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8Decode(bytes));
  } catch (err) {
    throw new DeserializationError(
      `Invalid metadata JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined },
    );
  }
  const r = new FieldReader(parsed, 'metadata');
  if (!r.has('signed')) {
    r.fail('signed', 'present');
  }
  const signed = signedFromJson(r.object('signed'));
  const signatures = r.array('signatures').map((v, i) => signatureFromJson(v, `signatures[${i}]`));
  return { signed, signatures, unrecognized: r.remaining() };
}

/**
 * Decode metadata bytes and require a specific `_type`.
 *
 * @throws {DeserializationError} When the document is of another type.
 */
export function decodeAs<K extends SignedType>(type: K, bytes: Uint8Array): Metadata<SignedByType[K]> {
  const md = decodeMetadata(bytes);
  if (!isMetadataOf(type, md)) {
    throw new DeserializationError(`Expected ${type} metadata, got ${md.signed.type}`);
  }
  return md;
}

/** Type guard narrowing an envelope to a given payload type. */
export function isMetadataOf<K extends SignedType>(type: K, md: Metadata): md is Metadata<SignedByType[K]> {
  return md.signed.type === type;
}

export const decodeRoot = (bytes: Uint8Array): Metadata<Root> => decodeAs('root', bytes);
export const decodeTimestamp = (bytes: Uint8Array): Metadata<Timestamp> => decodeAs('timestamp', bytes);
export const decodeSnapshot = (bytes: Uint8Array): Metadata<Snapshot> => decodeAs('snapshot', bytes);
export const decodeTargets = (bytes: Uint8Array): Metadata<Targets> => decodeAs('targets', bytes);

// ─── Encoders ──────────────────────────────────────────────────────────────────

/** Format a date the way `expires` is written: second precision, `Z` suffix. */
export function formatExpires(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function mapToJson<T>(map: ReadonlyMap<string, T>, toJson: (value: T) => Json): Json {
  return Object.fromEntries(Array.from(map, ([name, value]): [string, Json] => [name, toJson(value)]));
}

export function keyToJson(key: Key): Json {
  return { ...key.unrecognized, keytype: key.keytype, scheme: key.scheme, keyval: { ...key.keyval } };
}

export function roleToJson(role: Role): Json {
  return { ...role.unrecognized, keyids: [...role.keyids], threshold: role.threshold };
}

export function metaFileToJson(meta: MetaFile): Json {
  return {
    ...meta.unrecognized,
    version: meta.version,
    length: meta.length,
    hashes: meta.hashes ? { ...meta.hashes } : undefined,
  };
}

export function targetFileToJson(target: TargetFile): Json {
  return {
    ...target.unrecognized,
    length: target.length,
    hashes: { ...target.hashes },
    custom: target.custom,
  };
}

function delegatedRoleToJson(role: DelegatedRole): Json {
  return {
    ...roleToJson(role),
    name: role.name,
    terminating: role.terminating,
    paths: role.paths,
    path_hash_prefixes: role.pathHashPrefixes,
  };
}

function delegationsToJson(delegations: Delegations): Json {
  const succinct = delegations.succinctRoles;
  return {
    ...delegations.unrecognized,
    keys: mapToJson(delegations.keys, keyToJson),
    roles: delegations.roles?.map(delegatedRoleToJson),
    succinct_roles: succinct
      ? { ...roleToJson(succinct), bit_length: succinct.bitLength, name_prefix: succinct.namePrefix }
      : undefined,
  };
}

/** Convert a signed payload to its JSON form. */
export function signedToJson(signed: Signed): Json {
  const base: Json = {
    ...signed.unrecognized,
    _type: signed.type,
    spec_version: signed.specVersion,
    version: signed.version,
    expires: formatExpires(signed.expires),
  };
  switch (signed.type) {
    case 'root':
      return {
        ...base,
        consistent_snapshot: signed.consistentSnapshot,
        keys: mapToJson(signed.keys, keyToJson),
        roles: mapToJson(signed.roles, roleToJson),
      };
    case 'timestamp':
      return { ...base, meta: { 'snapshot.json': metaFileToJson(signed.snapshotMeta) } };
    case 'snapshot':
      return { ...base, meta: mapToJson(signed.meta, metaFileToJson) };
    case 'targets':
      return {
        ...base,
        targets: mapToJson(signed.targets, targetFileToJson),
        delegations: signed.delegations ? delegationsToJson(signed.delegations) : undefined,
      };
    default:
      return assertNever(signed);
  }
}

/** The canonical bytes signatures over `signed` are computed and checked against. */
export function canonicalSignedBytes(signed: Signed): Uint8Array {
  return encodeCanonical(signedToJson(signed));
}

/**
 * Encode an envelope as canonical JSON bytes.
 *
 * `decodeMetadata(encodeMetadata(md))` yields a document equal to `md`.
 */
export function encodeMetadata(md: Metadata): Uint8Array {
  return encodeCanonical({
    ...md.unrecognized,
    signed: signedToJson(md.signed),
    signatures: md.signatures.map((s) => ({ keyid: s.keyid, sig: s.sig })),
  });
}
