import * as ed from '@noble/ed25519';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { sha384 as nobleSha384, sha512 as nobleSha512 } from '@noble/hashes/sha512';
import { bytesToHex, hexToBytes, randomBytes } from '@noble/hashes/utils';
import { MooringError, MooringErrorCode } from '@mooring/types';

export type {
  KeyPair,
  PrivateKey,
  PublicKey,
  Signature,
  HashHex,
  HashAlgorithm,
} from './types';

import type { KeyPair, PrivateKey, PublicKey, Signature, HashHex, HashAlgorithm } from './types';

// ─── Ed25519 ──────────────────────────────────────────────────────────────────

const PRIVATE_KEY_LENGTH = 32;

function checkPrivateKey(privateKey: unknown, caller: string): asserts privateKey is PrivateKey {
  if (privateKey instanceof Uint8Array && privateKey.length === PRIVATE_KEY_LENGTH) {
    return;
  }
  const got = privateKey instanceof Uint8Array ? `${privateKey.length} bytes` : typeof privateKey;
  throw new MooringError(
    MooringErrorCode.CRYPTO_INVALID_KEY,
    `${caller} needs a ${PRIVATE_KEY_LENGTH}-byte Ed25519 private key, got ${got}`,
    { hint: 'Pass the raw 32-byte seed, not a hex string or an expanded key.' }
  );
}

/**
 * A fresh Ed25519 key pair. Repository tooling uses this to mint role keys.
 *
 * ```typescript
 * const { publicKeyHex } = await generateKeyPair(); // 64 hex characters
 * ```
 */
export async function generateKeyPair(): Promise<KeyPair> {
  return keyPairFromPrivateKey(randomBytes(PRIVATE_KEY_LENGTH));
}

/** Derive the key pair of an existing seed. The seed is copied. */
export async function keyPairFromPrivateKey(privateKey: Uint8Array): Promise<KeyPair> {
  checkPrivateKey(privateKey, 'keyPairFromPrivateKey');
  const seed = Uint8Array.from(privateKey);
  const publicKey = await ed.getPublicKeyAsync(seed);
  return { privateKey: seed, publicKey, publicKeyHex: toHex(publicKey) };
}

/** Sign `message`, returning the 64-byte signature. */
export async function sign(message: Uint8Array, privateKey: PrivateKey): Promise<Signature> {
  checkPrivateKey(privateKey, 'sign');
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new MooringError(
      MooringErrorCode.CRYPTO_SIGNATURE_FAILED,
      `Signing failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined }
    );
  }
}

/**
 * Check an Ed25519 signature. Inputs come from untrusted metadata, so
 * malformed keys and signatures give `false` rather than throwing.
 */
export async function verify(
  message: Uint8Array,
  signature: Signature,
  publicKey: PublicKey
): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

// ─── Hashing ──────────────────────────────────────────────────────────────────

const HASHERS: Record<HashAlgorithm, (data: Uint8Array) => Uint8Array> = {
  sha256: nobleSha256,
  sha384: nobleSha384,
  sha512: nobleSha512,
};

/** Whether `name` is a hash algorithm this client can compute. */
export function isSupportedHashAlgorithm(name: string): name is HashAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASHERS, name);
}

/**
 * Digest `data` with the named algorithm.
 *
 * @throws {MooringError} When the algorithm is not supported; check with
 *   {@link isSupportedHashAlgorithm} first when the name is untrusted.
 */
export function digest(algorithm: HashAlgorithm, data: Uint8Array): Uint8Array {
  const hasher = HASHERS[algorithm];
  if (hasher === undefined) {
    throw new MooringError(
      MooringErrorCode.INVALID_INPUT,
      `Unsupported hash algorithm: ${String(algorithm)}`,
      { hint: `Use one of ${Object.keys(HASHERS).join(', ')}.` }
    );
  }
  return hasher(data);
}

/** Lowercase hex SHA-256, the form key ids and path hashes take. */
export function sha256(data: Uint8Array): HashHex {
  return toHex(digest('sha256', data));
}

/** SHA-256 of a UTF-8 string as lowercase hex. */
export function sha256String(data: string): HashHex {
  return sha256(utf8Encode(data));
}

// ─── Canonical JSON ───────────────────────────────────────────────────────────

/**
 * Deterministic JSON serialization in the canonical form signatures are
 * computed over.
 *
 * - object keys sorted by Unicode code point, no insignificant whitespace
 * - strings escape only `"` and `\`, every other character is emitted raw
 * - numbers must be safe integers; floats and non-finite values are rejected
 * - object members whose value is `undefined` are omitted
 *
 * @throws {MooringError} SERIALIZATION_FAILED for values that have no canonical form.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 'q"' }); // '{"a":"q\\"","z":1}'
 * ```
 */
export function canonicalizeJson(value: unknown): string {
  const parts: string[] = [];
  writeCanonical(value, parts, '$');
  return parts.join('');
}

/** {@link canonicalizeJson} encoded as UTF-8 bytes. */
export function encodeCanonical(value: unknown): Uint8Array {
  return utf8Encode(canonicalizeJson(value));
}

function writeCanonical(value: unknown, out: string[], path: string): void {
  if (value === null) {
    out.push('null');
    return;
  }
  switch (typeof value) {
    case 'boolean':
      out.push(value ? 'true' : 'false');
      return;
    case 'number':
      if (!Number.isSafeInteger(value)) {
        throw new MooringError(
          MooringErrorCode.SERIALIZATION_FAILED,
          `Cannot canonicalize non-integer number ${value} at ${path}`,
          { hint: 'Canonical JSON carries integers only.' }
        );
      }
      out.push(String(value));
      return;
    case 'string':
      out.push(quote(value));
      return;
    case 'object':
      break;
    default:
      throw new MooringError(
        MooringErrorCode.SERIALIZATION_FAILED,
        `Cannot canonicalize value of type ${typeof value} at ${path}`
      );
  }

  if (Array.isArray(value)) {
    out.push('[');
    value.forEach((item: unknown, i) => {
      if (i > 0) out.push(',');
      writeCanonical(item, out, `${path}[${i}]`);
    });
    out.push(']');
    return;
  }

  const members: [string, unknown][] = Object.entries(value);
  const present = members
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => compareCodePoints(a, b));
  out.push('{');
  present.forEach(([key, member], i) => {
    if (i > 0) out.push(',');
    out.push(quote(key), ':');
    writeCanonical(member, out, `${path}.${key}`);
  });
  out.push('}');
}

function quote(s: string): string {
  return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Order strings by code point rather than UTF-16 code unit. */
function compareCodePoints(a: string, b: string): number {
  const ca = Array.from(a);
  const cb = Array.from(b);
  const n = Math.min(ca.length, cb.length);
  for (let i = 0; i < n; i++) {
    const x = ca[i].codePointAt(0) ?? 0;
    const y = cb[i].codePointAt(0) ?? 0;
    if (x !== y) return x - y;
  }
  return ca.length - cb.length;
}

// ─── Encoding helpers ─────────────────────────────────────────────────────────

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/** Encode a string as UTF-8 bytes. */
export function utf8Encode(s: string): Uint8Array {
  return encoder.encode(s);
}

/**
 * Decode UTF-8 bytes to a string.
 *
 * @throws {TypeError} On malformed UTF-8.
 */
export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/** Lowercase hex of `data`, e.g. `ff00` for `[255, 0]`. */
export function toHex(data: Uint8Array): string {
  return bytesToHex(data);
}

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Bytes of a hex string in either case.
 *
 * @throws {MooringError} INVALID_HEX on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  if (HEX_PATTERN.test(hex)) {
    return hexToBytes(hex);
  }
  throw new MooringError(
    MooringErrorCode.INVALID_HEX,
    hex.length % 2 === 0
      ? 'Invalid hex string: contains non-hexadecimal characters'
      : `Invalid hex string: odd length (${hex.length})`,
    { hint: 'Keys and digests are written as two hex characters per byte.' }
  );
}

/** Byte equality whose running time depends only on the lengths. */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  a.forEach((byte, i) => {
    diff |= byte ^ b[i];
  });
  return diff === 0;
}
