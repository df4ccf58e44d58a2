import { encodeCanonical, fromHex, sha256, verify } from '@mooring/crypto';
import { isValidHex } from '@mooring/types';
import type { KeyPair } from '@mooring/crypto';

import { keyToJson } from './serialization';
import type { Key } from './types';

/** Key type and signature scheme of every key this client can verify. */
export const ED25519 = 'ed25519';

/**
 * Key id: SHA-256 hex of the canonical JSON of the key.
 *
 * Unrecognized key fields take part in the digest, as they do on the wire.
 */
export function computeKeyId(key: Key): string {
  return sha256(encodeCanonical(keyToJson(key)));
}

/** Build an ed25519 key from a hex-encoded public key. */
export function keyFromPublicKey(publicKeyHex: string): Key {
  return {
    keytype: ED25519,
    scheme: ED25519,
    keyval: { public: publicKeyHex.toLowerCase() },
    unrecognized: {},
  };
}

export function keyFromKeyPair(keyPair: KeyPair): Key {
  return keyFromPublicKey(keyPair.publicKeyHex);
}

/**
 * Check one signature against one key.
 *
 * Never throws: a key of an unsupported type or scheme, a malformed public
 * key or a malformed signature all count as an invalid signature.
 */
export async function verifyKeySignature(
  key: Key,
  signatureHex: string,
  message: Uint8Array,
): Promise<boolean> {
  if (key.keytype !== ED25519 || key.scheme !== ED25519) {
    return false;
  }
  const publicKey = decodeHex(key.keyval.public);
  const signature = decodeHex(signatureHex);
  if (!publicKey || !signature) {
    return false;
  }
  return verify(message, signature, publicKey);
}

function decodeHex(hex: string): Uint8Array | undefined {
  return isValidHex(hex) ? fromHex(hex) : undefined;
}
