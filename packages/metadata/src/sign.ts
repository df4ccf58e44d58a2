import { sign, toHex } from '@mooring/crypto';
import type { KeyPair } from '@mooring/crypto';

import { computeKeyId, keyFromKeyPair } from './keys';
import { canonicalSignedBytes } from './serialization';
import type { Key, Metadata, Signed } from './types';

/** A private key together with the public key and key id it signs as. */
export interface Signer {
  keyid: string;
  key: Key;
  privateKey: Uint8Array;
}

export function createSigner(keyPair: KeyPair): Signer {
  const key = keyFromKeyPair(keyPair);
  return { keyid: computeKeyId(key), key, privateKey: keyPair.privateKey };
}

export interface SignOptions {
  /** Keep existing signatures instead of replacing them all. Defaults to false. */
  append?: boolean;
}

/**
 * Sign the canonical bytes of `md.signed` and return a new envelope.
 *
 * With `append`, an existing signature by the same key id is replaced and
 * the others are kept; without it the result carries only the new signature.
 */
export async function signMetadata<T extends Signed>(
  md: Metadata<T>,
  signer: Signer,
  options: SignOptions = {},
): Promise<Metadata<T>> {
  const sig = toHex(await sign(canonicalSignedBytes(md.signed), signer.privateKey));
  const kept = options.append ? md.signatures.filter((s) => s.keyid !== signer.keyid) : [];
  return { ...md, signatures: [...kept, { keyid: signer.keyid, sig }] };
}
