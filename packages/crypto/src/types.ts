/** Raw 32-byte Ed25519 private key */
export type PrivateKey = Uint8Array;

/** Raw 32-byte Ed25519 public key */
export type PublicKey = Uint8Array;

/** 64-byte Ed25519 signature */
export type Signature = Uint8Array;

/** Lowercase hex-encoded digest */
export type HashHex = string;

/** Digest algorithms that may appear in file-info `hashes` maps. */
export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512';

/** A key pair for signing and verification */
export interface KeyPair {
  privateKey: PrivateKey;
  publicKey: PublicKey;
  /** Hex-encoded public key, as carried in `keyval.public`. */
  publicKeyHex: string;
}
