import { digest, isSupportedHashAlgorithm, toHex } from '@mooring/crypto';
import { LengthOrHashMismatchError } from '@mooring/types';

import type { FileInfo, SignedBase } from './types';

/** Whether `signed` has expired at `reference`. Expiry is inclusive. */
export function isExpired(signed: Pick<SignedBase, 'expires'>, reference: Date): boolean {
  return reference.getTime() >= signed.expires.getTime();
}

/**
 * Check `data` against the length and every hash recorded in `info`.
 *
 * Absent `length` or `hashes` are not checked. An algorithm this client
 * cannot compute fails the check rather than being skipped.
 *
 * @throws {LengthOrHashMismatchError}
 */
export function verifyLengthAndHashes(data: Uint8Array, info: FileInfo, name = 'file'): void {
  if (info.length !== undefined && data.length !== info.length) {
    throw new LengthOrHashMismatchError(
      `${name}: expected length ${info.length}, got ${data.length}`,
      { context: { name, expected: info.length, actual: data.length } },
    );
  }
  for (const [algorithm, expected] of Object.entries(info.hashes ?? {})) {
    if (!isSupportedHashAlgorithm(algorithm)) {
      throw new LengthOrHashMismatchError(`${name}: unsupported hash algorithm ${algorithm}`, {
        context: { name, algorithm },
      });
    }
    const actual = toHex(digest(algorithm, data));
    if (actual !== expected.toLowerCase()) {
      throw new LengthOrHashMismatchError(`${name}: ${algorithm} hash mismatch`, {
        context: { name, algorithm, expected, actual },
      });
    }
  }
}
