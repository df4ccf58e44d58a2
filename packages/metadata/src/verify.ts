/**
 * Threshold signature verification of metadata envelopes.
 *
 * @packageDocumentation
 */

import { UnsignedMetadataError, ValidationError } from '@mooring/types';

import { isBinName } from './delegation';
import { verifyKeySignature } from './keys';
import { canonicalSignedBytes } from './serialization';
import { isTopLevelRoleName } from './types';
import type { Metadata, Root, RoleKeys, Targets, VerificationResult } from './types';

// ─── Role lookup ───────────────────────────────────────────────────────────────

/**
 * The role and key map `root` declares for a top-level role.
 *
 * @throws {ValidationError} When `roleName` is not a top-level role.
 */
export function getRootRoleKeys(root: Root, roleName: string): RoleKeys {
  const role = isTopLevelRoleName(roleName) ? root.roles.get(roleName) : undefined;
  if (role === undefined) {
    throw new ValidationError(`Root does not define role ${roleName}`, 'roleName');
  }
  return { role, keys: root.keys };
}

/**
 * The role and key map a targets payload declares for a delegated role,
 * named either explicitly or as one of its hashed bins.
 *
 * @returns `undefined` when `targets` does not delegate to `roleName`.
 */
export function findDelegatedRoleKeys(targets: Targets, roleName: string): RoleKeys | undefined {
  const delegations = targets.delegations;
  if (delegations === undefined) {
    return undefined;
  }
  if (delegations.succinctRoles !== undefined) {
    return isBinName(delegations.succinctRoles, roleName)
      ? { role: delegations.succinctRoles, keys: delegations.keys }
      : undefined;
  }
  const role = delegations.roles?.find((candidate) => candidate.name === roleName);
  return role ? { role, keys: delegations.keys } : undefined;
}

/**
 * Role keys of `roleName` as declared by `delegator`.
 *
 * @throws {ValidationError} When `delegator` does not declare the role.
 */
export function getRoleKeys(delegator: Root | Targets, roleName: string): RoleKeys {
  if (delegator.type === 'root') {
    return getRootRoleKeys(delegator, roleName);
  }
  const found = findDelegatedRoleKeys(delegator, roleName);
  if (found === undefined) {
    throw new ValidationError(`No delegation found for ${roleName}`, 'roleName');
  }
  return found;
}

// ─── Verification ──────────────────────────────────────────────────────────────

/**
 * Check every signature of `md` against a role.
 *
 * A key id counts at most once: only its first signature in the envelope
 * is considered. Signatures by keys outside the role, signatures by keys
 * missing from the key map, and invalid signatures are ignored.
 */
export async function getVerificationResult(
  roleKeys: RoleKeys,
  md: Metadata,
): Promise<VerificationResult> {
  const { role, keys } = roleKeys;
  const message = canonicalSignedBytes(md.signed);
  const authorized = new Set(role.keyids);

  const firstByKeyId = new Map<string, string>();
  for (const signature of md.signatures) {
    if (!firstByKeyId.has(signature.keyid)) {
      firstByKeyId.set(signature.keyid, signature.sig);
    }
  }

  const signed = new Set<string>();
  for (const [keyid, sig] of firstByKeyId) {
    const key = keys.get(keyid);
    if (!authorized.has(keyid) || key === undefined) {
      continue;
    }
    if (await verifyKeySignature(key, sig, message)) {
      signed.add(keyid);
    }
  }

  const unsigned = new Set(role.keyids.filter((keyid) => !signed.has(keyid)));
  return {
    verified: signed.size >= role.threshold,
    threshold: role.threshold,
    signed,
    unsigned,
  };
}

/**
 * Require `md` to carry at least `threshold` valid signatures of the role.
 *
 * @throws {UnsignedMetadataError}
 */
export async function verifySignatures(
  roleName: string,
  roleKeys: RoleKeys,
  md: Metadata,
): Promise<VerificationResult> {
  const result = await getVerificationResult(roleKeys, md);
  if (!result.verified) {
    throw new UnsignedMetadataError(
      `${roleName} was signed by ${result.signed.size}/${result.threshold} keys`,
      {
        context: { role: roleName, signed: [...result.signed], threshold: result.threshold },
      },
    );
  }
  return result;
}

/**
 * Verify `md` as role `roleName` with the keys and threshold `delegator`
 * assigns to it.
 *
 * @example
 * ```typescript
 * await verifyDelegate(trustedRoot, 'timestamp', newTimestamp);
 * await verifyDelegate(trustedTargets, 'projects-3f', binMetadata);
 * ```
 */
export async function verifyDelegate(
  delegator: Root | Targets,
  roleName: string,
  md: Metadata,
): Promise<VerificationResult> {
  return verifySignatures(roleName, getRoleKeys(delegator, roleName), md);
}
