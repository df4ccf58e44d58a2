/**
 * @mooring/metadata: The metadata model of a signed software repository.
 *
 * Decodes and canonically re-encodes root, timestamp, snapshot and targets
 * documents, verifies threshold signatures, and answers which delegated
 * role is trusted for a target path.
 *
 * @packageDocumentation
 */

export type {
  TopLevelRoleName,
  SignedType,
  UnrecognizedFields,
  KeyValue,
  Key,
  Role,
  MetaFile,
  TargetFile,
  DelegatedRole,
  SuccinctRoles,
  Delegations,
  SignedBase,
  Root,
  Timestamp,
  Snapshot,
  Targets,
  Signed,
  SignedByType,
  Signature,
  Metadata,
  VerificationResult,
  RoleKeys,
  DelegationMatch,
  FileInfo,
} from './types';
export { SPECIFICATION_VERSION, TOP_LEVEL_ROLE_NAMES, isTopLevelRoleName } from './types';

export {
  decodeMetadata,
  decodeAs,
  decodeRoot,
  decodeTimestamp,
  decodeSnapshot,
  decodeTargets,
  isMetadataOf,
  encodeMetadata,
  canonicalSignedBytes,
  signedToJson,
  formatExpires,
} from './serialization';

export { ED25519, computeKeyId, keyFromPublicKey, keyFromKeyPair, verifyKeySignature } from './keys';

export {
  getRootRoleKeys,
  findDelegatedRoleKeys,
  getRoleKeys,
  getVerificationResult,
  verifySignatures,
  verifyDelegate,
} from './verify';

export {
  matchPathPattern,
  isDelegatedPath,
  numberOfBins,
  binName,
  binIndexForTarget,
  binNameForTarget,
  isBinName,
  allBinNames,
  getRolesForTarget,
} from './delegation';

export { isExpired, verifyLengthAndHashes } from './checks';

export { createSigner, signMetadata } from './sign';
export type { Signer, SignOptions } from './sign';

export {
  newRole,
  newRoot,
  newMetaFile,
  newTimestamp,
  newSnapshot,
  newTargets,
  newMetadata,
  targetFileFromData,
} from './builders';
export type { NewSignedOptions } from './builders';
