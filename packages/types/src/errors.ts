/**
 * Error code system for the Mooring update client.
 *
 * Every error has a unique, documentable code (MOORING_Exxx) that maps
 * to a specific failure mode. Repository-caused validation failures share
 * the {@link RepositoryError} base so callers can tell a hostile or broken
 * mirror apart from a local programming error or a transport failure.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Mooring error codes. */
export enum MooringErrorCode {
  // Input validation (1xx)
  /** A required input was empty, missing, or otherwise invalid. */
  INVALID_INPUT = 'MOORING_E100',
  /** A value fell outside its permitted numeric range. */
  OUT_OF_RANGE = 'MOORING_E101',
  /** A hex-encoded string was malformed. */
  INVALID_HEX = 'MOORING_E102',

  // Metadata (2xx)
  /** A metadata document could not be parsed or is missing a required field. */
  DESERIALIZATION_FAILED = 'MOORING_E200',
  /** A metadata document could not be serialized to canonical form. */
  SERIALIZATION_FAILED = 'MOORING_E201',

  // Repository validation (3xx)
  /** Generic repository inconsistency. */
  REPOSITORY_ERROR = 'MOORING_E300',
  /** Fewer than threshold distinct keys produced valid signatures. */
  UNSIGNED_METADATA = 'MOORING_E301',
  /** The metadata expired before the reference time. */
  EXPIRED_METADATA = 'MOORING_E302',
  /** A version regressed or disagreed with the referencing role. */
  ROLLBACK_ATTACK = 'MOORING_E303',
  /** Downloaded bytes did not match the expected length or hashes. */
  LENGTH_OR_HASH_MISMATCH = 'MOORING_E304',
  /** The root rotation chain exceeded the configured ceiling. */
  ROTATION_LIMIT_EXCEEDED = 'MOORING_E305',

  // Delegation (4xx)
  /** The delegation walk exceeded its depth or visit budget. */
  MAX_DELEGATION_DEPTH_EXCEEDED = 'MOORING_E400',

  // State machine (5xx)
  /** A load was attempted out of the required role order. */
  LOAD_ORDER_VIOLATION = 'MOORING_E500',

  // Fetching (6xx)
  /** The requested metadata or target does not exist on the mirror. */
  FETCH_NOT_FOUND = 'MOORING_E600',
  /** The transport failed to deliver the requested bytes. */
  FETCH_FAILED = 'MOORING_E601',
  /** The response exceeded the maximum allowed byte length. */
  FETCH_LENGTH_EXCEEDED = 'MOORING_E602',

  // Store (7xx)
  /** A local store read failed. */
  STORE_READ_FAILED = 'MOORING_E700',
  /** A local store write failed. */
  STORE_WRITE_FAILED = 'MOORING_E701',

  // Crypto (9xx)
  /** A cryptographic key was invalid or malformed. */
  CRYPTO_INVALID_KEY = 'MOORING_E900',
  /** A cryptographic signing operation failed. */
  CRYPTO_SIGNATURE_FAILED = 'MOORING_E901',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options accepted by every {@link MooringError} constructor. */
export interface MooringErrorOptions {
  /** Structured details (role name, versions, URL) copied into log entries. */
  context?: Record<string, unknown>;
  /** What an operator can do about it. */
  hint?: string;
  cause?: Error;
}

/** Plain-object form of a {@link MooringError}, as written to logs. */
export interface MooringErrorJson {
  code: MooringErrorCode;
  message: string;
  hint?: string;
  context?: Record<string, unknown>;
}

export class MooringError extends Error {
  readonly code: MooringErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: MooringErrorCode, message: string, options: MooringErrorOptions = {}) {
    const { cause, context, hint } = options;
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MooringError';
    this.code = code;
    this.context = context;
    this.hint = hint;
  }

  toJSON(): MooringErrorJson {
    return {
      code: this.code,
      message: this.message,
      ...(this.hint === undefined ? {} : { hint: this.hint }),
      ...(this.context === undefined ? {} : { context: this.context }),
    };
  }
}

/**
 * Thrown when an input fails validation (empty string, out of range, etc.).
 */
export class ValidationError extends MooringError {
  /** The name of the field or parameter that failed validation. */
  readonly field: string;

  constructor(message: string, field: string, code: MooringErrorCode = MooringErrorCode.INVALID_INPUT) {
    super(code, message, { context: { field } });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Base class for every failure caused by the content a repository served.
 *
 * A RepositoryError never indicates a bug in the client: the candidate
 * metadata was rejected and the previously trusted state is unchanged.
 */
export class RepositoryError extends MooringError {
  constructor(message: string, options?: MooringErrorOptions, code: MooringErrorCode = MooringErrorCode.REPOSITORY_ERROR) {
    super(code, message, options);
    this.name = 'RepositoryError';
  }
}

/** Thrown when metadata bytes cannot be decoded into a valid document. */
export class DeserializationError extends RepositoryError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(message, options, MooringErrorCode.DESERIALIZATION_FAILED);
    this.name = 'DeserializationError';
  }
}

/** Thrown when a role's signature threshold is not met. */
export class UnsignedMetadataError extends RepositoryError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(message, options, MooringErrorCode.UNSIGNED_METADATA);
    this.name = 'UnsignedMetadataError';
  }
}

/** Thrown when metadata is expired at the reference time. */
export class ExpiredMetadataError extends RepositoryError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(message, options, MooringErrorCode.EXPIRED_METADATA);
    this.name = 'ExpiredMetadataError';
  }
}

/** Thrown on a version regression or a version that disagrees with its referrer. */
export class RollbackAttackError extends RepositoryError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(message, options, MooringErrorCode.ROLLBACK_ATTACK);
    this.name = 'RollbackAttackError';
  }
}

/** Thrown when bytes do not match an expected length or hash. */
export class LengthOrHashMismatchError extends RepositoryError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(message, options, MooringErrorCode.LENGTH_OR_HASH_MISMATCH);
    this.name = 'LengthOrHashMismatchError';
  }
}

/** Thrown when a delegation walk exceeds its depth or visit budget. */
export class MaxDelegationDepthExceededError extends MooringError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(MooringErrorCode.MAX_DELEGATION_DEPTH_EXCEEDED, message, options);
    this.name = 'MaxDelegationDepthExceededError';
  }
}

/**
 * Thrown when the trusted metadata state machine is driven out of order.
 * This is a programming error, not a repository failure.
 */
export class LoadOrderError extends MooringError {
  constructor(message: string, options?: MooringErrorOptions) {
    super(MooringErrorCode.LOAD_ORDER_VIOLATION, message, options);
    this.name = 'LoadOrderError';
  }
}

/** Thrown by a fetcher when bytes could not be retrieved. */
export class FetchError extends MooringError {
  constructor(code: MooringErrorCode, message: string, options?: MooringErrorOptions) {
    super(code, message, options);
    this.name = 'FetchError';
  }

  /** Whether the mirror reported that the resource does not exist. */
  get notFound(): boolean {
    return this.code === MooringErrorCode.FETCH_NOT_FOUND;
  }
}

/** Thrown when a local store read or write fails. */
export class StoreError extends MooringError {
  constructor(code: MooringErrorCode, message: string, options?: MooringErrorOptions) {
    super(code, message, options);
    this.name = 'StoreError';
  }
}
