/**
 * @mooring/types: Shared errors, logging and validation utilities.
 *
 * Provides the error taxonomy, the structured logger, runtime type guards
 * and the retry helper used across every Mooring package.
 *
 * @packageDocumentation
 */

import { MooringErrorCode, ValidationError } from './errors';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  MooringErrorCode,
  MooringError,
  ValidationError,
  RepositoryError,
  DeserializationError,
  UnsignedMetadataError,
  ExpiredMetadataError,
  RollbackAttackError,
  LengthOrHashMismatchError,
  MaxDelegationDepthExceededError,
  LoadOrderError,
  FetchError,
  StoreError,
} from './errors';
export type { MooringErrorJson, MooringErrorOptions } from './errors';

// ─── Validation utilities ───────────────────────────────────────────────────────

/**
 * @throws {ValidationError} When `value` is empty or only whitespace.
 */
export function validateNonEmpty(value: string, name: string): void {
  if (typeof value === 'string' && value.trim() !== '') {
    return;
  }
  throw new ValidationError(`${name} must be a non-empty string`, name);
}

/**
 * Require an integer in `[min, max]`, as configuration bounds are.
 *
 * ```typescript
 * validateRange(config.maxRootRotations, 1, 1024, 'maxRootRotations');
 * ```
 *
 * @throws {ValidationError} OUT_OF_RANGE, with the field name in `context.field`.
 */
export function validateRange(value: number, min: number, max: number, name: string): void {
  if (Number.isInteger(value) && value >= min && value <= max) {
    return;
  }
  throw new ValidationError(
    `${name} must be an integer between ${min} and ${max} (got ${value})`,
    name,
    MooringErrorCode.OUT_OF_RANGE,
  );
}

// ─── Runtime type guards ────────────────────────────────────────────────────────

export {
  isNonEmptyString,
  isValidHex,
  isNonNegativeInteger,
  isPositiveInteger,
  isStringArray,
  isPlainObject,
  assertNever,
} from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, createLogger, defaultLogger, stderrOutput, LogLevel } from './logger';
export type { LogEntry, LogLevelName, LogOutput, LoggerOptions } from './logger';

// ─── Retry ───────────────────────────────────────────────────────────────────────

export { withRetry } from './retry';
export type { RetryOptions } from './retry';
