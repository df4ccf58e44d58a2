/**
 * Type guards for values decoded from repository JSON.
 */

/** A string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

const HEX = /^(?:[0-9a-fA-F]{2})+$/;

/** Whole bytes of hexadecimal, such as a public key or digest. */
export function isValidHex(value: unknown): value is string {
  return typeof value === 'string' && HEX.test(value);
}

/** Lengths and versions: integers JSON carries exactly, zero or above. */
export function isNonNegativeInteger(value: unknown): value is number {
  return Number.isSafeInteger(value) && typeof value === 'number' && value >= 0;
}

export function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item): item is string => typeof item === 'string');
}

/**
 * An object literal or a null-prototype object. Arrays, class instances and
 * anything with a replaced prototype are rejected.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Marks the unreachable branch of an exhaustive `switch`: it fails to
 * compile while a case is unhandled and throws if a value gets through anyway.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
