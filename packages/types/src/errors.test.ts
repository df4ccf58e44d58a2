import { describe, it, expect } from 'vitest';
import {
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
} from './errors';

// ---------------------------------------------------------------------------
// MooringError
// ---------------------------------------------------------------------------
describe('MooringError', () => {
  it('carries code, message, hint and context', () => {
    const err = new MooringError(MooringErrorCode.INVALID_INPUT, 'bad', {
      hint: 'fix it',
      context: { field: 'x' },
    });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MooringError');
    expect(err.code).toBe('MOORING_E100');
    expect(err.message).toBe('bad');
    expect(err.hint).toBe('fix it');
    expect(err.context).toEqual({ field: 'x' });
  });

  it('chains the cause', () => {
    const cause = new Error('root cause');
    const err = new MooringError(MooringErrorCode.FETCH_FAILED, 'wrapped', { cause });
    expect(err.cause).toBe(cause);
  });

  it('toJSON omits absent hint and context', () => {
    const err = new MooringError(MooringErrorCode.REPOSITORY_ERROR, 'plain');
    expect(err.toJSON()).toEqual({ code: 'MOORING_E300', message: 'plain' });
  });
});

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------
describe('repository error hierarchy', () => {
  const cases: Array<[RepositoryError, string, MooringErrorCode]> = [
    [new DeserializationError('d'), 'DeserializationError', MooringErrorCode.DESERIALIZATION_FAILED],
    [new UnsignedMetadataError('u'), 'UnsignedMetadataError', MooringErrorCode.UNSIGNED_METADATA],
    [new ExpiredMetadataError('e'), 'ExpiredMetadataError', MooringErrorCode.EXPIRED_METADATA],
    [new RollbackAttackError('r'), 'RollbackAttackError', MooringErrorCode.ROLLBACK_ATTACK],
    [new LengthOrHashMismatchError('l'), 'LengthOrHashMismatchError', MooringErrorCode.LENGTH_OR_HASH_MISMATCH],
  ];

  it.each(cases)('%s is a RepositoryError with its own name and code', (err, name, code) => {
    expect(err).toBeInstanceOf(RepositoryError);
    expect(err).toBeInstanceOf(MooringError);
    expect(err.name).toBe(name);
    expect(err.code).toBe(code);
  });

  it('plain RepositoryError uses the generic code unless given one', () => {
    expect(new RepositoryError('x').code).toBe(MooringErrorCode.REPOSITORY_ERROR);
    expect(new RepositoryError('x', undefined, MooringErrorCode.ROTATION_LIMIT_EXCEEDED).code).toBe('MOORING_E305');
  });

  it('delegation, load-order and fetch errors are not repository errors', () => {
    expect(new MaxDelegationDepthExceededError('m')).not.toBeInstanceOf(RepositoryError);
    expect(new LoadOrderError('o')).not.toBeInstanceOf(RepositoryError);
    expect(new FetchError(MooringErrorCode.FETCH_FAILED, 'f')).not.toBeInstanceOf(RepositoryError);
  });
});

describe('FetchError', () => {
  it('reports notFound only for the not-found code', () => {
    expect(new FetchError(MooringErrorCode.FETCH_NOT_FOUND, 'gone').notFound).toBe(true);
    expect(new FetchError(MooringErrorCode.FETCH_FAILED, 'boom').notFound).toBe(false);
    expect(new FetchError(MooringErrorCode.FETCH_LENGTH_EXCEEDED, 'big').notFound).toBe(false);
  });
});

describe('ValidationError', () => {
  it('records the failing field in both the property and the context', () => {
    const err = new ValidationError('bad range', 'maxDelegations', MooringErrorCode.OUT_OF_RANGE);
    expect(err.field).toBe('maxDelegations');
    expect(err.context).toEqual({ field: 'maxDelegations' });
    expect(err.code).toBe('MOORING_E101');
  });
});

