import { describe, it, expect } from 'vitest';
import { utf8Decode, utf8Encode } from '@mooring/crypto';
import { DeserializationError, MooringErrorCode } from '@mooring/types';
import {
  decodeMetadata,
  decodeRoot,
  decodeTargets,
  decodeTimestamp,
  encodeMetadata,
  canonicalSignedBytes,
  formatExpires,
} from './serialization';

const KEY = {
  keytype: 'ed25519',
  scheme: 'ed25519',
  keyval: { public: 'ab'.repeat(32) },
};

function bytes(value: unknown): Uint8Array {
  return utf8Encode(JSON.stringify(value));
}

function rootDoc(overrides: Record<string, unknown> = {}) {
  return {
    signed: {
      _type: 'root',
      spec_version: '1.0.31',
      version: 1,
      expires: '2030-01-01T00:00:00Z',
      consistent_snapshot: true,
      keys: { k1: KEY },
      roles: {
        root: { keyids: ['k1'], threshold: 1 },
        timestamp: { keyids: ['k1'], threshold: 1 },
        snapshot: { keyids: ['k1'], threshold: 1 },
        targets: { keyids: ['k1'], threshold: 1 },
      },
      ...overrides,
    },
    signatures: [{ keyid: 'k1', sig: '00' }],
  };
}

function timestampDoc(signed: Record<string, unknown> = {}) {
  return {
    signed: {
      _type: 'timestamp',
      spec_version: '1.0.31',
      version: 3,
      expires: '2030-01-01T00:00:00Z',
      meta: { 'snapshot.json': { version: 7 } },
      ...signed,
    },
    signatures: [],
  };
}

function targetsDoc(signed: Record<string, unknown> = {}) {
  return {
    signed: {
      _type: 'targets',
      spec_version: '1.0.31',
      version: 1,
      expires: '2030-01-01T00:00:00Z',
      targets: {},
      ...signed,
    },
    signatures: [],
  };
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------
describe('decodeMetadata', () => {
  it('decodes a root document', () => {
    const md = decodeRoot(bytes(rootDoc()));
    expect(md.signed.version).toBe(1);
    expect(md.signed.expires.toISOString()).toBe('2030-01-01T00:00:00.000Z');
    expect(md.signed.consistentSnapshot).toBe(true);
    expect(md.signed.roles.size).toBe(4);
    expect(md.signed.roles.get('snapshot')?.threshold).toBe(1);
    expect(md.signed.keys.get('k1')?.keyval.public).toBe('ab'.repeat(32));
    expect(md.signatures).toEqual([{ keyid: 'k1', sig: '00' }]);
  });

  it('keeps only the snapshot entry of a timestamp', () => {
    const md = decodeTimestamp(bytes(timestampDoc()));
    expect(md.signed.snapshotMeta.version).toBe(7);
    expect(md.signed.snapshotMeta.length).toBeUndefined();
  });

  it('decodes targets and delegations', () => {
    const md = decodeTargets(
      bytes(
        targetsDoc({
          targets: { 'a/b.txt': { length: 3, hashes: { sha256: 'aa' }, custom: { tag: 'x' } } },
          delegations: {
            keys: { k1: KEY },
            roles: [
              { name: 'X', keyids: ['k1'], threshold: 1, terminating: true, paths: ['a/*'] },
              { name: 'Y', keyids: ['k1'], threshold: 1, terminating: false, path_hash_prefixes: ['ab'] },
            ],
          },
        }),
      ),
    );
    const target = md.signed.targets.get('a/b.txt');
    expect(target?.path).toBe('a/b.txt');
    expect(target?.length).toBe(3);
    expect(target?.custom).toEqual({ tag: 'x' });
    expect(md.signed.delegations?.roles?.map((r) => r.name)).toEqual(['X', 'Y']);
    expect(md.signed.delegations?.roles?.[1].pathHashPrefixes).toEqual(['ab']);
  });

  it('decodes succinct roles', () => {
    const md = decodeTargets(
      bytes(
        targetsDoc({
          delegations: {
            keys: {},
            succinct_roles: { keyids: [], threshold: 1, bit_length: 8, name_prefix: 'bin' },
          },
        }),
      ),
    );
    expect(md.signed.delegations?.succinctRoles?.bitLength).toBe(8);
    expect(md.signed.delegations?.succinctRoles?.namePrefix).toBe('bin');
  });

  it('treats target paths that look like object members as plain keys', () => {
    const md = decodeTargets(
      bytes(targetsDoc({ targets: { constructor: { length: 1, hashes: { sha256: 'aa' } } } })),
    );
    expect(md.signed.targets.get('constructor')?.length).toBe(1);
    expect(md.signed.targets.get('toString')).toBeUndefined();
  });

  it('rejects invalid JSON and invalid UTF-8', () => {
    expect(() => decodeMetadata(utf8Encode('{"signed":'))).toThrow(DeserializationError);
    expect(() => decodeMetadata(new Uint8Array([0x7b, 0xff, 0x7d]))).toThrow(DeserializationError);
  });

  it('reports the deserialization error code', () => {
    let caught: unknown;
    try {
      decodeMetadata(utf8Encode('[]'));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DeserializationError);
    expect(caught).toMatchObject({
      code: MooringErrorCode.DESERIALIZATION_FAILED,
      message: 'metadata must be a JSON object',
    });
  });

  it('rejects an unsupported spec version', () => {
    expect(() => decodeMetadata(bytes(rootDoc({ spec_version: '2.0.0' })))).toThrow(
      /Unsupported spec_version 2\.0\.0/,
    );
  });

  it('rejects expiry timestamps in any other format', () => {
    expect(() => decodeMetadata(bytes(rootDoc({ expires: '2030-01-01T00:00:00.000Z' })))).toThrow(
      /signed\.expires must be formatted/,
    );
    expect(() => decodeMetadata(bytes(rootDoc({ expires: '2030-02-30T00:00:00Z' })))).toThrow(
      /real calendar date/,
    );
  });

  it('rejects non-positive and fractional versions', () => {
    expect(() => decodeMetadata(bytes(rootDoc({ version: 0 })))).toThrow(/signed\.version/);
    expect(() => decodeMetadata(bytes(rootDoc({ version: 1.5 })))).toThrow(/signed\.version/);
  });

  it('rejects a root missing a top-level role', () => {
    const doc = rootDoc();
    const roles = { ...doc.signed.roles, targets: undefined };
    expect(() => decodeMetadata(bytes(rootDoc({ roles })))).toThrow(/missing the targets role/);
  });

  it('rejects a timestamp whose meta holds other files', () => {
    const meta = { 'snapshot.json': { version: 1 }, 'targets.json': { version: 1 } };
    expect(() => decodeMetadata(bytes(timestampDoc({ meta })))).toThrow(/exactly snapshot\.json/);
  });

  it('rejects a delegated role with both paths and hash prefixes', () => {
    const delegations = {
      keys: {},
      roles: [{ name: 'X', keyids: [], threshold: 1, terminating: false, paths: [], path_hash_prefixes: [] }],
    };
    expect(() => decodeMetadata(bytes(targetsDoc({ delegations })))).toThrow(/exactly one of paths/);
  });

  it('rejects hash prefixes that are not hexadecimal', () => {
    const delegations = {
      keys: {},
      roles: [{ name: 'X', keyids: [], threshold: 1, terminating: false, path_hash_prefixes: ['ab', 'g1'] }],
    };
    expect(() => decodeMetadata(bytes(targetsDoc({ delegations })))).toThrow(
      /path_hash_prefixes must be an array of hexadecimal prefixes/,
    );
  });

  it('rejects a document of another type than requested', () => {
    expect(() => decodeTimestamp(bytes(rootDoc()))).toThrow('Expected timestamp metadata, got root');
  });
});

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------
describe('encodeMetadata', () => {
  it('writes canonical JSON including unrecognized fields', () => {
    const md = decodeMetadata(bytes(timestampDoc({ 'x-note': 'keep' })));
    expect(utf8Decode(encodeMetadata(md))).toBe(
      '{"signatures":[],"signed":{"_type":"timestamp","expires":"2030-01-01T00:00:00Z",' +
        '"meta":{"snapshot.json":{"version":7}},"spec_version":"1.0.31","version":3,"x-note":"keep"}}',
    );
  });

  it('preserves unrecognized fields of nested objects', () => {
    const keys = { k1: { ...KEY, 'x-origin': 'hsm', keyval: { ...KEY.keyval, extra: 1 } } };
    const md = decodeRoot(bytes(rootDoc({ keys })));
    const again = decodeRoot(encodeMetadata(md));
    expect(again.signed.keys.get('k1')?.unrecognized).toEqual({ 'x-origin': 'hsm' });
    expect(again.signed.keys.get('k1')?.keyval).toEqual({ public: 'ab'.repeat(32), extra: 1 });
  });

  it('re-derives the same signed bytes after a round trip', () => {
    const md = decodeRoot(bytes(rootDoc({ 'x-a': [1, 2] })));
    const again = decodeRoot(encodeMetadata(md));
    expect(utf8Decode(canonicalSignedBytes(again.signed))).toBe(utf8Decode(canonicalSignedBytes(md.signed)));
  });
});

describe('formatExpires', () => {
  it('drops milliseconds', () => {
    expect(formatExpires(new Date(Date.UTC(2031, 5, 9, 8, 7, 6, 543)))).toBe('2031-06-09T08:07:06Z');
  });
});
