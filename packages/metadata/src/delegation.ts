/**
 * Which delegated roles are trusted for which target paths.
 *
 * @packageDocumentation
 */

import { digest, sha256String, utf8Encode } from '@mooring/crypto';

import type { DelegatedRole, DelegationMatch, Delegations, SuccinctRoles } from './types';

// ─── Path patterns ─────────────────────────────────────────────────────────────

const patternCache = new Map<string, RegExp>();

function escapeRegExp(s: string): string {
  return s.replace(/[\\^$.*+?()[\]{}|/-]/g, '\\$&');
}

function compilePattern(pattern: string): RegExp {
  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const c = pattern[i];
    i++;
    if (c === '*') {
      source += '.*';
    } else if (c === '?') {
      source += '.';
    } else if (c === '[') {
      let j = i;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++;
      const close = pattern.indexOf(']', j);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i, close);
      i = close + 1;
      let negate = false;
      if (body.startsWith('!')) {
        negate = true;
        body = body.slice(1);
      }
      source += `[${negate ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
    } else {
      source += escapeRegExp(c);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

/**
 * Shell-style match of a whole target path.
 *
 * `*` matches any run of characters including `/`, `?` any single character,
 * and `[...]` / `[!...]` a character class. Matching is case-sensitive.
 *
 * @example
 * ```typescript
 * matchPathPattern('a/*', 'a/b.txt');      // true
 * matchPathPattern('*.tgz', 'dir/x.tgz'); // true
 * ```
 */
export function matchPathPattern(pattern: string, targetPath: string): boolean {
  let re = patternCache.get(pattern);
  if (re === undefined) {
    re = compilePattern(pattern);
    patternCache.set(pattern, re);
  }
  return re.test(targetPath);
}

/** Whether `role` is trusted for `targetPath` by its patterns or hash prefixes. */
export function isDelegatedPath(role: DelegatedRole, targetPath: string): boolean {
  if (role.paths !== undefined) {
    return role.paths.some((pattern) => matchPathPattern(pattern, targetPath));
  }
  if (role.pathHashPrefixes !== undefined) {
    const pathHash = sha256String(targetPath);
    return role.pathHashPrefixes.some((prefix) => pathHash.startsWith(prefix.toLowerCase()));
  }
  return false;
}

// ─── Succinct hashed bins ──────────────────────────────────────────────────────

export function numberOfBins(succinct: SuccinctRoles): number {
  return 2 ** succinct.bitLength;
}

function suffixLength(succinct: SuccinctRoles): number {
  return (numberOfBins(succinct) - 1).toString(16).length;
}

/** Name of bin `index`: the prefix, a dash, and the zero-padded lowercase hex index. */
export function binName(succinct: SuccinctRoles, index: number): string {
  return `${succinct.namePrefix}-${index.toString(16).padStart(suffixLength(succinct), '0')}`;
}

/** Index of the bin responsible for `targetPath`: the top `bitLength` bits of SHA-256(path). */
export function binIndexForTarget(succinct: SuccinctRoles, targetPath: string): number {
  const hash = digest('sha256', utf8Encode(targetPath));
  const head = ((hash[0] << 24) | (hash[1] << 16) | (hash[2] << 8) | hash[3]) >>> 0;
  return head >>> (32 - succinct.bitLength);
}

export function binNameForTarget(succinct: SuccinctRoles, targetPath: string): string {
  return binName(succinct, binIndexForTarget(succinct, targetPath));
}

/** Whether `roleName` names one of the bins of `succinct`. */
export function isBinName(succinct: SuccinctRoles, roleName: string): boolean {
  const prefix = `${succinct.namePrefix}-`;
  if (!roleName.startsWith(prefix)) {
    return false;
  }
  const suffix = roleName.slice(prefix.length);
  if (suffix.length !== suffixLength(succinct) || !/^[0-9a-f]+$/i.test(suffix)) {
    return false;
  }
  return parseInt(suffix, 16) < numberOfBins(succinct);
}

/** All bin names in index order. */
export function* allBinNames(succinct: SuccinctRoles): Generator<string> {
  const count = numberOfBins(succinct);
  for (let i = 0; i < count; i++) {
    yield binName(succinct, i);
  }
}

// ─── Resolution ────────────────────────────────────────────────────────────────

/**
 * Child roles of a delegation block that are trusted for `targetPath`,
 * in declared order.
 *
 * For hashed bins this is the single responsible bin, always terminating.
 */
export function getRolesForTarget(delegations: Delegations, targetPath: string): DelegationMatch[] {
  if (delegations.succinctRoles !== undefined) {
    return [{ name: binNameForTarget(delegations.succinctRoles, targetPath), terminating: true }];
  }
  return (delegations.roles ?? [])
    .filter((role) => isDelegatedPath(role, targetPath))
    .map((role) => ({ name: role.name, terminating: role.terminating }));
}
