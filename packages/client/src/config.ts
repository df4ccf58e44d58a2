import { ValidationError, validateRange } from '@mooring/types';

/** Limits and behavior switches of an {@link Updater}. */
export interface UpdaterConfig {
  /** Most new root versions accepted in one refresh. */
  maxRootRotations: number;
  /** Most delegated roles visited in one target lookup. */
  maxDelegations: number;
  /** Deepest delegation chain followed below top-level targets. */
  maxDelegationDepth: number;
  rootMaxLength: number;
  timestampMaxLength: number;
  /** Used when the timestamp does not record the snapshot's length. */
  snapshotMaxLength: number;
  /** Used when the snapshot does not record a targets file's length. */
  targetsMaxLength: number;
  /** Download artifacts as `<hash>.<name>` when the repository uses consistent snapshots. */
  prefixTargetsWithHash: boolean;
  /** Instant expiry is checked against; fixed for the lifetime of an updater. */
  referenceTime: Date;
}

export const DEFAULT_UPDATER_CONFIG: Readonly<Omit<UpdaterConfig, 'referenceTime'>> = {
  maxRootRotations: 32,
  maxDelegations: 32,
  maxDelegationDepth: 16,
  rootMaxLength: 512_000,
  timestampMaxLength: 16_384,
  snapshotMaxLength: 2_000_000,
  targetsMaxLength: 5_000_000,
  prefixTargetsWithHash: true,
};

const NUMERIC_FIELDS = [
  'maxRootRotations',
  'maxDelegations',
  'maxDelegationDepth',
  'rootMaxLength',
  'timestampMaxLength',
  'snapshotMaxLength',
  'targetsMaxLength',
] as const;

/**
 * Fill in defaults and validate.
 *
 * @throws {ValidationError} When a limit is not a positive integer or the
 *   reference time is not a valid date.
 *
 * @example
 * ```typescript
 * const config = resolveUpdaterConfig({ maxDelegations: 8 });
 * ```
 */
export function resolveUpdaterConfig(overrides: Partial<UpdaterConfig> = {}): UpdaterConfig {
  const config: UpdaterConfig = {
    ...DEFAULT_UPDATER_CONFIG,
    ...overrides,
    referenceTime: new Date((overrides.referenceTime ?? new Date()).getTime()),
  };
  for (const field of NUMERIC_FIELDS) {
    validateRange(config[field], 1, Number.MAX_SAFE_INTEGER, field);
  }
  if (Number.isNaN(config.referenceTime.getTime())) {
    throw new ValidationError('referenceTime must be a valid date', 'referenceTime');
  }
  return config;
}
