/**
 * Type definitions for the @mooring/store package.
 *
 * Defines where a client keeps trusted metadata between runs and where it
 * keeps downloaded artifacts.
 */

// ─── MetadataStore interface ────────────────────────────────────────────────────

/**
 * Persistent cache of the most recently trusted metadata, one blob per role.
 *
 * Only bytes that have passed validation are ever saved, so a reader may
 * treat a stored blob as a candidate to re-validate, never as trusted.
 */
export interface MetadataStore {
  /** Load the stored bytes for a role. Returns undefined when none are stored. */
  load(roleName: string): Promise<Uint8Array | undefined>;

  /** Replace the stored bytes for a role. The replacement is atomic per role. */
  save(roleName: string, data: Uint8Array): Promise<void>;
}

// ─── ArtifactStore interface ────────────────────────────────────────────────────

/** Local cache of downloaded artifacts, keyed by target path. */
export interface ArtifactStore {
  /** Load a stored artifact. Returns undefined when none is stored. */
  load(targetPath: string): Promise<Uint8Array | undefined>;

  /**
   * Atomically store an artifact.
   *
   * @returns The location the artifact was written to (see {@link locate}).
   */
  save(targetPath: string, data: Uint8Array): Promise<string>;

  /** Where an artifact for `targetPath` is or would be stored. */
  locate(targetPath: string): string;
}
