/**
 * @mooring/store: Local storage for trusted metadata and artifacts.
 *
 * Provides the {@link MetadataStore} and {@link ArtifactStore} interfaces,
 * file-system implementations with atomic writes, and in-memory
 * implementations backed by a Map.
 *
 * @packageDocumentation
 */

import type { ArtifactStore, MetadataStore } from './types';

// Re-export every type so consumers only need @mooring/store
export type { ArtifactStore, MetadataStore } from './types';

export { FileMetadataStore, FileArtifactStore } from './file-store';

// ─── MemoryMetadataStore ────────────────────────────────────────────────────────

/**
 * In-memory implementation of {@link MetadataStore} backed by a Map.
 *
 * Suitable for testing and for clients that re-bootstrap on every run.
 * Stored and returned bytes are copies, so callers cannot mutate the
 * stored data.
 */
export class MemoryMetadataStore implements MetadataStore {
  private readonly data = new Map<string, Uint8Array>();

  async load(roleName: string): Promise<Uint8Array | undefined> {
    const stored = this.data.get(roleName);
    return stored ? new Uint8Array(stored) : undefined;
  }

  async save(roleName: string, data: Uint8Array): Promise<void> {
    this.data.set(roleName, new Uint8Array(data));
  }

  /** Whether bytes are stored for a role. */
  has(roleName: string): boolean {
    return this.data.has(roleName);
  }

  /** Role names with stored bytes, in first-save order. */
  roles(): string[] {
    return Array.from(this.data.keys());
  }

  /** Remove a role's bytes. Returns true if something was removed. */
  delete(roleName: string): boolean {
    return this.data.delete(roleName);
  }

  clear(): void {
    this.data.clear();
  }
}

// ─── MemoryArtifactStore ────────────────────────────────────────────────────────

/** In-memory implementation of {@link ArtifactStore}. Locations are `memory:<path>`. */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly data = new Map<string, Uint8Array>();

  locate(targetPath: string): string {
    return `memory:${targetPath}`;
  }

  async load(targetPath: string): Promise<Uint8Array | undefined> {
    const stored = this.data.get(targetPath);
    return stored ? new Uint8Array(stored) : undefined;
  }

  async save(targetPath: string, data: Uint8Array): Promise<string> {
    this.data.set(targetPath, new Uint8Array(data));
    return this.locate(targetPath);
  }

  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
