/**
 * On-disk {@link MetadataStore} and {@link ArtifactStore}.
 *
 * Each entry is one file directly under the base directory, named by the
 * percent-encoded role name or target path, so `team/a` and `a/b.tgz` stay
 * flat. The directory is created on the first write. A write lands in a
 * temporary sibling first and is renamed into place, so readers see either
 * the old bytes or the new ones.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';

import { MooringErrorCode, StoreError, validateNonEmpty } from '@mooring/types';

import type { ArtifactStore, MetadataStore } from './types';

// ─── Shared helpers ─────────────────────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Directory of single-file entries. Subclasses choose the file naming.
 */
abstract class FileDirectory {
  protected readonly baseDir: string;
  private dirReady = false;

  constructor(baseDir: string) {
    validateNonEmpty(baseDir, 'baseDir');
    this.baseDir = path.resolve(baseDir);
  }

  protected abstract fileName(name: string): string;

  protected filePath(name: string): string {
    return path.join(this.baseDir, this.fileName(name));
  }

  private async ensureDir(): Promise<void> {
    if (this.dirReady) {
      return;
    }
    await fs.mkdir(this.baseDir, { recursive: true });
    this.dirReady = true;
  }

  /** Write beside the target, then rename over it. */
  private async replaceFile(filePath: string, data: Uint8Array): Promise<void> {
    const tmpPath = `${filePath}.${randomUUID()}.partial`;
    try {
      await fs.writeFile(tmpPath, data);
      await fs.rename(tmpPath, filePath);
    } catch (err: unknown) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }

  protected async read(name: string): Promise<Uint8Array | undefined> {
    const filePath = this.filePath(name);
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw new StoreError(MooringErrorCode.STORE_READ_FAILED, `Cannot read ${filePath}: ${messageOf(err)}`, {
        context: { path: filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  protected async write(name: string, data: Uint8Array): Promise<string> {
    const filePath = this.filePath(name);
    try {
      await this.ensureDir();
      await this.replaceFile(filePath, data);
    } catch (err: unknown) {
      throw new StoreError(MooringErrorCode.STORE_WRITE_FAILED, `Cannot write ${filePath}: ${messageOf(err)}`, {
        context: { path: filePath },
        hint: 'Check that the cache directory is writable.',
        cause: err instanceof Error ? err : undefined,
      });
    }
    return filePath;
  }
}

// ─── FileMetadataStore ──────────────────────────────────────────────────────────

/**
 * Metadata cache on disk: `<baseDir>/<encoded role>.json`.
 *
 * @example
 * ```typescript
 * const store = new FileMetadataStore('/var/cache/app/metadata');
 * await store.save('root', rootBytes);
 * ```
 */
export class FileMetadataStore extends FileDirectory implements MetadataStore {
  protected fileName(roleName: string): string {
    return `${encodeURIComponent(roleName)}.json`;
  }

  async load(roleName: string): Promise<Uint8Array | undefined> {
    return this.read(roleName);
  }

  async save(roleName: string, data: Uint8Array): Promise<void> {
    await this.write(roleName, data);
  }
}

// ─── FileArtifactStore ──────────────────────────────────────────────────────────

/** Artifact cache on disk: `<baseDir>/<encoded target path>`. */
export class FileArtifactStore extends FileDirectory implements ArtifactStore {
  protected fileName(targetPath: string): string {
    const encoded = encodeURIComponent(targetPath);
    // '.' and '..' survive encoding but name directories
    return encoded === '.' || encoded === '..' ? encoded.replace(/\./g, '%2E') : encoded;
  }

  locate(targetPath: string): string {
    return this.filePath(targetPath);
  }

  async load(targetPath: string): Promise<Uint8Array | undefined> {
    return this.read(targetPath);
  }

  async save(targetPath: string, data: Uint8Array): Promise<string> {
    return this.write(targetPath, data);
  }
}
