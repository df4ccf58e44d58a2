/**
 * End-to-end update flow across packages.
 *
 *   @mooring/metadata - documents the simulated repository publishes
 *   @mooring/store    - on-disk metadata cache and download directory
 *   @mooring/client   - refresh, delegated lookup and verified download
 *
 * Scenario: a publisher ships a tool through a delegated `releases` role.
 * A client installs it from a fresh cache, the publisher rotates its root
 * key and ships a new release, and a second client run picks both up from
 * the on-disk cache. Finally a mirror serves tampered bytes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { LengthOrHashMismatchError, LogLevel, createLogger } from '@mooring/types';
import { FileArtifactStore, FileMetadataStore } from '@mooring/store';
import { Updater } from '@mooring/client';
import { RepositorySimulator, SIM_NOW, newSigner } from '../../packages/client/src/__tests__/simulator';

const encoder = new TextEncoder();

let workDir: string;
let metadataDir: string;
let downloadDir: string;
let sim: RepositorySimulator;

function newUpdater(bootstrapRoot?: Uint8Array): Updater {
  return new Updater({
    metadataStore: new FileMetadataStore(metadataDir),
    artifactStore: new FileArtifactStore(downloadDir),
    fetcher: sim,
    bootstrapRoot,
    config: { referenceTime: SIM_NOW },
    logger: createLogger({ level: LogLevel.SILENT }),
  });
}

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mooring-flow-test-'));
  metadataDir = path.join(workDir, 'metadata');
  downloadDir = path.join(workDir, 'downloads');
  sim = await RepositorySimulator.create();
  sim.computeMetaHashes = true;
  sim.addDelegation('targets', { name: 'releases', paths: ['tool/*'] }, await newSigner());
  sim.addTarget('releases', 'tool/v1.bin', encoder.encode('tool version 1'));
  await sim.updateSnapshot();
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe('update flow', () => {
  it('installs, rotates and updates from the on-disk cache', async () => {
    const first = newUpdater(sim.signedRoots[0]);
    const v1 = await first.getTargetInfo('tool/v1.bin');
    if (v1 === undefined) throw new Error('tool/v1.bin not found');
    const location = await first.downloadTarget(v1);

    expect(location).toBe(path.join(downloadDir, encodeURIComponent('tool/v1.bin')));
    expect(await fs.readFile(location, 'utf8')).toBe('tool version 1');
    expect((await fs.readdir(metadataDir)).sort()).toEqual([
      'releases.json',
      'root.json',
      'snapshot.json',
      'targets.json',
      'timestamp.json',
    ]);

    // publisher rotates the root key and ships v2
    const oldRoot = sim.signers.get('root') ?? [];
    const newRoot = await newSigner();
    sim.rotateKeys('root', [newRoot]);
    await sim.bumpRoot([...oldRoot, newRoot]);
    const releases = sim.getTargetsRole('releases');
    releases.version += 1;
    sim.addTarget('releases', 'tool/v2.bin', encoder.encode('tool version 2'));
    await sim.updateSnapshot();

    const second = newUpdater();
    const v2 = await second.getTargetInfo('tool/v2.bin');
    if (v2 === undefined) throw new Error('tool/v2.bin not found');
    expect(second.trusted?.root.signed.version).toBe(2);
    expect(await second.findCachedTarget(v1)).toBe(location);
    expect(await second.findCachedTarget(v2)).toBeUndefined();

    await second.downloadTarget(v2);
    expect(await second.findCachedTarget(v2)).toBe(path.join(downloadDir, encodeURIComponent('tool/v2.bin')));
    expect(await fs.readFile(path.join(metadataDir, 'root.json'))).toEqual(Buffer.from(sim.signedRoots[1]));
  });

  it('refuses tampered artifact bytes and leaves nothing on disk', async () => {
    const updater = newUpdater(sim.signedRoots[0]);
    const info = await updater.getTargetInfo('tool/v1.bin');
    if (info === undefined) throw new Error('tool/v1.bin not found');
    for (const key of sim.artifacts.keys()) {
      sim.artifacts.set(key, encoder.encode('tool version X'));
    }

    await expect(updater.downloadTarget(info)).rejects.toThrow(LengthOrHashMismatchError);
    await expect(fs.readdir(downloadDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('ignores a delegated role for paths outside its patterns', async () => {
    sim.addTarget('releases', 'docs/readme.txt', encoder.encode('readme'));
    sim.getTargetsRole('releases').version += 1;
    await sim.updateSnapshot();
    expect(await newUpdater(sim.signedRoots[0]).getTargetInfo('docs/readme.txt')).toBeUndefined();
  });
});
