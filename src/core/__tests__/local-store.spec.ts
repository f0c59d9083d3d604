import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EngineInstallation } from '../../types/engine';
import { EngineIOError, EngineNotFoundError } from '../../utils/errors';
import { INSTALL_RECORD_FILE, LocalStore } from '../local-store';
import { TestClock, createTempDir } from './helpers';

async function install(store: LocalStore, version: string, signature = `sig-${version}`): Promise<EngineInstallation> {
  const staging = await store.createStaging(version);
  await fs.writeFile(path.join(staging, 'engine.zip'), 'payload');
  return store.commit(version, staging, signature, 'engine.zip');
}

describe('LocalStore', () => {
  let root: string;
  let clock: TestClock;

  beforeEach(async () => {
    root = await createTempDir();
    clock = new TestClock();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  const open = (repair?: boolean): Promise<LocalStore> => LocalStore.open({ rootDir: root, clock: clock.read, repair });

  it('commits a staged installation into its version directory', async () => {
    const store = await open();

    const installation = await install(store, '7.0.0');

    expect(installation).toEqual({
      version: '7.0.0',
      installPath: path.join(root, '7.0.0'),
      packagePath: path.join(root, '7.0.0', 'engine.zip'),
      signature: 'sig-7.0.0',
      installedAt: 1_000_000,
      lastUsedAt: 1_000_000,
      sizeBytes: 7
    });
    expect(await fs.readdir(root)).toEqual(['7.0.0']);
    expect(store.getSignature('7.0.0')).toBe('sig-7.0.0');
  });

  it('writes an install record beside the package', async () => {
    const store = await open();
    await install(store, '7.0.0');

    expect(await fs.readJson(path.join(root, '7.0.0', INSTALL_RECORD_FILE))).toEqual({
      formatVersion: 1,
      version: '7.0.0',
      signature: 'sig-7.0.0',
      packageFile: 'engine.zip',
      installedAt: new Date(1_000_000).toISOString(),
      lastUsedAt: new Date(1_000_000).toISOString(),
      sizeBytes: 7
    });
  });

  it('rebuilds its index from disk on open', async () => {
    const first = await open();
    await install(first, '7.0.0');
    await install(first, '6.5.0');

    const reopened = await open();

    expect(reopened.list().map((installation) => installation.version)).toEqual(['6.5.0', '7.0.0']);
    expect(reopened.get('7.0.0')).toEqual(first.get('7.0.0'));
  });

  it('persists lastUsedAt when a version is used', async () => {
    const store = await open();
    await install(store, '7.0.0');

    clock.advance(5_000);
    expect(store.getPath('7.0.0')).toBe(path.join(root, '7.0.0'));
    await store.flush();

    const reopened = await open();
    expect(reopened.get('7.0.0')?.lastUsedAt).toBe(1_005_000);
    expect(reopened.get('7.0.0')?.installedAt).toBe(1_000_000);
  });

  it('throws not found for versions that are not installed', async () => {
    const store = await open();

    expect(() => store.getPath('7.0.0')).toThrow(EngineNotFoundError);
    expect(() => store.getSignature('7.0.0')).toThrow('Engine version 7.0.0 is not installed');
  });

  it('sweeps interrupted and unreadable directories on open', async () => {
    await fs.outputFile(path.join(root, '.staging-7.0.0-abc', 'engine.zip'), 'partial');
    await fs.outputFile(path.join(root, '.trash-6.0.0-def', 'engine.zip'), 'old');
    await fs.outputFile(path.join(root, '5.0.0', 'engine.zip'), 'no record');
    await fs.outputFile(path.join(root, '4.0.0', INSTALL_RECORD_FILE), '{ broken');

    const store = await open();

    expect(store.list()).toEqual([]);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('leaves unreadable directories alone without repair', async () => {
    await fs.outputFile(path.join(root, '5.0.0', 'engine.zip'), 'no record');

    const store = await open(false);

    expect(store.has('5.0.0')).toBe(false);
    expect(await fs.readdir(root)).toEqual(['5.0.0']);
  });

  it('discards records whose package file is gone', async () => {
    const first = await open();
    await install(first, '7.0.0');
    await fs.remove(path.join(root, '7.0.0', 'engine.zip'));

    const reopened = await open();

    expect(reopened.has('7.0.0')).toBe(false);
  });

  it('refuses to commit over an installed version', async () => {
    const store = await open();
    await install(store, '7.0.0');
    const staging = await store.createStaging('7.0.0');

    await expect(store.commit('7.0.0', staging, 'other', 'engine.zip')).rejects.toBeInstanceOf(EngineIOError);
  });

  it('removes installations idempotently', async () => {
    const store = await open();
    await install(store, '7.0.0');

    await expect(store.remove('7.0.0')).resolves.toBe(true);
    await expect(store.remove('7.0.0')).resolves.toBe(false);
    expect(store.has('7.0.0')).toBe(false);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('removes every installation and stray directory', async () => {
    const store = await open();
    await install(store, '7.0.0');
    await install(store, '6.0.0');
    await fs.ensureDir(path.join(root, 'stray'));

    const removed = await store.removeAll();

    expect(removed.sort()).toEqual(['6.0.0', '7.0.0']);
    expect(store.list()).toEqual([]);
    expect(await fs.readdir(root)).toEqual([]);
  });
});
