import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { VolumeManager, isNotFound } from './volume.manager';
import { makeTempDir } from '../../tests/fixtures/sandbox';

describe('VolumeManager', () => {
  let root: string;
  let volumes: VolumeManager;

  beforeEach(async () => {
    root = await makeTempDir('volumes');
    volumes = new VolumeManager(path.join(root, 'scratch'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should create a world-writable directory per call', async () => {
    const first = await volumes.create('job-1');
    const second = await volumes.create('job-1');

    expect(first.name).toMatch(/^job-[0-9a-f]{12}$/);
    expect(second.name).not.toBe(first.name);
    expect(first.hostPath).toBe(path.join(root, 'scratch', first.name));

    const stats = await fs.stat(first.hostPath);
    expect(stats.isDirectory()).toBe(true);
    expect(stats.mode & 0o777).toBe(0o777);
  });

  it('should remove a volume with its contents', async () => {
    const volume = await volumes.create('job-1');
    await fs.writeFile(path.join(volume.hostPath, 'result.json'), '{}');

    await volumes.remove(volume);
    await volumes.remove(volume);

    await expect(fs.stat(volume.hostPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should list only job directories', async () => {
    const volume = await volumes.create('job-1');
    await fs.mkdir(path.join(root, 'scratch', 'unrelated'));
    await fs.writeFile(path.join(root, 'scratch', 'job-notadir'), '');

    const listed = await volumes.list();

    expect(listed.map((entry) => entry.name)).toEqual([volume.name]);
    expect(listed[0].modifiedAt).toBeInstanceOf(Date);
  });

  it('should list nothing before the root exists', async () => {
    await expect(volumes.list()).resolves.toEqual([]);
  });
});

describe('isNotFound', () => {
  it('should recognise ENOENT errors only', () => {
    expect(isNotFound(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isNotFound(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isNotFound('ENOENT')).toBe(false);
  });
});
