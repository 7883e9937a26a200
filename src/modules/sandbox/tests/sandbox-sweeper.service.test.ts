import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { MANAGED_LABEL } from '../services/sandbox-executor.service';
import { SandboxSweeper } from '../services/sandbox-sweeper.service';
import { VolumeManager } from '../../../infrastructure/sandbox/volume.manager';
import { SandboxSpec } from '../../../shared/interfaces/sandbox-runtime.interface';
import { FakeSandboxRuntime, hangUntilKilled } from '../../../tests/mocks/sandbox-runtime';
import { PROCESSOR_IMAGE, makeTempDir } from '../../../tests/fixtures/sandbox';

const NOW = new Date('2024-03-01T12:00:00Z').getTime();
const MAX_JOB_MS = 60_000;

describe('SandboxSweeper', () => {
  let root: string;
  let runtime: FakeSandboxRuntime;
  let volumes: VolumeManager;
  let sweeper: SandboxSweeper;

  const startAt = async (createdAt: number, labels: Record<string, string>) => {
    runtime.now = () => new Date(createdAt);
    const spec: SandboxSpec = {
      name: `processor-${createdAt}`,
      image: PROCESSOR_IMAGE,
      mounts: [{ hostPath: root, containerPath: '/work', readOnly: false }],
      limits: { memoryBytes: 1, nanoCpus: 1, pidsLimit: 1 },
      scratchBytes: 1,
      labels,
    };
    return runtime.start(spec);
  };

  const volumeAt = async (modifiedAt: number) => {
    const volume = await volumes.create('job-1');
    const when = new Date(modifiedAt);
    await fs.utimes(volume.hostPath, when, when);
    return volume;
  };

  beforeEach(async () => {
    root = await makeTempDir('sweeper');
    runtime = new FakeSandboxRuntime();
    runtime.behaviors.set(PROCESSOR_IMAGE, hangUntilKilled);
    volumes = new VolumeManager(path.join(root, 'scratch'));
    sweeper = new SandboxSweeper(runtime, volumes, MAX_JOB_MS, () => NOW);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should remove managed sandboxes and volumes older than the longest job', async () => {
    const orphan = await startAt(NOW - 2 * MAX_JOB_MS, { [MANAGED_LABEL]: 'true' });
    const running = await startAt(NOW - 1000, { [MANAGED_LABEL]: 'true' });
    const foreign = await startAt(NOW - 2 * MAX_JOB_MS, { app: 'other' });
    const staleVolume = await volumeAt(NOW - 2 * MAX_JOB_MS);
    const freshVolume = await volumeAt(NOW - 1000);

    const result = await sweeper.sweep();

    expect(result).toEqual({ sandboxes: 1, volumes: 1 });
    expect(runtime.killed).toEqual([orphan]);
    expect(runtime.removed).toEqual([orphan]);
    expect(runtime.removed).not.toContain(running);
    expect(runtime.removed).not.toContain(foreign);
    expect((await volumes.list()).map((volume) => volume.name)).toEqual([
      freshVolume.name,
    ]);
    await expect(fs.stat(staleVolume.hostPath)).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('should keep sweeping volumes when a sandbox cannot be removed', async () => {
    await startAt(NOW - 2 * MAX_JOB_MS, { [MANAGED_LABEL]: 'true' });
    await volumeAt(NOW - 2 * MAX_JOB_MS);
    runtime.removeError = new Error('daemon unavailable');

    await expect(sweeper.sweep()).resolves.toEqual({ sandboxes: 0, volumes: 1 });
  });

  it('should do nothing on a clean host', async () => {
    await expect(sweeper.sweep()).resolves.toEqual({ sandboxes: 0, volumes: 0 });
  });
});
