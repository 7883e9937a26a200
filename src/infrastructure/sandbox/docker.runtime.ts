import Docker from 'dockerode';
import { logger } from '../../config/logger';
import {
  ISandboxRuntime,
  ManagedSandbox,
  SandboxSpec,
} from '../../shared/interfaces/sandbox-runtime.interface';

export type DockerClient = Pick<
  Docker,
  'createContainer' | 'getContainer' | 'listContainers'
>;

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Docker-backed sandboxes. Every container gets no network, a read-only
 * root, no capabilities and a tmpfs `/tmp`; the bind mounts in the spec are
 * the only writable paths.
 */
export class DockerSandboxRuntime implements ISandboxRuntime {
  constructor(private readonly docker: DockerClient = new Docker()) {}

  async start(spec: SandboxSpec): Promise<string> {
    const container = await this.docker.createContainer({
      name: spec.name,
      Image: spec.image,
      Cmd: spec.command,
      Labels: spec.labels,
      NetworkDisabled: true,
      WorkingDir: spec.mounts[0]?.containerPath,
      HostConfig: {
        NetworkMode: 'none',
        ReadonlyRootfs: true,
        Memory: spec.limits.memoryBytes,
        MemorySwap: spec.limits.memoryBytes,
        NanoCpus: spec.limits.nanoCpus,
        PidsLimit: spec.limits.pidsLimit,
        CapDrop: ['ALL'],
        SecurityOpt: ['no-new-privileges'],
        Binds: spec.mounts.map(
          (mount) =>
            `${mount.hostPath}:${mount.containerPath}:${mount.readOnly ? 'ro' : 'rw'}`,
        ),
        Tmpfs: { '/tmp': `rw,size=${spec.scratchBytes},mode=1777` },
        ...(spec.runtime ? { Runtime: spec.runtime } : {}),
      },
    });

    try {
      await container.start();
    } catch (error) {
      // a created-but-never-started container would otherwise wait for the sweep
      await this.remove(container.id);
      throw error;
    }

    logger.debug({ sandboxId: container.id, name: spec.name }, 'Sandbox started');
    return container.id;
  }

  async wait(id: string): Promise<number> {
    const result: { StatusCode: number } = await this.docker
      .getContainer(id)
      .wait();
    return result.StatusCode;
  }

  async kill(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).kill();
    } catch (error) {
      // 404: already gone, 409: not running
      const status = statusCodeOf(error);
      if (status !== 404 && status !== 409) throw error;
    }
  }

  async remove(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ force: true, v: true });
    } catch (error) {
      if (statusCodeOf(error) !== 404) throw error;
    }
  }

  async logs(id: string): Promise<string> {
    const output = await this.docker.getContainer(id).logs({
      stdout: true,
      stderr: true,
      follow: false,
    });
    return demuxLogs(output);
  }

  async list(label: string): Promise<ManagedSandbox[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [label] },
    });
    return containers.map((info) => ({
      id: info.Id,
      name: (info.Names[0] ?? info.Id).replace(/^\//, ''),
      createdAt: new Date(info.Created * 1000),
    }));
  }
}

/**
 * Non-TTY container logs are multiplexed: each frame is an 8-byte header
 * (stream type, 3 padding bytes, big-endian length) followed by the payload.
 */
export function demuxLogs(raw: Buffer): string {
  const parts: Buffer[] = [];
  let offset = 0;

  while (offset + 8 <= raw.length) {
    const streamType = raw[offset];
    const size = raw.readUInt32BE(offset + 4);
    if (streamType > 2 || offset + 8 + size > raw.length) {
      // not framed; treat the rest as plain output
      parts.push(raw.subarray(offset));
      offset = raw.length;
      break;
    }
    parts.push(raw.subarray(offset + 8, offset + 8 + size));
    offset += 8 + size;
  }
  if (offset < raw.length) {
    parts.push(raw.subarray(offset));
  }

  return Buffer.concat(parts).toString('utf-8');
}
