import fs from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';

export interface ScratchVolume {
  name: string;
  hostPath: string;
}

export interface StaleVolume extends ScratchVolume {
  modifiedAt: Date;
}

const VOLUME_PREFIX = 'job-';

/**
 * Host directories bind-mounted into sandboxes. One per sandbox, named
 * `job-{hash}` so the sweep can tell them apart from anything else under the
 * root.
 */
export class VolumeManager {
  constructor(private readonly root: string) {}

  async create(owner: string): Promise<ScratchVolume> {
    const hash = createHash('sha256')
      .update(`${owner}:${uuid()}`)
      .digest('hex')
      .slice(0, 12);
    const name = `${VOLUME_PREFIX}${hash}`;
    const hostPath = path.join(this.root, name);

    await fs.mkdir(this.root, { recursive: true });
    await fs.mkdir(hostPath, { mode: 0o777 });
    // the sandbox user is not the worker user; mkdir's mode is masked by umask
    await fs.chmod(hostPath, 0o777);

    return { name, hostPath };
  }

  async remove(volume: ScratchVolume): Promise<void> {
    await fs.rm(volume.hostPath, { recursive: true, force: true });
  }

  async list(): Promise<StaleVolume[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const volumes: StaleVolume[] = [];
    for (const name of entries) {
      if (!name.startsWith(VOLUME_PREFIX)) continue;
      const hostPath = path.join(this.root, name);
      try {
        const stats = await fs.stat(hostPath);
        if (stats.isDirectory()) {
          volumes.push({ name, hostPath, modifiedAt: stats.mtime });
        }
      } catch (error) {
        // removed between readdir and stat
        if (!isNotFound(error)) throw error;
      }
    }
    return volumes;
  }
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
