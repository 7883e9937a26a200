import { logger } from '../../../config/logger';
import { ISandboxRuntime } from '../../../shared/interfaces/sandbox-runtime.interface';
import { VolumeManager } from '../../../infrastructure/sandbox/volume.manager';
import { MANAGED_LABEL } from './sandbox-executor.service';

export interface SweepResult {
  sandboxes: number;
  volumes: number;
}

/**
 * Startup cleanup for sandboxes and scratch directories a crashed worker
 * left behind. Only resources older than the longest possible job are
 * touched, so workers in other processes keep theirs.
 */
export class SandboxSweeper {
  constructor(
    private readonly runtime: ISandboxRuntime,
    private readonly volumes: VolumeManager,
    private readonly maxJobDurationMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async sweep(): Promise<SweepResult> {
    const cutoff = this.now() - this.maxJobDurationMs;
    const result: SweepResult = { sandboxes: 0, volumes: 0 };

    for (const sandbox of await this.runtime.list(`${MANAGED_LABEL}=true`)) {
      if (sandbox.createdAt.getTime() >= cutoff) continue;
      try {
        await this.runtime.kill(sandbox.id);
        await this.runtime.remove(sandbox.id);
        result.sandboxes++;
      } catch (error) {
        logger.error(
          { err: error, sandboxId: sandbox.id, name: sandbox.name },
          'Failed to sweep sandbox',
        );
      }
    }

    for (const volume of await this.volumes.list()) {
      if (volume.modifiedAt.getTime() >= cutoff) continue;
      try {
        await this.volumes.remove(volume);
        result.volumes++;
      } catch (error) {
        logger.error({ err: error, volume: volume.name }, 'Failed to sweep volume');
      }
    }

    if (result.sandboxes || result.volumes) {
      logger.warn({ ...result }, 'Swept orphaned sandboxes');
    }
    return result;
  }
}
