import fs from 'fs/promises';
import path from 'path';
import { setTimeout } from 'timers/promises';
import { Logger } from 'pino';
import { logger as rootLogger } from '../../../config/logger';
import { JobFailure } from '../../../shared/errors/job-failure';
import {
  ISandboxRuntime,
  ResourceLimits,
  SandboxSpec,
} from '../../../shared/interfaces/sandbox-runtime.interface';
import { Deadline } from '../../../shared/utils/deadline';
import { errorMessage } from '../../../shared/utils/error-message';
import {
  ScratchVolume,
  VolumeManager,
} from '../../../infrastructure/sandbox/volume.manager';

export const MANAGED_LABEL = 'sandboxed-thumbnailer.managed';
export const OWNER_LABEL = 'sandboxed-thumbnailer.owner';
export const ROLE_LABEL = 'sandboxed-thumbnailer.role';

export type SandboxRole = 'processor' | 'helper';

export type SandboxInput =
  | { name: string; sourcePath: string }
  | { name: string; content: string | Buffer };

export interface SandboxRequest {
  /** Job id the sandbox belongs to; used for labels and log context. */
  owner: string;
  role: SandboxRole;
  image: string;
  command?: string[];
  /** Files placed in the scratch directory before the sandbox starts. */
  inputs: SandboxInput[];
  /** Where the scratch directory appears inside the sandbox. */
  mountPath: string;
  limits: ResourceLimits;
  log?: Logger;
}

export type SandboxRunResult<T> =
  | { status: 'exited'; exitCode: number; artifacts: T; durationMs: number }
  | { status: 'timed-out'; durationMs: number }
  | { status: 'setup-failed'; cause: string };

export interface SandboxLease {
  id: string;
  /** Host path of the scratch directory shared with the sandbox. */
  workDir: string;
  /** Kills and removes the sandbox and its directory. Safe to call twice. */
  destroy(): Promise<void>;
}

export interface SandboxExecutorOptions {
  runtime?: string;
  scratchBytes: number;
}

/**
 * One disposable sandbox per call. Whatever happens between provisioning and
 * collection, the container and its scratch directory are torn down exactly
 * once before `run` returns or throws.
 */
export class SandboxExecutor {
  private active = 0;

  constructor(
    private readonly runtime: ISandboxRuntime,
    private readonly volumes: VolumeManager,
    private readonly options: SandboxExecutorOptions,
  ) {}

  /** Sandboxes started by this executor that have not been torn down yet. */
  activeSandboxes(): number {
    return this.active;
  }

  /**
   * Runs the request to completion or until `deadline`, then hands the
   * scratch directory to `collect` before it is destroyed. Errors thrown by
   * `collect` propagate after teardown.
   */
  async run<T>(
    request: SandboxRequest,
    deadline: Deadline,
    collect: (workDir: string) => Promise<T>,
  ): Promise<SandboxRunResult<T>> {
    const startedAt = Date.now();
    const log = (request.log ?? rootLogger).child({ role: request.role });

    if (deadline.expired) {
      return { status: 'timed-out', durationMs: 0 };
    }

    this.active++;
    let volume: ScratchVolume | undefined;
    let sandboxId: string | undefined;

    try {
      try {
        volume = await this.volumes.create(request.owner);
        await this.stageInputs(volume.hostPath, request.inputs);
        sandboxId = await this.runtime.start(this.buildSpec(request, volume));
      } catch (error) {
        const cause = errorMessage(error);
        log.warn({ err: error }, 'Sandbox setup failed');
        return { status: 'setup-failed', cause };
      }

      const sandboxLog = log.child({ sandboxId });
      const exitCode = await this.waitUntil(sandboxId, deadline);

      if (exitCode === null) {
        sandboxLog.warn('Sandbox deadline reached, killing');
        await this.runtime.kill(sandboxId).catch((error: unknown) => {
          sandboxLog.error({ err: error }, 'Failed to kill sandbox');
        });
        return { status: 'timed-out', durationMs: Date.now() - startedAt };
      }

      await this.logOutput(sandboxId, sandboxLog);
      const artifacts = await collect(volume.hostPath);
      sandboxLog.info({ exitCode }, 'Sandbox exited');

      return {
        status: 'exited',
        exitCode,
        artifacts,
        durationMs: Date.now() - startedAt,
      };
    } finally {
      await this.teardown(sandboxId, volume, log);
      this.active--;
    }
  }

  /**
   * Starts a long-lived sandbox over a fresh scratch directory. The caller
   * owns the lease and must `destroy()` it.
   * @throws {JobFailure} transient when the sandbox cannot be started
   */
  async lease(request: SandboxRequest): Promise<SandboxLease> {
    const log = (request.log ?? rootLogger).child({ role: request.role });
    let volume: ScratchVolume | undefined;
    let sandboxId: string | undefined;

    this.active++;
    try {
      volume = await this.volumes.create(request.owner);
      await this.stageInputs(volume.hostPath, request.inputs);
      sandboxId = await this.runtime.start(this.buildSpec(request, volume));
    } catch (error) {
      await this.teardown(sandboxId, volume, log);
      this.active--;
      const cause = errorMessage(error);
      throw JobFailure.transient(`${request.role} sandbox setup failed: ${cause}`);
    }

    const id = sandboxId;
    const leased = volume;
    let destroyed: Promise<void> | undefined;
    log.child({ sandboxId: id }).info('Sandbox leased');

    return {
      id,
      workDir: leased.hostPath,
      destroy: () => {
        if (!destroyed) {
          destroyed = (async () => {
            await this.runtime.kill(id).catch((error: unknown) => {
              log.error({ err: error, sandboxId: id }, 'Failed to kill sandbox');
            });
            await this.teardown(id, leased, log);
            this.active--;
          })();
        }
        return destroyed;
      },
    };
  }

  private buildSpec(request: SandboxRequest, volume: ScratchVolume): SandboxSpec {
    return {
      name: `${request.role}-${volume.name}`,
      image: request.image,
      command: request.command,
      mounts: [
        {
          hostPath: volume.hostPath,
          containerPath: request.mountPath,
          readOnly: false,
        },
      ],
      limits: request.limits,
      scratchBytes: this.options.scratchBytes,
      runtime: this.options.runtime,
      labels: {
        [MANAGED_LABEL]: 'true',
        [OWNER_LABEL]: request.owner,
        [ROLE_LABEL]: request.role,
      },
    };
  }

  private async stageInputs(dir: string, inputs: SandboxInput[]): Promise<void> {
    for (const input of inputs) {
      const target = path.join(dir, path.basename(input.name));
      if ('sourcePath' in input) {
        await fs.copyFile(input.sourcePath, target);
      } else {
        await fs.writeFile(target, input.content);
      }
      await fs.chmod(target, 0o644);
    }
  }

  /** Exit code, or null when the deadline passed first. */
  private async waitUntil(
    sandboxId: string,
    deadline: Deadline,
  ): Promise<number | null> {
    const ac = new AbortController();
    const expired = setTimeout(deadline.remainingMs(), null, {
      signal: ac.signal,
    }).then(
      () => null,
      () => null,
    );

    try {
      return await Promise.race([this.runtime.wait(sandboxId), expired]);
    } finally {
      ac.abort();
    }
  }

  private async logOutput(sandboxId: string, log: Logger): Promise<void> {
    try {
      const output = await this.runtime.logs(sandboxId);
      if (output) {
        log.debug({ output }, 'Sandbox output');
      }
    } catch (error) {
      log.warn({ err: error }, 'Could not read sandbox output');
    }
  }

  private async teardown(
    sandboxId: string | undefined,
    volume: ScratchVolume | undefined,
    log: Logger,
  ): Promise<void> {
    if (sandboxId) {
      try {
        await this.runtime.remove(sandboxId);
      } catch (error) {
        // left for the startup sweep
        log.error({ err: error, sandboxId }, 'Sandbox removal failed');
      }
    }
    if (volume) {
      try {
        await this.volumes.remove(volume);
      } catch (error) {
        log.error({ err: error, volume: volume.name }, 'Volume removal failed');
      }
    }
  }
}
