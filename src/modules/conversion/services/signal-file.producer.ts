import fs from 'fs/promises';
import path from 'path';
import { setTimeout } from 'timers/promises';
import { Logger } from 'pino';
import { logger as rootLogger } from '../../../config/logger';
import { JobFailure } from '../../../shared/errors/job-failure';
import { ConversionOutcome } from '../../../shared/types';
import { Deadline } from '../../../shared/utils/deadline';
import { isNotFound } from '../../../infrastructure/sandbox/volume.manager';
import {
  cleanCause,
  copyFileAtomic,
  isSafeJobId,
  pathExists,
  signalPaths,
  writeFileAtomic,
} from './signal-file.protocol';

/**
 * Coordinator side of the exchange directory. Writes one conversion request
 * per job and polls for the helper's terminal marker.
 */
export class SignalFileProducer {
  constructor(
    private readonly exchangeDir: string,
    private readonly pollIntervalMs: number,
    private readonly log: Logger = rootLogger,
  ) {}

  /**
   * Places the source file and then the request marker, each by atomic
   * rename. Refuses while an earlier request or outcome for the same id is
   * still in the directory.
   */
  async submit(
    jobId: string,
    sourcePath: string,
    extension: string,
  ): Promise<void> {
    if (!isSafeJobId(jobId)) {
      throw JobFailure.contractViolation(`invalid job id for conversion: ${jobId}`);
    }

    const paths = signalPaths(this.exchangeDir, jobId);
    if ((await pathExists(paths.done)) || (await pathExists(paths.failed))) {
      throw JobFailure.transient(
        `conversion outcome for ${jobId} already present in exchange directory`,
      );
    }
    if (await pathExists(paths.request)) {
      throw JobFailure.transient(`conversion request for ${jobId} already pending`);
    }

    const sourceName = `${jobId}${extension.toLowerCase()}`;
    await copyFileAtomic(sourcePath, path.join(this.exchangeDir, sourceName));
    await writeFileAtomic(paths.request, sourceName);

    this.log.info({ sourceName }, 'Conversion request written');
  }

  /** Polls until a terminal marker appears or `deadline` passes. */
  async awaitOutcome(
    jobId: string,
    deadline: Deadline,
  ): Promise<ConversionOutcome> {
    const paths = signalPaths(this.exchangeDir, jobId);

    for (;;) {
      if (await pathExists(paths.done)) {
        if (await pathExists(paths.output)) {
          return { status: 'done', outputPath: paths.output };
        }
        return { status: 'failed', cause: 'conversion output missing' };
      }

      const cause = await this.readFailure(paths.failed);
      if (cause !== null) {
        return { status: 'failed', cause: cause || 'conversion failed' };
      }

      const remaining = deadline.remainingMs();
      if (remaining === 0) {
        this.log.warn('No conversion outcome before deadline');
        return { status: 'timeout' };
      }
      await setTimeout(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private async readFailure(filePath: string): Promise<string | null> {
    try {
      return cleanCause(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}
