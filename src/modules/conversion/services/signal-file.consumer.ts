import fs from 'fs/promises';
import path from 'path';
import { setTimeout } from 'timers/promises';
import { logger } from '../../../config/logger';
import { IConversionToolchain } from '../../../shared/interfaces/conversion-toolchain.interface';
import { errorMessage } from '../../../shared/utils/error-message';
import { isNotFound } from '../../../infrastructure/sandbox/volume.manager';
import {
  REQUEST_SUFFIX,
  cleanCause,
  isPlainFileName,
  pathExists,
  signalPaths,
  writeFileAtomic,
} from './signal-file.protocol';

export const CAUSE_SOURCE_MISSING = 'DWG file not found';
export const CAUSE_INVALID_REQUEST = 'invalid conversion request';

export type RequestResolution = 'skipped' | 'dropped' | 'done' | 'failed';

/**
 * Helper side of the exchange directory. Single-threaded: requests are
 * handled one at a time, in name order, once per scan.
 */
export class SignalFileConsumer {
  constructor(
    private readonly exchangeDir: string,
    private readonly toolchain: IConversionToolchain,
    private readonly pollIntervalMs: number,
  ) {}

  /** Polls until `signal` aborts. A failing scan is logged and retried. */
  async run(signal: AbortSignal): Promise<void> {
    logger.info({ exchangeDir: this.exchangeDir }, 'Conversion helper polling');

    while (!signal.aborted) {
      try {
        await this.scanOnce();
      } catch (error) {
        logger.error({ err: error }, 'Exchange directory scan failed');
      }
      try {
        await setTimeout(this.pollIntervalMs, null, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }

    logger.info('Conversion helper stopped');
  }

  async scanOnce(): Promise<number> {
    const markers = (await fs.readdir(this.exchangeDir))
      .filter((name) => name.endsWith(REQUEST_SUFFIX) && !name.startsWith('.'))
      .sort();

    let handled = 0;
    for (const marker of markers) {
      const resolution = await this.handle(
        marker.slice(0, -REQUEST_SUFFIX.length),
      );
      if (resolution !== 'skipped') handled++;
    }
    return handled;
  }

  async handle(jobId: string): Promise<RequestResolution> {
    const paths = signalPaths(this.exchangeDir, jobId);
    const log = logger.child({ jobId });

    let sourceName: string;
    try {
      sourceName = (await fs.readFile(paths.request, 'utf-8')).trim();
    } catch (error) {
      // consumed between readdir and read
      if (isNotFound(error)) return 'skipped';
      throw error;
    }

    if ((await pathExists(paths.done)) || (await pathExists(paths.failed))) {
      log.warn('Outcome already present, dropping repeated request');
      await fs.rm(paths.request, { force: true });
      return 'dropped';
    }

    if (!isPlainFileName(sourceName)) {
      log.warn('Request does not name a plain file');
      return this.finishFailed(paths.request, paths.failed, CAUSE_INVALID_REQUEST);
    }

    const sourcePath = path.join(this.exchangeDir, sourceName);
    if (!(await pathExists(sourcePath))) {
      log.warn({ sourceName }, 'Source file missing');
      return this.finishFailed(paths.request, paths.failed, CAUSE_SOURCE_MISSING);
    }

    let cause: string | null = null;
    try {
      const run = await this.toolchain.convert(sourcePath, paths.output);
      if (run.exitCode !== 0) {
        log.warn({ exitCode: run.exitCode, output: run.output }, 'Conversion failed');
        cause = `Conversion failed with exit code ${run.exitCode}`;
      } else if (!(await pathExists(paths.output))) {
        cause = 'Conversion produced no output';
      }
    } catch (error) {
      log.error({ err: error }, 'Conversion toolchain error');
      cause = `Conversion failed: ${errorMessage(error)}`;
    }

    if (cause !== null) {
      return this.finishFailed(paths.request, paths.failed, cause);
    }

    await fs.rm(paths.request, { force: true });
    await writeFileAtomic(paths.done, '');
    log.info('Conversion done');
    return 'done';
  }

  /** The request marker always goes before the terminal marker appears. */
  private async finishFailed(
    requestPath: string,
    failedPath: string,
    cause: string,
  ): Promise<RequestResolution> {
    await fs.rm(requestPath, { force: true });
    await writeFileAtomic(failedPath, cleanCause(cause));
    return 'failed';
  }
}
