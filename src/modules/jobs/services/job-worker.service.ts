import fs from 'fs/promises';
import { setTimeout } from 'timers/promises';
import retry from 'async-retry';
import { Logger } from 'pino';
import { logger } from '../../../config/logger';
import { JobFailure } from '../../../shared/errors/job-failure';
import { IResultStore } from '../../../shared/interfaces/result-store.interface';
import { ConversionJob } from '../../../shared/types';
import { resolveInputPath } from '../../../shared/utils/input-path';
import { errorMessage } from '../../../shared/utils/error-message';
import { JobQueueService } from '../../queue/services/job-queue.service';
import { SandboxOrchestrator } from '../../orchestration/services/sandbox-orchestrator.service';
import { SandboxSweeper } from '../../sandbox/services/sandbox-sweeper.service';
import { ResultSanitizerService } from '../../sanitization/services/result-sanitizer.service';

export interface JobWorkerOptions {
  concurrency: number;
  pollIntervalMs: number;
  inputDir: string;
  /** Queue stats are logged after every this many processed jobs. */
  statsEvery?: number;
  /** Attempts for queue persistence calls before giving up. */
  persistenceRetries?: number;
}

/**
 * Claims jobs and carries each through orchestration, sanitization and
 * storage to a terminal state. `concurrency` loops run side by side; the
 * claim is the only thing they share.
 */
export class JobWorkerService {
  private controller?: AbortController;
  private loops: Promise<void>[] = [];
  private processed = 0;

  constructor(
    private readonly queue: JobQueueService,
    private readonly orchestrator: SandboxOrchestrator,
    private readonly sanitizer: ResultSanitizerService,
    private readonly results: IResultStore,
    private readonly sweeper: SandboxSweeper,
    private readonly options: JobWorkerOptions,
  ) {}

  /** Reclaims stale jobs, sweeps orphans, then starts the claim loops. */
  public async startWorker(): Promise<void> {
    if (this.controller) {
      logger.info('Worker already running');
      return;
    }

    await this.withRetry(() => this.queue.reclaimStale(), 'Reclaim', logger);
    await this.sweeper.sweep();

    const controller = new AbortController();
    this.controller = controller;
    this.loops = Array.from({ length: this.options.concurrency }, (_, slot) =>
      this.loop(slot, controller.signal),
    );
    logger.info(
      { concurrency: this.options.concurrency },
      'Conversion worker started.',
    );
  }

  /** Stops claiming and waits for in-flight jobs to reach a terminal state. */
  public async stopWorker(): Promise<void> {
    if (!this.controller) {
      logger.info('Worker is not running, nothing to stop');
      return;
    }

    logger.info('Stopping conversion worker...');
    this.controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = undefined;
    logger.info('Conversion worker stopped successfully');
  }

  /**
   * Claims and processes one job.
   * @returns false when nothing was claimable
   */
  public async processNext(): Promise<boolean> {
    const job = await this.withRetry(
      () => this.queue.claimNext(),
      'Claim',
      logger,
    );
    if (!job) return false;

    await this.processJob(job);
    return true;
  }

  private async loop(slot: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        if (await this.processNext()) continue;
      } catch (error) {
        logger.error(
          { slot, error: errorMessage(error) },
          'Worker loop error',
        );
      }
      await this.pause(signal);
    }
  }

  private async pause(signal: AbortSignal): Promise<void> {
    try {
      await setTimeout(this.options.pollIntervalMs, null, { signal });
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }

  private async processJob(job: ConversionJob): Promise<void> {
    const jobLogger = logger.child({
      jobId: job.id,
      kind: job.kind,
      attempt: job.attemptCount + 1,
    });
    jobLogger.info('Starting conversion job');

    let terminal: boolean;
    try {
      const raw = await this.orchestrator.execute(job, jobLogger);
      const sanitized = await this.sanitizer.sanitize(job.kind, raw);
      const ref = await this.results.save(job.id, sanitized);

      terminal = await this.withRetry(
        () => this.queue.complete(job, ref),
        'Complete',
        jobLogger,
      );
      if (terminal) {
        jobLogger.info(
          { thumbnailKey: ref.thumbnailKey, textLength: ref.extractedText?.length ?? 0 },
          'Conversion job completed',
        );
      }
    } catch (error) {
      const failure = JobFailure.from(error);
      jobLogger.error(
        {
          category: failure.category,
          retryPolicy: failure.retryPolicy,
          error: failure.message,
        },
        'Conversion attempt failed',
      );

      const resolution = await this.withRetry(
        () => this.queue.fail(job, failure),
        'Fail',
        jobLogger,
      );
      terminal = resolution === 'failed';
      if (resolution) {
        jobLogger.info({ resolution }, 'Failure recorded');
      }
    }

    if (terminal) {
      await this.removeInput(job, jobLogger);
    }
    await this.countProcessed();
  }

  private async removeInput(job: ConversionJob, jobLogger: Logger): Promise<void> {
    const inputPath = resolveInputPath(this.options.inputDir, job.sourceRef);
    if (!inputPath) return;
    try {
      await fs.rm(inputPath, { force: true });
    } catch (error) {
      jobLogger.warn({ error: errorMessage(error) }, 'Could not remove input');
    }
  }

  private async countProcessed(): Promise<void> {
    this.processed++;
    const every = this.options.statsEvery ?? 10;
    if (this.processed % every !== 0) return;

    try {
      const stats = await this.queue.stats();
      logger.info({ processed: this.processed, ...stats }, 'Queue stats');
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Could not read queue stats');
    }
  }

  private withRetry<T>(
    fn: () => Promise<T>,
    operation: string,
    log: Logger,
  ): Promise<T> {
    return retry(fn, {
      retries: this.options.persistenceRetries ?? 3,
      factor: 2,
      onRetry: (error, attempt) => {
        log.warn(
          { attempt, error: errorMessage(error) },
          `${operation} failed, retrying...`,
        );
      },
    });
  }
}
