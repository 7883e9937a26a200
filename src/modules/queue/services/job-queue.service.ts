import { v4 as uuid } from 'uuid';
import { logger } from '../../../config/logger';
import { JobFailure } from '../../../shared/errors/job-failure';
import {
  IJobStore,
  ReclaimResult,
} from '../../../shared/interfaces/job-store.interface';
import {
  ConversionJob,
  EnqueueRequest,
  QueueStats,
  StoredResultRef,
} from '../../../shared/types';
import { classifyKind } from '../../../shared/utils/file-kind';
import { BackoffCalculator } from './backoff';

export interface JobQueueOptions {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  staleAfterMs: number;
}

export type FailureResolution = 'pending' | 'failed';

const MAX_CAUSE_LENGTH = 1000;

/**
 * Job lifecycle on top of a conditional-update store:
 * `pending -> processing -> completed | failed`, with failed attempts going
 * back to `pending` until the attempt budget is spent.
 */
export class JobQueueService {
  constructor(
    private readonly store: IJobStore,
    private readonly options: JobQueueOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async enqueue(request: EnqueueRequest): Promise<ConversionJob> {
    const job = await this.store.insert(
      {
        id: request.id ?? uuid(),
        sourceRef: request.sourceRef,
        originalFilename: request.originalFilename,
        kind: request.kind ?? classifyKind(request.originalFilename),
      },
      this.now(),
    );
    logger.info({ jobId: job.id, kind: job.kind }, 'Job enqueued');
    return job;
  }

  /** Returns null when nothing is claimable; that is not an error. */
  claimNext(): Promise<ConversionJob | null> {
    return this.store.claimNext(this.now());
  }

  /**
   * Marks the job completed with its stored result.
   * @returns false when the job was no longer ours to complete
   */
  async complete(job: ConversionJob, ref: StoredResultRef): Promise<boolean> {
    const now = this.now();
    const updated = await this.store.transition(
      job.id,
      'processing',
      {
        status: 'completed',
        finishedAt: now,
        thumbnailKey: ref.thumbnailKey,
        extractedText: ref.extractedText,
      },
      now,
    );

    if (!updated) {
      logger.warn({ jobId: job.id }, 'Job left processing before completion');
      return false;
    }
    return true;
  }

  /**
   * Records a failed attempt. The job goes back to `pending` behind a
   * back-off delay, or to `failed` once the failure's retry policy or the
   * attempt budget says so.
   * @returns the status the job ended in, or null when it was no longer ours
   */
  async fail(
    job: ConversionJob,
    failure: JobFailure,
  ): Promise<FailureResolution | null> {
    const attempts = job.attemptCount + 1;
    const now = this.now();
    const cause = failure.message.slice(0, MAX_CAUSE_LENGTH);

    const terminal =
      failure.retryPolicy === 'never' ||
      (failure.retryPolicy === 'retry-once' && attempts >= 2) ||
      attempts >= this.options.maxAttempts;

    const availableAt = terminal
      ? now
      : new Date(
          now.getTime() +
            BackoffCalculator.calculate({
              attempt: attempts,
              baseBackoffMs: this.options.backoffBaseMs,
              maxBackoffMs: this.options.backoffMaxMs,
            }),
        );

    const updated = await this.store.transition(
      job.id,
      'processing',
      {
        status: terminal ? 'failed' : 'pending',
        attemptCount: attempts,
        lastError: cause,
        availableAt,
        ...(terminal ? { finishedAt: now } : {}),
      },
      now,
    );

    if (!updated) {
      logger.warn({ jobId: job.id }, 'Job left processing before failure');
      return null;
    }
    return updated.status === 'failed' ? 'failed' : 'pending';
  }

  /**
   * Counts every attempt abandoned by a crashed worker as a failure. Run
   * once at startup, before any claim.
   */
  async reclaimStale(): Promise<ReclaimResult> {
    const now = this.now();
    const claimedBefore = new Date(now.getTime() - this.options.staleAfterMs);
    const result = await this.store.reclaimStale(
      claimedBefore,
      this.options.maxAttempts,
      now,
    );

    if (result.requeued || result.failed) {
      logger.warn({ ...result }, 'Reclaimed stale processing jobs');
    }
    return result;
  }

  findById(id: string): Promise<ConversionJob | null> {
    return this.store.findById(id);
  }

  stats(): Promise<QueueStats> {
    return this.store.countByStatus();
  }
}
