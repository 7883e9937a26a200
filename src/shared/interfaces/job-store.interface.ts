import {
  ConversionJob,
  EnqueueRequest,
  JobKind,
  JobPatch,
  JobStatus,
  QueueStats,
} from '../types';

export interface NewJob extends Required<Omit<EnqueueRequest, 'kind'>> {
  kind: JobKind;
}

export interface ReclaimResult {
  requeued: number;
  failed: number;
}

/**
 * Persistence for the job queue. Every state change goes through a single
 * conditional update so concurrent workers never both win the same job.
 */
export interface IJobStore {
  insert(job: NewJob, now: Date): Promise<ConversionJob>;

  /** Atomically moves the oldest claimable pending job to processing. */
  claimNext(now: Date): Promise<ConversionJob | null>;

  /**
   * Applies `patch` only while the job is still in status `from`.
   * Returns the updated job, or null when the condition no longer holds.
   */
  transition(
    id: string,
    from: JobStatus,
    patch: JobPatch,
    now: Date,
  ): Promise<ConversionJob | null>;

  /**
   * Treats every job claimed before `claimedBefore` and still processing as
   * a failed attempt: back to pending, or failed once out of attempts.
   */
  reclaimStale(
    claimedBefore: Date,
    maxAttempts: number,
    now: Date,
  ): Promise<ReclaimResult>;

  findById(id: string): Promise<ConversionJob | null>;

  countByStatus(): Promise<QueueStats>;
}
