import {
  IJobStore,
  NewJob,
  ReclaimResult,
} from '../../../shared/interfaces/job-store.interface';
import {
  ConversionJob,
  JobPatch,
  JobStatus,
  QueueStats,
} from '../../../shared/types';
import { STALE_ATTEMPT_CAUSE } from './postgres-job.store';

/**
 * Single-process job store. Each operation checks and writes without an
 * `await` in between, which is what makes the conditional update atomic on
 * the event loop.
 */
export class InMemoryJobStore implements IJobStore {
  private readonly jobs = new Map<string, ConversionJob>();

  async insert(job: NewJob, now: Date): Promise<ConversionJob> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }

    const created: ConversionJob = {
      ...job,
      status: 'pending',
      attemptCount: 0,
      availableAt: now,
      createdAt: now,
      claimedAt: null,
      finishedAt: null,
      updatedAt: now,
      lastError: null,
      thumbnailKey: null,
      extractedText: null,
    };
    this.jobs.set(job.id, created);
    return { ...created };
  }

  async claimNext(now: Date): Promise<ConversionJob | null> {
    let next: ConversionJob | undefined;
    for (const job of this.jobs.values()) {
      if (job.status !== 'pending' || job.availableAt > now) continue;
      if (
        !next ||
        job.availableAt < next.availableAt ||
        (job.availableAt.getTime() === next.availableAt.getTime() &&
          job.createdAt < next.createdAt)
      ) {
        next = job;
      }
    }
    if (!next) return null;

    const claimed: ConversionJob = {
      ...next,
      status: 'processing',
      claimedAt: now,
      updatedAt: now,
    };
    this.jobs.set(claimed.id, claimed);
    return { ...claimed };
  }

  async transition(
    id: string,
    from: JobStatus,
    patch: JobPatch,
    now: Date,
  ): Promise<ConversionJob | null> {
    const current = this.jobs.get(id);
    if (!current || current.status !== from) return null;

    const defined = Object.fromEntries(
      Object.entries(patch).filter(([, value]) => value !== undefined),
    );
    const updated: ConversionJob = { ...current, ...defined, updatedAt: now };
    this.jobs.set(id, updated);
    return { ...updated };
  }

  async reclaimStale(
    claimedBefore: Date,
    maxAttempts: number,
    now: Date,
  ): Promise<ReclaimResult> {
    const result: ReclaimResult = { requeued: 0, failed: 0 };

    for (const job of this.jobs.values()) {
      if (job.status !== 'processing' || !job.claimedAt) continue;
      if (job.claimedAt >= claimedBefore) continue;

      const attemptCount = job.attemptCount + 1;
      const exhausted = attemptCount >= maxAttempts;
      this.jobs.set(job.id, {
        ...job,
        attemptCount,
        status: exhausted ? 'failed' : 'pending',
        finishedAt: exhausted ? now : null,
        availableAt: now,
        lastError: STALE_ATTEMPT_CAUSE,
        updatedAt: now,
      });
      if (exhausted) {
        result.failed++;
      } else {
        result.requeued++;
      }
    }

    return result;
  }

  async findById(id: string): Promise<ConversionJob | null> {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  async countByStatus(): Promise<QueueStats> {
    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
    };
    for (const job of this.jobs.values()) {
      stats[job.status]++;
    }
    return stats;
  }
}
