import { IDBStore } from '../../../shared/interfaces/db-store.interface';
import {
  IJobStore,
  NewJob,
  ReclaimResult,
} from '../../../shared/interfaces/job-store.interface';
import {
  ConversionJob,
  JOB_KINDS,
  JOB_STATUSES,
  JobKind,
  JobPatch,
  JobStatus,
  QueueStats,
} from '../../../shared/types';

export const JOBS_TABLE = 'conversion_jobs';

export const STALE_ATTEMPT_CAUSE =
  'worker-crash: attempt abandoned while processing';

interface JobRow {
  id: string;
  source_ref: string;
  original_filename: string;
  kind: string;
  status: string;
  attempt_count: number;
  available_at: Date;
  created_at: Date;
  claimed_at: Date | null;
  finished_at: Date | null;
  updated_at: Date;
  last_error: string | null;
  thumbnail_key: string | null;
  extracted_text: string | null;
}

const PATCH_COLUMNS: ReadonlyArray<[keyof JobPatch, string]> = [
  ['status', 'status'],
  ['attemptCount', 'attempt_count'],
  ['availableAt', 'available_at'],
  ['claimedAt', 'claimed_at'],
  ['finishedAt', 'finished_at'],
  ['lastError', 'last_error'],
  ['thumbnailKey', 'thumbnail_key'],
  ['extractedText', 'extracted_text'],
];

function isJobKind(value: string): value is JobKind {
  return (JOB_KINDS as readonly string[]).includes(value);
}

function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value);
}

function toJob(row: JobRow): ConversionJob {
  if (!isJobStatus(row.status)) {
    throw new Error(`Job ${row.id} has unknown status "${row.status}"`);
  }

  return {
    id: row.id,
    sourceRef: row.source_ref,
    originalFilename: row.original_filename,
    kind: isJobKind(row.kind) ? row.kind : 'unknown',
    status: row.status,
    attemptCount: row.attempt_count,
    availableAt: row.available_at,
    createdAt: row.created_at,
    claimedAt: row.claimed_at,
    finishedAt: row.finished_at,
    updatedAt: row.updated_at,
    lastError: row.last_error,
    thumbnailKey: row.thumbnail_key,
    extractedText: row.extracted_text,
  };
}

/**
 * PostgreSQL-backed job store. Claims use `FOR UPDATE SKIP LOCKED` inside a
 * single UPDATE statement, so the select and the status change cannot be
 * split by another worker.
 */
export class PostgresJobStore implements IJobStore {
  constructor(private readonly db: IDBStore) {}

  async insert(job: NewJob, now: Date): Promise<ConversionJob> {
    const { rows } = await this.db.query<JobRow>(
      `INSERT INTO ${JOBS_TABLE}
         (id, source_ref, original_filename, kind, status, attempt_count,
          available_at, created_at, updated_at)
       VALUES ($1, $2, $3, $4, 'pending', 0, $5, $5, $5)
       RETURNING *`,
      [job.id, job.sourceRef, job.originalFilename, job.kind, now],
    );
    return toJob(rows[0]);
  }

  async claimNext(now: Date): Promise<ConversionJob | null> {
    const { rows } = await this.db.query<JobRow>(
      `UPDATE ${JOBS_TABLE}
          SET status = 'processing', claimed_at = $1, updated_at = $1
        WHERE id = (
                SELECT id FROM ${JOBS_TABLE}
                 WHERE status = 'pending' AND available_at <= $1
                 ORDER BY available_at, created_at
                 LIMIT 1
                 FOR UPDATE SKIP LOCKED
              )
          AND status = 'pending'
        RETURNING *`,
      [now],
    );
    return rows.length ? toJob(rows[0]) : null;
  }

  async transition(
    id: string,
    from: JobStatus,
    patch: JobPatch,
    now: Date,
  ): Promise<ConversionJob | null> {
    const params: unknown[] = [id, from];
    const sets: string[] = [];

    for (const [key, column] of PATCH_COLUMNS) {
      if (patch[key] === undefined) continue;
      params.push(patch[key]);
      sets.push(`${column} = $${params.length}`);
    }
    params.push(now);
    sets.push(`updated_at = $${params.length}`);

    const { rows } = await this.db.query<JobRow>(
      `UPDATE ${JOBS_TABLE}
          SET ${sets.join(', ')}
        WHERE id = $1 AND status = $2
        RETURNING *`,
      params,
    );
    return rows.length ? toJob(rows[0]) : null;
  }

  async reclaimStale(
    claimedBefore: Date,
    maxAttempts: number,
    now: Date,
  ): Promise<ReclaimResult> {
    const { rows } = await this.db.query<{ status: string }>(
      `UPDATE ${JOBS_TABLE}
          SET attempt_count = attempt_count + 1,
              status = CASE WHEN attempt_count + 1 >= $2 THEN 'failed' ELSE 'pending' END,
              finished_at = CASE WHEN attempt_count + 1 >= $2 THEN $3 ELSE NULL END,
              available_at = $3,
              last_error = $4,
              updated_at = $3
        WHERE status = 'processing' AND claimed_at < $1
        RETURNING status`,
      [claimedBefore, maxAttempts, now, STALE_ATTEMPT_CAUSE],
    );

    return {
      requeued: rows.filter((row) => row.status === 'pending').length,
      failed: rows.filter((row) => row.status === 'failed').length,
    };
  }

  async findById(id: string): Promise<ConversionJob | null> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM ${JOBS_TABLE} WHERE id = $1`,
      [id],
    );
    return rows.length ? toJob(rows[0]) : null;
  }

  async countByStatus(): Promise<QueueStats> {
    const { rows } = await this.db.query<{ status: string; count: number }>(
      `SELECT status, COUNT(*)::int AS count FROM ${JOBS_TABLE} GROUP BY status`,
    );

    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
    };
    for (const row of rows) {
      if (isJobStatus(row.status)) {
        stats[row.status] = row.count;
      }
    }
    return stats;
  }
}
