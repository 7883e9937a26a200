export const JOB_KINDS = [
  'image',
  'office',
  'cad',
  'pdf',
  'text',
  'unknown',
] as const;
export type JobKind = (typeof JOB_KINDS)[number];

export const JOB_STATUSES = [
  'pending',
  'processing',
  'completed',
  'failed',
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface ConversionJob {
  id: string;
  sourceRef: string;
  originalFilename: string;
  kind: JobKind;
  status: JobStatus;
  attemptCount: number;
  availableAt: Date;
  createdAt: Date;
  claimedAt: Date | null;
  finishedAt: Date | null;
  updatedAt: Date;
  lastError: string | null;
  thumbnailKey: string | null;
  extractedText: string | null;
}

export interface EnqueueRequest {
  id?: string;
  sourceRef: string;
  originalFilename: string;
  kind?: JobKind;
}

/** Fields a store may change in a single conditional update. */
export type JobPatch = Partial<
  Pick<
    ConversionJob,
    | 'status'
    | 'attemptCount'
    | 'availableAt'
    | 'claimedAt'
    | 'finishedAt'
    | 'lastError'
    | 'thumbnailKey'
    | 'extractedText'
  >
>;

export type QueueStats = Record<JobStatus, number>;

export interface StoredResultRef {
  thumbnailKey: string | null;
  extractedText: string | null;
}

/** Manifest the processor writes to `result.json` inside its sandbox. */
export interface ProcessorResult {
  success: boolean;
  thumbnailFile: string | null;
  extractedText: string | null;
  error: string | null;
}

/** Bytes copied out of a sandbox before teardown. Untrusted until sanitized. */
export interface RawArtifacts {
  result: ProcessorResult;
  thumbnail: Buffer | null;
}

export interface SanitizedResult {
  thumbnail: Buffer | null;
  text: string | null;
}

export type ConversionOutcome =
  | { status: 'done'; outputPath: string }
  | { status: 'failed'; cause: string }
  | { status: 'timeout' };
