import { SanitizedResult, StoredResultRef } from '../types';

/** Hand-off to the trusted side: takes sanitized output only. */
export interface IResultStore {
  save(jobId: string, result: SanitizedResult): Promise<StoredResultRef>;
}
