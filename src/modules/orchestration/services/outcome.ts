import { JobFailure } from '../../../shared/errors/job-failure';
import {
  ConversionOutcome,
  ProcessorResult,
  RawArtifacts,
} from '../../../shared/types';
import { SandboxRunResult } from '../../sandbox/services/sandbox-executor.service';

/** What the orchestrator copies out of the processor's scratch directory. */
export interface CollectedArtifacts {
  /** null when the processor never wrote `result.json`. */
  result: ProcessorResult | null;
  thumbnail: Buffer | null;
  /** The manifest named a thumbnail file that is not there. */
  thumbnailMissing: boolean;
}

export const HELPER_TIMEOUT_CAUSE = 'helper-timeout';

export interface AttemptObservations {
  run?: SandboxRunResult<CollectedArtifacts>;
  helper?: ConversionOutcome;
}

/**
 * Maps what happened in the sandboxes to either raw artifacts eligible for
 * completion or the `JobFailure` the attempt ends with.
 */
export function decideOutcome({ run, helper }: AttemptObservations): RawArtifacts {
  if (helper?.status === 'failed') {
    throw JobFailure.execution(helper.cause);
  }
  if (helper?.status === 'timeout') {
    throw JobFailure.timeout(HELPER_TIMEOUT_CAUSE);
  }
  if (!run) {
    throw JobFailure.transient('processor did not run');
  }

  switch (run.status) {
    case 'setup-failed':
      throw JobFailure.transient(`sandbox setup failed: ${run.cause}`);
    case 'timed-out':
      throw JobFailure.timeout(`processor timed out after ${run.durationMs}ms`);
    case 'exited':
      return fromExit(run.exitCode, run.artifacts);
  }
}

function fromExit(exitCode: number, artifacts: CollectedArtifacts): RawArtifacts {
  const { result, thumbnail, thumbnailMissing } = artifacts;

  if (exitCode !== 0) {
    const detail = result?.error ? `: ${result.error}` : '';
    throw JobFailure.execution(`processor exited with code ${exitCode}${detail}`);
  }
  if (!result) {
    throw JobFailure.producerBug('processor exited 0 without result.json');
  }
  if (!result.success) {
    throw JobFailure.execution(
      `processor reported failure: ${result.error ?? 'no error given'}`,
    );
  }
  if (thumbnailMissing) {
    throw JobFailure.producerBug(
      `processor declared thumbnail ${result.thumbnailFile} but did not write it`,
    );
  }
  if (!thumbnail && !result.extractedText) {
    throw JobFailure.producerBug('processor reported success without artifacts');
  }

  return { result, thumbnail };
}
