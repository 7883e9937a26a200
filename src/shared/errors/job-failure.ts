import { errorMessage } from '../utils/error-message';

export type FailureCategory =
  | 'transient'
  | 'timeout'
  | 'contract-violation'
  | 'producer-bug'
  | 'execution'
  | 'rejected';

/**
 * - `retry`: back to pending until the attempt budget runs out
 * - `retry-once`: at most one more attempt
 * - `never`: terminal on first occurrence
 */
export type RetryPolicy = 'retry' | 'retry-once' | 'never';

const DEFAULT_POLICY: Record<FailureCategory, RetryPolicy> = {
  transient: 'retry',
  timeout: 'retry',
  'contract-violation': 'never',
  'producer-bug': 'retry-once',
  execution: 'retry',
  rejected: 'never',
};

/**
 * A failed job attempt. Everything that goes wrong below the orchestration
 * layer ends up as one of these, and its message is the cause string stored
 * on the job.
 */
export class JobFailure extends Error {
  readonly retryPolicy: RetryPolicy;

  constructor(
    readonly category: FailureCategory,
    message: string,
    retryPolicy?: RetryPolicy,
  ) {
    super(message);
    this.name = 'JobFailure';
    this.retryPolicy = retryPolicy ?? DEFAULT_POLICY[category];
  }

  static transient(message: string): JobFailure {
    return new JobFailure('transient', message);
  }

  static timeout(message: string): JobFailure {
    return new JobFailure('timeout', message);
  }

  static contractViolation(message: string): JobFailure {
    return new JobFailure('contract-violation', message);
  }

  static producerBug(message: string): JobFailure {
    return new JobFailure('producer-bug', message);
  }

  static execution(message: string): JobFailure {
    return new JobFailure('execution', message);
  }

  static rejected(message: string): JobFailure {
    return new JobFailure('rejected', message);
  }

  /** Wraps anything thrown by infrastructure code as a retryable failure. */
  static from(error: unknown): JobFailure {
    if (error instanceof JobFailure) {
      return error;
    }
    const message = errorMessage(error);
    return JobFailure.transient(message);
  }
}
