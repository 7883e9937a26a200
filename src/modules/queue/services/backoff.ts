export interface RetryBackoffParams {
  attempt: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
}

export class BackoffCalculator {
  /** `base * 2^(attempt-1)`, capped at `maxBackoffMs`. Attempts start at 1. */
  static calculate(params: RetryBackoffParams): number {
    const { attempt, baseBackoffMs, maxBackoffMs } = params;
    const exponent = Math.max(0, attempt - 1);

    return Math.min(baseBackoffMs * 2 ** exponent, maxBackoffMs);
  }
}
