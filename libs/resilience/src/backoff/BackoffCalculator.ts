export interface ExponentialBackoffParams {
  attempt: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export class BackoffCalculator {
  /**
   * Delay before the retry that follows the failed `attempt` (1-based):
   * `initialDelayMs * 2^(attempt-1)`, clamped to `maxDelayMs`.
   */
  static exponential(params: ExponentialBackoffParams): number {
    const { attempt, initialDelayMs, maxDelayMs } = params;
    const exponent = Math.max(0, attempt - 1);

    return Math.min(initialDelayMs * 2 ** exponent, maxDelayMs);
  }

}
