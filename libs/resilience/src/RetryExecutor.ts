import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '@app/logger/Logger';
import { toError } from '@app/web-common/util/toError';
import { BackoffCalculator } from './backoff/BackoffCalculator';
import { isRetryable } from './classifier/FailureClass';
import { FailureClassifier } from './classifier/FailureClassifier';
import { RETRY_CONFIG, RetryConfig, RetryOptions } from './config/RetryConfig';
import {
  PermanentFailureError,
  RetryCancelledError,
  RetryExhaustedError,
} from './error/RetryError';
import { Sleeper } from './sleeper/Sleeper';

@Injectable()
export class RetryExecutor {
  constructor(
    @Inject(RETRY_CONFIG) private readonly config: RetryConfig,
    private readonly sleeper: Sleeper,
    private readonly logger: Logger,
  ) {}

  // =========================================================================
  //  attempt 1 ─ fail ─┬─ PERMANENT ─────────────→ PermanentFailureError
  //                    ├─ retryable, attempts left → sleep(backoff) → attempt 2 ...
  //                    └─ retryable, last attempt → RetryExhaustedError
  //
  //  backoff(n) = min(initialDelayMs × 2^(n-1), maxDelayMs)
  //  signal abort during a call or a sleep → RetryCancelledError
  // =========================================================================

  async execute<T>(
    operation: (signal?: AbortSignal) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const maxAttempts = Math.max(
      1,
      options.maxAttempts ?? this.config.maxAttempts,
    );
    const initialDelayMs = options.initialDelayMs ?? this.config.initialDelayMs;
    const maxDelayMs = options.maxDelayMs ?? this.config.maxDelayMs;
    const { label = 'operation', signal } = options;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new RetryCancelledError(label, attempt - 1);
      }

      try {
        return await operation(signal);
      } catch (e) {
        const error = toError(e);

        if (signal?.aborted) {
          throw new RetryCancelledError(label, attempt, error);
        }

        const failureClass = FailureClassifier.classify(e);

        if (!isRetryable(failureClass)) {
          this.logger.warn(
            `${label} failed permanently on attempt ${attempt}: ${error.message}`,
            error,
          );
          throw new PermanentFailureError(label, attempt, error);
        }

        if (attempt >= maxAttempts) {
          this.logger.error(
            `${label} gave up after ${attempt} attempts (${failureClass}): ${error.message}`,
            error,
          );
          throw new RetryExhaustedError(label, attempt, failureClass, error);
        }

        const delayMs = BackoffCalculator.exponential({
          attempt,
          initialDelayMs,
          maxDelayMs,
        });

        this.logger.warn(
          `${label} attempt ${attempt}/${maxAttempts} failed (${failureClass}), retrying in ${delayMs}ms: ${error.message}`,
        );
        options.onRetry?.({
          label,
          attempt,
          maxAttempts,
          delayMs,
          failureClass,
          error,
        });

        await this.wait(delayMs, label, attempt, signal);
      }
    }
  }

  private async wait(
    delayMs: number,
    label: string,
    attempt: number,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.sleeper.sleep(delayMs, signal);
    } catch (e) {
      if (signal?.aborted) {
        throw new RetryCancelledError(label, attempt, toError(e));
      }

      throw e;
    }
  }
}
