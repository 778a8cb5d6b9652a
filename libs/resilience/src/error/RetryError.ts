import { FailureClass } from '../classifier/FailureClass';

export abstract class RetryError extends Error {
  protected constructor(
    message: string,
    readonly label: string,
    readonly attempts: number,
    readonly originalError?: Error,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PermanentFailureError extends RetryError {
  readonly failureClass = FailureClass.PERMANENT;

  constructor(label: string, attempts: number, originalError: Error) {
    super(
      `${label} failed permanently on attempt ${attempts}: ${originalError.message}`,
      label,
      attempts,
      originalError,
    );
  }
}

export class RetryExhaustedError extends RetryError {
  constructor(
    label: string,
    attempts: number,
    readonly failureClass: FailureClass,
    originalError: Error,
  ) {
    super(
      `${label} failed after ${attempts} attempts (${failureClass}): ${originalError.message}`,
      label,
      attempts,
      originalError,
    );
  }
}

export class RetryCancelledError extends RetryError {
  constructor(label: string, attempts: number, originalError?: Error) {
    super(
      `${label} cancelled after ${attempts} attempt(s)`,
      label,
      attempts,
      originalError,
    );
  }
}
