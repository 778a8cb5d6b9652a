export enum FailureClass {
  PERMANENT = 'PERMANENT',
  RETRYABLE_OVERLOAD = 'RETRYABLE_OVERLOAD',
  RETRYABLE_RATE_LIMIT = 'RETRYABLE_RATE_LIMIT',
  RETRYABLE_CONNECTION = 'RETRYABLE_CONNECTION',
}

export function isRetryable(failureClass: FailureClass): boolean {
  return failureClass !== FailureClass.PERMANENT;
}
