import { FailureClass } from '../classifier/FailureClass';

export const RETRY_CONFIG = Symbol('RETRY_CONFIG');

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  maxDelayMs: 60000,
};

export interface RetryEvent {
  label: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  failureClass: FailureClass;
  error: Error;
}

export interface RetryOptions extends Partial<RetryConfig> {
  label?: string;
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}
