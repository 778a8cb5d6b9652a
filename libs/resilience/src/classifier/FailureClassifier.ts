import { OpenAI } from 'openai';
import { FailureClass } from './FailureClass';

const OVERLOAD_PATTERN = /overloaded|unavailable|service unavailable/i;
const RATE_LIMIT_PATTERN = /rate limit|too many requests/i;
const CONNECTION_PATTERN = /connection|timeout|network/i;

const STATUS_KEYS = ['status', 'statusCode', 'code'] as const;

const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Decides whether a failed call to the generation service is worth retrying.
 *
 * Rules are checked in a fixed order: overload, then rate limit, then
 * connection trouble. An error whose message mentions both "overloaded" and
 * "connection" is therefore an overload. Everything that matches no rule,
 * including values that are not errors at all, is permanent.
 */
export class FailureClassifier {
  static classify(error: unknown): FailureClass {
    const statusCode = FailureClassifier.statusCodeOf(error);
    const message = FailureClassifier.messageOf(error);

    if (statusCode === 503 || OVERLOAD_PATTERN.test(message)) {
      return FailureClass.RETRYABLE_OVERLOAD;
    }

    if (
      statusCode === 429 ||
      error instanceof OpenAI.RateLimitError ||
      RATE_LIMIT_PATTERN.test(message)
    ) {
      return FailureClass.RETRYABLE_RATE_LIMIT;
    }

    if (
      FailureClassifier.isConnectionError(error) ||
      CONNECTION_PATTERN.test(message)
    ) {
      return FailureClass.RETRYABLE_CONNECTION;
    }

    return FailureClass.PERMANENT;
  }

  static statusCodeOf(error: unknown): number | null {
    if (typeof error !== 'object' || error === null) {
      return null;
    }

    for (const key of STATUS_KEYS) {
      const value: unknown = Reflect.get(error, key);

      if (typeof value === 'number' && Number.isInteger(value)) {
        return value;
      }

      if (typeof value === 'string' && /^\d{3}$/.test(value)) {
        return Number(value);
      }
    }

    return null;
  }

  private static messageOf(error: unknown): string {
    if (typeof error === 'string') {
      return error;
    }

    if (typeof error !== 'object' || error === null) {
      return '';
    }

    const message: unknown = Reflect.get(error, 'message');

    return typeof message === 'string' ? message : '';
  }

  private static isConnectionError(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError) {
      return true;
    }

    if (typeof error !== 'object' || error === null) {
      return false;
    }

    if (Reflect.get(error, 'name') === 'TimeoutError') {
      return true;
    }

    // fetch() hides the socket error code one level down, in `cause`
    const cause: unknown = Reflect.get(error, 'cause');

    return (
      FailureClassifier.hasConnectionCode(error) ||
      (typeof cause === 'object' &&
        cause !== null &&
        FailureClassifier.hasConnectionCode(cause))
    );
  }

  private static hasConnectionCode(error: object): boolean {
    const code: unknown = Reflect.get(error, 'code');

    return typeof code === 'string' && CONNECTION_ERROR_CODES.has(code);
  }
}
