/**
 * The model answered, but not with a company list. Never retried, so the
 * message stays free of words the failure classifier treats as transient;
 * the raw answer is kept on the error instead.
 */
export class UnparseableCompletionError extends Error {
  constructor(
    reason: string,
    readonly rawContent: string,
  ) {
    super(`Model output could not be parsed: ${reason}`);
    this.name = 'UnparseableCompletionError';
  }
}
