export class WebClientError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'WebClientError';
  }
}
