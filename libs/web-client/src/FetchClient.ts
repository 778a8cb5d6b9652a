import { toError } from '@app/web-common/util/toError';
import { MediaType } from './http/MediaType';
import { ResponseSpec } from './http/ResponseSpec';
import { WebClient } from './http/WebClient';
import { WebClientError } from './http/WebClientError';

export class FetchClient implements WebClient {
  readonly #url: string;
  #method = 'GET';
  #headers: Record<string, string> = {};
  #timeout: number;
  #signal?: AbortSignal;

  constructor(url: string, requestTimeout = 5000) {
    this.#url = url;
    this.#timeout = requestTimeout;
  }

  get(): this {
    this.#method = 'GET';

    return this;
  }

  accept(mediaType: MediaType): this {
    return this.header({ Accept: mediaType });
  }

  header(param: Record<string, string>): this {
    this.#headers = {
      ...this.#headers,
      ...param,
    };

    return this;
  }

  timeout(timeout: number): this {
    this.#timeout = timeout;
    return this;
  }

  signal(signal: AbortSignal | undefined): this {
    this.#signal = signal;
    return this;
  }

  /**
   * The timeout covers reading the body as well. Aborting the caller's
   * signal aborts the request; both surface as `WebClientError`.
   */
  async retrieve(): Promise<ResponseSpec> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    const timer = setTimeout(abort, this.#timeout);
    const callerSignal = this.#signal;

    callerSignal?.addEventListener('abort', abort, { once: true });

    if (callerSignal?.aborted) {
      abort();
    }

    try {
      const response = await fetch(this.#url, {
        method: this.#method,
        headers: this.#headers,
        signal: controller.signal,
      });

      return new ResponseSpec(response.status, await response.text());
    } catch (e) {
      throw this.toClientError(toError(e), controller.signal, callerSignal);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', abort);
    }
  }

  private toClientError(
    error: Error,
    requestSignal: AbortSignal,
    callerSignal?: AbortSignal,
  ): WebClientError {
    const request = `${this.#method} ${this.#url}`;

    if (callerSignal?.aborted) {
      return new WebClientError(`${request} was aborted`, this.#url, error);
    }

    if (requestSignal.aborted) {
      return new WebClientError(
        `${request} timed out after ${this.#timeout}ms`,
        this.#url,
        error,
      );
    }

    return new WebClientError(
      `${request} failed: ${error.message}`,
      this.#url,
      error,
    );
  }
}
