import { MediaType } from './MediaType';
import { ResponseSpec } from './ResponseSpec';

export interface WebClient {
  get(): this;

  accept(mediaType: MediaType): this;

  header(param: Record<string, string>): this;

  timeout(timeout: number): this;

  signal(signal: AbortSignal | undefined): this;

  retrieve(): Promise<ResponseSpec>;
}
