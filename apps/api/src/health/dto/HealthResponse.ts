export class HealthResponse {
  readonly status = 'healthy';

  constructor(
    readonly timestamp: string,
    readonly version: string,
    readonly geminiConfigured: boolean,
  ) {}
}
