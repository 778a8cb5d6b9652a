export class ResponseSpec {
  constructor(
    readonly statusCode: number,
    readonly rawBody: string,
  ) {}

  get isOk(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }
}
