import { Exclude, Expose } from 'class-transformer';
import { ResponseStatus } from './ResponseStatus';

@Exclude()
export class ResponseEntity<T> {
  private readonly _statusCode: ResponseStatus;
  private readonly _message: string;
  private readonly _data: T;

  constructor(status: ResponseStatus, message: string, data: T) {
    this._statusCode = status;
    this._message = message;
    this._data = data;
  }

  @Expose()
  get statusCode(): string {
    return this._statusCode;
  }

  @Expose()
  get message(): string {
    return this._message;
  }

  @Expose()
  get data(): T {
    return this._data;
  }

  static OK_WITH<T>(data: T, message = ''): ResponseEntity<T> {
    return new ResponseEntity<T>(ResponseStatus.OK, message, data);
  }

  static ERROR(): ResponseEntity<string> {
    return new ResponseEntity<string>(
      ResponseStatus.SERVER_ERROR,
      'Internal server error',
      '',
    );
  }

  static ERROR_WITH(
    message: string,
    code: ResponseStatus = ResponseStatus.SERVER_ERROR,
  ): ResponseEntity<string> {
    return new ResponseEntity<string>(code, message, '');
  }
}
