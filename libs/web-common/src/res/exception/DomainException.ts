import { HttpStatus } from '@nestjs/common';

export interface DomainExceptionArg {
  message: string;
  responseMessage?: string;
  parameter?: object;
}

export class DomainException extends Error {
  private readonly _statusCode: HttpStatus;
  private readonly _responseMessage?: string;
  private readonly _parameter?: object;

  constructor(status: HttpStatus, arg: DomainExceptionArg) {
    super(arg.message);
    this.name = new.target.name;
    this._statusCode = status;
    this._responseMessage = arg.responseMessage;
    this._parameter = arg.parameter;
  }

  static Conflict(arg: DomainExceptionArg) {
    return new DomainException(HttpStatus.CONFLICT, arg);
  }

  get statusCode(): HttpStatus {
    return this._statusCode;
  }

  get responseMessage(): string {
    return this._responseMessage ?? this.message;
  }

  get parameter(): object | undefined {
    return this._parameter;
  }
}
