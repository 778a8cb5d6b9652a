import { HttpStatus } from '@nestjs/common';

export enum ResponseStatus {
  OK = 'OK',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  BAD_GATEWAY = 'BAD_GATEWAY',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  SERVER_ERROR = 'SERVER_ERROR',
}

export function toResponseStatus(status: HttpStatus): ResponseStatus {
  switch (status) {
    case HttpStatus.OK:
    case HttpStatus.CREATED:
      return ResponseStatus.OK;
    case HttpStatus.BAD_REQUEST:
      return ResponseStatus.BAD_REQUEST;
    case HttpStatus.NOT_FOUND:
      return ResponseStatus.NOT_FOUND;
    case HttpStatus.CONFLICT:
      return ResponseStatus.CONFLICT;
    case HttpStatus.BAD_GATEWAY:
      return ResponseStatus.BAD_GATEWAY;
    case HttpStatus.SERVICE_UNAVAILABLE:
      return ResponseStatus.SERVICE_UNAVAILABLE;
    default:
      return ResponseStatus.SERVER_ERROR;
  }
}
