import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from '@nestjs/common';
import { Logger } from '@app/logger/Logger';
import { instanceToPlain } from 'class-transformer';
import { Request, Response } from 'express';
import { ResponseEntity } from '../res/ResponseEntity';
import { toResponseStatus } from '../res/ResponseStatus';
import { describeRequest } from '../util/describeRequest';
import { toError } from '../util/toError';

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: Logger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    if (exception instanceof HttpException) {
      this.logger.info(
        describeRequest(
          request,
          `HttpException: status = ${exception.getStatus()} path = ${request.url}`,
        ),
        exception,
      );

      response
        .status(exception.getStatus())
        .json(
          instanceToPlain(
            ResponseEntity.ERROR_WITH(
              this.getHttpExceptionMessage(exception),
              toResponseStatus(exception.getStatus()),
            ),
          ),
        );

      return;
    }

    this.logger.error(
      describeRequest(request, `GlobalException: path = ${request.url}`),
      toError(exception),
    );

    response.status(500).json(instanceToPlain(ResponseEntity.ERROR()));
  }

  private getHttpExceptionMessage(exception: HttpException): string {
    const body = exception.getResponse();

    if (typeof body === 'object' && body !== null && 'message' in body) {
      const { message } = body;

      if (Array.isArray(message)) {
        return message.join(', ');
      }

      if (typeof message === 'string') {
        return message;
      }
    }

    return exception.message;
  }
}
