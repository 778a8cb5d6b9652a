import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { Logger } from '@app/logger/Logger';
import { Request, Response } from 'express';
import { instanceToPlain } from 'class-transformer';
import { DomainException } from '../res/exception/DomainException';
import { ResponseEntity } from '../res/ResponseEntity';
import { toResponseStatus } from '../res/ResponseStatus';
import { describeRequest } from '../util/describeRequest';

@Catch(DomainException)
export class DomainExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: Logger) {}

  catch(exception: DomainException, host: ArgumentsHost): void {
    const request = host.switchToHttp().getRequest<Request>();
    const response = host.switchToHttp().getResponse<Response>();

    this.logger.info(this.getErrorLogMessage(request, exception), exception);

    response
      .status(exception.statusCode)
      .json(
        instanceToPlain(
          ResponseEntity.ERROR_WITH(
            exception.responseMessage,
            toResponseStatus(exception.statusCode),
          ),
        ),
      );
  }

  private getErrorLogMessage(request: Request, exception: DomainException) {
    const parameter = exception.parameter
      ? ` parameter = ${JSON.stringify(exception.parameter)}`
      : '';

    return describeRequest(
      request,
      `DomainException: message = ${exception.message} path=${request.url}${parameter}`,
    );
  }
}
