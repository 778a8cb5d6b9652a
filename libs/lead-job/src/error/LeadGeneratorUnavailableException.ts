import { HttpStatus } from '@nestjs/common';
import { DomainException } from '@app/web-common/res/exception/DomainException';

export class LeadGeneratorUnavailableException extends DomainException {
  constructor(cause: Error) {
    super(HttpStatus.SERVICE_UNAVAILABLE, {
      message: `Lead generator unavailable: ${cause.message}`,
      responseMessage: cause.message,
    });
  }
}
