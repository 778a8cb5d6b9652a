import { HttpStatus } from '@nestjs/common';
import { DomainException } from '@app/web-common/res/exception/DomainException';

export class LeadGenerationFailedException extends DomainException {
  constructor(cause: Error) {
    super(HttpStatus.BAD_GATEWAY, {
      message: `Lead generation failed: ${cause.message}`,
    });
  }
}
