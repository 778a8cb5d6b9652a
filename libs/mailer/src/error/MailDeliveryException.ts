import { HttpStatus } from '@nestjs/common';
import { DomainException } from '@app/web-common/res/exception/DomainException';

export class MailDeliveryException extends DomainException {
  constructor(to: string, cause: Error) {
    super(HttpStatus.INTERNAL_SERVER_ERROR, {
      message: `Email to ${to} could not be sent: ${cause.message}`,
      responseMessage: `Email sending failed: ${cause.message}`,
      parameter: { to },
    });
  }
}
