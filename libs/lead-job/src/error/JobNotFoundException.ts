import { HttpStatus } from '@nestjs/common';
import { DomainException } from '@app/web-common/res/exception/DomainException';

export class JobNotFoundException extends DomainException {
  constructor(readonly jobId: string) {
    super(HttpStatus.NOT_FOUND, {
      message: `Job ${jobId} not found`,
      responseMessage: 'Job not found',
      parameter: { jobId },
    });
  }
}
