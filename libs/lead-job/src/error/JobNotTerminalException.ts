import { HttpStatus } from '@nestjs/common';
import { DomainException } from '@app/web-common/res/exception/DomainException';
import { JobStatus } from '../model/JobStatus';

export class JobNotTerminalException extends DomainException {
  constructor(
    readonly jobId: string,
    readonly status: JobStatus,
  ) {
    super(HttpStatus.BAD_REQUEST, {
      message: `Job ${jobId} is ${status}, export needs a completed job`,
      responseMessage: 'Job not completed yet',
      parameter: { jobId, status },
    });
  }
}
