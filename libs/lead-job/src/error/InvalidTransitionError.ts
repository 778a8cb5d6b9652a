import { JobStatus } from '../model/JobStatus';

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
