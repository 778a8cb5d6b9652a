import { JobStatus } from '@app/lead-job/model/JobStatus';

export class LeadJobAccepted {
  readonly status = JobStatus.QUEUED;
  readonly statusEndpoint: string;

  constructor(readonly jobId: string) {
    this.statusEndpoint = `/api/v1/leads/status/${jobId}`;
  }
}
