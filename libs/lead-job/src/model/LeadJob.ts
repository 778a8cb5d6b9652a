import { CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { InvalidTransitionError } from '../error/InvalidTransitionError';
import { JobStatus } from './JobStatus';
import { LeadGenerationParams } from './LeadGenerationRequest';

interface LeadJobBase {
  readonly id: string;
  readonly params: LeadGenerationParams;
  readonly createdAt: Date;
}

export interface QueuedLeadJob extends LeadJobBase {
  readonly status: JobStatus.QUEUED;
}

export interface ProcessingLeadJob extends LeadJobBase {
  readonly status: JobStatus.PROCESSING;
  readonly startedAt: Date;
}

export interface CompletedLeadJob extends LeadJobBase {
  readonly status: JobStatus.COMPLETED;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly result: CompanyPayload;
  readonly enhancementError: string | null;
}

export interface FailedLeadJob extends LeadJobBase {
  readonly status: JobStatus.FAILED;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly error: string;
}

export type LeadJob =
  | QueuedLeadJob
  | ProcessingLeadJob
  | CompletedLeadJob
  | FailedLeadJob;

// Records are frozen; every transition builds a new value.

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }

  return value;
}

export function queuedJob(
  id: string,
  params: LeadGenerationParams,
  now: Date,
): QueuedLeadJob {
  const next: QueuedLeadJob = {
    id,
    params,
    createdAt: now,
    status: JobStatus.QUEUED,
  };

  return Object.freeze(next);
}

export function startProcessing(job: LeadJob, now: Date): ProcessingLeadJob {
  if (job.status !== JobStatus.QUEUED) {
    throw new InvalidTransitionError(job.id, job.status, JobStatus.PROCESSING);
  }

  const next: ProcessingLeadJob = {
    id: job.id,
    params: job.params,
    createdAt: job.createdAt,
    status: JobStatus.PROCESSING,
    startedAt: now,
  };

  return Object.freeze(next);
}

export function completeJob(
  job: LeadJob,
  now: Date,
  result: CompanyPayload,
  enhancementError: string | null = null,
): CompletedLeadJob {
  if (job.status !== JobStatus.PROCESSING) {
    throw new InvalidTransitionError(job.id, job.status, JobStatus.COMPLETED);
  }

  const next: CompletedLeadJob = {
    id: job.id,
    params: job.params,
    createdAt: job.createdAt,
    status: JobStatus.COMPLETED,
    startedAt: job.startedAt,
    completedAt: now,
    result: deepFreeze(structuredClone(result)),
    enhancementError,
  };

  return Object.freeze(next);
}

export function failJob(job: LeadJob, now: Date, error: string): FailedLeadJob {
  if (job.status !== JobStatus.PROCESSING) {
    throw new InvalidTransitionError(job.id, job.status, JobStatus.FAILED);
  }

  const next: FailedLeadJob = {
    id: job.id,
    params: job.params,
    createdAt: job.createdAt,
    status: JobStatus.FAILED,
    startedAt: job.startedAt,
    completedAt: now,
    error,
  };

  return Object.freeze(next);
}
