import { randomUUID } from 'crypto';
import { Injectable } from '@nestjs/common';
import { CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { Clock } from '../clock/Clock';
import { JobNotFoundException } from '../error/JobNotFoundException';
import { LeadGenerationParams } from '../model/LeadGenerationRequest';
import {
  completeJob,
  CompletedLeadJob,
  failJob,
  FailedLeadJob,
  LeadJob,
  ProcessingLeadJob,
  queuedJob,
  startProcessing,
} from '../model/LeadJob';
import { JobStore } from './JobStore';

// Each method reads, checks and writes without awaiting in between,
// so a reader sees either the old record or the new one.
@Injectable()
export class InMemoryJobStore extends JobStore {
  private readonly jobs = new Map<string, LeadJob>();

  constructor(private readonly clock: Clock) {
    super();
  }

  async create(params: LeadGenerationParams): Promise<string> {
    const id = this.nextId();
    this.jobs.set(id, queuedJob(id, params, this.clock.now()));

    return id;
  }

  async get(id: string): Promise<LeadJob | null> {
    return this.jobs.get(id) ?? null;
  }

  async transitionToProcessing(id: string): Promise<ProcessingLeadJob> {
    return this.replace(id, (job, now) => startProcessing(job, now));
  }

  async complete(
    id: string,
    result: CompanyPayload,
    enhancementError: string | null = null,
  ): Promise<CompletedLeadJob> {
    return this.replace(id, (job, now) =>
      completeJob(job, now, result, enhancementError),
    );
  }

  async fail(id: string, error: string): Promise<FailedLeadJob> {
    return this.replace(id, (job, now) => failJob(job, now, error));
  }

  async list(): Promise<LeadJob[]> {
    return [...this.jobs.values()];
  }

  private replace<T extends LeadJob>(
    id: string,
    transition: (job: LeadJob, now: Date) => T,
  ): T {
    const current = this.jobs.get(id);

    if (!current) {
      throw new JobNotFoundException(id);
    }

    const next = transition(current, this.clock.now());
    this.jobs.set(id, next);

    return next;
  }

  private nextId(): string {
    let id: string;

    do {
      id = `job_${randomUUID()}`;
    } while (this.jobs.has(id));

    return id;
  }
}
