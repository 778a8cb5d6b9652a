import { setImmediate } from 'timers/promises';
import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { Logger } from '@app/logger/Logger';
import { RetryExecutor } from '@app/resilience/RetryExecutor';
import { DomainException } from '@app/web-common/res/exception/DomainException';
import { toError } from '@app/web-common/util/toError';
import { LeadEnhancer } from './collaborator/LeadEnhancer';
import { LeadGenerator } from './collaborator/LeadGenerator';
import { JobNotFoundException } from './error/JobNotFoundException';
import { LeadGenerationFailedException } from './error/LeadGenerationFailedException';
import { LeadGeneratorUnavailableException } from './error/LeadGeneratorUnavailableException';
import { LeadRequestValidationException } from './error/LeadRequestValidationException';
import { JobHandle } from './model/JobHandle';
import { isTerminal, JobStatus } from './model/JobStatus';
import { LeadGenerationOutcome } from './model/LeadGenerationOutcome';
import {
  LeadGenerationInput,
  LeadGenerationParams,
  LeadGenerationRequest,
} from './model/LeadGenerationRequest';
import { LeadJob } from './model/LeadJob';
import {
  JobStatusView,
  LeadExport,
  LeadResultProjector,
} from './projector/LeadResultProjector';
import { JobStore } from './store/JobStore';

export const JOB_CANCELLED_MESSAGE = 'Job cancelled';

interface RunningJob {
  controller: AbortController;
  done: Promise<void>;
}

@Injectable()
export class LeadJobOrchestrator implements OnApplicationShutdown {
  private readonly running = new Map<string, RunningJob>();

  constructor(
    private readonly store: JobStore,
    private readonly generator: LeadGenerator,
    private readonly enhancer: LeadEnhancer,
    private readonly retryExecutor: RetryExecutor,
    private readonly projector: LeadResultProjector,
    private readonly logger: Logger,
  ) {}

  async runSync(input: LeadGenerationInput): Promise<LeadGenerationOutcome> {
    const params = this.validate(input);
    this.assertGeneratorConfigured();

    try {
      return await this.produce(params);
    } catch (e) {
      const error = toError(e);
      this.logger.error(
        `Lead generation failed (${describeParams(params)}): ${error.message}`,
        error,
      );
      throw new LeadGenerationFailedException(error);
    }
  }

  /**
   * Creates a queued job and returns at once. The work runs detached and
   * starts no earlier than the next turn of the event loop, so the caller
   * can always observe the queued state.
   */
  async submit(input: LeadGenerationInput): Promise<JobHandle> {
    const params = this.validate(input);
    this.assertGeneratorConfigured();
    const jobId = await this.store.create(params);
    const controller = new AbortController();
    const done = this.drive(jobId, params, controller.signal);

    this.running.set(jobId, { controller, done });
    this.logger.info(`Job ${jobId} queued (${describeParams(params)})`);

    return {
      jobId,
      done,
      cancel: () => controller.abort(),
    };
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    return this.projector.toStatusView(await this.getJob(jobId));
  }

  async export(jobId: string): Promise<LeadExport> {
    return this.projector.toExport(await this.getJob(jobId));
  }

  async exportCsv(jobId: string): Promise<string> {
    return this.projector.toCsv(await this.export(jobId));
  }

  async listJobs(): Promise<JobStatusView[]> {
    const jobs = await this.store.list();

    return jobs.map((job) => this.projector.toStatusView(job));
  }

  /** Aborts a running job and waits for it to settle. */
  async cancel(jobId: string): Promise<JobStatusView> {
    const job = await this.getJob(jobId);
    const running = this.running.get(jobId);

    if (!running || isTerminal(job.status)) {
      throw alreadyFinished(jobId, job.status);
    }

    running.controller.abort();
    await running.done;

    // the job may have completed before it saw the abort
    const settled = await this.getJob(jobId);

    if (settled.status !== JobStatus.FAILED) {
      throw alreadyFinished(jobId, settled.status);
    }

    return this.projector.toStatusView(settled);
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    const pending = [...this.running.values()];

    if (pending.length === 0) {
      return;
    }

    this.logger.info(
      `Shutdown signal received: ${signal}, cancelling ${pending.length} running job(s)`,
    );

    for (const job of pending) {
      job.controller.abort();
    }

    await Promise.all(pending.map((job) => job.done));
  }

  private async drive(
    jobId: string,
    params: LeadGenerationParams,
    signal: AbortSignal,
  ): Promise<void> {
    await setImmediate();

    try {
      await this.store.transitionToProcessing(jobId);
      const { payload, enhancementError } = await this.produce(params, signal);
      await this.store.complete(jobId, payload, enhancementError);
      this.logger.info(
        `Job ${jobId} completed with ${payload.companies.length} companies`,
      );
    } catch (e) {
      const error = toError(e);
      await this.recordFailure(
        jobId,
        signal.aborted ? JOB_CANCELLED_MESSAGE : error.message,
        error,
      );
    } finally {
      this.running.delete(jobId);
    }
  }

  private async produce(
    params: LeadGenerationParams,
    signal?: AbortSignal,
  ): Promise<LeadGenerationOutcome> {
    const { industry, count, country } = params;
    const payload = await this.retryExecutor.execute(
      (attemptSignal) =>
        this.generator.generate({ industry, count, country }, attemptSignal),
      { label: 'generate', signal },
    );

    if (!params.enableWebScraping) {
      return { payload, enhancementError: null };
    }

    return this.enhance(payload, signal);
  }

  private async enhance(
    payload: CompanyPayload,
    signal?: AbortSignal,
  ): Promise<LeadGenerationOutcome> {
    try {
      return {
        payload: await this.enhancer.enhance(payload, signal),
        enhancementError: null,
      };
    } catch (e) {
      if (signal?.aborted) {
        throw e;
      }

      const error = toError(e);
      this.logger.warn(
        `Enhancement failed, keeping the generated payload: ${error.message}`,
        error,
      );

      return { payload, enhancementError: error.message };
    }
  }

  private async recordFailure(
    jobId: string,
    message: string,
    cause: Error,
  ): Promise<void> {
    try {
      await this.store.fail(jobId, message);
      this.logger.warn(`Job ${jobId} failed: ${message}`, cause);
    } catch (e) {
      const error = toError(e);
      this.logger.error(
        `Job ${jobId} could not be marked failed: ${error.message}`,
        error,
      );
    }
  }

  private async getJob(jobId: string): Promise<LeadJob> {
    const job = await this.store.get(jobId);

    if (!job) {
      throw new JobNotFoundException(jobId);
    }

    return job;
  }

  private assertGeneratorConfigured(): void {
    try {
      this.generator.assertConfigured();
    } catch (e) {
      throw new LeadGeneratorUnavailableException(toError(e));
    }
  }

  private validate(input: LeadGenerationInput): LeadGenerationParams {
    const request = plainToClass(LeadGenerationRequest, input);
    const errors = validateSync(request);

    if (errors.length > 0) {
      throw LeadRequestValidationException.of(errors);
    }

    return Object.freeze({
      industry: request.industry,
      count: request.count,
      country: request.country,
      enableWebScraping: request.enableWebScraping ?? false,
    });
  }
}

function alreadyFinished(jobId: string, status: JobStatus): DomainException {
  return DomainException.Conflict({
    message: `Job ${jobId} is already ${status}`,
    responseMessage: 'Job already finished',
    parameter: { jobId },
  });
}

function describeParams(params: LeadGenerationParams): string {
  return `industry=${params.industry}, count=${params.count}, country=${params.country}`;
}
