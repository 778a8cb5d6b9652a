import { CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { LeadGenerationParams } from '../model/LeadGenerationRequest';
import {
  CompletedLeadJob,
  FailedLeadJob,
  LeadJob,
  ProcessingLeadJob,
} from '../model/LeadJob';

/**
 * The only owner of job state. Mutations on an unknown id throw
 * `JobNotFoundException`; a mutation from the wrong status throws
 * `InvalidTransitionError` and leaves the record untouched.
 */
export abstract class JobStore {
  abstract create(params: LeadGenerationParams): Promise<string>;

  abstract get(id: string): Promise<LeadJob | null>;

  abstract transitionToProcessing(id: string): Promise<ProcessingLeadJob>;

  abstract complete(
    id: string,
    result: CompanyPayload,
    enhancementError?: string | null,
  ): Promise<CompletedLeadJob>;

  abstract fail(id: string, error: string): Promise<FailedLeadJob>;

  /** Every job, oldest first. */
  abstract list(): Promise<LeadJob[]>;
}
