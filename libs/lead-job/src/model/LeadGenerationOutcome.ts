import { CompanyPayload } from '@app/company-generator/model/CompanyLead';

export interface LeadGenerationOutcome {
  payload: CompanyPayload;
  /** Set when enrichment failed and the unenriched payload was kept. */
  enhancementError: string | null;
}
