import { CompanyLead, CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { LeadGenerationOutcome } from '@app/lead-job/model/LeadGenerationOutcome';
import { LeadGenerationRequest } from '@app/lead-job/model/LeadGenerationRequest';

export interface LeadGenerateMetadata {
  industry: string;
  country: string;
  requestedCount: number;
  actualCount: number;
  webScrapingEnabled: boolean;
  generatedAt: string;
  enhancementError: string | null;
}

export class LeadGenerateResponse implements CompanyPayload {
  constructor(
    readonly companies: CompanyLead[],
    readonly metadata: LeadGenerateMetadata,
  ) {}

  static of(
    request: LeadGenerationRequest,
    { payload, enhancementError }: LeadGenerationOutcome,
    generatedAt: Date,
  ): LeadGenerateResponse {
    return new LeadGenerateResponse(payload.companies, {
      industry: request.industry,
      country: request.country,
      requestedCount: request.count,
      actualCount: payload.companies.length,
      webScrapingEnabled: request.enableWebScraping ?? false,
      generatedAt: generatedAt.toISOString(),
      enhancementError,
    });
  }
}
