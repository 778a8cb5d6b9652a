import { CompanyPayload } from '@app/company-generator/model/CompanyLead';

export abstract class LeadEnhancer {
  abstract enhance(
    payload: CompanyPayload,
    signal?: AbortSignal,
  ): Promise<CompanyPayload>;
}
