import {
  CompanyPayload,
  CompanyQuery,
} from '@app/company-generator/model/CompanyLead';

export abstract class LeadGenerator {
  /** Throws when the generator cannot be called at all. */
  abstract assertConfigured(): void;

  abstract generate(
    query: CompanyQuery,
    signal?: AbortSignal,
  ): Promise<CompanyPayload>;
}
