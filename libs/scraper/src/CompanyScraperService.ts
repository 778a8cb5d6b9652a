import { Injectable } from '@nestjs/common';
import {
  CompanyLead,
  CompanyPayload,
} from '@app/company-generator/model/CompanyLead';
import { ScraperEnvironment } from '@app/config/env/ScraperEnvironment';
import { Logger } from '@app/logger/Logger';
import { WebClientService } from '@app/web-client/creator/WebClientService';
import { MediaType } from '@app/web-client/http/MediaType';
import { toError } from '@app/web-common/util/toError';
import { ContactExtractor, ExtractedContacts } from './extractor/ContactExtractor';
import { mapWithConcurrency } from './util/mapWithConcurrency';

@Injectable()
export class CompanyScraperService {
  constructor(
    private readonly webClientService: WebClientService,
    private readonly config: ScraperEnvironment,
    private readonly logger: Logger,
  ) {}

  /**
   * Visits each company website and fills in the contact details found
   * there. A site that cannot be read leaves its company as it was; only
   * an abort of `signal` rejects.
   */
  async enhance(
    payload: CompanyPayload,
    signal?: AbortSignal,
  ): Promise<CompanyPayload> {
    const companies = await mapWithConcurrency(
      payload.companies,
      this.config.concurrency,
      (company) => this.enhanceCompany(company, signal),
    );

    const enriched = companies.filter(
      (company, i) => company !== payload.companies[i],
    ).length;
    this.logger.info(
      `scraped ${enriched}/${companies.length} company websites`,
    );

    return { companies };
  }

  private async enhanceCompany(
    company: CompanyLead,
    signal?: AbortSignal,
  ): Promise<CompanyLead> {
    const url = toWebsiteUrl(company.website_url);

    if (!url) {
      return company;
    }

    try {
      const response = await this.webClientService
        .create(url)
        .get()
        .accept(MediaType.TEXT_HTML)
        .header({ 'User-Agent': this.config.userAgent })
        .timeout(this.config.timeoutMs)
        .signal(signal)
        .retrieve();

      if (!response.isOk) {
        this.logger.warn(
          `scrape skipped: company=${company.company_name} url=${url} status=${response.statusCode}`,
        );

        return company;
      }

      return withContacts(company, ContactExtractor.extract(response.rawBody));
    } catch (e) {
      if (signal?.aborted) {
        throw e;
      }

      const error = toError(e);
      this.logger.warn(
        `scrape failed: company=${company.company_name} url=${url} message=${error.message}`,
        error,
      );

      return company;
    }
  }
}

function toWebsiteUrl(websiteUrl: string | null): string | null {
  if (!websiteUrl) {
    return null;
  }

  const candidate = /^https?:\/\//i.test(websiteUrl)
    ? websiteUrl
    : `https://${websiteUrl}`;

  try {
    return new URL(candidate).toString();
  } catch {
    return null;
  }
}

function withContacts(
  company: CompanyLead,
  contacts: ExtractedContacts,
): CompanyLead {
  const [firstEmail, ...otherEmails] = contacts.emails;

  return {
    ...company,
    social_media_scraped: contacts.socialMedia,
    contact_email: firstEmail ?? company.contact_email,
    contact_email_llm: company.contact_email,
    additional_emails: otherEmails,
  };
}
