import { UnparseableCompletionError } from '../error/UnparseableCompletionError';
import {
  CompanyLead,
  CompanyPayload,
  CompanySocialMedia,
  SOCIAL_PLATFORMS,
} from '../model/CompanyLead';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

type JsonObject = Record<string, unknown>;

export class CompletionResponse {
  constructor(private readonly content: string | null) {}

  get isNoMessage(): boolean {
    return !this.content?.trim();
  }

  get answer(): string {
    const content = this.content ?? '';
    const fenced = FENCED_BLOCK.exec(content);

    return (fenced ? fenced[1] : content).trim();
  }

  toPayload(): CompanyPayload {
    if (this.isNoMessage) {
      throw new UnparseableCompletionError('empty answer', '');
    }

    const parsed = this.parse();

    if (!isJsonObject(parsed) || !Array.isArray(parsed.companies)) {
      throw new UnparseableCompletionError(
        'no "companies" array in the answer',
        this.answer,
      );
    }

    return {
      companies: parsed.companies
        .map(toCompanyLead)
        .filter((company): company is CompanyLead => company !== null),
    };
  }

  private parse(): unknown {
    try {
      return JSON.parse(this.answer);
    } catch {
      throw new UnparseableCompletionError('answer is not JSON', this.answer);
    }
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCompanyLead(value: unknown): CompanyLead | null {
  if (!isJsonObject(value)) {
    return null;
  }

  const companyName = toText(value.company_name);

  if (!companyName) {
    return null;
  }

  return {
    company_name: companyName,
    website_url: toText(value.website_url),
    company_size: toText(value.company_size),
    headquarters_location: toText(value.headquarters_location),
    revenue_market_cap: toText(value.revenue_market_cap),
    key_products_services: toText(value.key_products_services),
    target_market: toText(value.target_market),
    number_of_users: toText(value.number_of_users),
    notable_customers: toTextList(value.notable_customers),
    social_media: toSocialMedia(value.social_media),
    contact_email: toText(value.contact_email),
    recent_news_insights: toText(value.recent_news_insights),
    decision_maker_roles: toTextList(value.decision_maker_roles),
  };
}

function toText(value: unknown): string | null {
  if (typeof value === 'number') {
    return String(value);
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();

  return text.length > 0 ? text : null;
}

function toTextList(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const texts = value
    .map(toText)
    .filter((text): text is string => text !== null);

  return texts.length > 0 ? texts : null;
}

function toSocialMedia(value: unknown): CompanySocialMedia | null {
  if (!isJsonObject(value)) {
    return null;
  }

  const socialMedia: CompanySocialMedia = {};

  for (const platform of SOCIAL_PLATFORMS) {
    const url = toText(value[platform]);

    if (url) {
      socialMedia[platform] = url;
    }
  }

  return Object.keys(socialMedia).length > 0 ? socialMedia : null;
}
