export const SOCIAL_PLATFORMS = [
  'linkedin',
  'twitter',
  'facebook',
  'instagram',
  'youtube',
] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export type CompanySocialMedia = Partial<Record<SocialPlatform, string>>;

/**
 * One generated company. Field names follow the JSON the model is prompted
 * to emit, so they stay snake_case all the way to the export.
 */
export interface CompanyLead {
  company_name: string;
  website_url: string | null;
  company_size: string | null;
  headquarters_location: string | null;
  revenue_market_cap: string | null;
  key_products_services: string | null;
  target_market: string | null;
  number_of_users: string | null;
  notable_customers: string[] | null;
  social_media: CompanySocialMedia | null;
  contact_email: string | null;
  recent_news_insights: string | null;
  decision_maker_roles: string[] | null;

  // filled in by the scraper
  social_media_scraped?: CompanySocialMedia;
  contact_email_llm?: string | null;
  additional_emails?: string[];
}

export interface CompanyPayload {
  companies: CompanyLead[];
}

export interface CompanyQuery {
  industry: string;
  count: number;
  country: string;
}
