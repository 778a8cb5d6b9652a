import { OpenAI } from 'openai';
import { CompanyQuery } from '../model/CompanyLead';

export class CompanyPromptRequest {
  private readonly requestParams = {
    temperature: 0.2,
  };

  constructor(
    private readonly query: CompanyQuery,
    private readonly model: string,
  ) {}

  static from(query: CompanyQuery, model: string): CompanyPromptRequest {
    return new CompanyPromptRequest(query, model);
  }

  get toBody(): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
    return {
      model: this.model,
      messages: [
        {
          role: 'user',
          content: this.prompt,
        },
      ],
      ...this.requestParams,
    };
  }

  get prompt(): string {
    const { industry, count, country } = this.query;

    return `You research B2B sales leads. List ${count} companies in the ${industry} industry that are based in or operate in ${country}.

Answer with one JSON object and nothing else, shaped like this:
{
  "companies": [
    {
      "company_name": "official company name",
      "website_url": "official website URL",
      "company_size": "approximate employee range",
      "headquarters_location": "city and country",
      "revenue_market_cap": "annual revenue or market capitalisation",
      "key_products_services": "main offerings in this industry",
      "target_market": "primary customer segments",
      "number_of_users": "total users, members, customers or subscribers, e.g. \\"2.5 million customers\\"",
      "notable_customers": ["customer", "..."],
      "social_media": {
        "linkedin": "full URL",
        "twitter": "full URL",
        "facebook": "full URL",
        "instagram": "full URL",
        "youtube": "full URL"
      },
      "contact_email": "general contact address",
      "recent_news_insights": "recent developments or partnerships",
      "decision_maker_roles": ["CEO", "VP of Sales", "..."]
    }
  ]
}

Use the JSON value null for anything that is not publicly known, never a placeholder string. The same applies to each social platform and to the two lists.`;
  }
}
