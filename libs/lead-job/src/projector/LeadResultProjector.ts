import { Injectable } from '@nestjs/common';
import {
  CompanyLead,
  CompanyPayload,
  SOCIAL_PLATFORMS,
} from '@app/company-generator/model/CompanyLead';
import { JobNotTerminalException } from '../error/JobNotTerminalException';
import { JobStatus } from '../model/JobStatus';
import { LeadJob } from '../model/LeadJob';

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  result?: CompanyPayload;
  enhancementError?: string | null;
  error?: string;
}

export interface LeadExport {
  jobId: string;
  industry: string;
  country: string;
  count: number;
  companies: CompanyLead[];
  generatedAt: string;
}

type CsvColumn = [header: string, value: (company: CompanyLead) => string];

const LIST_SEPARATOR = '; ';
const CSV_LINE_BREAK = '\r\n';

const text = (value: string | null | undefined): string => value ?? '';
const list = (values: string[] | null | undefined): string =>
  (values ?? []).join(LIST_SEPARATOR);

const CSV_COLUMNS: CsvColumn[] = [
  ['company_name', (c) => c.company_name],
  ['website_url', (c) => text(c.website_url)],
  ['company_size', (c) => text(c.company_size)],
  ['headquarters_location', (c) => text(c.headquarters_location)],
  ['revenue_market_cap', (c) => text(c.revenue_market_cap)],
  ['key_products_services', (c) => text(c.key_products_services)],
  ['target_market', (c) => text(c.target_market)],
  ['number_of_users', (c) => text(c.number_of_users)],
  ['notable_customers', (c) => list(c.notable_customers)],
  ...SOCIAL_PLATFORMS.map((platform): CsvColumn => [
    platform,
    (c) => text(c.social_media_scraped?.[platform] ?? c.social_media?.[platform]),
  ]),
  ['contact_email', (c) => text(c.contact_email)],
  ['additional_emails', (c) => list(c.additional_emails)],
  ['recent_news_insights', (c) => text(c.recent_news_insights)],
  ['decision_maker_roles', (c) => list(c.decision_maker_roles)],
];

@Injectable()
export class LeadResultProjector {
  toStatusView(job: LeadJob): JobStatusView {
    const view: JobStatusView = {
      jobId: job.id,
      status: job.status,
      createdAt: job.createdAt.toISOString(),
    };

    switch (job.status) {
      case JobStatus.QUEUED:
        return view;
      case JobStatus.PROCESSING:
        return { ...view, startedAt: job.startedAt.toISOString() };
      case JobStatus.COMPLETED:
        return {
          ...view,
          startedAt: job.startedAt.toISOString(),
          completedAt: job.completedAt.toISOString(),
          result: job.result,
          enhancementError: job.enhancementError,
        };
      case JobStatus.FAILED:
        return {
          ...view,
          startedAt: job.startedAt.toISOString(),
          completedAt: job.completedAt.toISOString(),
          error: job.error,
        };
    }
  }

  toExport(job: LeadJob): LeadExport {
    if (job.status !== JobStatus.COMPLETED) {
      throw new JobNotTerminalException(job.id, job.status);
    }

    return {
      jobId: job.id,
      industry: job.params.industry,
      country: job.params.country,
      count: job.result.companies.length,
      companies: job.result.companies,
      generatedAt: job.completedAt.toISOString(),
    };
  }

  /** RFC 4180: CRLF line breaks, a header row, quoted cells where needed. */
  toCsv(leadExport: LeadExport): string {
    const header = CSV_COLUMNS.map(([name]) => name);
    const rows = leadExport.companies.map((company) =>
      CSV_COLUMNS.map(([, value]) => value(company)),
    );

    return (
      [header, ...rows]
        .map((cells) => cells.map(escapeCsvCell).join(','))
        .join(CSV_LINE_BREAK) + CSV_LINE_BREAK
    );
  }
}

function escapeCsvCell(cell: string): string {
  if (!/[",\r\n]/.test(cell)) {
    return cell;
  }

  return `"${cell.replace(/"/g, '""')}"`;
}
