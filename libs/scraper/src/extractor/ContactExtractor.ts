import {
  CompanySocialMedia,
  SOCIAL_PLATFORMS,
  SocialPlatform,
} from '@app/company-generator/model/CompanyLead';

export interface ExtractedContacts {
  emails: string[];
  socialMedia: CompanySocialMedia;
}

const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi;

// logo@2x.png and friends
const ASSET_SUFFIX = /\.(png|jpe?g|gif|svg|webp|css|js)$/i;

// error-tracking addresses that page builders embed in every site
const IGNORED_EMAIL_DOMAINS = ['sentry.io', 'wixpress.com'];

const SOCIAL_PATTERNS: Record<SocialPlatform, RegExp> = {
  linkedin:
    /https?:\/\/(?:[a-z]{2,3}\.)?linkedin\.com\/(?:company|school|in)\/[a-z0-9_.%-]+/gi,
  twitter: /https?:\/\/(?:www\.)?(?:twitter|x)\.com\/[a-z0-9_]{1,15}(?![a-z0-9_])/gi,
  facebook: /https?:\/\/(?:www\.|m\.)?facebook\.com\/[a-z0-9_.-]+/gi,
  instagram: /https?:\/\/(?:www\.)?instagram\.com\/[a-z0-9_.]+/gi,
  youtube:
    /https?:\/\/(?:www\.)?youtube\.com\/(?:@|c\/|channel\/|user\/)[a-z0-9_.-]+/gi,
};

// share buttons, not profiles
const SHARE_PATHS = /\/(?:intent|share|sharer|sharer\.php|home)$/i;

export class ContactExtractor {
  static extract(html: string): ExtractedContacts {
    return {
      emails: ContactExtractor.emails(html),
      socialMedia: ContactExtractor.socialMedia(html),
    };
  }

  static emails(html: string): string[] {
    const found = new Set<string>();

    for (const [match] of html.matchAll(EMAIL_PATTERN)) {
      const email = match.toLowerCase();
      const domain = email.slice(email.indexOf('@') + 1);

      if (
        !ASSET_SUFFIX.test(email) &&
        !IGNORED_EMAIL_DOMAINS.some((ignored) => domain.endsWith(ignored))
      ) {
        found.add(email);
      }
    }

    return [...found];
  }

  static socialMedia(html: string): CompanySocialMedia {
    const socialMedia: CompanySocialMedia = {};

    for (const platform of SOCIAL_PLATFORMS) {
      const profile = [...html.matchAll(SOCIAL_PATTERNS[platform])]
        .map(([match]) => match)
        .find((url) => !SHARE_PATHS.test(url));

      if (profile) {
        socialMedia[platform] = profile;
      }
    }

    return socialMedia;
  }
}
