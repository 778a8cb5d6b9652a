import { Injectable } from '@nestjs/common';
import { EmailContentRequest } from './dto/EmailContentRequest';
import { EmailContentSuggestion } from './dto/EmailContentSuggestion';
import { EmailPurpose, EmailTone } from './dto/EmailPurpose';

type PurposeTemplate = Pick<
  EmailContentSuggestion,
  'subject' | 'body' | 'call_to_action'
>;
type ToneTemplate = Pick<EmailContentSuggestion, 'greeting' | 'closing'>;

const PURPOSES: Record<EmailPurpose, (company: string) => PurposeTemplate> = {
  [EmailPurpose.INTRODUCTION]: (company) => ({
    subject: `Introducing ourselves to ${company}`,
    body:
      `I came across ${company} and was impressed by your work in the industry. ` +
      'I would like to introduce our team and share how we help companies like yours.\n\n' +
      'I believe there is a good fit between what you do and what we offer.',
    call_to_action: 'Would you be open to a 15-minute call next week?',
  }),
  [EmailPurpose.FOLLOW_UP]: (company) => ({
    subject: `Following up with ${company}`,
    body:
      `I wanted to follow up on my previous message to the ${company} team. ` +
      'I understand things get busy, so I am keeping this short.\n\n' +
      'I am still keen to hear whether this is a priority for you right now.',
    call_to_action: 'Is there a good time this week for a quick conversation?',
  }),
  [EmailPurpose.PARTNERSHIP]: (company) => ({
    subject: `Exploring partnership opportunities with ${company}`,
    body:
      `I came across ${company} and was impressed by your work in the industry. ` +
      'I believe there could be valuable opportunities for collaboration between our organizations.\n\n' +
      'I would love to discuss how we might work together to create mutual value.',
    call_to_action: 'Would you be available for a 15-minute call next week?',
  }),
};

const TONES: Record<EmailTone, (company: string) => ToneTemplate> = {
  [EmailTone.PROFESSIONAL]: (company) => ({
    greeting: `Dear ${company} Team,`,
    closing: 'Best regards,',
  }),
  [EmailTone.CASUAL]: (company) => ({
    greeting: `Hi ${company} team,`,
    closing: 'Cheers,',
  }),
  [EmailTone.FRIENDLY]: (company) => ({
    greeting: `Hello ${company} team!`,
    closing: 'Warm wishes,',
  }),
};

/** Template-based outreach drafts. No model call is made. */
@Injectable()
export class EmailContentService {
  suggest({
    companyName,
    purpose,
    tone,
  }: EmailContentRequest): EmailContentSuggestion {
    const { subject, body, call_to_action } = PURPOSES[purpose](companyName);
    const { greeting, closing } = TONES[tone](companyName);

    return { subject, greeting, body, call_to_action, closing };
  }
}
