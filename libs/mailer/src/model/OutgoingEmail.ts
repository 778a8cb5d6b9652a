import {
  SendEmailCommandInput,
  SendRawEmailCommandInput,
} from '@aws-sdk/client-ses';
import { MimeMessage } from '../mime/MimeMessage';
import { EmailAttachment } from './EmailAttachment';

export interface OutgoingEmailArg {
  from: string;
  to: string;
  subject: string;
  html: string;
  cc?: string[];
  attachments?: EmailAttachment[];
}

export class OutgoingEmail {
  private readonly _from: string;
  private readonly _to: string;
  private readonly _subject: string;
  private readonly _html: string;
  private readonly _cc: string[];
  private readonly _attachments: EmailAttachment[];

  constructor(arg: OutgoingEmailArg) {
    this._from = arg.from;
    this._to = arg.to;
    this._subject = arg.subject;
    this._html = arg.html;
    this._cc = (arg.cc ?? []).filter((address) => address !== arg.to);
    this._attachments = [...(arg.attachments ?? [])];
  }

  /** The sender gets a copy of what they sent. */
  static copyingSender(arg: Omit<OutgoingEmailArg, 'cc'>): OutgoingEmail {
    return new OutgoingEmail({ ...arg, cc: [arg.from] });
  }

  get from(): string {
    return this._from;
  }

  get to(): string {
    return this._to;
  }

  get cc(): string[] {
    return [...this._cc];
  }

  get attachmentsCount(): number {
    return this._attachments.length;
  }

  get hasAttachments(): boolean {
    return this._attachments.length > 0;
  }

  get commandInput(): SendEmailCommandInput {
    return {
      Source: this._from,
      Destination: {
        ToAddresses: [this._to],
        CcAddresses: this._cc,
      },
      Message: {
        Subject: {
          Data: this._subject,
          Charset: 'UTF-8',
        },
        Body: {
          Html: {
            Data: this._html,
            Charset: 'UTF-8',
          },
        },
      },
    };
  }

  rawCommandInput(boundary?: string): SendRawEmailCommandInput {
    const message = new MimeMessage(
      {
        from: this._from,
        to: this._to,
        cc: this._cc,
        subject: this._subject,
        html: this._html,
        attachments: this._attachments,
      },
      boundary,
    );

    return {
      Source: this._from,
      Destinations: [this._to, ...this._cc],
      RawMessage: { Data: message.toBytes() },
    };
  }
}
