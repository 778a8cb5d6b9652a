import { randomUUID } from 'crypto';
import { EmailAttachment } from '../model/EmailAttachment';

const CRLF = '\r\n';
const BASE64_LINE_LENGTH = 76;

export interface MimeMessageArg {
  from: string;
  to: string;
  cc: string[];
  subject: string;
  html: string;
  attachments: EmailAttachment[];
}

/** multipart/mixed: one HTML part followed by base64 encoded attachments. */
export class MimeMessage {
  constructor(
    private readonly arg: MimeMessageArg,
    private readonly boundary = `lead-generator-${randomUUID()}`,
  ) {}

  toString(): string {
    const { from, to, cc, subject, html, attachments } = this.arg;
    const headers = [
      `From: ${from}`,
      `To: ${to}`,
      ...(cc.length > 0 ? [`Cc: ${cc.join(', ')}`] : []),
      `Subject: ${encodeHeader(subject)}`,
      'MIME-Version: 1.0',
      `Content-Type: multipart/mixed; boundary="${this.boundary}"`,
    ];
    const parts = [
      this.part(
        ['Content-Type: text/html; charset=UTF-8'],
        Buffer.from(html, 'utf8'),
      ),
      ...attachments.map((attachment) => {
        const filename = sanitizeFilename(attachment.filename);

        return this.part(
          [
            `Content-Type: ${attachment.contentType}; name="${filename}"`,
            `Content-Disposition: attachment; filename="${filename}"`,
          ],
          attachment.content,
        );
      }),
    ];

    return [
      ...headers,
      '',
      ...parts,
      `--${this.boundary}--`,
      '',
    ].join(CRLF);
  }

  toBytes(): Uint8Array {
    return Buffer.from(this.toString(), 'utf8');
  }

  private part(headers: string[], body: Buffer): string {
    return [
      `--${this.boundary}`,
      ...headers,
      'Content-Transfer-Encoding: base64',
      '',
      wrapBase64(body),
    ].join(CRLF);
  }
}

function encodeHeader(value: string): string {
  // RFC 2047 only when the value leaves printable ASCII
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

function sanitizeFilename(filename: string): string {
  return filename.replace(/["\r\n\\]/g, '_');
}

function wrapBase64(content: Buffer): string {
  const encoded = content.toString('base64');
  const lines: string[] = [];

  for (let i = 0; i < encoded.length; i += BASE64_LINE_LENGTH) {
    lines.push(encoded.slice(i, i + BASE64_LINE_LENGTH));
  }

  return lines.join(CRLF);
}
