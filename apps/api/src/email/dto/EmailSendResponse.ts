import { MailReceipt } from '@app/mailer/model/MailReceipt';

export class EmailSendResponse {
  constructor(
    readonly messageId: string,
    readonly from: string,
    readonly to: string,
    readonly cc: string[],
    readonly attachmentsCount: number,
    readonly sentAt: string,
  ) {}

  static of(receipt: MailReceipt): EmailSendResponse {
    return new EmailSendResponse(
      receipt.messageId,
      receipt.from,
      receipt.to,
      receipt.cc,
      receipt.attachmentsCount,
      receipt.sentAt.toISOString(),
    );
  }
}
