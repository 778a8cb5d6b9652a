import { Injectable } from '@nestjs/common';
import { toError } from '@app/web-common/util/toError';
import { MailDeliveryException } from './error/MailDeliveryException';
import { MailReceipt } from './model/MailReceipt';
import { OutgoingEmail } from './model/OutgoingEmail';
import { SESClientService } from './ses/SESClientService';

@Injectable()
export class MailerService {
  constructor(private readonly sesClientService: SESClientService) {}

  async send(email: OutgoingEmail): Promise<MailReceipt> {
    try {
      const result = email.hasAttachments
        ? await this.sesClientService.sendRaw(email.rawCommandInput())
        : await this.sesClientService.send(email.commandInput);

      return {
        messageId: result.messageId,
        from: email.from,
        to: email.to,
        cc: email.cc,
        attachmentsCount: email.attachmentsCount,
        sentAt: new Date(),
      };
    } catch (e) {
      throw new MailDeliveryException(email.to, toError(e));
    }
  }
}
