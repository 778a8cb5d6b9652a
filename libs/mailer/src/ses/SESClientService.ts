import { Injectable } from '@nestjs/common';
import {
  SendEmailCommand,
  SendEmailCommandInput,
  SendEmailCommandOutput,
  SendRawEmailCommand,
  SendRawEmailCommandInput,
  SendRawEmailCommandOutput,
  SESClient,
} from '@aws-sdk/client-ses';
import { Logger } from '@app/logger/Logger';
import { toError } from '@app/web-common/util/toError';
import { SESDeliveryResult } from './SESDeliveryResult';

@Injectable()
export class SESClientService {
  constructor(
    private readonly sesClient: SESClient,
    private readonly logger: Logger,
  ) {}

  async send(commandInput: SendEmailCommandInput): Promise<SESDeliveryResult> {
    return this.deliver(
      () => this.sesClient.send(new SendEmailCommand(commandInput)),
      JSON.stringify(commandInput.Destination),
    );
  }

  /** Sends a prebuilt MIME message, used when the mail carries attachments. */
  async sendRaw(
    commandInput: SendRawEmailCommandInput,
  ): Promise<SESDeliveryResult> {
    return this.deliver(
      () => this.sesClient.send(new SendRawEmailCommand(commandInput)),
      JSON.stringify(commandInput.Destinations),
    );
  }

  private async deliver(
    command: () => Promise<SendEmailCommandOutput | SendRawEmailCommandOutput>,
    destination: string,
  ): Promise<SESDeliveryResult> {
    try {
      const result = new SESDeliveryResult(await command());

      if (result.isNotOK()) {
        throw new Error(`ses send result is not ok: ${result.description}`);
      }

      return result;
    } catch (e) {
      const error = toError(e);
      this.logger.error(
        `mail delivery failed: destination=${destination} message=${error.message}`,
        error,
      );
      throw error;
    }
  }
}
