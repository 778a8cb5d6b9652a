import {
  SendEmailCommandOutput,
  SendRawEmailCommandOutput,
} from '@aws-sdk/client-ses';
import { HttpStatus } from '@nestjs/common';

export class SESDeliveryResult {
  private readonly _statusCode: number;
  private readonly _messageId: string;
  private readonly _requestId: string;

  constructor(output: SendEmailCommandOutput | SendRawEmailCommandOutput) {
    this._statusCode = output.$metadata.httpStatusCode ?? 0;
    this._messageId = output.MessageId ?? '';
    this._requestId = output.$metadata.requestId ?? '';
  }

  get messageId(): string {
    return this._messageId;
  }

  get description(): string {
    return JSON.stringify({
      statusCode: this._statusCode,
      messageId: this._messageId,
      requestId: this._requestId,
    });
  }

  isNotOK(): boolean {
    return this._statusCode !== HttpStatus.OK;
  }
}
