import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Version,
} from '@nestjs/common';
import { Logger } from '@app/logger/Logger';
import { MailerService } from '@app/mailer/MailerService';
import { ResponseEntity } from '@app/web-common/res/ResponseEntity';
import { EmailContentRequest } from './dto/EmailContentRequest';
import { EmailContentSuggestion } from './dto/EmailContentSuggestion';
import { EmailSendRequest } from './dto/EmailSendRequest';
import { EmailSendResponse } from './dto/EmailSendResponse';
import { EmailContentService } from './EmailContentService';

@Controller('email')
export class EmailController {
  constructor(
    private readonly mailerService: MailerService,
    private readonly emailContentService: EmailContentService,
    private readonly logger: Logger,
  ) {}

  @Post('send')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async send(
    @Body() request: EmailSendRequest,
  ): Promise<ResponseEntity<EmailSendResponse>> {
    const receipt = await this.mailerService.send(request.toOutgoingEmail());
    this.logger.info(
      `email sent: to=${receipt.to} messageId=${receipt.messageId}`,
    );

    return ResponseEntity.OK_WITH(
      EmailSendResponse.of(receipt),
      `Email sent to ${receipt.to}`,
    );
  }

  @Post('generate-content')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  generateContent(
    @Body() request: EmailContentRequest,
  ): ResponseEntity<EmailContentSuggestion> {
    return ResponseEntity.OK_WITH(this.emailContentService.suggest(request));
  }
}
