import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { OutgoingEmail } from '@app/mailer/model/OutgoingEmail';
import { EmailAttachmentRequest } from './EmailAttachmentRequest';

export const MAX_ATTACHMENTS = 10;

export class EmailSendRequest {
  @IsEmail()
  toEmail!: string;

  @IsEmail()
  fromEmail!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  subject!: string;

  @IsString()
  @IsNotEmpty()
  body!: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(MAX_ATTACHMENTS)
  @ValidateNested({ each: true })
  @Type(() => EmailAttachmentRequest)
  attachments?: EmailAttachmentRequest[];

  toOutgoingEmail(): OutgoingEmail {
    return OutgoingEmail.copyingSender({
      from: this.fromEmail,
      to: this.toEmail,
      subject: this.subject,
      html: this.body,
      attachments: (this.attachments ?? []).map((attachment) =>
        attachment.toAttachment(),
      ),
    });
  }
}
