import {
  IsBase64,
  IsMimeType,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { EmailAttachment } from '@app/mailer/model/EmailAttachment';

export class EmailAttachmentRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  filename!: string;

  @IsBase64()
  content!: string;

  @IsOptional()
  @IsMimeType()
  mimetype = 'application/octet-stream';

  toAttachment(): EmailAttachment {
    return {
      filename: this.filename,
      content: Buffer.from(this.content, 'base64'),
      contentType: this.mimetype,
    };
  }
}
