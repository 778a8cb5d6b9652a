import { Transform } from 'class-transformer';
import {
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { EmailPurpose, EmailTone } from './EmailPurpose';

export class EmailContentRequest {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  companyName!: string;

  @IsOptional()
  @IsEnum(EmailPurpose)
  purpose: EmailPurpose = EmailPurpose.INTRODUCTION;

  @IsOptional()
  @IsEnum(EmailTone)
  tone: EmailTone = EmailTone.PROFESSIONAL;
}
