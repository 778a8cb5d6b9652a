import { IsNotEmpty, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ServerEnvironment } from '@app/config/env/ServerEnvironment';
import { GeminiEnvironment } from '@app/config/env/GeminiEnvironment';
import { RetryEnvironment } from '@app/config/env/RetryEnvironment';
import { ScraperEnvironment } from '@app/config/env/ScraperEnvironment';
import { MailerEnvironment } from './MailerEnvironment';

export class Environment {
  @ValidateNested()
  @IsNotEmpty()
  @Type(() => ServerEnvironment)
  server!: ServerEnvironment;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => GeminiEnvironment)
  gemini!: GeminiEnvironment;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => RetryEnvironment)
  retry!: RetryEnvironment;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => ScraperEnvironment)
  scraper!: ScraperEnvironment;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => MailerEnvironment)
  mailer!: MailerEnvironment;
}
