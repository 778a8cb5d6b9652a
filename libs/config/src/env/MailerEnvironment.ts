import { IsNotEmpty, IsString } from 'class-validator';

export class MailerEnvironment {
  @IsNotEmpty()
  @IsString()
  region!: string;
}
