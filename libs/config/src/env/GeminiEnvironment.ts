import { IsNotEmpty, IsString } from 'class-validator';

export class GeminiEnvironment {
  @IsString()
  apiKey!: string;

  @IsNotEmpty()
  @IsString()
  baseUrl!: string;

  @IsNotEmpty()
  @IsString()
  model!: string;

  get isConfigured(): boolean {
    return this.apiKey.trim().length > 0;
  }
}
