import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

export class ScraperEnvironment {
  @IsInt()
  @Min(1)
  timeoutMs!: number;

  @IsInt()
  @Min(1)
  concurrency!: number;

  @IsNotEmpty()
  @IsString()
  userAgent!: string;
}
