import { IsInt, Min } from 'class-validator';

export class RetryEnvironment {
  @IsInt()
  @Min(1)
  maxAttempts!: number;

  @IsInt()
  @Min(0)
  initialDelayMs!: number;

  @IsInt()
  @Min(0)
  maxDelayMs!: number;
}
