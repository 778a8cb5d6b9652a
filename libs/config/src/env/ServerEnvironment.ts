import { IsInt, Max, Min } from 'class-validator';

export class ServerEnvironment {
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;
}
