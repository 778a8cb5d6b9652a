import { Controller, Get } from '@nestjs/common';
import { GeminiEnvironment } from '@app/config/env/GeminiEnvironment';
import { HealthResponse } from './dto/HealthResponse';

export const API_VERSION = '1.0.0';

@Controller('health')
export class HealthController {
  constructor(private readonly gemini: GeminiEnvironment) {}

  @Get()
  check(): HealthResponse {
    return new HealthResponse(
      new Date().toISOString(),
      API_VERSION,
      this.gemini.isConfigured,
    );
  }
}
