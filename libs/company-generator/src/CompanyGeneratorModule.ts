import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAI } from 'openai';
import { Environment } from '@app/config/env/Environment';
import { GeminiEnvironment } from '@app/config/env/GeminiEnvironment';
import { CompanyGeneratorService } from './CompanyGeneratorService';

@Module({
  providers: [
    CompanyGeneratorService,
    {
      provide: GeminiEnvironment,
      useFactory: (configService: ConfigService<Environment>) => {
        const gemini = configService.get('gemini', { infer: true });

        if (!gemini) {
          throw new Error('gemini configuration is missing');
        }

        return gemini;
      },
      inject: [ConfigService],
    },
    {
      provide: OpenAI,
      useFactory: (gemini: GeminiEnvironment) =>
        new OpenAI({
          apiKey: gemini.apiKey,
          baseURL: gemini.baseUrl,
          // retries belong to RetryExecutor
          maxRetries: 0,
        }),
      inject: [GeminiEnvironment],
    },
  ],
  exports: [CompanyGeneratorService, GeminiEnvironment],
})
export class CompanyGeneratorModule {}
