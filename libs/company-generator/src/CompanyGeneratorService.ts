import { Injectable } from '@nestjs/common';
import { OpenAI } from 'openai';
import { GeminiEnvironment } from '@app/config/env/GeminiEnvironment';
import { Logger } from '@app/logger/Logger';
import { toError } from '@app/web-common/util/toError';
import { CompanyPromptRequest } from './dto/CompanyPromptRequest';
import { CompletionResponse } from './dto/CompletionResponse';
import { GeneratorNotConfiguredError } from './error/GeneratorNotConfiguredError';
import { CompanyPayload, CompanyQuery } from './model/CompanyLead';

@Injectable()
export class CompanyGeneratorService {
  constructor(
    private readonly openAI: OpenAI,
    private readonly gemini: GeminiEnvironment,
    private readonly logger: Logger,
  ) {}

  assertConfigured(): void {
    if (!this.gemini.isConfigured) {
      throw new GeneratorNotConfiguredError();
    }
  }

  /**
   * One completion call, no retries. Errors are rethrown as they came from
   * the SDK so the caller can classify them.
   */
  async generate(
    query: CompanyQuery,
    signal?: AbortSignal,
  ): Promise<CompanyPayload> {
    this.assertConfigured();

    const request = CompanyPromptRequest.from(query, this.gemini.model);

    try {
      const completion = await this.openAI.chat.completions.create(
        request.toBody,
        { signal },
      );
      const payload = new CompletionResponse(
        completion.choices[0]?.message.content ?? null,
      ).toPayload();

      this.logger.debug(
        `generated ${payload.companies.length}/${query.count} companies: query=${JSON.stringify(query)}`,
      );

      return payload;
    } catch (e) {
      const error = toError(e);
      this.logger.warn(
        `company generation error: query=${JSON.stringify(query)} message=${error.message}`,
        error,
      );

      throw error;
    }
  }
}
