import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';
import { DEFAULT_RETRY_CONFIG, RETRY_CONFIG, RetryConfig } from './config/RetryConfig';
import { RetryExecutor } from './RetryExecutor';
import { Sleeper, TimerSleeper } from './sleeper/Sleeper';

@Module({
  providers: [
    {
      provide: RETRY_CONFIG,
      useFactory: (configService: ConfigService<Environment>): RetryConfig => ({
        ...DEFAULT_RETRY_CONFIG,
        ...configService.get('retry', { infer: true }),
      }),
      inject: [ConfigService],
    },
    {
      provide: Sleeper,
      useClass: TimerSleeper,
    },
    RetryExecutor,
  ],
  exports: [RetryExecutor, RETRY_CONFIG],
})
export class ResilienceModule {}
