import { Global, Module } from '@nestjs/common';
import { createLogger } from 'winston';
import { Logger } from '@app/logger/Logger';
import { getWinstonLoggerOption } from '@app/logger/getWinstonLoggerOption';

@Global()
@Module({
  providers: [
    {
      provide: Logger,
      useFactory: (): Logger => createLogger(getWinstonLoggerOption()),
    },
  ],
  exports: [Logger],
})
export class LoggerModule {}
