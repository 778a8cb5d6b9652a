import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SESClient } from '@aws-sdk/client-ses';
import { Environment } from '@app/config/env/Environment';
import { MailerService } from './MailerService';
import { SESClientService } from './ses/SESClientService';

@Module({
  providers: [
    MailerService,
    SESClientService,
    {
      provide: SESClient,
      useFactory: (configService: ConfigService<Environment>) =>
        new SESClient({
          region: configService.get('mailer.region', { infer: true }),
        }),
      inject: [ConfigService],
    },
  ],
  exports: [MailerService],
})
export class MailerModule {}
