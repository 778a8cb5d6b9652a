import { Module } from '@nestjs/common';
import { Configuration } from '@app/config/Configuration';
import { LoggerModule } from '@app/logger/LoggerModule';
import { EmailModule } from './email/EmailModule';
import { HealthModule } from './health/HealthModule';
import { LeadModule } from './lead/LeadModule';

@Module({
  imports: [
    LoggerModule,
    Configuration.getModule(),
    LeadModule,
    EmailModule,
    HealthModule,
  ],
})
export class ApiModule {}
