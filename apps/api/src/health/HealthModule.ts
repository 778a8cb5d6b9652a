import { Module } from '@nestjs/common';
import { CompanyGeneratorModule } from '@app/company-generator/CompanyGeneratorModule';
import { HealthController } from './HealthController';

@Module({
  imports: [CompanyGeneratorModule],
  controllers: [HealthController],
})
export class HealthModule {}
