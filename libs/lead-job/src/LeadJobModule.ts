import { Module } from '@nestjs/common';
import { CompanyGeneratorModule } from '@app/company-generator/CompanyGeneratorModule';
import { CompanyGeneratorService } from '@app/company-generator/CompanyGeneratorService';
import { ResilienceModule } from '@app/resilience/ResilienceModule';
import { CompanyScraperService } from '@app/scraper/CompanyScraperService';
import { ScraperModule } from '@app/scraper/ScraperModule';
import { Clock, SystemClock } from './clock/Clock';
import { LeadEnhancer } from './collaborator/LeadEnhancer';
import { LeadGenerator } from './collaborator/LeadGenerator';
import { LeadJobOrchestrator } from './LeadJobOrchestrator';
import { LeadResultProjector } from './projector/LeadResultProjector';
import { InMemoryJobStore } from './store/InMemoryJobStore';
import { JobStore } from './store/JobStore';

@Module({
  imports: [ResilienceModule, CompanyGeneratorModule, ScraperModule],
  providers: [
    {
      provide: Clock,
      useClass: SystemClock,
    },
    {
      provide: JobStore,
      useClass: InMemoryJobStore,
    },
    {
      provide: LeadGenerator,
      useFactory: (service: CompanyGeneratorService): LeadGenerator => service,
      inject: [CompanyGeneratorService],
    },
    {
      provide: LeadEnhancer,
      useFactory: (service: CompanyScraperService): LeadEnhancer => service,
      inject: [CompanyScraperService],
    },
    LeadResultProjector,
    LeadJobOrchestrator,
  ],
  exports: [LeadJobOrchestrator],
})
export class LeadJobModule {}
