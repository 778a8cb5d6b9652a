import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';
import { ScraperEnvironment } from '@app/config/env/ScraperEnvironment';
import { WebClientModule } from '@app/web-client/WebClientModule';
import { CompanyScraperService } from './CompanyScraperService';

@Module({
  imports: [WebClientModule],
  providers: [
    CompanyScraperService,
    {
      provide: ScraperEnvironment,
      useFactory: (configService: ConfigService<Environment>) => {
        const scraper = configService.get('scraper', { infer: true });

        if (!scraper) {
          throw new Error('scraper configuration is missing');
        }

        return scraper;
      },
      inject: [ConfigService],
    },
  ],
  exports: [CompanyScraperService],
})
export class ScraperModule {}
