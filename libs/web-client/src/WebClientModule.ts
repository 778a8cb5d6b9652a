import { Module } from '@nestjs/common';
import { FetchClientService } from './creator/FetchClientService';
import { WebClientService } from './creator/WebClientService';

@Module({
  providers: [
    {
      provide: WebClientService,
      useClass: FetchClientService,
    },
  ],
  exports: [WebClientService],
})
export class WebClientModule {}
