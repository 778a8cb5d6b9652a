import { Module } from '@nestjs/common';
import { LeadJobModule } from '@app/lead-job/LeadJobModule';
import { LeadController } from './LeadController';

@Module({
  imports: [LeadJobModule],
  controllers: [LeadController],
})
export class LeadModule {}
