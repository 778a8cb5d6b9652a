import { Module } from '@nestjs/common';
import { MailerModule } from '@app/mailer/MailerModule';
import { EmailContentService } from './EmailContentService';
import { EmailController } from './EmailController';

@Module({
  imports: [MailerModule],
  controllers: [EmailController],
  providers: [EmailContentService],
})
export class EmailModule {}
