import { Module } from '@nestjs/common';
import { EscalationsController } from './escalations.controller';
import { WebhookNotifierService } from './webhook-notifier.service';

@Module({
  controllers: [EscalationsController],
  providers: [WebhookNotifierService],
  exports: [WebhookNotifierService],
})
export class NotificationsModule {}
