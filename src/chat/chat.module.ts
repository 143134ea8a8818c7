import { Module } from '@nestjs/common';
import { OrdersModule } from '../orders/orders.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { LlmClient } from './llm.client';

@Module({
  imports: [OrdersModule],
  controllers: [ChatController],
  providers: [ChatService, LlmClient],
})
export class ChatModule {}
