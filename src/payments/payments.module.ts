import { Module } from '@nestjs/common';
import { OrdersModule } from '../orders/orders.module';
import { stripeClientProvider } from './stripe.client';
import { StripeWebhookController } from './stripe-webhook.controller';
import { StripeWebhookService } from './stripe-webhook.service';

@Module({
  imports: [OrdersModule],
  controllers: [StripeWebhookController],
  providers: [stripeClientProvider, StripeWebhookService],
})
export class PaymentsModule {}
