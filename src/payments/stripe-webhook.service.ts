import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { DomainError, ErrorCode } from '../common/errors';
import { OrdersService } from '../orders/orders.service';
import { STRIPE_CLIENT } from './stripe.client';

export const STRIPE_SIGNATURE_TOLERANCE_SECONDS = 300;
export const PAID_STATUS = 'paid';
export const PAYMENT_FAILED_STATUS = 'payment_failed';

export interface StripeWebhookResult {
  received: true;
  orderId?: string;
  status?: string;
}

interface OrderPaymentUpdate {
  orderId?: string;
  status: string;
}

function isEventShape(value: unknown): value is Stripe.Event {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'type' in value &&
    typeof value.type === 'string' &&
    'data' in value &&
    typeof value.data === 'object' &&
    value.data !== null &&
    'object' in value.data &&
    typeof value.data.object === 'object' &&
    value.data.object !== null
  );
}

@Injectable()
export class StripeWebhookService {
  private readonly logger = new Logger(StripeWebhookService.name);
  private readonly webhookSecret: string;

  constructor(
    @Inject(STRIPE_CLIENT) private readonly stripe: Stripe,
    private readonly orders: OrdersService,
    config: ConfigService,
  ) {
    this.webhookSecret = config.get<string>('STRIPE_WEBHOOK_SECRET') ?? '';
  }

  /** Verifies the `stripe-signature` header when a webhook secret is configured. */
  constructEvent(rawBody: string, signature: string | undefined): Stripe.Event {
    if (!this.webhookSecret) {
      this.logger.warn('STRIPE_WEBHOOK_SECRET is not configured; accepting unsigned Stripe events');
      return this.parseUnsigned(rawBody);
    }
    if (!signature) {
      throw this.signatureError('No stripe-signature header found');
    }
    try {
      return this.stripe.webhooks.constructEvent(
        rawBody,
        signature,
        this.webhookSecret,
        STRIPE_SIGNATURE_TOLERANCE_SECONDS,
      );
    } catch (err) {
      if (err instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw this.signatureError(err.message);
      }
      throw this.eventError((err as Error).message);
    }
  }

  async handle(event: Stripe.Event): Promise<StripeWebhookResult> {
    const update = this.paymentUpdate(event);
    if (!update?.orderId) {
      this.logger.debug({ msg: 'Stripe event ignored', eventId: event.id, type: event.type });
      return { received: true };
    }
    const { orderId, status } = update;

    try {
      await this.orders.updateStatus(orderId, status);
    } catch (err) {
      // unknown orders are acknowledged so Stripe stops retrying
      if (err instanceof DomainError && err.code === ErrorCode.ORDER_NOT_FOUND) {
        this.logger.warn({ msg: 'Stripe event for unknown order', eventId: event.id, orderId });
        return { received: true };
      }
      throw err;
    }
    this.logger.log({ msg: 'Order payment status updated', eventId: event.id, orderId, status });
    return { received: true, orderId, status };
  }

  private paymentUpdate(event: Stripe.Event): OrderPaymentUpdate | null {
    switch (event.type) {
      case 'payment_intent.succeeded':
        return { orderId: event.data.object.metadata?.order_id, status: PAID_STATUS };
      case 'checkout.session.completed':
        return { orderId: event.data.object.metadata?.order_id, status: PAID_STATUS };
      case 'payment_intent.payment_failed':
        return { orderId: event.data.object.metadata?.order_id, status: PAYMENT_FAILED_STATUS };
      default:
        return null;
    }
  }

  private parseUnsigned(rawBody: string): Stripe.Event {
    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (err) {
      throw this.eventError((err as Error).message);
    }
    if (!isEventShape(payload)) {
      throw this.eventError('Expected { id, type, data: { object } }');
    }
    return payload;
  }

  private signatureError(reason: string) {
    return new DomainError(ErrorCode.STRIPE_SIGNATURE_INVALID, 'Invalid Stripe signature', HttpStatus.BAD_REQUEST, {
      reason,
    });
  }

  private eventError(reason: string) {
    return new DomainError(ErrorCode.STRIPE_EVENT_INVALID, 'Malformed Stripe event', HttpStatus.BAD_REQUEST, {
      reason,
    });
  }
}
