import { Injectable, Logger } from '@nestjs/common';
import { OrdersService } from '../orders/orders.service';
import { OrderRow } from '../supabase/supabase.types';
import { LlmClient } from './llm.client';

export type ChatRoute = { kind: 'order_lookup'; trackingId: string } | { kind: 'llm' };

export type ChatReply =
  | { source: 'order_lookup'; reply: string; order: OrderRow | null }
  | { source: 'llm'; reply: string };

/**
 * Any digit in the message means an order lookup; the digits are joined in
 * order (not parsed as one number) and used as the tracking ID.
 */
export function routeMessage(message: string): ChatRoute {
  const digits = message.replace(/[^0-9]/g, '');
  return digits ? { kind: 'order_lookup', trackingId: digits } : { kind: 'llm' };
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly orders: OrdersService,
    private readonly llm: LlmClient,
  ) {}

  async reply(message: string): Promise<ChatReply> {
    const route = routeMessage(message);
    if (route.kind === 'llm') {
      return { source: 'llm', reply: await this.llm.complete(message) };
    }

    const order = await this.orders.findByTrackingId(route.trackingId);
    this.logger.debug({ msg: 'Chat order lookup', trackingId: route.trackingId, found: Boolean(order) });
    if (!order) {
      return {
        source: 'order_lookup',
        reply: `We couldn't find an order with tracking ID ${route.trackingId}. Please check the number or rephrase your question.`,
        order: null,
      };
    }
    return {
      source: 'order_lookup',
      reply: `Your order ${order.tracking_id} is currently ${order.status}.`,
      order,
    };
  }
}
