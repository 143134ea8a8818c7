import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { OrderRow } from '../supabase/supabase.types';
import { DomainError, ErrorCode } from '../common/errors';
import { CreateOrderDto } from './dto';
import { generateTrackingId } from './tracking-id.util';

export const DEFAULT_ORDER_STATUS = 'pending';

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(private readonly supabase: SupabaseService) {}

  async create(dto: CreateOrderDto): Promise<OrderRow> {
    const order = await this.supabase.insert('orders', {
      customer_id: dto.customer_id,
      total_amount: dto.total_amount,
      tracking_id: dto.tracking_id || generateTrackingId(),
      status: dto.status ?? DEFAULT_ORDER_STATUS,
      shop_id: dto.shop_id,
      delivery_address: dto.delivery_address,
    });
    this.logger.log({ msg: 'Order created', orderId: order.id, trackingId: order.tracking_id });
    return order;
  }

  findByTrackingId(trackingId: string): Promise<OrderRow | null> {
    return this.supabase.selectOne('orders', { tracking_id: trackingId });
  }

  async getByTrackingId(trackingId: string): Promise<OrderRow> {
    const order = await this.findByTrackingId(trackingId);
    if (!order) {
      throw new DomainError(ErrorCode.ORDER_NOT_FOUND, 'Order not found', HttpStatus.NOT_FOUND);
    }
    return order;
  }

  async updateStatus(orderId: string, status: string): Promise<OrderRow> {
    const [updated] = await this.supabase.update('orders', { id: orderId }, { status });
    if (!updated) {
      throw new DomainError(ErrorCode.ORDER_NOT_FOUND, 'Order not found', HttpStatus.NOT_FOUND);
    }
    this.logger.log({ msg: 'Order status updated', orderId, status });
    return updated;
  }
}
