import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { DeliveryBoyRow, OrderAssignmentRow } from '../supabase/supabase.types';
import { DomainError, ErrorCode } from '../common/errors';
import { AssignOrderDto, CreateDeliveryBoyDto } from './dto';

export const AVAILABLE_STATUS = 'available';
export const BUSY_STATUS = 'busy';

// raised by assign_order() when the delivery boy row is missing
const NO_DATA_FOUND = 'P0002';

@Injectable()
export class DeliveryBoysService {
  private readonly logger = new Logger(DeliveryBoysService.name);

  constructor(private readonly supabase: SupabaseService) {}

  create(dto: CreateDeliveryBoyDto): Promise<DeliveryBoyRow> {
    return this.supabase.insert('delivery_boys', {
      name: dto.name,
      phone: dto.phone,
      status: dto.status ?? AVAILABLE_STATUS,
    });
  }

  list(): Promise<DeliveryBoyRow[]> {
    return this.supabase.select('delivery_boys');
  }

  /**
   * Records the assignment and marks the delivery boy busy. Both writes run
   * inside the assign_order() database function, so neither lands alone.
   */
  async assign(dto: AssignOrderDto): Promise<OrderAssignmentRow> {
    try {
      const assignment = await this.supabase.rpc('assign_order', {
        p_order_id: dto.order_id,
        p_delivery_boy_id: dto.delivery_boy_id,
      });
      this.logger.log({
        msg: 'Order assigned',
        orderId: dto.order_id,
        deliveryBoyId: dto.delivery_boy_id,
        assignmentId: assignment.id,
      });
      return assignment;
    } catch (error) {
      if (error instanceof DomainError && error.details?.storeCode === NO_DATA_FOUND) {
        throw new DomainError(ErrorCode.DELIVERY_BOY_NOT_FOUND, 'Delivery boy not found', HttpStatus.NOT_FOUND);
      }
      throw error;
    }
  }

  assignmentsForOrder(orderId: string): Promise<OrderAssignmentRow[]> {
    return this.supabase.select('order_assignments', { filters: { order_id: orderId } });
  }
}
