import { Injectable } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { BUSY_STATUS } from '../delivery-boys/delivery-boys.service';
import { OPEN_TICKET_STATUS } from '../tickets/tickets.service';

export interface AnalyticsSnapshot {
  orders: number;
  tickets: number;
  openTickets: number;
  deliveryBoys: number;
  busyDeliveryBoys: number;
  users: number;
  generatedAt: string;
}

@Injectable()
export class AnalyticsService {
  constructor(private readonly supabase: SupabaseService) {}

  async snapshot(): Promise<AnalyticsSnapshot> {
    const [orders, tickets, openTickets, deliveryBoys, busyDeliveryBoys, users] = await Promise.all([
      this.supabase.count('orders'),
      this.supabase.count('tickets'),
      this.supabase.count('tickets', { status: OPEN_TICKET_STATUS }),
      this.supabase.count('delivery_boys'),
      this.supabase.count('delivery_boys', { status: BUSY_STATUS }),
      this.supabase.count('users'),
    ]);
    return {
      orders,
      tickets,
      openTickets,
      deliveryBoys,
      busyDeliveryBoys,
      users,
      generatedAt: new Date().toISOString(),
    };
  }
}
