import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { TicketRow } from '../supabase/supabase.types';
import { WebhookNotifierService } from '../notifications/webhook-notifier.service';
import { CreateTicketDto } from './dto';

export const OPEN_TICKET_STATUS = 'open';

@Injectable()
export class TicketsService {
  private readonly logger = new Logger(TicketsService.name);

  constructor(
    private readonly supabase: SupabaseService,
    private readonly notifier: WebhookNotifierService,
  ) {}

  async create(dto: CreateTicketDto): Promise<TicketRow> {
    const ticket = await this.supabase.insert('tickets', {
      order_id: dto.order_id,
      issue: dto.issue,
      status: OPEN_TICKET_STATUS,
    });
    this.logger.log({ msg: 'Ticket created', ticketId: ticket.id, orderId: ticket.order_id });
    await this.notifier.notifyTicketCreated(ticket);
    return ticket;
  }

  list(): Promise<TicketRow[]> {
    return this.supabase.select('tickets');
  }
}
