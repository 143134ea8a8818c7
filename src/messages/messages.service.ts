import { Injectable } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { MessageRow } from '../supabase/supabase.types';
import { CreateMessageDto } from './dto';

@Injectable()
export class MessagesService {
  constructor(private readonly supabase: SupabaseService) {}

  create(dto: CreateMessageDto): Promise<MessageRow> {
    return this.supabase.insert('messages', { order_id: dto.order_id, sender: dto.sender, content: dto.content });
  }

  list(): Promise<MessageRow[]> {
    return this.supabase.select('messages', { orderBy: { column: 'created_at', ascending: true } });
  }

  listForOrder(orderId: string): Promise<MessageRow[]> {
    return this.supabase.select('messages', {
      filters: { order_id: orderId },
      orderBy: { column: 'created_at', ascending: true },
    });
  }
}
