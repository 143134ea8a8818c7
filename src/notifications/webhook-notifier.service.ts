import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { RequestContextService } from '../common/context/request-context.service';
import { DomainError, ErrorCode } from '../common/errors';
import { TicketRow } from '../supabase/supabase.types';
import { EscalateDto } from './dto';
import { signTimestampedPayload } from '../common/utils/hmac.util';

export type WebhookEvent = 'ticket.created' | 'issue.escalated';

@Injectable()
export class WebhookNotifierService {
  private readonly logger = new Logger(WebhookNotifierService.name);
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly signingSecret: string;

  constructor(
    config: ConfigService,
    private readonly context: RequestContextService,
  ) {
    this.webhookUrl = config.get<string>('ZAPIER_WEBHOOK') ?? '';
    this.timeoutMs = Number(config.get('WEBHOOK_TIMEOUT_MS') ?? 5000);
    this.signingSecret = config.get<string>('WEBHOOK_SIGNING_SECRET') ?? '';
  }

  /** Best-effort: a missing or failing webhook never reaches the caller. */
  async notifyTicketCreated(ticket: TicketRow): Promise<boolean> {
    if (!this.webhookUrl) {
      this.logger.debug({ msg: 'Ticket webhook not configured; skipping', ticketId: ticket.id });
      return false;
    }
    try {
      await this.deliver('ticket.created', { ticket });
      return true;
    } catch (err) {
      this.logger.warn({ msg: 'Ticket webhook failed', ticketId: ticket.id, error: (err as Error).message });
      return false;
    }
  }

  async escalate(escalation: EscalateDto): Promise<void> {
    if (!this.webhookUrl) {
      throw new DomainError(
        ErrorCode.WEBHOOK_NOT_CONFIGURED,
        'Escalation webhook is not configured',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
    try {
      await this.deliver('issue.escalated', { escalation });
    } catch (err) {
      const message = (err as Error).message;
      this.logger.error({ msg: 'Escalation webhook failed', orderId: escalation.order_id, error: message });
      throw new DomainError(
        ErrorCode.WEBHOOK_DELIVERY_FAILED,
        `Escalation webhook failed: ${message}`,
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  private async deliver(event: WebhookEvent, data: Record<string, unknown>) {
    const timestamp = Math.floor(Date.now() / 1000);
    const body = JSON.stringify({
      event,
      occurred_at: new Date(timestamp * 1000).toISOString(),
      correlation_id: this.context.correlationId() ?? null,
      ...data,
    });
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'x-helpy-event': event,
    };
    if (this.signingSecret) {
      headers['x-helpy-timestamp'] = String(timestamp);
      headers['x-helpy-signature'] = signTimestampedPayload(this.signingSecret, timestamp, body);
    }

    const response = await axios.post(this.webhookUrl, body, {
      headers,
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Webhook responded with status ${response.status}`);
    }
    this.logger.log({ msg: 'Webhook delivered', event, status: response.status });
  }
}
