import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { WebhookNotifierService } from './webhook-notifier.service';
import { EscalateDto } from './dto';

@ApiTags('Support')
@Controller('escalate')
export class EscalationsController {
  constructor(private readonly notifier: WebhookNotifierService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async escalate(@Body() dto: EscalateDto) {
    await this.notifier.escalate(dto);
    return { escalated: true };
  }
}
