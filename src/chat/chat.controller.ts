import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Throttle, seconds } from '@nestjs/throttler';
import { ChatService } from './chat.service';
import { ChatMessageDto } from './dto';

@ApiTags('Support')
@Controller('chat')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 20, ttl: seconds(60) } })
  reply(@Body() dto: ChatMessageDto) {
    return this.chat.reply(dto.message);
  }
}
