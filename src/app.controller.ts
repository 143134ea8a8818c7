import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { Public } from './common/decorators/public.decorator';

@ApiTags('System')
@Public()
@Controller()
export class AppController {
  constructor(private readonly config: ConfigService) {}

  @Get()
  @ApiOkResponse({
    description: 'Liveness payload',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        message: { type: 'string', example: 'Helpy API running' },
      },
    },
  })
  root() {
    return { status: 'ok', message: 'Helpy API running' };
  }

  @Get('config/public')
  @ApiOkResponse({ description: 'Client-side configuration safe to expose' })
  publicConfig() {
    return { mapboxToken: this.config.get<string>('MAPBOX_TOKEN') ?? null };
  }
}
