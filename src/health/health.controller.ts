import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckError, HealthCheckService, HealthIndicatorResult } from '@nestjs/terminus';
import { Public } from '../common/decorators/public.decorator';
import { SupabaseService } from '../supabase/supabase.service';

@ApiTags('System')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly supabase: SupabaseService,
  ) {}

  private async supabaseCheck(): Promise<HealthIndicatorResult> {
    try {
      await this.supabase.ping();
    } catch (err) {
      throw new HealthCheckError('Supabase check failed', {
        supabase: { status: 'down', message: (err as Error).message },
      });
    }
    return { supabase: { status: 'up' } };
  }

  @Public()
  @Get()
  @HealthCheck()
  check() {
    return this.health.check([() => this.supabaseCheck()]);
  }
}
