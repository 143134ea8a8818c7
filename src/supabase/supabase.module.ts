import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from '@supabase/supabase-js';
import { SUPABASE_CLIENT, SupabaseService } from './supabase.service';

@Global()
@Module({
  providers: [
    {
      provide: SUPABASE_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createClient(config.getOrThrow<string>('SUPABASE_URL'), config.getOrThrow<string>('SUPABASE_KEY'), {
          // server-side service-role client: no session to keep
          auth: { persistSession: false, autoRefreshToken: false },
        }),
    },
    SupabaseService,
  ],
  exports: [SupabaseService],
})
export class SupabaseModule {}
