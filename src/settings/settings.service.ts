import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../supabase/supabase.service';
import { Json, SettingRow } from '../supabase/supabase.types';

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(private readonly supabase: SupabaseService) {}

  async getAll(): Promise<Record<string, Json>> {
    const rows = await this.supabase.select('settings');
    const out: Record<string, Json> = {};
    for (const row of rows) {
      out[row.key] = row.value;
    }
    return out;
  }

  /** Single upsert on the key column: concurrent writers resolve to last-write-wins. */
  async set(key: string, value: Json): Promise<SettingRow> {
    const row = await this.supabase.upsert(
      'settings',
      { key, value, updated_at: new Date().toISOString() },
      'key',
    );
    this.logger.log({ msg: 'Setting updated', key });
    return row;
  }
}
