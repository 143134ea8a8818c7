import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { DomainError, ErrorCode } from '../common/errors';
import {
  Filters,
  FilterValue,
  FunctionName,
  Functions,
  NewRow,
  SelectOptions,
  TableName,
  Tables,
} from './supabase.types';

export const SUPABASE_CLIENT = Symbol('SUPABASE_CLIENT');

// rows leave the typed layer as plain column maps
function toRecord(row: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(row));
}

/**
 * Thin adapter over the Supabase client. Every call is a single round-trip;
 * store errors surface as DATA_STORE_ERROR with the store's own message.
 */
@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);

  constructor(@Inject(SUPABASE_CLIENT) private readonly client: SupabaseClient) {}

  async insert<K extends TableName>(table: K, record: NewRow<K>): Promise<Tables[K]> {
    const { data, error } = await this.client.from(table).insert(toRecord(record)).select().single();
    if (error) throw this.toError('insert', table, error);
    return data;
  }

  async select<K extends TableName>(table: K, options: SelectOptions<K> = {}): Promise<Tables[K][]> {
    let query = this.client.from(table).select('*');
    for (const [column, value] of this.entries(options.filters)) {
      query = query.eq(column, value);
    }
    if (options.orderBy) {
      query = query.order(options.orderBy.column, { ascending: options.orderBy.ascending ?? true });
    }
    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }
    const { data, error } = await query;
    if (error) throw this.toError('select', table, error);
    return data ?? [];
  }

  async selectOne<K extends TableName>(table: K, filters: Filters<K>): Promise<Tables[K] | null> {
    const rows = await this.select(table, { filters, limit: 1 });
    return rows[0] ?? null;
  }

  async update<K extends TableName>(table: K, where: Filters<K>, patch: NewRow<K>): Promise<Tables[K][]> {
    let query = this.client.from(table).update(toRecord(patch));
    for (const [column, value] of this.entries(where)) {
      query = query.eq(column, value);
    }
    const { data, error } = await query.select();
    if (error) throw this.toError('update', table, error);
    return data ?? [];
  }

  async upsert<K extends TableName>(table: K, record: NewRow<K>, onConflict: string): Promise<Tables[K]> {
    const { data, error } = await this.client
      .from(table)
      .upsert(toRecord(record), { onConflict })
      .select()
      .single();
    if (error) throw this.toError('upsert', table, error);
    return data;
  }

  async rpc<F extends FunctionName>(fn: F, args: Functions[F]['args']): Promise<Functions[F]['returns']> {
    const { data, error } = await this.client.rpc(fn, args);
    if (error) throw this.toError('rpc', fn, error);
    return data;
  }

  async count<K extends TableName>(table: K, filters?: Filters<K>): Promise<number> {
    let query = this.client.from(table).select('*', { count: 'exact', head: true });
    for (const [column, value] of this.entries(filters)) {
      query = query.eq(column, value);
    }
    const { count, error } = await query;
    if (error) throw this.toError('count', table, error);
    return count ?? 0;
  }

  async ping(): Promise<void> {
    const { error } = await this.client.from('settings').select('key', { head: true }).limit(1);
    if (error) throw this.toError('ping', 'settings', error);
  }

  private entries<K extends TableName>(filters?: Filters<K>): Array<[string, FilterValue]> {
    if (!filters) return [];
    const out: Array<[string, FilterValue]> = [];
    for (const [column, value] of Object.entries(filters)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        out.push([column, value]);
      }
    }
    return out;
  }

  private toError(operation: string, target: string, error: PostgrestError) {
    this.logger.error({ msg: `Supabase ${operation} error`, target, code: error.code, error: error.message });
    return new DomainError(ErrorCode.DATA_STORE_ERROR, error.message, HttpStatus.INTERNAL_SERVER_ERROR, {
      storeCode: error.code,
    });
  }
}
