import { randomUUID } from 'crypto';
import { HttpStatus } from '@nestjs/common';
import { DomainError, ErrorCode } from '../src/common/errors';
import { BUSY_STATUS } from '../src/delivery-boys/delivery-boys.service';
import { SupabaseService } from '../src/supabase/supabase.service';
import {
  Filters,
  FunctionName,
  Functions,
  NewRow,
  SelectOptions,
  TableName,
  Tables,
} from '../src/supabase/supabase.types';

type Row = Record<string, unknown>;

const toRow = (value: object): Row => Object.fromEntries(Object.entries(value));

/** In-process stand-in for SupabaseService with the same call surface. */
export class InMemorySupabaseService
  implements Pick<SupabaseService, 'insert' | 'select' | 'selectOne' | 'update' | 'upsert' | 'rpc' | 'count' | 'ping'>
{
  private readonly tables = new Map<TableName, Row[]>();

  rows<K extends TableName>(table: K): Tables[K][] {
    return this.table(table) as unknown as Tables[K][];
  }

  reset() {
    this.tables.clear();
  }

  async insert<K extends TableName>(table: K, record: NewRow<K>): Promise<Tables[K]> {
    const row: Row = { id: randomUUID(), created_at: new Date().toISOString(), ...toRow(record) };
    this.table(table).push(row);
    return { ...row } as unknown as Tables[K];
  }

  async select<K extends TableName>(table: K, options: SelectOptions<K> = {}): Promise<Tables[K][]> {
    let rows = this.table(table).filter((row) => this.matches(row, options.filters));
    const orderBy = options.orderBy;
    if (orderBy) {
      const direction = orderBy.ascending === false ? -1 : 1;
      rows = [...rows].sort((a, b) => String(a[orderBy.column]).localeCompare(String(b[orderBy.column])) * direction);
    }
    if (options.limit !== undefined) rows = rows.slice(0, options.limit);
    return rows.map((row) => ({ ...row })) as unknown as Tables[K][];
  }

  async selectOne<K extends TableName>(table: K, filters: Filters<K>): Promise<Tables[K] | null> {
    const [row] = await this.select(table, { filters, limit: 1 });
    return row ?? null;
  }

  async update<K extends TableName>(table: K, where: Filters<K>, patch: NewRow<K>): Promise<Tables[K][]> {
    const updated: Row[] = [];
    for (const row of this.table(table)) {
      if (this.matches(row, where)) {
        Object.assign(row, patch);
        updated.push({ ...row });
      }
    }
    return updated as unknown as Tables[K][];
  }

  async upsert<K extends TableName>(table: K, record: NewRow<K>, onConflict: string): Promise<Tables[K]> {
    const incoming = toRow(record);
    const existing = this.table(table).find((row) => row[onConflict] === incoming[onConflict]);
    if (existing) {
      Object.assign(existing, incoming);
      return { ...existing } as unknown as Tables[K];
    }
    this.table(table).push(incoming);
    return { ...incoming } as unknown as Tables[K];
  }

  async rpc<F extends FunctionName>(fn: F, args: Functions[F]['args']): Promise<Functions[F]['returns']> {
    const deliveryBoy = this.table('delivery_boys').find((row) => row.id === args.p_delivery_boy_id);
    if (!deliveryBoy) {
      throw new DomainError(ErrorCode.DATA_STORE_ERROR, 'delivery boy not found', HttpStatus.INTERNAL_SERVER_ERROR, {
        storeCode: 'P0002',
      });
    }
    deliveryBoy.status = BUSY_STATUS;
    const assignment = await this.insert('order_assignments', {
      order_id: args.p_order_id,
      delivery_boy_id: args.p_delivery_boy_id,
    });
    return assignment as Functions[F]['returns'];
  }

  async count<K extends TableName>(table: K, filters?: Filters<K>): Promise<number> {
    return this.table(table).filter((row) => this.matches(row, filters)).length;
  }

  async ping(): Promise<void> {}

  private table(name: TableName): Row[] {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = [];
      this.tables.set(name, rows);
    }
    return rows;
  }

  private matches(row: Row, filters?: object) {
    if (!filters) return true;
    return Object.entries(filters).every(([column, value]) => value === undefined || row[column] === value);
  }
}
