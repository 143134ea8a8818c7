import { SupabaseClient } from '@supabase/supabase-js';
import { DomainError, ErrorCode } from '../common/errors';
import { SupabaseService } from './supabase.service';

type Result = { data?: unknown; error?: unknown; count?: number | null };

class FakeQuery {
  readonly calls: Array<[string, unknown[]]> = [];

  constructor(private readonly result: Result) {}

  private record(name: string, args: unknown[]) {
    this.calls.push([name, args]);
    return this;
  }

  select(...args: unknown[]) {
    return this.record('select', args);
  }
  insert(...args: unknown[]) {
    return this.record('insert', args);
  }
  update(...args: unknown[]) {
    return this.record('update', args);
  }
  upsert(...args: unknown[]) {
    return this.record('upsert', args);
  }
  eq(...args: unknown[]) {
    return this.record('eq', args);
  }
  order(...args: unknown[]) {
    return this.record('order', args);
  }
  limit(...args: unknown[]) {
    return this.record('limit', args);
  }
  single() {
    return this.record('single', []);
  }

  then<T>(resolve: (value: Result) => T, reject?: (reason: unknown) => T) {
    return Promise.resolve({ data: null, error: null, ...this.result }).then(resolve, reject);
  }
}

describe('SupabaseService', () => {
  const build = (result: Result) => {
    const query = new FakeQuery(result);
    const client = {
      from: jest.fn().mockReturnValue(query),
      rpc: jest.fn().mockReturnValue(query),
    };
    const service = new SupabaseService(client as unknown as SupabaseClient);
    return { service, client, query };
  };

  it('inserts a record and returns the stored row', async () => {
    const row = { id: 'u1', name: 'Ada', email: 'ada@example.com' };
    const { service, client, query } = build({ data: row });

    await expect(service.insert('users', { name: 'Ada', email: 'ada@example.com' })).resolves.toEqual(row);
    expect(client.from).toHaveBeenCalledWith('users');
    expect(query.calls).toEqual([
      ['insert', [{ name: 'Ada', email: 'ada@example.com' }]],
      ['select', []],
      ['single', []],
    ]);
  });

  it('applies equality filters, ordering and limit on select', async () => {
    const { service, query } = build({ data: [{ id: 'm1' }] });

    const rows = await service.select('messages', {
      filters: { order_id: 'o1' },
      orderBy: { column: 'created_at' },
      limit: 10,
    });

    expect(rows).toEqual([{ id: 'm1' }]);
    expect(query.calls).toEqual([
      ['select', ['*']],
      ['eq', ['order_id', 'o1']],
      ['order', ['created_at', { ascending: true }]],
      ['limit', [10]],
    ]);
  });

  it('skips undefined filter values', async () => {
    const { service, query } = build({ data: [] });
    await service.select('products', { filters: { shop_id: undefined } });
    expect(query.calls).toEqual([['select', ['*']]]);
  });

  it('applies number and boolean filters alongside strings', async () => {
    const { service, query } = build({ data: [] });
    await service.select('orders', { filters: { status: 'paid', total_amount: 10 } });
    expect(query.calls).toEqual([
      ['select', ['*']],
      ['eq', ['status', 'paid']],
      ['eq', ['total_amount', 10]],
    ]);
  });

  it('sends writes as plain column maps', async () => {
    const { service, query } = build({ data: [] });
    const patch = { status: 'shipped' };
    await service.update('orders', { id: 'o1' }, patch);
    const [name, [sent]] = query.calls[0];
    expect(name).toBe('update');
    expect(sent).toEqual(patch);
    expect(sent).not.toBe(patch);
  });

  it('returns null from selectOne when nothing matches', async () => {
    const { service } = build({ data: [] });
    await expect(service.selectOne('orders', { tracking_id: 'missing' })).resolves.toBeNull();
  });

  it('filters updates by the where clause and returns updated rows', async () => {
    const { service, query } = build({ data: [{ id: 'o1', status: 'shipped' }] });

    const rows = await service.update('orders', { id: 'o1' }, { status: 'shipped' });

    expect(rows).toEqual([{ id: 'o1', status: 'shipped' }]);
    expect(query.calls).toEqual([
      ['update', [{ status: 'shipped' }]],
      ['eq', ['id', 'o1']],
      ['select', []],
    ]);
  });

  it('upserts on the conflict column', async () => {
    const { service, query } = build({ data: { key: 'plan', value: 'pro' } });
    await service.upsert('settings', { key: 'plan', value: 'pro' }, 'key');
    expect(query.calls[0]).toEqual(['upsert', [{ key: 'plan', value: 'pro' }, { onConflict: 'key' }]]);
  });

  it('calls database functions through rpc', async () => {
    const { service, client } = build({ data: { id: 'a1' } });
    const args = { p_order_id: 'o1', p_delivery_boy_id: 'd1' };
    await expect(service.rpc('assign_order', args)).resolves.toEqual({ id: 'a1' });
    expect(client.rpc).toHaveBeenCalledWith('assign_order', args);
  });

  it('returns exact counts', async () => {
    const { service, query } = build({ count: 7 });
    await expect(service.count('tickets', { status: 'open' })).resolves.toBe(7);
    expect(query.calls).toEqual([
      ['select', ['*', { count: 'exact', head: true }]],
      ['eq', ['status', 'open']],
    ]);
  });

  it('raises DATA_STORE_ERROR with the store message', async () => {
    const { service } = build({ error: { message: 'relation "users" does not exist', code: '42P01' } });

    const error = await service.select('users').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toMatchObject({
      code: ErrorCode.DATA_STORE_ERROR,
      userMessage: 'relation "users" does not exist',
      httpStatus: 500,
      details: { storeCode: '42P01' },
    });
  });
});
