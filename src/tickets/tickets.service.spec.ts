import { TicketsService } from './tickets.service';

describe('TicketsService', () => {
  const stored = {
    id: 't1',
    order_id: 'o1',
    issue: 'Late delivery',
    status: 'open',
    created_at: '2024-05-01T10:00:00.000Z',
  };

  it('stores the ticket and notifies the webhook with the stored row', async () => {
    const supabase = { insert: jest.fn().mockResolvedValue(stored) } as any;
    const notifier = { notifyTicketCreated: jest.fn().mockResolvedValue(true) } as any;
    const service = new TicketsService(supabase, notifier);

    await expect(service.create({ order_id: 'o1', issue: 'Late delivery' })).resolves.toEqual(stored);
    expect(supabase.insert).toHaveBeenCalledWith('tickets', { order_id: 'o1', issue: 'Late delivery', status: 'open' });
    expect(notifier.notifyTicketCreated).toHaveBeenCalledWith(stored);
  });

  it('does not notify when the insert fails', async () => {
    const supabase = { insert: jest.fn().mockRejectedValue(new Error('insert failed')) } as any;
    const notifier = { notifyTicketCreated: jest.fn() } as any;
    const service = new TicketsService(supabase, notifier);

    await expect(service.create({ order_id: 'o1', issue: 'Late delivery' })).rejects.toThrow('insert failed');
    expect(notifier.notifyTicketCreated).not.toHaveBeenCalled();
  });
});
