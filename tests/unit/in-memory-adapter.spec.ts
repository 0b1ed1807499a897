import { InMemoryMachineAdapter } from '../../src/adapters/in-memory-machine.adapter';
import type { MachineRecord } from '../../src/interfaces/machine-records.interface';
import { deferred, flushPromises } from '../helpers';

function row(
  id: string,
  overrides: Partial<Omit<MachineRecord, 'updatedAt'>> = {},
): Omit<MachineRecord, 'updatedAt'> {
  return {
    id,
    stateValue: 'draft',
    version: 0,
    data: {},
    parentType: null,
    parentId: null,
    expiresAt: null,
    ...overrides,
  };
}

describe('InMemoryMachineAdapter', () => {
  let adapter: InMemoryMachineAdapter;

  beforeEach(() => {
    adapter = new InMemoryMachineAdapter();
  });

  it('should return null when row does not exist', async () => {
    await expect(adapter.findOne('transfers', 'id-1')).resolves.toBeNull();
  });

  it('should insert and find a row', async () => {
    await expect(
      adapter.insert('transfers', row('id-1', { data: { amount: 100 } })),
    ).resolves.toBe(true);

    const found = await adapter.findOne('transfers', 'id-1');
    expect(found).toMatchObject({
      id: 'id-1',
      stateValue: 'draft',
      version: 0,
      data: { amount: 100 },
    });
    expect(found?.updatedAt).toBeInstanceOf(Date);
  });

  it('should refuse to insert an existing id', async () => {
    await adapter.insert('transfers', row('id-1'));

    await expect(
      adapter.insert('transfers', row('id-1', { stateValue: 'sent' })),
    ).resolves.toBe(false);
    expect((await adapter.findOne('transfers', 'id-1'))?.stateValue).toBe(
      'draft',
    );
  });

  it('should clone data to avoid external mutations', async () => {
    const data = { amount: 100 };
    await adapter.insert('transfers', row('id-1', { data }));

    data.amount = 99;
    const firstRead = await adapter.findOne('transfers', 'id-1');
    expect(firstRead?.data).toEqual({ amount: 100 });

    if (firstRead) firstRead.data.amount = 77;
    const secondRead = await adapter.findOne('transfers', 'id-1');
    expect(secondRead?.data).toEqual({ amount: 100 });
  });

  describe('compareAndSet', () => {
    it('should move a row that still holds the expected revision', async () => {
      await adapter.insert('transfers', row('id-1'));
      const expiresAt = new Date('2026-05-01T00:00:00.000Z');

      const swapped = await adapter.compareAndSet(
        'transfers',
        'id-1',
        { stateValue: 'draft', version: 0 },
        { stateValue: 'sent', data: { sentBy: 'api' }, expiresAt },
      );

      expect(swapped).toBe(true);
      expect(await adapter.findOne('transfers', 'id-1')).toMatchObject({
        stateValue: 'sent',
        version: 1,
        data: { sentBy: 'api' },
        expiresAt,
      });
    });

    it('should leave the row untouched on a stale revision', async () => {
      await adapter.insert('transfers', row('id-1', { version: 3 }));

      await expect(
        adapter.compareAndSet(
          'transfers',
          'id-1',
          { stateValue: 'draft', version: 2 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        ),
      ).resolves.toBe(false);
      await expect(
        adapter.compareAndSet(
          'transfers',
          'id-1',
          { stateValue: 'pending', version: 3 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        ),
      ).resolves.toBe(false);

      expect(await adapter.findOne('transfers', 'id-1')).toMatchObject({
        stateValue: 'draft',
        version: 3,
      });
    });

    it('should fail for a missing row', async () => {
      await expect(
        adapter.compareAndSet(
          'transfers',
          'nope',
          { stateValue: 'draft', version: 0 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        ),
      ).resolves.toBe(false);
    });
  });

  describe('history', () => {
    it('should append rows and clone the context', async () => {
      const context = { source: 'api' };
      await adapter.insertHistory('transfers', {
        instanceId: 'id-1',
        fromState: 'draft',
        toState: 'sent',
        eventType: 'send',
        context,
        idempotencyKey: null,
      });

      context.source = 'mutated';
      const rows = await adapter.findHistory('transfers', 'id-1');

      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        instanceId: 'id-1',
        fromState: 'draft',
        toState: 'sent',
        eventType: 'send',
        context: { source: 'api' },
        idempotencyKey: null,
      });
      expect(rows[0].id).toEqual(expect.any(String));
      expect(rows[0].transitionedAt).toBeInstanceOf(Date);
    });

    it('should find a row by idempotency key', async () => {
      await adapter.insertHistory('transfers', {
        instanceId: 'id-1',
        fromState: 'draft',
        toState: 'sent',
        eventType: 'send',
        context: {},
        idempotencyKey: 'req-1',
      });

      await expect(
        adapter.findHistoryByKey('transfers', 'id-1', 'req-1'),
      ).resolves.toMatchObject({ eventType: 'send', toState: 'sent' });
      await expect(
        adapter.findHistoryByKey('transfers', 'id-2', 'req-1'),
      ).resolves.toBeNull();
    });
  });

  it('should find expired rows only', async () => {
    await adapter.insert(
      'transfers',
      row('expired', { expiresAt: new Date(Date.now() - 60_000) }),
    );
    await adapter.insert(
      'transfers',
      row('future', { expiresAt: new Date(Date.now() + 60_000) }),
    );
    await adapter.insert('transfers', row('none'));

    await expect(adapter.findExpired('transfers')).resolves.toEqual([
      { id: 'expired' },
    ]);
  });

  it('should find rows by state value', async () => {
    await adapter.insert('transfers', row('id-1', { stateValue: 'pending' }));
    await adapter.insert('transfers', row('id-2', { stateValue: 'sent' }));

    const rows = await adapter.findByState('transfers', 'pending');
    expect(rows.map((r) => r.id)).toEqual(['id-1']);
  });

  it('should find the children of a parent', async () => {
    await adapter.insert(
      'transfers',
      row('c1', { parentType: 'batches', parentId: 'b1' }),
    );
    await adapter.insert(
      'transfers',
      row('c2', { parentType: 'batches', parentId: 'b2' }),
    );
    await adapter.insert(
      'transfers',
      row('c3', { parentType: 'batches', parentId: 'b1' }),
    );

    const children = await adapter.findChildren('transfers', 'batches', 'b1');
    expect(children.map((c) => c.id)).toEqual(['c1', 'c3']);
  });

  describe('transaction', () => {
    it('should commit transaction changes', async () => {
      await adapter.insert('transfers', row('id-1'));

      await adapter.transaction(async (tx) => {
        await tx.compareAndSet(
          'transfers',
          'id-1',
          { stateValue: 'draft', version: 0 },
          { stateValue: 'sent', data: { tx: true }, expiresAt: null },
        );
        await tx.insertHistory('transfers', {
          instanceId: 'id-1',
          fromState: 'draft',
          toState: 'sent',
          eventType: 'send',
          context: {},
          idempotencyKey: null,
        });
      });

      expect((await adapter.findOne('transfers', 'id-1'))?.data).toEqual({
        tx: true,
      });
      await expect(adapter.findHistory('transfers', 'id-1')).resolves.toHaveLength(1);
    });

    it('should rollback transaction changes on error', async () => {
      await expect(
        adapter.transaction(async (tx) => {
          await tx.insert('transfers', row('id-1'));
          await tx.insertHistory('transfers', {
            instanceId: 'id-1',
            fromState: 'draft',
            toState: 'sent',
            eventType: 'send',
            context: {},
            idempotencyKey: null,
          });
          throw new Error('forced rollback');
        }),
      ).rejects.toThrow('forced rollback');

      await expect(adapter.findOne('transfers', 'id-1')).resolves.toBeNull();
      await expect(adapter.findHistory('transfers', 'id-1')).resolves.toEqual([]);
    });

    it('should run transactions one at a time so neither write is lost', async () => {
      await adapter.insert('transfers', row('a'));
      await adapter.insert('transfers', row('b'));
      const gate = deferred();

      const first = adapter.transaction(async (tx) => {
        await gate.promise;
        await tx.compareAndSet(
          'transfers',
          'a',
          { stateValue: 'draft', version: 0 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        );
      });
      const second = adapter.transaction(async (tx) => {
        await tx.compareAndSet(
          'transfers',
          'b',
          { stateValue: 'draft', version: 0 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        );
      });

      await flushPromises();
      expect((await adapter.findOne('transfers', 'b'))?.stateValue).toBe('draft');

      gate.resolve();
      await Promise.all([first, second]);

      expect((await adapter.findOne('transfers', 'a'))?.stateValue).toBe('sent');
      expect((await adapter.findOne('transfers', 'b'))?.stateValue).toBe('sent');
    });

    it('should keep writes made while a transaction is open', async () => {
      await adapter.insert('transfers', row('a'));
      const gate = deferred();

      const open = adapter.transaction(async (tx) => {
        await gate.promise;
        await tx.compareAndSet(
          'transfers',
          'a',
          { stateValue: 'draft', version: 0 },
          { stateValue: 'sent', data: {}, expiresAt: null },
        );
      });
      await flushPromises();
      const outside = adapter.insert('transfers', row('b'));
      await flushPromises();

      gate.resolve();
      await Promise.all([open, outside]);

      await expect(outside).resolves.toBe(true);
      expect((await adapter.findOne('transfers', 'a'))?.stateValue).toBe('sent');
      expect((await adapter.findOne('transfers', 'b'))?.stateValue).toBe('draft');
    });
  });

  it('should reject invalid table names in method calls', async () => {
    await expect(
      adapter.insert('transfers;DROP', row('id-1')),
    ).rejects.toThrow('Invalid table name');
  });
});
