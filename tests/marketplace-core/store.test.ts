import { describe, it, expect } from 'vitest';
import { InMemoryStore } from '@core/store';

describe('InMemoryStore', () => {
  it('commits writes from a successful transaction', async () => {
    const store = new InMemoryStore();
    await store.transaction((tx) => tx.saveAccount({ identity: 'carol', balance: 10n }));
    const account = await store.transaction((tx) => tx.findAccount('carol'));
    expect(account).toEqual({ identity: 'carol', balance: 10n });
  });

  it('discards every write of a transaction that throws', async () => {
    const store = new InMemoryStore();
    await store.transaction((tx) => tx.saveAccount({ identity: 'carol', balance: 10n }));

    await expect(
      store.transaction(async (tx) => {
        await tx.saveAccount({ identity: 'carol', balance: 0n });
        await tx.saveAccount({ identity: 'fred', balance: 10n });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    const [carol, fred] = await store.transaction(async (tx) => [
      await tx.findAccount('carol'),
      await tx.findAccount('fred'),
    ]);
    expect(carol?.balance).toBe(10n);
    expect(fred).toBeUndefined();
  });

  it('keeps serving transactions after one fails', async () => {
    const store = new InMemoryStore();
    const failed = store.transaction(async () => {
      throw new Error('boom');
    });
    const next = store.transaction((tx) => tx.saveAccount({ identity: 'carol', balance: 1n }));
    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBeUndefined();
  });

  it('runs transactions one at a time', async () => {
    const store = new InMemoryStore();
    await store.transaction((tx) => tx.saveAccount({ identity: 'carol', balance: 0n }));

    const increment = () =>
      store.transaction(async (tx) => {
        const account = await tx.findAccount('carol', { forUpdate: true });
        await new Promise((resolve) => setTimeout(resolve, 1));
        await tx.saveAccount({ identity: 'carol', balance: (account?.balance ?? 0n) + 1n });
      });
    await Promise.all([increment(), increment(), increment()]);

    const account = await store.transaction((tx) => tx.findAccount('carol'));
    expect(account?.balance).toBe(3n);
  });

  it('hands out copies, not live records', async () => {
    const store = new InMemoryStore();
    await store.transaction((tx) => tx.saveAccount({ identity: 'carol', balance: 10n }));
    const first = await store.transaction((tx) => tx.findAccount('carol'));
    if (first) first.balance = 99n;
    const second = await store.transaction((tx) => tx.findAccount('carol'));
    expect(second?.balance).toBe(10n);
  });

  it('sees its own writes inside a transaction', async () => {
    const store = new InMemoryStore();
    const seen = await store.transaction(async (tx) => {
      await tx.insertUser({ identity: 'carol', name: 'Carol', role: 'client', createdAt: new Date(0) });
      return tx.findUser('carol');
    });
    expect(seen?.name).toBe('Carol');
  });
});
