import Decimal from 'decimal.js';
import { MemoryLedgerStore } from '../../src/store';
import type { LedgerRepository } from '../../src/store';
import type { PendingDecision, User } from '../../src/types';
import { tickingClock } from '../helpers/ledger';

describe('MemoryLedgerStore', () => {
  let store: MemoryLedgerStore;
  let user: User;

  const run = <T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T> => store.transaction(work);

  const newDebtor = (name: string, userId = user.id) =>
    run((repo) => repo.createDebtor({ userId, name, externalId: null }));

  const append = (debtorId: number, kind: 'DEBT' | 'CREDIT', value: string, dueDate: Date | null = null) =>
    run((repo) =>
      repo.insertTransaction({ debtorId, amount: new Decimal(value), kind, note: null, dueDate, groupTag: null })
    );

  beforeEach(async () => {
    store = new MemoryLedgerStore({ now: tickingClock() });
    user = await run((repo) => repo.upsertUser({ externalId: 'u-1', displayName: 'Lan', handle: 'lan' }));
  });

  // ============================================
  // Units of work
  // ============================================
  describe('transaction', () => {
    it('should discard every write of a failed unit', async () => {
      await expect(
        run(async (repo) => {
          await repo.createDebtor({ userId: user.id, name: 'Tuan', externalId: null });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await run((repo) => repo.countDebtors(user.id))).toBe(0);
    });

    it('should stay usable after a failed unit', async () => {
      await expect(run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

      const debtor = await newDebtor('Tuan');
      expect(debtor.name).toBe('Tuan');
    });

    it('should run concurrent units one at a time', async () => {
      const countThenCreate = () =>
        run(async (repo) => {
          const seen = await repo.countDebtors(user.id);
          await repo.createDebtor({ userId: user.id, name: `Debtor ${seen}`, externalId: null });
          return seen;
        });

      const results = await Promise.all([countThenCreate(), countThenCreate(), countThenCreate()]);

      expect(results).toEqual([0, 1, 2]);
      expect(await run((repo) => repo.countDebtors(user.id))).toBe(3);
    });

    it('should forget everything on close', async () => {
      await newDebtor('Tuan');
      await store.close();

      expect(await run((repo) => repo.findUserByExternalId('u-1'))).toBeNull();
    });
  });

  // ============================================
  // Users
  // ============================================
  describe('users', () => {
    it('should refresh the display name on upsert', async () => {
      const again = await run((repo) => repo.upsertUser({ externalId: 'u-1', displayName: 'Lan N.', handle: null }));

      expect(again.id).toBe(user.id);
      expect(again.displayName).toBe('Lan N.');
      expect(again.handle).toBeNull();
    });

    it('should find users by handle case-insensitively', async () => {
      const found = await run((repo) => repo.findUserByHandle('LAN'));

      expect(found?.id).toBe(user.id);
    });
  });

  // ============================================
  // Ownership and cascades
  // ============================================
  describe('ownership', () => {
    it('should hide other users debtors and transactions', async () => {
      const other = await run((repo) => repo.upsertUser({ externalId: 'u-2', displayName: 'Minh', handle: null }));
      const debtor = await newDebtor('Tuan');
      const tx = await append(debtor.id, 'DEBT', '100');

      expect(await run((repo) => repo.findDebtor(other.id, debtor.id))).toBeNull();
      expect(await run((repo) => repo.findTransaction(other.id, tx.id))).toBeNull();
      expect(await run((repo) => repo.deleteTransaction(other.id, tx.id))).toBe(false);
      expect(await run((repo) => repo.deleteDebtor(other.id, debtor.id))).toBe(false);
      expect(await run((repo) => repo.countTransactions(user.id))).toBe(1);
    });

    it('should cascade debtor deletion to aliases and transactions', async () => {
      const debtor = await newDebtor('Tuan');
      await run((repo) => repo.createAlias({ userId: user.id, debtorId: debtor.id, aliasName: 'Béo' }));
      await append(debtor.id, 'DEBT', '100');

      expect(await run((repo) => repo.deleteDebtor(user.id, debtor.id))).toBe(true);
      expect(await run((repo) => repo.findAlias(user.id, 'béo'))).toBeNull();
      expect(await run((repo) => repo.countTransactions(user.id))).toBe(0);
    });

    it('should delete all debtors of one user only', async () => {
      const other = await run((repo) => repo.upsertUser({ externalId: 'u-2', displayName: 'Minh', handle: null }));
      await newDebtor('Tuan');
      await newDebtor('Khanh');
      await newDebtor('Hoa', other.id);

      expect(await run((repo) => repo.deleteAllDebtors(user.id))).toBe(2);
      expect(await run((repo) => repo.countDebtors(other.id))).toBe(1);
    });
  });

  // ============================================
  // Aliases
  // ============================================
  describe('aliases', () => {
    it('should list aliases with their debtor', async () => {
      const debtor = await newDebtor('Tuan');
      await run((repo) => repo.createAlias({ userId: user.id, debtorId: debtor.id, aliasName: 'Béo' }));

      const [listed] = await run((repo) => repo.listDebtors(user.id));
      expect(listed.aliases).toEqual(['Béo']);

      const hit = await run((repo) => repo.findAlias(user.id, 'BÉO'));
      expect(hit).toMatchObject({ debtorId: debtor.id, debtorName: 'Tuan', aliasName: 'Béo' });
    });

    it('should reject an alias the user already uses', async () => {
      const tuan = await newDebtor('Tuan');
      const khanh = await newDebtor('Khanh');
      await run((repo) => repo.createAlias({ userId: user.id, debtorId: tuan.id, aliasName: 'Béo' }));

      await expect(
        run((repo) => repo.createAlias({ userId: user.id, debtorId: khanh.id, aliasName: 'béo' }))
      ).rejects.toMatchObject({ statusCode: 409, message: 'Alias "béo" is already in use' });
    });
  });

  // ============================================
  // Balances and history
  // ============================================
  describe('balances', () => {
    it('should return exact zero without transactions', async () => {
      const debtor = await newDebtor('Tuan');

      const balance = await run((repo) => repo.getBalance(debtor.id));
      expect(balance.isZero()).toBe(true);
    });

    it('should aggregate non-zero balances, most owed first', async () => {
      const a = await newDebtor('A');
      const b = await newDebtor('B');
      const c = await newDebtor('C');
      await append(a.id, 'DEBT', '50000');
      await append(a.id, 'CREDIT', '20000');
      await append(b.id, 'DEBT', '10000');
      await append(b.id, 'CREDIT', '10000');
      await append(c.id, 'CREDIT', '5000');

      const balances = await run((repo) => repo.getBalances(user.id));
      expect(balances.map((row) => [row.debtorName, row.balance.toString()])).toEqual([
        ['A', '30000'],
        ['C', '-5000'],
      ]);

      const all = await run((repo) => repo.getBalances(user.id, { includeZero: true }));
      expect(all.map((row) => row.debtorName)).toEqual(['A', 'B', 'C']);
    });

    it('should return history newest first, up to the limit', async () => {
      const debtor = await newDebtor('Tuan');
      const first = await append(debtor.id, 'DEBT', '1');
      const second = await append(debtor.id, 'DEBT', '2');
      const third = await append(debtor.id, 'CREDIT', '3');

      const history = await run((repo) => repo.listTransactions(debtor.id, 2));
      expect(history.map((tx) => tx.id)).toEqual([third.id, second.id]);
      expect(history.map((tx) => tx.id)).not.toContain(first.id);
    });

    it('should filter user history by debtor and attach names', async () => {
      const tuan = await newDebtor('Tuan');
      const khanh = await newDebtor('Khanh');
      await append(tuan.id, 'DEBT', '1');
      await append(khanh.id, 'DEBT', '2');

      const rows = await run((repo) => repo.listTransactionsForUser(user.id, { debtorId: khanh.id, limit: 10 }));
      expect(rows).toHaveLength(1);
      expect(rows[0].debtorName).toBe('Khanh');
      expect(rows[0].amount.toString()).toBe('2');
    });
  });

  // ============================================
  // Deadlines
  // ============================================
  describe('listDueTransactions', () => {
    it('should list deadlines soonest first and honour the cutoff', async () => {
      const debtor = await newDebtor('Tuan');
      const late = await append(debtor.id, 'DEBT', '1', new Date('2024-03-01T00:00:00.000Z'));
      const soon = await append(debtor.id, 'DEBT', '2', new Date('2024-02-01T00:00:00.000Z'));
      await append(debtor.id, 'DEBT', '3');

      const all = await run((repo) => repo.listDueTransactions(user.id, { limit: 10 }));
      expect(all.map((tx) => tx.id)).toEqual([soon.id, late.id]);

      const before = await run((repo) =>
        repo.listDueTransactions(user.id, { limit: 10, dueBefore: new Date('2024-02-15T00:00:00.000Z') })
      );
      expect(before.map((tx) => tx.id)).toEqual([soon.id]);
    });
  });

  // ============================================
  // Monthly trends
  // ============================================
  describe('getMonthlyNetChanges', () => {
    it('should group by UTC month, newest first', async () => {
      let current = new Date('2024-01-15T10:00:00.000Z');
      store = new MemoryLedgerStore({ now: () => current });
      user = await run((repo) => repo.upsertUser({ externalId: 'u-1', displayName: 'Lan', handle: null }));
      const debtor = await newDebtor('Tuan');

      await append(debtor.id, 'DEBT', '100');
      current = new Date('2024-02-03T10:00:00.000Z');
      await append(debtor.id, 'CREDIT', '30');
      await append(debtor.id, 'DEBT', '10');

      const months = await run((repo) => repo.getMonthlyNetChanges(user.id, 12));
      expect(months.map((row) => [row.month, row.netChange.toString()])).toEqual([
        ['2024-02', '-20'],
        ['2024-01', '100'],
      ]);

      const latest = await run((repo) => repo.getMonthlyNetChanges(user.id, 1));
      expect(latest.map((row) => row.month)).toEqual(['2024-02']);
    });
  });

  // ============================================
  // Pending decisions
  // ============================================
  describe('pending decisions', () => {
    const createdAt = new Date('2024-01-01T00:00:00.000Z');
    const expiresAt = new Date('2024-01-01T00:15:00.000Z');

    const decision = (): PendingDecision => ({
      userId: user.id,
      sessionToken: 'chat-1',
      nameQuery: 'tun',
      amount: new Decimal('50000'),
      kind: 'DEBT',
      note: null,
      dueDate: null,
      groupTag: null,
      candidateIds: [1],
      createdAt,
      expiresAt,
    });

    it('should read an unexpired decision back', async () => {
      await run((repo) => repo.savePendingDecision(decision()));

      const found = await run((repo) => repo.findPendingDecision(user.id, 'chat-1', createdAt));
      expect(found?.nameQuery).toBe('tun');
      expect(found?.amount.toString()).toBe('50000');
    });

    it('should treat a decision as missing once it expires', async () => {
      await run((repo) => repo.savePendingDecision(decision()));

      expect(await run((repo) => repo.findPendingDecision(user.id, 'chat-1', expiresAt))).toBeNull();
      expect(await run((repo) => repo.purgeExpiredDecisions(expiresAt))).toBe(1);
    });

    it('should replace the decision of the same session', async () => {
      await run((repo) => repo.savePendingDecision(decision()));
      await run((repo) => repo.savePendingDecision({ ...decision(), nameQuery: 'khan' }));

      const found = await run((repo) => repo.findPendingDecision(user.id, 'chat-1', createdAt));
      expect(found?.nameQuery).toBe('khan');
      expect(await run((repo) => repo.deletePendingDecision(user.id, 'chat-1'))).toBe(true);
      expect(await run((repo) => repo.deletePendingDecision(user.id, 'chat-1'))).toBe(false);
    });
  });
});
