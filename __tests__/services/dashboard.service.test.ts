import {
  getDebtByPerson,
  getMonthlyTrends,
  getTransactionHistoryForUser,
  getUserSummary,
} from '../../src/services/dashboard.service';
import { appendTransaction } from '../../src/services/ledger.service';
import { createDebtor } from '../../src/services/debtor.service';
import { createTestUser, useMemoryStore } from '../helpers/ledger';
import type { Debtor, User } from '../../src/types';

describe('Dashboard Service', () => {
  let user: User;
  let a: Debtor;
  let c: Debtor;

  beforeEach(async () => {
    useMemoryStore();
    user = await createTestUser();
    a = await createDebtor(user.id, 'A');
    const b = await createDebtor(user.id, 'B');
    c = await createDebtor(user.id, 'C');

    await appendTransaction({ debtorId: a.id, amount: '50000', kind: 'DEBT' });
    await appendTransaction({ debtorId: a.id, amount: '20000', kind: 'CREDIT' });
    await appendTransaction({ debtorId: b.id, amount: '10000', kind: 'DEBT' });
    await appendTransaction({ debtorId: b.id, amount: '10000', kind: 'CREDIT' });
    await appendTransaction({ debtorId: c.id, amount: '5000', kind: 'CREDIT' });
  });

  describe('getUserSummary', () => {
    it('should split what others owe from what the user owes', async () => {
      const summary = await getUserSummary(user.id);

      expect(summary.totalNetBalance.toString()).toBe('25000');
      expect(summary.totalPositive.toString()).toBe('30000');
      expect(summary.totalNegative.toString()).toBe('5000');
      expect(summary.debtorCount).toBe(3);
      expect(summary.transactionCount).toBe(5);
    });

    it('should be all zeros for a new user', async () => {
      const other = await createTestUser('user-2', 'Minh');
      const summary = await getUserSummary(other.id);

      expect(summary.totalNetBalance.toString()).toBe('0');
      expect(summary.debtorCount).toBe(0);
      expect(summary.transactionCount).toBe(0);
    });
  });

  describe('getDebtByPerson', () => {
    it('should list non-zero balances, most owed first', async () => {
      const rows = await getDebtByPerson(user.id);

      expect(rows.map((row) => [row.debtorId, row.balance.toString()])).toEqual([
        [a.id, '30000'],
        [c.id, '-5000'],
      ]);
    });
  });

  describe('getTransactionHistoryForUser', () => {
    it('should return the newest entries across debtors', async () => {
      const rows = await getTransactionHistoryForUser(user.id, { limit: 2 });

      expect(rows.map((row) => [row.debtorName, row.kind, row.amount.toString()])).toEqual([
        ['C', 'CREDIT', '5000'],
        ['B', 'CREDIT', '10000'],
      ]);
    });

    it('should filter by debtor', async () => {
      const rows = await getTransactionHistoryForUser(user.id, { debtorId: a.id });

      expect(rows.map((row) => row.amount.toString())).toEqual(['20000', '50000']);
    });
  });

  describe('getMonthlyTrends', () => {
    it('should sum every entry of the month', async () => {
      const trends = await getMonthlyTrends(user.id);

      expect(trends.map((row) => [row.month, row.netChange.toString()])).toEqual([['2024-01', '25000']]);
    });

    it('should reject a non-positive month count', async () => {
      await expect(getMonthlyTrends(user.id, 0)).rejects.toThrow('months must be a positive integer');
    });
  });
});
