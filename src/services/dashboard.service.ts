/**
 * Dashboard Service
 *
 * Read-only aggregates for the web dashboard. All of them are projections of
 * the transaction log; nothing here writes.
 */

import Decimal from 'decimal.js';
import { withRepository, type LedgerRepository, type MonthlyNetChange } from '../store';
import { sumDecimals } from '../utils/money';
import { assertLimit } from '../utils/validation';
import type { DebtorBalance, LedgerTransactionWithDebtor } from '../types';

export const DEFAULT_DASHBOARD_HISTORY_LIMIT = 50;
export const DEFAULT_TREND_MONTHS = 12;

export interface UserSummary {
  totalNetBalance: Decimal;
  /** Sum of positive balances: what others owe the user */
  totalPositive: Decimal;
  /** Sum of |negative balances|: what the user owes */
  totalNegative: Decimal;
  debtorCount: number;
  transactionCount: number;
}

export async function getUserSummary(userId: number, repo?: LedgerRepository): Promise<UserSummary> {
  return withRepository(repo, async (client) => {
    const balances = (await client.getBalances(userId, { includeZero: true })).map((row) => row.balance);

    return {
      totalNetBalance: sumDecimals(balances),
      totalPositive: sumDecimals(balances.filter((balance) => balance.isPositive() && !balance.isZero())),
      totalNegative: sumDecimals(balances.filter((balance) => balance.isNegative() && !balance.isZero())).abs(),
      debtorCount: balances.length,
      transactionCount: await client.countTransactions(userId),
    };
  });
}

/**
 * Same rows as the ledger's all-balances query.
 */
export async function getDebtByPerson(userId: number, repo?: LedgerRepository): Promise<DebtorBalance[]> {
  return withRepository(repo, (client) => client.getBalances(userId));
}

export async function getTransactionHistoryForUser(
  userId: number,
  options: { debtorId?: number; limit?: number } = {},
  repo?: LedgerRepository
): Promise<LedgerTransactionWithDebtor[]> {
  const limit = assertLimit(options.limit ?? DEFAULT_DASHBOARD_HISTORY_LIMIT);
  return withRepository(repo, (client) =>
    client.listTransactionsForUser(userId, { debtorId: options.debtorId, limit })
  );
}

/**
 * Net change per calendar month (UTC), newest month first. Months without
 * entries are absent.
 */
export async function getMonthlyTrends(
  userId: number,
  months = DEFAULT_TREND_MONTHS,
  repo?: LedgerRepository
): Promise<MonthlyNetChange[]> {
  const checked = assertLimit(months, 'months');
  return withRepository(repo, (client) => client.getMonthlyNetChanges(userId, checked));
}

export const dashboardService = {
  getUserSummary,
  getDebtByPerson,
  getTransactionHistoryForUser,
  getMonthlyTrends,
};

export default dashboardService;
