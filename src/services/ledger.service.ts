/**
 * Ledger Service
 *
 * Append-only transaction log per debtor. Balances are never stored; they are
 * projected from the log at query time:
 *
 *   balance = Σ DEBT − Σ CREDIT
 *
 * DEBT raises what the debtor owes the user, CREDIT lowers it. No balance
 * check blocks a transaction; negative balances (overpayments) are valid.
 */

import Decimal from 'decimal.js';
import { withRepository, type LedgerRepository } from '../store';
import { AppError } from '../utils/AppError';
import { createScopedLogger } from '../utils/logger';
import { parsePositiveAmount } from '../utils/money';
import { assertLimit, assertValidDate, optionalText } from '../utils/validation';
import {
  TRANSACTION_KINDS,
  type DebtorBalance,
  type LedgerTransaction,
  type TransactionKind,
} from '../types';

const log = createScopedLogger('ledger');

export const DEFAULT_HISTORY_LIMIT = 10;

export interface AppendTransactionInput {
  debtorId: number;
  amount: Decimal.Value;
  kind: TransactionKind;
  note?: string | null;
  dueDate?: Date | null;
  groupTag?: string | null;
}

export function assertKind(kind: string): TransactionKind {
  const match = TRANSACTION_KINDS.find((candidate) => candidate === kind);
  if (!match) {
    throw AppError.validation(`kind must be one of ${TRANSACTION_KINDS.join(', ')}`, { kind });
  }
  return match;
}

/**
 * Appends one entry. Validation happens before anything is written.
 */
export async function appendTransaction(
  input: AppendTransactionInput,
  repo?: LedgerRepository
): Promise<LedgerTransaction> {
  const amount = parsePositiveAmount(input.amount);
  const kind = assertKind(input.kind);
  const dueDate = input.dueDate ? assertValidDate(input.dueDate) : null;

  return withRepository(repo, async (client) => {
    const transaction = await client.insertTransaction({
      debtorId: input.debtorId,
      amount,
      kind,
      note: optionalText(input.note),
      dueDate,
      groupTag: optionalText(input.groupTag),
    });

    log.debug(`Appended ${kind} ${amount.toFixed(2)} to debtor ${input.debtorId} (tx ${transaction.id})`);
    return transaction;
  });
}

/**
 * Exact decimal balance; zero for a debtor without transactions.
 */
export async function getBalance(debtorId: number, repo?: LedgerRepository): Promise<Decimal> {
  return withRepository(repo, (client) => client.getBalance(debtorId));
}

/**
 * Non-zero balances of all the user's debtors in one aggregation, most owed first.
 */
export async function getAllBalances(userId: number, repo?: LedgerRepository): Promise<DebtorBalance[]> {
  return withRepository(repo, (client) => client.getBalances(userId));
}

/**
 * Newest entries first.
 */
export async function getHistory(
  debtorId: number,
  limit = DEFAULT_HISTORY_LIMIT,
  repo?: LedgerRepository
): Promise<LedgerTransaction[]> {
  const checked = assertLimit(limit);
  return withRepository(repo, (client) => client.listTransactions(debtorId, checked));
}

/**
 * False when the transaction is missing or belongs to another user's debtor.
 */
export async function deleteTransaction(
  userId: number,
  transactionId: number,
  repo?: LedgerRepository
): Promise<boolean> {
  return withRepository(repo, async (client) => {
    const removed = await client.deleteTransaction(userId, transactionId);
    if (removed) {
      log.info(`Deleted transaction ${transactionId} for user ${userId}`);
    }
    return removed;
  });
}

/**
 * Removes the debtor with its aliases and transactions. False when missing or
 * not owned.
 */
export async function deleteDebtor(userId: number, debtorId: number, repo?: LedgerRepository): Promise<boolean> {
  return withRepository(repo, async (client) => {
    const removed = await client.deleteDebtor(userId, debtorId);
    if (removed) {
      log.info(`Deleted debtor ${debtorId} for user ${userId}`);
    }
    return removed;
  });
}

/**
 * Removes every debtor of the user; returns how many were removed.
 */
export async function deleteAllDebtors(userId: number, repo?: LedgerRepository): Promise<number> {
  return withRepository(repo, async (client) => {
    const removed = await client.deleteAllDebtors(userId);
    log.info(`Deleted ${removed} debtors for user ${userId}`);
    return removed;
  });
}

export async function countDebtors(userId: number, repo?: LedgerRepository): Promise<number> {
  return withRepository(repo, (client) => client.countDebtors(userId));
}

export const ledgerService = {
  appendTransaction,
  getBalance,
  getAllBalances,
  getHistory,
  deleteTransaction,
  deleteDebtor,
  deleteAllDebtors,
  countDebtors,
};

export default ledgerService;
