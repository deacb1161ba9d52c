/**
 * Deadline Service
 *
 * Optional due dates on ledger entries. A due date is the only mutable field of
 * a transaction.
 */

import { withRepository, type LedgerRepository } from '../store';
import { AppError } from '../utils/AppError';
import { assertLimit, assertValidDate } from '../utils/validation';
import type { LedgerTransaction, LedgerTransactionWithDebtor } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_UPCOMING_LIMIT = 20;

export interface ListUpcomingOptions {
  limit?: number;
  /** Only deadlines up to now + withinDays; overdue entries always qualify */
  withinDays?: number;
  now?: Date;
}

/**
 * Sets or clears (null) a due date. Returns null when the transaction is
 * missing or not owned by the user.
 */
export async function setDueDate(
  userId: number,
  transactionId: number,
  dueDate: Date | null,
  repo?: LedgerRepository
): Promise<LedgerTransaction | null> {
  const checked = dueDate ? assertValidDate(dueDate) : null;

  return withRepository(repo, async (client) => {
    const transaction = await client.findTransaction(userId, transactionId);
    if (!transaction) {
      return null;
    }
    return client.updateDueDate(transaction.id, checked);
  });
}

/**
 * Entries with a due date, soonest first (overdue ones lead), ties by creation.
 */
export async function listUpcoming(
  userId: number,
  options: ListUpcomingOptions = {},
  repo?: LedgerRepository
): Promise<LedgerTransactionWithDebtor[]> {
  const limit = assertLimit(options.limit ?? DEFAULT_UPCOMING_LIMIT);
  const { withinDays } = options;

  let dueBefore: Date | undefined;
  if (withinDays !== undefined) {
    if (!Number.isFinite(withinDays) || withinDays < 0) {
      throw AppError.validation('withinDays must be zero or more', { withinDays });
    }
    const now = options.now ?? new Date();
    dueBefore = new Date(now.getTime() + withinDays * DAY_MS);
  }

  return withRepository(repo, (client) => client.listDueTransactions(userId, { dueBefore, limit }));
}

export const deadlineService = {
  setDueDate,
  listUpcoming,
};

export default deadlineService;
