/**
 * Domain records shared by the store, the services and the routes.
 *
 * Amounts are decimal.js values everywhere; they serialise to strings in JSON.
 */

import type Decimal from 'decimal.js';

export type TransactionKind = 'DEBT' | 'CREDIT';

export const TRANSACTION_KINDS: readonly TransactionKind[] = ['DEBT', 'CREDIT'];

/** A creditor account, created on first contact. */
export interface User {
  id: number;
  externalId: string;
  displayName: string;
  handle: string | null;
  createdAt: Date;
}

/** A counterparty inside one user's private ledger. */
export interface Debtor {
  id: number;
  userId: number;
  name: string;
  /** External identity used to route notifications to the counterpart */
  externalId: string | null;
  createdAt: Date;
}

export interface Alias {
  id: number;
  debtorId: number;
  userId: number;
  aliasName: string;
  createdAt: Date;
}

export interface DebtorWithAliases extends Debtor {
  aliases: string[];
}

export interface LedgerTransaction {
  id: number;
  debtorId: number;
  amount: Decimal;
  kind: TransactionKind;
  note: string | null;
  dueDate: Date | null;
  groupTag: string | null;
  createdAt: Date;
}

export interface LedgerTransactionWithDebtor extends LedgerTransaction {
  debtorName: string;
}

export interface DebtorBalance {
  debtorName: string;
  debtorId: number;
  balance: Decimal;
}

/**
 * A recording request parked until the user picks one of the fuzzy candidates.
 * Keyed by (userId, sessionToken).
 */
export interface PendingDecision {
  userId: number;
  sessionToken: string;
  nameQuery: string;
  amount: Decimal;
  kind: TransactionKind;
  note: string | null;
  dueDate: Date | null;
  groupTag: string | null;
  candidateIds: number[];
  createdAt: Date;
  expiresAt: Date;
}
