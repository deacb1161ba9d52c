/**
 * Persistence boundary for the ledger.
 *
 * Services never talk to a database directly: each logical operation runs
 * inside `LedgerStore.transaction`, which hands it a `LedgerRepository` bound
 * to one atomic unit of work (BEGIN ... COMMIT, ROLLBACK on throw).
 *
 * Every user-scoped query filters by the owning user id. Lookups by id that
 * miss OR hit another user's row return null/false alike.
 */

import type Decimal from 'decimal.js';
import type {
  Alias,
  Debtor,
  DebtorBalance,
  DebtorWithAliases,
  LedgerTransaction,
  LedgerTransactionWithDebtor,
  PendingDecision,
  TransactionKind,
  User,
} from '../types';

export interface UpsertUserInput {
  externalId: string;
  displayName: string;
  handle: string | null;
}

export interface NewDebtor {
  userId: number;
  name: string;
  externalId: string | null;
}

export interface DebtorPatch {
  name?: string;
  externalId?: string | null;
}

export interface NewAlias {
  userId: number;
  debtorId: number;
  aliasName: string;
}

export interface AliasWithDebtor extends Alias {
  debtorName: string;
}

export interface NewTransaction {
  debtorId: number;
  amount: Decimal;
  kind: TransactionKind;
  note: string | null;
  dueDate: Date | null;
  groupTag: string | null;
}

export interface BalanceQuery {
  /** Include debtors whose balance is zero (or who have no transactions) */
  includeZero?: boolean;
}

export interface UserHistoryQuery {
  debtorId?: number;
  limit: number;
}

export interface DueQuery {
  /** Only deadlines at or before this instant; overdue rows always qualify */
  dueBefore?: Date;
  limit: number;
}

export interface MonthlyNetChange {
  /** YYYY-MM, UTC */
  month: string;
  netChange: Decimal;
}

export interface LedgerRepository {
  // ---------------- Users ----------------
  upsertUser(input: UpsertUserInput): Promise<User>;
  findUserByExternalId(externalId: string): Promise<User | null>;
  /** Case-insensitive; handles are stored without a leading "@" */
  findUserByHandle(handle: string): Promise<User | null>;
  /** Serialises find-or-create flows of one user until the unit of work ends */
  lockUser(userId: number): Promise<void>;

  // ---------------- Debtors ----------------
  /** All debtors of a user with their alias names, in creation order */
  listDebtors(userId: number): Promise<DebtorWithAliases[]>;
  findDebtor(userId: number, debtorId: number): Promise<Debtor | null>;
  findDebtorByExternalId(userId: number, externalId: string): Promise<Debtor | null>;
  createDebtor(input: NewDebtor): Promise<Debtor>;
  updateDebtor(debtorId: number, patch: DebtorPatch): Promise<Debtor>;
  /** Cascades to aliases and transactions */
  deleteDebtor(userId: number, debtorId: number): Promise<boolean>;
  deleteAllDebtors(userId: number): Promise<number>;
  countDebtors(userId: number): Promise<number>;

  // ---------------- Aliases ----------------
  /** Case-insensitive lookup across every debtor of the user */
  findAlias(userId: number, aliasName: string): Promise<AliasWithDebtor | null>;
  createAlias(input: NewAlias): Promise<Alias>;

  // ---------------- Transactions ----------------
  insertTransaction(input: NewTransaction): Promise<LedgerTransaction>;
  findTransaction(userId: number, transactionId: number): Promise<LedgerTransaction | null>;
  deleteTransaction(userId: number, transactionId: number): Promise<boolean>;
  updateDueDate(transactionId: number, dueDate: Date | null): Promise<LedgerTransaction>;
  /** Σ DEBT − Σ CREDIT; exact zero without transactions */
  getBalance(debtorId: number): Promise<Decimal>;
  /** One aggregation over all of the user's debtors, balance descending */
  getBalances(userId: number, query?: BalanceQuery): Promise<DebtorBalance[]>;
  /** Newest first */
  listTransactions(debtorId: number, limit: number): Promise<LedgerTransaction[]>;
  listTransactionsForUser(userId: number, query: UserHistoryQuery): Promise<LedgerTransactionWithDebtor[]>;
  countTransactions(userId: number): Promise<number>;
  /** Deadline set, due date ascending then creation ascending */
  listDueTransactions(userId: number, query: DueQuery): Promise<LedgerTransactionWithDebtor[]>;
  /** Newest month first */
  getMonthlyNetChanges(userId: number, months: number): Promise<MonthlyNetChange[]>;

  // ---------------- Pending decisions ----------------
  /** Insert or replace the decision for (userId, sessionToken) */
  savePendingDecision(decision: PendingDecision): Promise<PendingDecision>;
  /** Expired decisions read as missing */
  findPendingDecision(userId: number, sessionToken: string, now: Date): Promise<PendingDecision | null>;
  deletePendingDecision(userId: number, sessionToken: string): Promise<boolean>;
  purgeExpiredDecisions(now: Date): Promise<number>;
}

export interface LedgerStore {
  readonly driver: 'postgres' | 'memory';
  /**
   * Runs `work` as one atomic unit: everything it wrote commits together, or
   * nothing does if it throws.
   */
  transaction<T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T>;
  checkHealth(): Promise<boolean>;
  close(): Promise<void>;
}
