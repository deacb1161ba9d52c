/**
 * In-memory LedgerStore
 *
 * Used for local development (STORE_DRIVER=memory) and the test suite. It keeps
 * the same contract as the Postgres store:
 * - units of work run one at a time, in arrival order
 * - each unit works on a draft copy that replaces the live state only on success
 * - records are never mutated in place, so a shallow copy of each table is a
 *   full snapshot
 */

import Decimal from 'decimal.js';
import { namesEqual } from '../matching';
import { sumDecimals } from '../utils/money';
import { AppError } from '../utils/AppError';
import type {
  Alias,
  Debtor,
  DebtorBalance,
  DebtorWithAliases,
  LedgerTransaction,
  LedgerTransactionWithDebtor,
  PendingDecision,
  User,
} from '../types';
import type {
  AliasWithDebtor,
  BalanceQuery,
  DebtorPatch,
  DueQuery,
  LedgerRepository,
  LedgerStore,
  MonthlyNetChange,
  NewAlias,
  NewDebtor,
  NewTransaction,
  UpsertUserInput,
  UserHistoryQuery,
} from './types';

interface MemoryState {
  users: User[];
  debtors: Debtor[];
  aliases: Alias[];
  transactions: LedgerTransaction[];
  decisions: PendingDecision[];
  sequences: {
    users: number;
    debtors: number;
    aliases: number;
    transactions: number;
  };
}

export interface MemoryLedgerStoreOptions {
  /** Clock used for created_at columns */
  now?: () => Date;
}

function emptyState(): MemoryState {
  return {
    users: [],
    debtors: [],
    aliases: [],
    transactions: [],
    decisions: [],
    sequences: { users: 0, debtors: 0, aliases: 0, transactions: 0 },
  };
}

function cloneState(state: MemoryState): MemoryState {
  return {
    users: [...state.users],
    debtors: [...state.debtors],
    aliases: [...state.aliases],
    transactions: [...state.transactions],
    decisions: [...state.decisions],
    sequences: { ...state.sequences },
  };
}

function signedAmount(transaction: LedgerTransaction): Decimal {
  return transaction.kind === 'DEBT' ? transaction.amount : transaction.amount.negated();
}

function newestFirst(a: LedgerTransaction, b: LedgerTransaction): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

function soonestDueFirst(a: LedgerTransaction, b: LedgerTransaction): number {
  const dueA = a.dueDate?.getTime() ?? 0;
  const dueB = b.dueDate?.getTime() ?? 0;
  return dueA - dueB || a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

class MemoryLedgerRepository implements LedgerRepository {
  constructor(
    private readonly state: MemoryState,
    private readonly now: () => Date
  ) {}

  // ---------------- Users ----------------

  async upsertUser(input: UpsertUserInput): Promise<User> {
    const existing = this.state.users.find((user) => user.externalId === input.externalId);

    if (existing) {
      const updated: User = { ...existing, displayName: input.displayName, handle: input.handle };
      this.state.users = this.state.users.map((user) => (user.id === existing.id ? updated : user));
      return updated;
    }

    const user: User = {
      id: ++this.state.sequences.users,
      externalId: input.externalId,
      displayName: input.displayName,
      handle: input.handle,
      createdAt: this.now(),
    };
    this.state.users.push(user);
    return user;
  }

  async findUserByExternalId(externalId: string): Promise<User | null> {
    return this.state.users.find((user) => user.externalId === externalId) ?? null;
  }

  async findUserByHandle(handle: string): Promise<User | null> {
    return (
      this.state.users.find((user) => user.handle !== null && namesEqual(user.handle, handle)) ?? null
    );
  }

  async lockUser(): Promise<void> {
    // Units of work are already serialised.
  }

  // ---------------- Debtors ----------------

  private debtorsOf(userId: number): Debtor[] {
    return this.state.debtors.filter((debtor) => debtor.userId === userId);
  }

  private ownedDebtorIds(userId: number): Set<number> {
    return new Set(this.debtorsOf(userId).map((debtor) => debtor.id));
  }

  async listDebtors(userId: number): Promise<DebtorWithAliases[]> {
    return this.debtorsOf(userId).map((debtor) => ({
      ...debtor,
      aliases: this.state.aliases
        .filter((alias) => alias.debtorId === debtor.id)
        .map((alias) => alias.aliasName),
    }));
  }

  async findDebtor(userId: number, debtorId: number): Promise<Debtor | null> {
    return this.debtorsOf(userId).find((debtor) => debtor.id === debtorId) ?? null;
  }

  async findDebtorByExternalId(userId: number, externalId: string): Promise<Debtor | null> {
    return this.debtorsOf(userId).find((debtor) => debtor.externalId === externalId) ?? null;
  }

  async createDebtor(input: NewDebtor): Promise<Debtor> {
    const debtor: Debtor = {
      id: ++this.state.sequences.debtors,
      userId: input.userId,
      name: input.name,
      externalId: input.externalId,
      createdAt: this.now(),
    };
    this.state.debtors.push(debtor);
    return debtor;
  }

  async updateDebtor(debtorId: number, patch: DebtorPatch): Promise<Debtor> {
    const existing = this.state.debtors.find((debtor) => debtor.id === debtorId);
    if (!existing) {
      throw AppError.notFound(`Debtor not found: ${debtorId}`);
    }

    const updated: Debtor = {
      ...existing,
      name: patch.name ?? existing.name,
      externalId: patch.externalId === undefined ? existing.externalId : patch.externalId,
    };
    this.state.debtors = this.state.debtors.map((debtor) => (debtor.id === debtorId ? updated : debtor));
    return updated;
  }

  private removeDebtors(ids: Set<number>): void {
    this.state.debtors = this.state.debtors.filter((debtor) => !ids.has(debtor.id));
    this.state.aliases = this.state.aliases.filter((alias) => !ids.has(alias.debtorId));
    this.state.transactions = this.state.transactions.filter((tx) => !ids.has(tx.debtorId));
  }

  async deleteDebtor(userId: number, debtorId: number): Promise<boolean> {
    if (!this.ownedDebtorIds(userId).has(debtorId)) {
      return false;
    }
    this.removeDebtors(new Set([debtorId]));
    return true;
  }

  async deleteAllDebtors(userId: number): Promise<number> {
    const ids = this.ownedDebtorIds(userId);
    this.removeDebtors(ids);
    return ids.size;
  }

  async countDebtors(userId: number): Promise<number> {
    return this.debtorsOf(userId).length;
  }

  // ---------------- Aliases ----------------

  async findAlias(userId: number, aliasName: string): Promise<AliasWithDebtor | null> {
    const alias = this.state.aliases.find(
      (candidate) => candidate.userId === userId && namesEqual(candidate.aliasName, aliasName)
    );
    if (!alias) {
      return null;
    }

    const debtor = this.state.debtors.find((candidate) => candidate.id === alias.debtorId);
    return { ...alias, debtorName: debtor?.name ?? '' };
  }

  async createAlias(input: NewAlias): Promise<Alias> {
    if (await this.findAlias(input.userId, input.aliasName)) {
      throw AppError.conflict(`Alias "${input.aliasName}" is already in use`, {
        alias: input.aliasName,
      });
    }

    const alias: Alias = {
      id: ++this.state.sequences.aliases,
      debtorId: input.debtorId,
      userId: input.userId,
      aliasName: input.aliasName,
      createdAt: this.now(),
    };
    this.state.aliases.push(alias);
    return alias;
  }

  // ---------------- Transactions ----------------

  async insertTransaction(input: NewTransaction): Promise<LedgerTransaction> {
    const transaction: LedgerTransaction = {
      id: ++this.state.sequences.transactions,
      debtorId: input.debtorId,
      amount: input.amount,
      kind: input.kind,
      note: input.note,
      dueDate: input.dueDate,
      groupTag: input.groupTag,
      createdAt: this.now(),
    };
    this.state.transactions.push(transaction);
    return transaction;
  }

  async findTransaction(userId: number, transactionId: number): Promise<LedgerTransaction | null> {
    const owned = this.ownedDebtorIds(userId);
    return (
      this.state.transactions.find((tx) => tx.id === transactionId && owned.has(tx.debtorId)) ?? null
    );
  }

  async deleteTransaction(userId: number, transactionId: number): Promise<boolean> {
    if (!(await this.findTransaction(userId, transactionId))) {
      return false;
    }
    this.state.transactions = this.state.transactions.filter((tx) => tx.id !== transactionId);
    return true;
  }

  async updateDueDate(transactionId: number, dueDate: Date | null): Promise<LedgerTransaction> {
    const existing = this.state.transactions.find((tx) => tx.id === transactionId);
    if (!existing) {
      throw AppError.notFound(`Transaction not found: ${transactionId}`);
    }

    const updated: LedgerTransaction = { ...existing, dueDate };
    this.state.transactions = this.state.transactions.map((tx) => (tx.id === transactionId ? updated : tx));
    return updated;
  }

  async getBalance(debtorId: number): Promise<Decimal> {
    return sumDecimals(
      this.state.transactions.filter((tx) => tx.debtorId === debtorId).map(signedAmount)
    );
  }

  async getBalances(userId: number, query: BalanceQuery = {}): Promise<DebtorBalance[]> {
    const rows: DebtorBalance[] = [];

    for (const debtor of this.debtorsOf(userId)) {
      const transactions = this.state.transactions.filter((tx) => tx.debtorId === debtor.id);
      const balance = sumDecimals(transactions.map(signedAmount));

      if (query.includeZero || !balance.isZero()) {
        rows.push({ debtorName: debtor.name, debtorId: debtor.id, balance });
      }
    }

    return rows.sort((a, b) => b.balance.comparedTo(a.balance));
  }

  async listTransactions(debtorId: number, limit: number): Promise<LedgerTransaction[]> {
    return this.state.transactions
      .filter((tx) => tx.debtorId === debtorId)
      .sort(newestFirst)
      .slice(0, limit);
  }

  private withDebtorName(transaction: LedgerTransaction): LedgerTransactionWithDebtor {
    const debtor = this.state.debtors.find((candidate) => candidate.id === transaction.debtorId);
    return { ...transaction, debtorName: debtor?.name ?? '' };
  }

  async listTransactionsForUser(
    userId: number,
    query: UserHistoryQuery
  ): Promise<LedgerTransactionWithDebtor[]> {
    const owned = this.ownedDebtorIds(userId);

    return this.state.transactions
      .filter((tx) => owned.has(tx.debtorId))
      .filter((tx) => query.debtorId === undefined || tx.debtorId === query.debtorId)
      .sort(newestFirst)
      .slice(0, query.limit)
      .map((tx) => this.withDebtorName(tx));
  }

  async countTransactions(userId: number): Promise<number> {
    const owned = this.ownedDebtorIds(userId);
    return this.state.transactions.filter((tx) => owned.has(tx.debtorId)).length;
  }

  async listDueTransactions(userId: number, query: DueQuery): Promise<LedgerTransactionWithDebtor[]> {
    const owned = this.ownedDebtorIds(userId);
    const cutoff = query.dueBefore?.getTime();

    return this.state.transactions
      .filter((tx) => owned.has(tx.debtorId) && tx.dueDate !== null)
      .filter((tx) => cutoff === undefined || (tx.dueDate !== null && tx.dueDate.getTime() <= cutoff))
      .sort(soonestDueFirst)
      .slice(0, query.limit)
      .map((tx) => this.withDebtorName(tx));
  }

  async getMonthlyNetChanges(userId: number, months: number): Promise<MonthlyNetChange[]> {
    const owned = this.ownedDebtorIds(userId);
    const byMonth = new Map<string, Decimal>();

    for (const tx of this.state.transactions) {
      if (!owned.has(tx.debtorId)) continue;
      const month = tx.createdAt.toISOString().slice(0, 7);
      byMonth.set(month, (byMonth.get(month) ?? new Decimal(0)).plus(signedAmount(tx)));
    }

    return [...byMonth.entries()]
      .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
      .slice(0, months)
      .map(([month, netChange]) => ({ month, netChange }));
  }

  // ---------------- Pending decisions ----------------

  private isDecisionFor(decision: PendingDecision, userId: number, sessionToken: string): boolean {
    return decision.userId === userId && decision.sessionToken === sessionToken;
  }

  async savePendingDecision(decision: PendingDecision): Promise<PendingDecision> {
    const stored: PendingDecision = { ...decision, candidateIds: [...decision.candidateIds] };
    this.state.decisions = [
      ...this.state.decisions.filter(
        (existing) => !this.isDecisionFor(existing, decision.userId, decision.sessionToken)
      ),
      stored,
    ];
    return stored;
  }

  async findPendingDecision(
    userId: number,
    sessionToken: string,
    now: Date
  ): Promise<PendingDecision | null> {
    const decision = this.state.decisions.find((existing) =>
      this.isDecisionFor(existing, userId, sessionToken)
    );
    if (!decision || decision.expiresAt.getTime() <= now.getTime()) {
      return null;
    }
    return decision;
  }

  async deletePendingDecision(userId: number, sessionToken: string): Promise<boolean> {
    const before = this.state.decisions.length;
    this.state.decisions = this.state.decisions.filter(
      (existing) => !this.isDecisionFor(existing, userId, sessionToken)
    );
    return this.state.decisions.length < before;
  }

  async purgeExpiredDecisions(now: Date): Promise<number> {
    const before = this.state.decisions.length;
    this.state.decisions = this.state.decisions.filter(
      (decision) => decision.expiresAt.getTime() > now.getTime()
    );
    return before - this.state.decisions.length;
  }
}

export class MemoryLedgerStore implements LedgerStore {
  readonly driver = 'memory' as const;

  private state: MemoryState = emptyState();
  private tail: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(options: MemoryLedgerStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  transaction<T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = cloneState(this.state);
      const result = await work(new MemoryLedgerRepository(draft, this.now));
      this.state = draft;
      return result;
    };

    const result = this.tail.then(run);
    this.tail = result.catch(() => undefined);
    return result;
  }

  async checkHealth(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }
}

export default MemoryLedgerStore;
