import { promises as fs } from 'fs';
import path from 'path';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import Decimal from 'decimal.js';
import { env } from '../config';
import { createScopedLogger } from '../utils/logger';
import { AppError } from '../utils/AppError';
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

const log = createScopedLogger('store');

const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

const UNIQUE_VIOLATION = '23505';

// ============================================================================
// ROW SHAPES (NUMERIC comes back as string, COUNT as bigint string)
// ============================================================================

interface UserRow extends QueryResultRow {
  id: number;
  external_id: string;
  display_name: string;
  handle: string | null;
  created_at: Date;
}

interface DebtorRow extends QueryResultRow {
  id: number;
  user_id: number;
  name: string;
  external_id: string | null;
  created_at: Date;
}

interface DebtorWithAliasesRow extends DebtorRow {
  aliases: string[];
}

interface AliasRow extends QueryResultRow {
  id: number;
  debtor_id: number;
  user_id: number;
  alias_name: string;
  created_at: Date;
}

interface AliasWithDebtorRow extends AliasRow {
  debtor_name: string;
}

interface TransactionRow extends QueryResultRow {
  id: number;
  debtor_id: number;
  amount: string;
  kind: TransactionKind;
  note: string | null;
  due_date: Date | null;
  group_tag: string | null;
  created_at: Date;
}

interface TransactionWithDebtorRow extends TransactionRow {
  debtor_name: string;
}

interface BalanceRow extends QueryResultRow {
  debtor_name: string;
  debtor_id: number;
  balance: string;
}

interface MonthlyRow extends QueryResultRow {
  month: string;
  net_change: string;
}

interface PendingDecisionRow extends QueryResultRow {
  user_id: number;
  session_token: string;
  name_query: string;
  amount: string;
  kind: TransactionKind;
  note: string | null;
  due_date: Date | null;
  group_tag: string | null;
  candidate_ids: number[];
  created_at: Date;
  expires_at: Date;
}

interface CountRow extends QueryResultRow {
  count: string;
}

interface SumRow extends QueryResultRow {
  balance: string;
}

const toUser = (row: UserRow): User => ({
  id: row.id,
  externalId: row.external_id,
  displayName: row.display_name,
  handle: row.handle,
  createdAt: row.created_at,
});

const toDebtor = (row: DebtorRow): Debtor => ({
  id: row.id,
  userId: row.user_id,
  name: row.name,
  externalId: row.external_id,
  createdAt: row.created_at,
});

const toAlias = (row: AliasRow): Alias => ({
  id: row.id,
  debtorId: row.debtor_id,
  userId: row.user_id,
  aliasName: row.alias_name,
  createdAt: row.created_at,
});

const toTransaction = (row: TransactionRow): LedgerTransaction => ({
  id: row.id,
  debtorId: row.debtor_id,
  amount: new Decimal(row.amount),
  kind: row.kind,
  note: row.note,
  dueDate: row.due_date,
  groupTag: row.group_tag,
  createdAt: row.created_at,
});

const toTransactionWithDebtor = (row: TransactionWithDebtorRow): LedgerTransactionWithDebtor => ({
  ...toTransaction(row),
  debtorName: row.debtor_name,
});

const toPendingDecision = (row: PendingDecisionRow): PendingDecision => ({
  userId: row.user_id,
  sessionToken: row.session_token,
  nameQuery: row.name_query,
  amount: new Decimal(row.amount),
  kind: row.kind,
  note: row.note,
  dueDate: row.due_date,
  groupTag: row.group_tag,
  candidateIds: row.candidate_ids,
  createdAt: row.created_at,
  expiresAt: row.expires_at,
});

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

// Signed contribution of one transaction row to a balance
const SIGNED_AMOUNT = `CASE WHEN t.kind = 'DEBT' THEN t.amount ELSE -t.amount END`;

const TRANSACTION_WITH_DEBTOR_COLUMNS = `t.*, d.name AS debtor_name`;

// ============================================================================
// REPOSITORY (bound to one pooled client inside BEGIN ... COMMIT)
// ============================================================================

class PostgresLedgerRepository implements LedgerRepository {
  constructor(private readonly client: PoolClient) {}

  private async many<R extends QueryResultRow>(sql: string, params: unknown[]): Promise<R[]> {
    const result = await this.client.query<R>(sql, params);
    return result.rows;
  }

  private async one<R extends QueryResultRow>(sql: string, params: unknown[]): Promise<R | null> {
    const rows = await this.many<R>(sql, params);
    return rows[0] ?? null;
  }

  private async affected(sql: string, params: unknown[]): Promise<number> {
    const result = await this.client.query(sql, params);
    return result.rowCount ?? 0;
  }

  private async count(sql: string, params: unknown[]): Promise<number> {
    const row = await this.one<CountRow>(sql, params);
    return Number(row?.count ?? 0);
  }

  // ---------------- Users ----------------

  async upsertUser(input: UpsertUserInput): Promise<User> {
    const row = await this.one<UserRow>(
      `INSERT INTO users (external_id, display_name, handle)
       VALUES ($1, $2, $3)
       ON CONFLICT (external_id)
       DO UPDATE SET display_name = EXCLUDED.display_name, handle = EXCLUDED.handle
       RETURNING *`,
      [input.externalId, input.displayName, input.handle]
    );
    if (!row) {
      throw AppError.internal('User upsert returned no row');
    }
    return toUser(row);
  }

  async findUserByExternalId(externalId: string): Promise<User | null> {
    const row = await this.one<UserRow>('SELECT * FROM users WHERE external_id = $1', [externalId]);
    return row ? toUser(row) : null;
  }

  async findUserByHandle(handle: string): Promise<User | null> {
    const row = await this.one<UserRow>(
      'SELECT * FROM users WHERE lower(handle) = lower($1) ORDER BY id LIMIT 1',
      [handle]
    );
    return row ? toUser(row) : null;
  }

  async lockUser(userId: number): Promise<void> {
    await this.client.query('SELECT id FROM users WHERE id = $1 FOR UPDATE', [userId]);
  }

  // ---------------- Debtors ----------------

  async listDebtors(userId: number): Promise<DebtorWithAliases[]> {
    const rows = await this.many<DebtorWithAliasesRow>(
      `SELECT d.*,
              COALESCE(array_agg(a.alias_name ORDER BY a.id) FILTER (WHERE a.id IS NOT NULL), '{}') AS aliases
       FROM debtors d
       LEFT JOIN aliases a ON a.debtor_id = d.id
       WHERE d.user_id = $1
       GROUP BY d.id
       ORDER BY d.id`,
      [userId]
    );
    return rows.map((row) => ({ ...toDebtor(row), aliases: row.aliases }));
  }

  async findDebtor(userId: number, debtorId: number): Promise<Debtor | null> {
    const row = await this.one<DebtorRow>('SELECT * FROM debtors WHERE id = $1 AND user_id = $2', [
      debtorId,
      userId,
    ]);
    return row ? toDebtor(row) : null;
  }

  async findDebtorByExternalId(userId: number, externalId: string): Promise<Debtor | null> {
    const row = await this.one<DebtorRow>(
      'SELECT * FROM debtors WHERE user_id = $1 AND external_id = $2 ORDER BY id LIMIT 1',
      [userId, externalId]
    );
    return row ? toDebtor(row) : null;
  }

  async createDebtor(input: NewDebtor): Promise<Debtor> {
    const row = await this.one<DebtorRow>(
      'INSERT INTO debtors (user_id, name, external_id) VALUES ($1, $2, $3) RETURNING *',
      [input.userId, input.name, input.externalId]
    );
    if (!row) {
      throw AppError.internal('Debtor insert returned no row');
    }
    return toDebtor(row);
  }

  async updateDebtor(debtorId: number, patch: DebtorPatch): Promise<Debtor> {
    const row = await this.one<DebtorRow>(
      `UPDATE debtors
       SET name = COALESCE($2, name),
           external_id = CASE WHEN $3::boolean THEN $4::text ELSE external_id END
       WHERE id = $1
       RETURNING *`,
      [debtorId, patch.name ?? null, patch.externalId !== undefined, patch.externalId ?? null]
    );
    if (!row) {
      throw AppError.notFound(`Debtor not found: ${debtorId}`);
    }
    return toDebtor(row);
  }

  async deleteDebtor(userId: number, debtorId: number): Promise<boolean> {
    const removed = await this.affected('DELETE FROM debtors WHERE id = $1 AND user_id = $2', [
      debtorId,
      userId,
    ]);
    return removed > 0;
  }

  async deleteAllDebtors(userId: number): Promise<number> {
    return this.affected('DELETE FROM debtors WHERE user_id = $1', [userId]);
  }

  async countDebtors(userId: number): Promise<number> {
    return this.count('SELECT COUNT(*) AS count FROM debtors WHERE user_id = $1', [userId]);
  }

  // ---------------- Aliases ----------------

  async findAlias(userId: number, aliasName: string): Promise<AliasWithDebtor | null> {
    const row = await this.one<AliasWithDebtorRow>(
      `SELECT a.*, d.name AS debtor_name
       FROM aliases a
       JOIN debtors d ON d.id = a.debtor_id
       WHERE a.user_id = $1 AND lower(a.alias_name) = lower($2)
       LIMIT 1`,
      [userId, aliasName]
    );
    return row ? { ...toAlias(row), debtorName: row.debtor_name } : null;
  }

  async createAlias(input: NewAlias): Promise<Alias> {
    try {
      const row = await this.one<AliasRow>(
        'INSERT INTO aliases (debtor_id, user_id, alias_name) VALUES ($1, $2, $3) RETURNING *',
        [input.debtorId, input.userId, input.aliasName]
      );
      if (!row) {
        throw AppError.internal('Alias insert returned no row');
      }
      return toAlias(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw AppError.conflict(`Alias "${input.aliasName}" is already in use`, {
          alias: input.aliasName,
        });
      }
      throw error;
    }
  }

  // ---------------- Transactions ----------------

  async insertTransaction(input: NewTransaction): Promise<LedgerTransaction> {
    const row = await this.one<TransactionRow>(
      `INSERT INTO transactions (debtor_id, amount, kind, note, due_date, group_tag)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [input.debtorId, input.amount.toFixed(2), input.kind, input.note, input.dueDate, input.groupTag]
    );
    if (!row) {
      throw AppError.internal('Transaction insert returned no row');
    }
    return toTransaction(row);
  }

  async findTransaction(userId: number, transactionId: number): Promise<LedgerTransaction | null> {
    const row = await this.one<TransactionRow>(
      `SELECT t.*
       FROM transactions t
       JOIN debtors d ON d.id = t.debtor_id
       WHERE t.id = $1 AND d.user_id = $2`,
      [transactionId, userId]
    );
    return row ? toTransaction(row) : null;
  }

  async deleteTransaction(userId: number, transactionId: number): Promise<boolean> {
    const removed = await this.affected(
      `DELETE FROM transactions t
       USING debtors d
       WHERE t.id = $1 AND d.id = t.debtor_id AND d.user_id = $2`,
      [transactionId, userId]
    );
    return removed > 0;
  }

  async updateDueDate(transactionId: number, dueDate: Date | null): Promise<LedgerTransaction> {
    const row = await this.one<TransactionRow>(
      'UPDATE transactions SET due_date = $2 WHERE id = $1 RETURNING *',
      [transactionId, dueDate]
    );
    if (!row) {
      throw AppError.notFound(`Transaction not found: ${transactionId}`);
    }
    return toTransaction(row);
  }

  async getBalance(debtorId: number): Promise<Decimal> {
    const row = await this.one<SumRow>(
      `SELECT COALESCE(SUM(${SIGNED_AMOUNT}), 0) AS balance FROM transactions t WHERE t.debtor_id = $1`,
      [debtorId]
    );
    return new Decimal(row?.balance ?? 0);
  }

  async getBalances(userId: number, query: BalanceQuery = {}): Promise<DebtorBalance[]> {
    const rows = await this.many<BalanceRow>(
      `SELECT d.name AS debtor_name,
              d.id AS debtor_id,
              COALESCE(SUM(${SIGNED_AMOUNT}), 0) AS balance
       FROM debtors d
       LEFT JOIN transactions t ON t.debtor_id = d.id
       WHERE d.user_id = $1
       GROUP BY d.id, d.name
       HAVING $2::boolean OR COALESCE(SUM(${SIGNED_AMOUNT}), 0) <> 0
       ORDER BY balance DESC, d.id ASC`,
      [userId, query.includeZero === true]
    );
    return rows.map((row) => ({
      debtorName: row.debtor_name,
      debtorId: row.debtor_id,
      balance: new Decimal(row.balance),
    }));
  }

  async listTransactions(debtorId: number, limit: number): Promise<LedgerTransaction[]> {
    const rows = await this.many<TransactionRow>(
      `SELECT * FROM transactions
       WHERE debtor_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [debtorId, limit]
    );
    return rows.map(toTransaction);
  }

  async listTransactionsForUser(
    userId: number,
    query: UserHistoryQuery
  ): Promise<LedgerTransactionWithDebtor[]> {
    const rows = await this.many<TransactionWithDebtorRow>(
      `SELECT ${TRANSACTION_WITH_DEBTOR_COLUMNS}
       FROM transactions t
       JOIN debtors d ON d.id = t.debtor_id
       WHERE d.user_id = $1 AND ($2::int IS NULL OR t.debtor_id = $2::int)
       ORDER BY t.created_at DESC, t.id DESC
       LIMIT $3`,
      [userId, query.debtorId ?? null, query.limit]
    );
    return rows.map(toTransactionWithDebtor);
  }

  async countTransactions(userId: number): Promise<number> {
    return this.count(
      `SELECT COUNT(*) AS count
       FROM transactions t
       JOIN debtors d ON d.id = t.debtor_id
       WHERE d.user_id = $1`,
      [userId]
    );
  }

  async listDueTransactions(userId: number, query: DueQuery): Promise<LedgerTransactionWithDebtor[]> {
    const rows = await this.many<TransactionWithDebtorRow>(
      `SELECT ${TRANSACTION_WITH_DEBTOR_COLUMNS}
       FROM transactions t
       JOIN debtors d ON d.id = t.debtor_id
       WHERE d.user_id = $1
         AND t.due_date IS NOT NULL
         AND ($2::timestamptz IS NULL OR t.due_date <= $2::timestamptz)
       ORDER BY t.due_date ASC, t.created_at ASC, t.id ASC
       LIMIT $3`,
      [userId, query.dueBefore ?? null, query.limit]
    );
    return rows.map(toTransactionWithDebtor);
  }

  async getMonthlyNetChanges(userId: number, months: number): Promise<MonthlyNetChange[]> {
    const rows = await this.many<MonthlyRow>(
      `SELECT to_char(date_trunc('month', t.created_at AT TIME ZONE 'UTC'), 'YYYY-MM') AS month,
              SUM(${SIGNED_AMOUNT}) AS net_change
       FROM transactions t
       JOIN debtors d ON d.id = t.debtor_id
       WHERE d.user_id = $1
       GROUP BY month
       ORDER BY month DESC
       LIMIT $2`,
      [userId, months]
    );
    return rows.map((row) => ({ month: row.month, netChange: new Decimal(row.net_change) }));
  }

  // ---------------- Pending decisions ----------------

  async savePendingDecision(decision: PendingDecision): Promise<PendingDecision> {
    const row = await this.one<PendingDecisionRow>(
      `INSERT INTO pending_decisions
         (user_id, session_token, name_query, amount, kind, note, due_date, group_tag,
          candidate_ids, created_at, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (user_id, session_token) DO UPDATE SET
         name_query = EXCLUDED.name_query,
         amount = EXCLUDED.amount,
         kind = EXCLUDED.kind,
         note = EXCLUDED.note,
         due_date = EXCLUDED.due_date,
         group_tag = EXCLUDED.group_tag,
         candidate_ids = EXCLUDED.candidate_ids,
         created_at = EXCLUDED.created_at,
         expires_at = EXCLUDED.expires_at
       RETURNING *`,
      [
        decision.userId,
        decision.sessionToken,
        decision.nameQuery,
        decision.amount.toFixed(2),
        decision.kind,
        decision.note,
        decision.dueDate,
        decision.groupTag,
        decision.candidateIds,
        decision.createdAt,
        decision.expiresAt,
      ]
    );
    if (!row) {
      throw AppError.internal('Pending decision upsert returned no row');
    }
    return toPendingDecision(row);
  }

  async findPendingDecision(
    userId: number,
    sessionToken: string,
    now: Date
  ): Promise<PendingDecision | null> {
    const row = await this.one<PendingDecisionRow>(
      `SELECT * FROM pending_decisions
       WHERE user_id = $1 AND session_token = $2 AND expires_at > $3`,
      [userId, sessionToken, now]
    );
    return row ? toPendingDecision(row) : null;
  }

  async deletePendingDecision(userId: number, sessionToken: string): Promise<boolean> {
    const removed = await this.affected(
      'DELETE FROM pending_decisions WHERE user_id = $1 AND session_token = $2',
      [userId, sessionToken]
    );
    return removed > 0;
  }

  async purgeExpiredDecisions(now: Date): Promise<number> {
    return this.affected('DELETE FROM pending_decisions WHERE expires_at <= $1', [now]);
  }
}

// ============================================================================
// STORE
// ============================================================================

export interface PostgresLedgerStoreOptions {
  connectionString?: string;
  max?: number;
}

export class PostgresLedgerStore implements LedgerStore {
  readonly driver = 'postgres' as const;

  private readonly pool: Pool;

  constructor(options: PostgresLedgerStoreOptions = {}) {
    this.pool = new Pool({
      connectionString: options.connectionString ?? env.DATABASE_URL,
      max: options.max ?? env.DATABASE_POOL_SIZE,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000,
    });

    this.pool.on('error', (error) => {
      log.error('Idle database client error:', error);
    });
  }

  /**
   * Applies db/schema.sql (idempotent).
   */
  async initSchema(): Promise<void> {
    const sql = await fs.readFile(SCHEMA_PATH, 'utf8');
    await this.pool.query(sql);
    log.info('📦 Database schema ready');
  }

  async transaction<T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PostgresLedgerRepository(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        log.error('ROLLBACK failed:', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      log.warn('Database health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    log.info('📦 Database pool closed');
  }
}

export default PostgresLedgerStore;
