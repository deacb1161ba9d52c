/**
 * Recording Service
 *
 * The resolve → confirm → append flow behind "add debt" / "record payment":
 *
 * 1. Exact resolution (alias or name)  → append, report the new balance
 * 2. Fuzzy candidates                  → park a pending decision, ask the user
 * 3. Nothing matched                   → create the debtor, append
 *
 * A pending decision is persisted per (user, session token) with an expiry, so
 * the confirmation may arrive on another process. It is consumed by the
 * confirmation in every outcome.
 *
 * Notifications to linked counterparts go out only after the unit of work has
 * committed and never affect the recorded entry.
 */

import Decimal from 'decimal.js';
import { env } from '../config';
import { MAX_CONFIRMATION_CANDIDATES } from '../matching';
import { getLedgerStore, type LedgerRepository } from '../store';
import { AppError } from '../utils/AppError';
import { createScopedLogger } from '../utils/logger';
import { parsePositiveAmount } from '../utils/money';
import { assertValidDate, optionalText, requireName } from '../utils/validation';
import type {
  Debtor,
  DebtorBalance,
  LedgerTransaction,
  PendingDecision,
  TransactionKind,
  User,
} from '../types';
import { resolveDebtor, getOrCreateDebtor, type DebtorCandidate } from './debtor.service';
import { appendTransaction, assertKind } from './ledger.service';
import { formatNotificationMessage, notifySafely } from './notification.service';

const log = createScopedLogger('recording');

// ============================================
// Types
// ============================================

export interface RecordTransactionInput {
  user: User;
  /** Identifies the conversation/session a follow-up confirmation arrives on */
  sessionToken: string;
  nameQuery: string;
  amount: Decimal.Value;
  kind: TransactionKind;
  note?: string | null;
  dueDate?: Date | null;
  groupTag?: string | null;
  /** Layered alias-aware resolution (default true) */
  aliasAware?: boolean;
  threshold?: number;
  now?: Date;
}

export type RecordedMatchKind = 'alias' | 'name' | 'created' | 'confirmed';

export interface RecordedOutcome {
  status: 'recorded';
  matchKind: RecordedMatchKind;
  debtor: Debtor;
  transaction: LedgerTransaction;
  balance: Decimal;
  /** The user's non-zero balances after the write */
  summary: DebtorBalance[];
  notified: boolean;
}

export interface NeedsConfirmationOutcome {
  status: 'needs_confirmation';
  sessionToken: string;
  candidates: DebtorCandidate[];
  expiresAt: Date;
}

export type RecordOutcome = RecordedOutcome | NeedsConfirmationOutcome;

/** A candidate debtor id, or 'new' to create a debtor named as typed */
export type DecisionChoice = number | 'new';

export type ConfirmOutcome = RecordedOutcome | { status: 'expired' } | { status: 'rejected' };

interface EntryFields {
  amount: Decimal;
  kind: TransactionKind;
  note: string | null;
  dueDate: Date | null;
  groupTag: string | null;
}

type Committed = Omit<RecordedOutcome, 'notified'>;

// ============================================
// Helpers
// ============================================

function requireSessionToken(sessionToken: string): string {
  const token = sessionToken.trim();
  if (!token) {
    throw AppError.validation('sessionToken is required', { field: 'sessionToken' });
  }
  return token;
}

async function appendAndSummarize(
  repo: LedgerRepository,
  user: User,
  debtor: Debtor,
  fields: EntryFields,
  matchKind: RecordedMatchKind
): Promise<Committed> {
  const transaction = await appendTransaction({ debtorId: debtor.id, ...fields }, repo);
  const balance = await repo.getBalance(debtor.id);
  const summary = await repo.getBalances(user.id);

  log.info(`User ${user.id} recorded ${fields.kind} ${fields.amount.toFixed(2)} for debtor ${debtor.id} (${matchKind})`);
  return { status: 'recorded', matchKind, debtor, transaction, balance, summary };
}

async function notifyCounterpart(user: User, committed: Committed): Promise<RecordedOutcome> {
  const { debtor, transaction } = committed;
  if (!debtor.externalId) {
    return { ...committed, notified: false };
  }

  const message = formatNotificationMessage({
    creditorName: user.displayName,
    amount: transaction.amount,
    kind: transaction.kind,
    note: transaction.note,
  });
  return { ...committed, notified: await notifySafely(debtor.externalId, message) };
}

// ============================================
// Operations
// ============================================

/**
 * Resolves the named debtor and records the entry, or parks the request until
 * the user confirms one of the fuzzy candidates.
 */
export async function recordTransaction(input: RecordTransactionInput): Promise<RecordOutcome> {
  const { user } = input;
  const sessionToken = requireSessionToken(input.sessionToken);
  const nameQuery = requireName(input.nameQuery, 'nameQuery');
  const fields: EntryFields = {
    amount: parsePositiveAmount(input.amount),
    kind: assertKind(input.kind),
    note: optionalText(input.note),
    dueDate: input.dueDate ? assertValidDate(input.dueDate) : null,
    groupTag: optionalText(input.groupTag),
  };
  const now = input.now ?? new Date();

  const outcome = await getLedgerStore().transaction<Committed | NeedsConfirmationOutcome>(async (repo) => {
    const resolution = await resolveDebtor(
      user.id,
      nameQuery,
      { threshold: input.threshold, aliasAware: input.aliasAware },
      repo
    );

    if (resolution.exactMatch) {
      const matchKind = resolution.matchKind === 'alias' ? 'alias' : 'name';
      return appendAndSummarize(repo, user, resolution.exactMatch, fields, matchKind);
    }

    if (resolution.candidates.length > 0) {
      const candidates = resolution.candidates.slice(0, MAX_CONFIRMATION_CANDIDATES);
      const decision: PendingDecision = {
        userId: user.id,
        sessionToken,
        nameQuery,
        ...fields,
        candidateIds: candidates.map((candidate) => candidate.debtor.id),
        createdAt: now,
        expiresAt: new Date(now.getTime() + env.PENDING_DECISION_TTL_SECONDS * 1000),
      };

      await repo.purgeExpiredDecisions(now);
      await repo.savePendingDecision(decision);
      log.debug(`User ${user.id} must confirm "${nameQuery}" among ${candidates.length} candidates`);

      return { status: 'needs_confirmation', sessionToken, candidates, expiresAt: decision.expiresAt };
    }

    const debtor = await getOrCreateDebtor(user.id, nameQuery, repo);
    return appendAndSummarize(repo, user, debtor, fields, 'created');
  });

  if (outcome.status === 'needs_confirmation') {
    return outcome;
  }
  return notifyCounterpart(user, outcome);
}

/**
 * Completes a parked request with the user's choice.
 * - missing or expired decision → expired
 * - a debtor id that was not offered, or no longer exists → rejected
 */
export async function confirmPendingDecision(
  user: User,
  sessionToken: string,
  choice: DecisionChoice,
  now: Date = new Date()
): Promise<ConfirmOutcome> {
  const token = requireSessionToken(sessionToken);

  const outcome = await getLedgerStore().transaction<Committed | { status: 'expired' } | { status: 'rejected' }>(
    async (repo) => {
      const decision = await repo.findPendingDecision(user.id, token, now);
      await repo.deletePendingDecision(user.id, token);

      if (!decision) {
        return { status: 'expired' };
      }

      const fields: EntryFields = {
        amount: decision.amount,
        kind: decision.kind,
        note: decision.note,
        dueDate: decision.dueDate,
        groupTag: decision.groupTag,
      };

      if (choice === 'new') {
        const debtor = await repo.createDebtor({ userId: user.id, name: decision.nameQuery, externalId: null });
        return appendAndSummarize(repo, user, debtor, fields, 'created');
      }

      if (!decision.candidateIds.includes(choice)) {
        log.warn(`User ${user.id} confirmed debtor ${choice}, which was not offered`);
        return { status: 'rejected' };
      }

      const debtor = await repo.findDebtor(user.id, choice);
      if (!debtor) {
        log.warn(`User ${user.id} confirmed debtor ${choice} they do not own`);
        return { status: 'rejected' };
      }
      return appendAndSummarize(repo, user, debtor, fields, 'confirmed');
    }
  );

  if (outcome.status !== 'recorded') {
    return outcome;
  }
  return notifyCounterpart(user, outcome);
}

/**
 * Drops a parked request; false when there was none.
 */
export async function cancelPendingDecision(user: User, sessionToken: string): Promise<boolean> {
  const token = requireSessionToken(sessionToken);
  return getLedgerStore().transaction((repo) => repo.deletePendingDecision(user.id, token));
}

export const recordingService = {
  recordTransaction,
  confirmPendingDecision,
  cancelPendingDecision,
};

export default recordingService;
