/**
 * Transaction API Routes
 *
 * Endpoints:
 * - POST   /                          - Record a debt or payment against a typed name
 * - POST   /decisions/:sessionToken   - Confirm a parked request
 * - DELETE /decisions/:sessionToken   - Cancel a parked request
 * - PATCH  /:id/due-date              - Set or clear a deadline
 * - DELETE /:id                       - Delete a transaction
 *
 * Recording answers 201 when the entry was written and 202 when the name was
 * ambiguous and the caller must confirm one of the candidates.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, AppError } from '../utils';
import { commonSchemas, getCurrentUser, validate } from '../middlewares';
import {
  cancelPendingDecision,
  confirmPendingDecision,
  recordTransaction,
} from '../services/recording.service';
import { deleteTransaction } from '../services/ledger.service';
import { setDueDate } from '../services/deadline.service';

const router = Router();

// ============================================
// Schemas
// ============================================

const amountField = z.union([z.string().trim().min(1), z.number()]);

const recordSchema = z.object({
  sessionToken: z.string().trim().min(1).max(128),
  name: z.string().trim().min(1, 'name is required').max(100),
  amount: amountField,
  kind: z.enum(['DEBT', 'CREDIT']),
  note: z.string().max(500).nullish(),
  dueDate: z.coerce.date().nullish(),
  groupTag: z.string().max(64).nullish(),
  aliasAware: z.boolean().optional(),
  threshold: z.number().min(0).max(100).optional(),
});

const choiceSchema = z.object({
  choice: z.union([z.literal('new'), z.number().int().positive()]),
});

const dueDateSchema = z.object({
  dueDate: z.coerce.date().nullable(),
});

function getTransactionId(req: Request): number {
  return validate(commonSchemas.id, req.params).id;
}

function getSessionToken(req: Request): string {
  return validate(commonSchemas.sessionToken, req.params).sessionToken;
}

// ============================================
// Recording Routes
// ============================================

/**
 * @route   POST /api/v1/transactions
 * @desc    Record a DEBT (they owe more) or CREDIT (they paid back)
 *
 * Response:
 * - 201 Created: { status: "recorded", debtor, transaction, balance, summary, ... }
 * - 202 Accepted: { status: "needs_confirmation", candidates, expiresAt }
 * - 400 Bad Request: non-positive amount, blank name
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const body = validate(recordSchema, req.body);

    const outcome = await recordTransaction({
      user,
      sessionToken: body.sessionToken,
      nameQuery: body.name,
      amount: body.amount,
      kind: body.kind,
      note: body.note,
      dueDate: body.dueDate,
      groupTag: body.groupTag,
      aliasAware: body.aliasAware,
      threshold: body.threshold,
    });

    if (outcome.status === 'needs_confirmation') {
      sendSuccess(res, outcome, 'Several debtors match; confirm one', 202);
      return;
    }
    sendSuccess(res, outcome, 'Transaction recorded', 201);
  })
);

/**
 * @route   POST /api/v1/transactions/decisions/:sessionToken
 * @desc    Confirm a parked request with a candidate id or "new"
 *
 * Response:
 * - 201 Created: recorded outcome
 * - 404 Not Found: no pending request (expired or consumed), or a debtor the caller does not own
 */
router.post(
  '/decisions/:sessionToken',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { choice } = validate(choiceSchema, req.body);

    const outcome = await confirmPendingDecision(user, getSessionToken(req), choice);

    if (outcome.status === 'expired') {
      throw AppError.notFound('No pending decision for this session');
    }
    if (outcome.status === 'rejected') {
      throw AppError.notFound('Debtor not found');
    }
    sendSuccess(res, outcome, 'Transaction recorded', 201);
  })
);

/**
 * @route   DELETE /api/v1/transactions/decisions/:sessionToken
 */
router.delete(
  '/decisions/:sessionToken',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const cancelled = await cancelPendingDecision(user, getSessionToken(req));

    sendSuccess(res, { cancelled }, cancelled ? 'Pending decision cancelled' : 'Nothing to cancel');
  })
);

// ============================================
// Single Transaction Routes
// ============================================

/**
 * @route   PATCH /api/v1/transactions/:id/due-date
 * @desc    Set a deadline, or clear it with { dueDate: null }
 */
router.patch(
  '/:id/due-date',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { dueDate } = validate(dueDateSchema, req.body);

    const transaction = await setDueDate(user.id, getTransactionId(req), dueDate);
    if (!transaction) {
      throw AppError.notFound('Transaction not found');
    }
    sendSuccess(res, transaction, dueDate ? 'Due date set' : 'Due date cleared');
  })
);

/**
 * @route   DELETE /api/v1/transactions/:id
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const deleted = await deleteTransaction(user.id, getTransactionId(req));

    if (!deleted) {
      throw AppError.notFound('Transaction not found');
    }
    sendSuccess(res, { deleted }, 'Transaction deleted');
  })
);

export default router;
