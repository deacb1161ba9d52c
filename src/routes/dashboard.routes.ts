/**
 * Dashboard Routes
 *
 * Read-only aggregates for the web dashboard.
 *
 * Endpoints:
 * - GET /summary                      - Totals and counts
 * - GET /debts                        - Balance per person
 * - GET /history?debtorId=&limit=50   - Newest transactions with debtor names
 * - GET /trends?months=12             - Net change per month
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, sendList } from '../utils';
import { commonSchemas, getCurrentUser, validate } from '../middlewares';
import {
  getDebtByPerson,
  getMonthlyTrends,
  getTransactionHistoryForUser,
  getUserSummary,
  DEFAULT_DASHBOARD_HISTORY_LIMIT,
  DEFAULT_TREND_MONTHS,
} from '../services/dashboard.service';

const router = Router();

const historyQuerySchema = z.object({
  debtorId: z.coerce.number().int().positive().optional(),
  limit: commonSchemas.limit(DEFAULT_DASHBOARD_HISTORY_LIMIT),
});

const trendsQuerySchema = z.object({
  months: commonSchemas.limit(DEFAULT_TREND_MONTHS, 120),
});

/**
 * @route   GET /api/v1/dashboard/summary
 */
router.get(
  '/summary',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    sendSuccess(res, await getUserSummary(user.id));
  })
);

/**
 * @route   GET /api/v1/dashboard/debts
 */
router.get(
  '/debts',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const debts = await getDebtByPerson(user.id);

    sendSuccess(res, { debts, count: debts.length });
  })
);

/**
 * @route   GET /api/v1/dashboard/history
 * @desc    A debtorId of another user yields an empty list
 */
router.get(
  '/history',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { debtorId, limit } = validate(historyQuerySchema, req.query);

    const transactions = await getTransactionHistoryForUser(user.id, { debtorId, limit });
    sendList(res, transactions, limit);
  })
);

/**
 * @route   GET /api/v1/dashboard/trends
 */
router.get(
  '/trends',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { months } = validate(trendsQuerySchema, req.query);

    const trends = await getMonthlyTrends(user.id, months);
    sendSuccess(res, { trends, months });
  })
);

export default router;
