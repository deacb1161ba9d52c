/**
 * Balance and Deadline Routes
 *
 * Endpoints:
 * - GET /balances   - Non-zero balances, most owed first
 * - GET /deadlines  - Transactions with a due date, soonest (and overdue) first
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, sendList } from '../utils';
import { commonSchemas, getCurrentUser, validate } from '../middlewares';
import { getAllBalances } from '../services/ledger.service';
import { listUpcoming, DEFAULT_UPCOMING_LIMIT } from '../services/deadline.service';

const router = Router();

const deadlinesQuerySchema = z.object({
  limit: commonSchemas.limit(DEFAULT_UPCOMING_LIMIT),
  withinDays: z.coerce.number().int().min(0).max(3650).optional(),
});

/**
 * @route   GET /api/v1/balances
 */
router.get(
  '/balances',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const balances = await getAllBalances(user.id);

    sendSuccess(res, { balances, count: balances.length });
  })
);

/**
 * @route   GET /api/v1/deadlines?withinDays=7&limit=20
 * @desc    Overdue entries always qualify; withinDays bounds future ones
 */
router.get(
  '/deadlines',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { limit, withinDays } = validate(deadlinesQuerySchema, req.query);

    const transactions = await listUpcoming(user.id, { limit, withinDays });
    sendList(res, transactions, limit);
  })
);

export default router;
