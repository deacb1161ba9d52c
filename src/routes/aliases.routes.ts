/**
 * Alias API Routes
 *
 * Endpoints:
 * - POST /        - Add a nickname to the debtor named exactly `name`
 * - GET  /:alias  - Debtor behind a nickname
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, AppError } from '../utils';
import { getCurrentUser, validate } from '../middlewares';
import { addAlias, getDebtorByAlias } from '../services/debtor.service';

const router = Router();

const addAliasSchema = z.object({
  alias: z.string().trim().min(1, 'alias is required').max(100),
  name: z.string().trim().min(1, 'name is required').max(100),
});

const aliasParamsSchema = z.object({
  alias: z.string().trim().min(1).max(100),
});

/**
 * @route   POST /api/v1/aliases
 * @desc    Add a nickname by the debtor's real name
 *
 * Response:
 * - 201 Created: { alias, debtor }
 * - 404 Not Found: no debtor with that name
 * - 409 Conflict: nickname already used by one of the caller's debtors
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { alias, name } = validate(addAliasSchema, req.body);

    const result = await addAlias(user.id, alias, name);
    if (result.status === 'not_found') {
      throw AppError.notFound(`No debtor named "${name}"`);
    }
    sendSuccess(res, { alias: result.alias, debtor: result.debtor }, 'Alias added', 201);
  })
);

/**
 * @route   GET /api/v1/aliases/:alias
 */
router.get(
  '/:alias',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { alias } = validate(aliasParamsSchema, req.params);

    const debtor = await getDebtorByAlias(user.id, alias);
    if (!debtor) {
      throw AppError.notFound('Alias not found');
    }
    sendSuccess(res, debtor);
  })
);

export default router;
