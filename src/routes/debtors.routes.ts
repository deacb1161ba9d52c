/**
 * Debtor API Routes
 *
 * Endpoints:
 * - GET    /               - List debtors with aliases
 * - POST   /               - Create a debtor
 * - DELETE /               - Delete every debtor of the caller
 * - POST   /resolve        - Layered name resolution (alias → name → fuzzy)
 * - POST   /search         - Fuzzy candidates only
 * - GET    /:id/balance    - Balance of one debtor
 * - GET    /:id/history    - Newest transactions of one debtor
 * - POST   /:id/aliases    - Add a nickname
 * - POST   /:id/link       - Link to an external account (id or handle)
 * - DELETE /:id            - Delete a debtor with its aliases and transactions
 *
 * Ids of other users' debtors answer 404, exactly like unknown ids.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, sendList, AppError } from '../utils';
import { commonSchemas, getCurrentUser, validate } from '../middlewares';
import {
  addAliasToDebtor,
  createDebtor,
  getDebtor,
  linkDebtor,
  linkDebtorByHandle,
  listDebtors,
  rankDebtors,
  resolveDebtor,
} from '../services/debtor.service';
import {
  countDebtors,
  deleteAllDebtors,
  deleteDebtor,
  getBalance,
  getHistory,
  DEFAULT_HISTORY_LIMIT,
} from '../services/ledger.service';

const router = Router();

// ============================================
// Schemas
// ============================================

const nameField = z.string().trim().min(1, 'name is required').max(100);

const createSchema = z.object({
  name: nameField,
});

const resolveSchema = z.object({
  name: nameField,
  threshold: z.number().min(0).max(100).optional(),
  aliasAware: z.boolean().optional(),
});

const searchSchema = z.object({
  name: nameField,
  threshold: z.number().min(0).max(100).optional(),
});

const historyQuerySchema = z.object({
  limit: commonSchemas.limit(DEFAULT_HISTORY_LIMIT),
});

const aliasSchema = z.object({
  alias: nameField,
});

const linkSchema = z.union([
  z.object({ externalId: z.string().trim().min(1).max(128) }),
  z.object({ handle: z.string().trim().min(1).max(64) }),
]);

function getDebtorId(req: Request): number {
  return validate(commonSchemas.id, req.params).id;
}

/**
 * Debtor of the caller, or 404.
 */
async function requireOwnedDebtor(req: Request) {
  const user = getCurrentUser(req);
  const debtor = await getDebtor(user.id, getDebtorId(req));

  if (!debtor) {
    throw AppError.notFound('Debtor not found');
  }
  return { user, debtor };
}

// ============================================
// Collection Routes
// ============================================

/**
 * @route   GET /api/v1/debtors
 * @desc    Debtors of the caller with their aliases, oldest first
 */
router.get(
  '/',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const debtors = await listDebtors(user.id);

    sendSuccess(res, { debtors, count: debtors.length });
  })
);

/**
 * @route   POST /api/v1/debtors
 * @desc    Create a debtor (duplicate names are allowed)
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { name } = validate(createSchema, req.body);

    const debtor = await createDebtor(user.id, name);
    sendSuccess(res, debtor, 'Debtor created', 201);
  })
);

/**
 * @route   DELETE /api/v1/debtors
 * @desc    Delete all of the caller's debtors (cascades)
 */
router.delete(
  '/',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const deleted = await deleteAllDebtors(user.id);

    sendSuccess(res, { deleted }, `Deleted ${deleted} debtors`);
  })
);

/**
 * @route   GET /api/v1/debtors/count
 */
router.get(
  '/count',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    sendSuccess(res, { count: await countDebtors(user.id) });
  })
);

// ============================================
// Matching Routes
// ============================================

/**
 * @route   POST /api/v1/debtors/resolve
 * @desc    Resolve a typed name
 *
 * Response:
 * - exactMatch: debtor or null
 * - candidates: ranked { debtor, score, matchedOn } when matchKind is "fuzzy"
 * - matchKind: alias | name | fuzzy | none
 */
router.post(
  '/resolve',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { name, threshold, aliasAware } = validate(resolveSchema, req.body);

    const resolution = await resolveDebtor(user.id, name, { threshold, aliasAware });
    sendSuccess(res, resolution);
  })
);

/**
 * @route   POST /api/v1/debtors/search
 * @desc    Fuzzy candidates over names and aliases, best first
 */
router.post(
  '/search',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { name, threshold } = validate(searchSchema, req.body);

    const candidates = await rankDebtors(user.id, name, threshold);
    sendSuccess(res, { candidates, count: candidates.length });
  })
);

// ============================================
// Single Debtor Routes
// ============================================

/**
 * @route   GET /api/v1/debtors/:id/balance
 */
router.get(
  '/:id/balance',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { debtor } = await requireOwnedDebtor(req);
    const balance = await getBalance(debtor.id);

    sendSuccess(res, { debtorId: debtor.id, debtorName: debtor.name, balance });
  })
);

/**
 * @route   GET /api/v1/debtors/:id/history?limit=10
 */
router.get(
  '/:id/history',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { debtor } = await requireOwnedDebtor(req);
    const { limit } = validate(historyQuerySchema, req.query);

    const transactions = await getHistory(debtor.id, limit);
    sendList(res, transactions, limit);
  })
);

/**
 * @route   POST /api/v1/debtors/:id/aliases
 * @desc    Add a nickname; 409 when the caller already uses it
 */
router.post(
  '/:id/aliases',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const { alias } = validate(aliasSchema, req.body);

    const created = await addAliasToDebtor(user.id, getDebtorId(req), alias);
    if (!created) {
      throw AppError.notFound('Debtor not found');
    }
    sendSuccess(res, created, 'Alias added', 201);
  })
);

/**
 * @route   POST /api/v1/debtors/:id/link
 * @desc    Route notifications for this debtor to an external account
 *
 * Request body: { externalId } or { handle }
 */
router.post(
  '/:id/link',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const debtorId = getDebtorId(req);
    const body = validate(linkSchema, req.body);

    const debtor =
      'externalId' in body
        ? await linkDebtor(user.id, debtorId, body.externalId)
        : await linkDebtorByHandle(user.id, debtorId, body.handle);

    if (!debtor) {
      throw AppError.notFound('Debtor or account not found');
    }
    sendSuccess(res, debtor, 'Debtor linked');
  })
);

/**
 * @route   DELETE /api/v1/debtors/:id
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const user = getCurrentUser(req);
    const deleted = await deleteDebtor(user.id, getDebtorId(req));

    if (!deleted) {
      throw AppError.notFound('Debtor not found');
    }
    sendSuccess(res, { deleted }, 'Debtor deleted');
  })
);

export default router;
