/**
 * Caller identity
 *
 * The authenticating gateway in front of this API forwards the caller as
 * headers; issuing sessions happens there. Each request upserts the caller so
 * accounts exist from the first call.
 *
 *   X-User-Id      external id (required)
 *   X-User-Name    display name (defaults to the id)
 *   X-User-Handle  handle used for cross-account linking
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getOrCreateUser } from '../services/user.service';
import { AppError } from '../utils/AppError';
import type { User } from '../types';

const identitySchema = z.object({
  externalId: z.string().trim().min(1).max(128),
  displayName: z.string().trim().max(128).optional(),
  handle: z.string().trim().max(64).optional(),
});

const currentUsers = new WeakMap<Request, User>();

export const setCurrentUser = (req: Request, user: User): void => {
  currentUsers.set(req, user);
};

/**
 * The user attached by `requireUser`; 401 when the route is not behind it.
 */
export const getCurrentUser = (req: Request): User => {
  const user = currentUsers.get(req);
  if (!user) {
    throw AppError.unauthorized('Missing user identity');
  }
  return user;
};

export const requireUser = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
  try {
    const parsed = identitySchema.safeParse({
      externalId: req.get('x-user-id'),
      displayName: req.get('x-user-name'),
      handle: req.get('x-user-handle'),
    });

    if (!parsed.success) {
      throw AppError.unauthorized('Missing or invalid X-User-Id header');
    }

    const { externalId, displayName, handle } = parsed.data;
    const user = await getOrCreateUser({
      externalId,
      displayName: displayName || externalId,
      handle: handle ?? null,
    });

    setCurrentUser(req, user);
    next();
  } catch (error) {
    next(error);
  }
};

export default requireUser;
