/**
 * User Service
 *
 * Creditor accounts are created lazily: every inbound request upserts the
 * caller by external id and refreshes the display name and handle.
 */

import { withRepository, type LedgerRepository } from '../store';
import { AppError } from '../utils/AppError';
import { requireName } from '../utils/validation';
import type { User } from '../types';

export interface UserIdentity {
  externalId: string;
  displayName: string;
  handle?: string | null;
}

/**
 * Handles are stored without the leading "@"; blank becomes null.
 */
export function normalizeHandle(handle: string | null | undefined): string | null {
  const trimmed = handle?.trim().replace(/^@+/, '');
  return trimmed ? trimmed : null;
}

/**
 * Upserts the caller on their external id.
 */
export async function getOrCreateUser(identity: UserIdentity, repo?: LedgerRepository): Promise<User> {
  const externalId = identity.externalId.trim();
  if (!externalId) {
    throw AppError.validation('externalId is required', { field: 'externalId' });
  }

  const displayName = identity.displayName.trim() ? requireName(identity.displayName, 'displayName') : externalId;

  return withRepository(repo, (client) =>
    client.upsertUser({
      externalId,
      displayName,
      handle: normalizeHandle(identity.handle),
    })
  );
}

/**
 * Case-insensitive lookup; "@alice" and "alice" find the same account.
 */
export async function findUserByHandle(handle: string, repo?: LedgerRepository): Promise<User | null> {
  const normalized = normalizeHandle(handle);
  if (!normalized) {
    return null;
  }
  return withRepository(repo, (client) => client.findUserByHandle(normalized));
}

export const userService = {
  getOrCreateUser,
  findUserByHandle,
  normalizeHandle,
};

export default userService;
