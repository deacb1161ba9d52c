/**
 * Debtor Service
 *
 * Owns debtors, their aliases and their links to external identities, and runs
 * the matching engine against one user's debtor set.
 *
 * RULES:
 * - Every read and write is scoped to the owning user id
 * - Lookups by id that miss or hit another user's debtor return null (fail-closed)
 * - Alias names are unique per user, case-insensitively; collisions are rejected
 * - Fuzzy candidates are never auto-resolved; callers confirm them
 */

import { env } from '../config';
import {
  findByAlias,
  findByName,
  rankCandidates,
  resolveAgainst,
  type MatchKind,
  type RankedCandidate,
  type Resolution,
} from '../matching';
import { withRepository, type LedgerRepository } from '../store';
import { AppError } from '../utils/AppError';
import { createScopedLogger } from '../utils/logger';
import { assertThreshold, requireName } from '../utils/validation';
import type { Alias, Debtor, DebtorWithAliases } from '../types';
import { normalizeHandle } from './user.service';

const log = createScopedLogger('debtors');

// ============================================
// Types
// ============================================

export interface ResolveDebtorOptions {
  threshold?: number;
  /** Layered alias → name → fuzzy resolution (default true) */
  aliasAware?: boolean;
}

export type DebtorResolution = Resolution<DebtorWithAliases>;

export type DebtorCandidate = RankedCandidate<DebtorWithAliases>;

export interface ResolveOrCreateResult {
  debtor: Debtor;
  matchKind: Extract<MatchKind, 'alias' | 'name'> | 'created';
}

export type AddAliasResult =
  | { status: 'created'; alias: Alias; debtor: Debtor }
  | { status: 'not_found' };

export type ExternalLinkOutcome = 'already_linked' | 'linked_candidate' | 'created';

export interface ExternalLinkResult {
  debtor: Debtor;
  outcome: ExternalLinkOutcome;
}

// ============================================
// Matching
// ============================================

/**
 * Resolves a typed name to one of the user's debtors.
 *
 * Layered: alias exact → name exact → fuzzy candidates → none.
 * With `aliasAware: false`, plain fuzzy ranking over names where a score of
 * 100 counts as exact.
 */
export async function resolveDebtor(
  userId: number,
  nameQuery: string,
  options: ResolveDebtorOptions = {},
  repo?: LedgerRepository
): Promise<DebtorResolution> {
  const query = requireName(nameQuery, 'nameQuery');
  const threshold = assertThreshold(options.threshold ?? env.MATCH_THRESHOLD);

  return withRepository(repo, async (client) => {
    const debtors = await client.listDebtors(userId);
    const resolution = resolveAgainst(query, debtors, { threshold, aliasAware: options.aliasAware });

    log.debug(
      `resolve "${query}" for user ${userId}: ${resolution.matchKind} (${resolution.candidates.length} candidates)`
    );
    return resolution;
  });
}

/**
 * Alias-aware fuzzy ranking of the user's debtors, best first.
 */
export async function rankDebtors(
  userId: number,
  nameQuery: string,
  threshold: number = env.MATCH_THRESHOLD,
  repo?: LedgerRepository
): Promise<DebtorCandidate[]> {
  const query = requireName(nameQuery, 'nameQuery');
  const checked = assertThreshold(threshold);

  return withRepository(repo, async (client) => {
    const debtors = await client.listDebtors(userId);
    return rankCandidates(query, debtors, { threshold: checked, includeAliases: true });
  });
}

/**
 * Guarantees a target debtor: alias exact → name exact → create.
 * Fuzzy candidates never satisfy it; a substring hit would silently pick the
 * wrong person.
 */
export async function resolveOrCreate(
  userId: number,
  nameQuery: string,
  repo?: LedgerRepository
): Promise<ResolveOrCreateResult> {
  const name = requireName(nameQuery, 'nameQuery');

  return withRepository(repo, async (client) => {
    await client.lockUser(userId);
    const debtors = await client.listDebtors(userId);

    const aliasMatch = findByAlias(name, debtors);
    if (aliasMatch) {
      return { debtor: aliasMatch, matchKind: 'alias' };
    }

    const nameMatch = findByName(name, debtors);
    if (nameMatch) {
      return { debtor: nameMatch, matchKind: 'name' };
    }

    const debtor = await client.createDebtor({ userId, name, externalId: null });
    log.info(`Created debtor ${debtor.id} "${name}" for user ${userId}`);
    return { debtor, matchKind: 'created' };
  });
}

// ============================================
// Debtor CRUD
// ============================================

export async function createDebtor(userId: number, name: string, repo?: LedgerRepository): Promise<Debtor> {
  const cleaned = requireName(name);

  return withRepository(repo, async (client) => {
    const debtor = await client.createDebtor({ userId, name: cleaned, externalId: null });
    log.info(`Created debtor ${debtor.id} "${cleaned}" for user ${userId}`);
    return debtor;
  });
}

/**
 * Exact (case-insensitive) name match or create, under the user's lock so two
 * concurrent calls cannot both create.
 */
export async function getOrCreateDebtor(
  userId: number,
  name: string,
  repo?: LedgerRepository
): Promise<Debtor> {
  const cleaned = requireName(name);

  return withRepository(repo, async (client) => {
    await client.lockUser(userId);
    const existing = findByName(cleaned, await client.listDebtors(userId));
    if (existing) {
      return existing;
    }
    return client.createDebtor({ userId, name: cleaned, externalId: null });
  });
}

/**
 * All debtors of a user with their aliases, oldest first.
 */
export async function listDebtors(userId: number, repo?: LedgerRepository): Promise<DebtorWithAliases[]> {
  return withRepository(repo, (client) => client.listDebtors(userId));
}

export async function getDebtor(
  userId: number,
  debtorId: number,
  repo?: LedgerRepository
): Promise<Debtor | null> {
  return withRepository(repo, (client) => client.findDebtor(userId, debtorId));
}

// ============================================
// Aliases
// ============================================

async function createAliasFor(
  client: LedgerRepository,
  userId: number,
  debtor: Debtor,
  aliasName: string
): Promise<Alias> {
  const existing = await client.findAlias(userId, aliasName);
  if (existing) {
    throw AppError.conflict(`Alias "${aliasName}" already belongs to ${existing.debtorName}`, {
      alias: aliasName,
      debtorId: existing.debtorId,
      debtorName: existing.debtorName,
    });
  }

  const alias = await client.createAlias({ userId, debtorId: debtor.id, aliasName });
  log.info(`Alias "${aliasName}" → debtor ${debtor.id} for user ${userId}`);
  return alias;
}

/**
 * Adds a nickname to the debtor whose name matches `realName` exactly
 * (case-insensitive).
 */
export async function addAlias(
  userId: number,
  aliasName: string,
  realName: string,
  repo?: LedgerRepository
): Promise<AddAliasResult> {
  const alias = requireName(aliasName, 'aliasName');
  const target = requireName(realName, 'realName');

  return withRepository(repo, async (client) => {
    const debtor = findByName(target, await client.listDebtors(userId));
    if (!debtor) {
      return { status: 'not_found' };
    }
    return { status: 'created', alias: await createAliasFor(client, userId, debtor, alias), debtor };
  });
}

/**
 * Adds a nickname to a debtor by id. Null when the debtor is missing or not
 * owned by the user.
 */
export async function addAliasToDebtor(
  userId: number,
  debtorId: number,
  aliasName: string,
  repo?: LedgerRepository
): Promise<Alias | null> {
  const alias = requireName(aliasName, 'aliasName');

  return withRepository(repo, async (client) => {
    const debtor = await client.findDebtor(userId, debtorId);
    if (!debtor) {
      return null;
    }
    return createAliasFor(client, userId, debtor, alias);
  });
}

export async function getDebtorByAlias(
  userId: number,
  aliasName: string,
  repo?: LedgerRepository
): Promise<Debtor | null> {
  const alias = requireName(aliasName, 'aliasName');

  return withRepository(repo, async (client) => {
    const hit = await client.findAlias(userId, alias);
    return hit ? client.findDebtor(userId, hit.debtorId) : null;
  });
}

// ============================================
// External identity links
// ============================================

/**
 * Sets the external identity notifications are routed to.
 */
export async function linkDebtor(
  userId: number,
  debtorId: number,
  externalId: string,
  repo?: LedgerRepository
): Promise<Debtor | null> {
  const target = externalId.trim();
  if (!target) {
    throw AppError.validation('externalId is required', { field: 'externalId' });
  }

  return withRepository(repo, async (client) => {
    const debtor = await client.findDebtor(userId, debtorId);
    if (!debtor) {
      return null;
    }
    return client.updateDebtor(debtor.id, { externalId: target });
  });
}

/**
 * Links a debtor to the account registered under `handle`. Null when the
 * debtor is not the user's or no account has that handle.
 */
export async function linkDebtorByHandle(
  userId: number,
  debtorId: number,
  handle: string,
  repo?: LedgerRepository
): Promise<Debtor | null> {
  const normalized = normalizeHandle(handle);
  if (!normalized) {
    throw AppError.validation('handle is required', { field: 'handle' });
  }

  return withRepository(repo, async (client) => {
    const account = await client.findUserByHandle(normalized);
    if (!account) {
      return null;
    }
    return linkDebtor(userId, debtorId, account.externalId, client);
  });
}

/**
 * Finds the debtor standing for an external account:
 * 1. the debtor already linked to it (its name is refreshed);
 * 2. the best fuzzy candidate at the stricter threshold, linked only while it has no link;
 * 3. a new linked debtor.
 */
export async function findOrLinkDebtorByExternalId(
  userId: number,
  externalId: string,
  displayName: string,
  threshold: number = env.LINK_MATCH_THRESHOLD,
  repo?: LedgerRepository
): Promise<ExternalLinkResult> {
  const target = externalId.trim();
  if (!target) {
    throw AppError.validation('externalId is required', { field: 'externalId' });
  }
  const name = requireName(displayName, 'displayName');
  const checked = assertThreshold(threshold);

  return withRepository(repo, async (client) => {
    await client.lockUser(userId);

    const linked = await client.findDebtorByExternalId(userId, target);
    if (linked) {
      const debtor = linked.name === name ? linked : await client.updateDebtor(linked.id, { name });
      return { debtor, outcome: 'already_linked' };
    }

    const [best] = rankCandidates(name, await client.listDebtors(userId), {
      threshold: checked,
      includeAliases: true,
    });
    if (best && best.debtor.externalId === null) {
      const debtor = await client.updateDebtor(best.debtor.id, { externalId: target });
      log.info(`Linked debtor ${debtor.id} to ${target} (score ${best.score})`);
      return { debtor, outcome: 'linked_candidate' };
    }

    const debtor = await client.createDebtor({ userId, name, externalId: target });
    return { debtor, outcome: 'created' };
  });
}

// ============================================
// Exports
// ============================================

export const debtorService = {
  resolveDebtor,
  rankDebtors,
  resolveOrCreate,
  createDebtor,
  getOrCreateDebtor,
  listDebtors,
  getDebtor,
  addAlias,
  addAliasToDebtor,
  getDebtorByAlias,
  linkDebtor,
  linkDebtorByHandle,
  findOrLinkDebtorByExternalId,
};

export default debtorService;
