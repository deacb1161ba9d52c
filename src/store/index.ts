import { env } from '../config';
import logger from '../utils/logger';
import { MemoryLedgerStore } from './memory.store';
import { PostgresLedgerStore } from './postgres.store';
import type { LedgerRepository, LedgerStore } from './types';

let store: LedgerStore | null = null;

function createLedgerStore(): LedgerStore {
  if (env.STORE_DRIVER === 'memory') {
    logger.info('📦 Using in-memory ledger store');
    return new MemoryLedgerStore();
  }
  return new PostgresLedgerStore();
}

/**
 * Process-wide store, created on first use from STORE_DRIVER.
 */
export const getLedgerStore = (): LedgerStore => {
  if (!store) {
    store = createLedgerStore();
  }
  return store;
};

/**
 * Replace the active store (tests, bootstrap).
 */
export const setLedgerStore = (next: LedgerStore): void => {
  store = next;
};

/**
 * Runs `work` on the caller's repository when it is already inside a unit of
 * work, otherwise opens a new one on the active store.
 */
export const withRepository = <T>(
  repo: LedgerRepository | undefined,
  work: (repo: LedgerRepository) => Promise<T>
): Promise<T> => {
  return repo ? work(repo) : getLedgerStore().transaction(work);
};

export const closeLedgerStore = async (): Promise<void> => {
  if (store) {
    const closing = store;
    store = null;
    await closing.close();
  }
};

export { MemoryLedgerStore } from './memory.store';
export { PostgresLedgerStore } from './postgres.store';
export type * from './types';
