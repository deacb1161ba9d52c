/**
 * Notification Service
 *
 * Tells a linked counterpart that a creditor recorded something against them.
 * Best effort: called only after the ledger write has committed, and a failure
 * here is logged, never propagated.
 */

import Decimal from 'decimal.js';
import { isRedisEnabled } from '../redis';
import { enqueueNotification } from '../workers';
import { createScopedLogger } from '../utils/logger';
import type { TransactionKind } from '../types';

const log = createScopedLogger('notifications');

export interface Notifier {
  notify(externalId: string, message: string): Promise<void>;
}

/**
 * Used when Redis is disabled: the message only reaches the log.
 */
export class LogNotifier implements Notifier {
  async notify(externalId: string, message: string): Promise<void> {
    log.info(`Notify ${externalId}: ${message}`);
  }
}

/**
 * Hands the message to the BullMQ notification queue.
 */
export class QueueNotifier implements Notifier {
  async notify(externalId: string, message: string): Promise<void> {
    await enqueueNotification({ externalId, message });
  }
}

let notifier: Notifier | null = null;

export function getNotifier(): Notifier {
  if (!notifier) {
    notifier = isRedisEnabled() ? new QueueNotifier() : new LogNotifier();
  }
  return notifier;
}

export function setNotifier(next: Notifier | null): void {
  notifier = next;
}

export interface NotificationContent {
  creditorName: string;
  amount: Decimal;
  kind: TransactionKind;
  note: string | null;
}

/**
 * @example
 * formatNotificationMessage({ creditorName: 'Lan', amount: new Decimal(50000), kind: 'DEBT', note: 'lunch' })
 * // "🔔 Lan recorded a debt for you: 50000. Note: lunch"
 */
export function formatNotificationMessage(content: NotificationContent): string {
  const action = content.kind === 'DEBT' ? 'recorded a debt for you' : 'recorded a payment from you';
  const note = content.note ? `. Note: ${content.note}` : '';
  return `🔔 ${content.creditorName} ${action}: ${content.amount.toString()}${note}`;
}

/**
 * Never throws.
 */
export async function notifySafely(externalId: string, message: string): Promise<boolean> {
  try {
    await getNotifier().notify(externalId, message);
    return true;
  } catch (error) {
    log.warn(
      `Notification to ${externalId} failed (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return false;
  }
}

export const notificationService = {
  getNotifier,
  setNotifier,
  formatNotificationMessage,
  notifySafely,
};

export default notificationService;
