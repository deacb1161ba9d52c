/**
 * Notification Worker
 *
 * Delivers queued counterpart notifications to the chat transport's delivery
 * hook (NOTIFY_WEBHOOK_URL). A non-2xx answer fails the job so BullMQ retries
 * it with backoff. Without a webhook the message is only logged.
 */

import { Job } from 'bullmq';
import { env } from '../config';
import { createScopedLogger } from '../utils/logger';
import type { NotificationJobData } from './notification.queue';

const log = createScopedLogger('notifications');

/** The part of fetch the worker relies on */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number }>;

export interface DeliveryOptions {
  webhookUrl?: string;
  fetchImpl?: FetchLike;
}

export async function deliverNotification(
  data: NotificationJobData,
  options: DeliveryOptions = {}
): Promise<void> {
  const webhookUrl = options.webhookUrl ?? env.NOTIFY_WEBHOOK_URL;

  if (!webhookUrl) {
    log.info(`Notification for ${data.externalId} (no webhook configured): ${data.message}`);
    return;
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ externalId: data.externalId, message: data.message }),
  });

  if (!response.ok) {
    throw new Error(`Notification webhook answered ${response.status}`);
  }
}

export async function processNotificationJob(job: Job<NotificationJobData>): Promise<void> {
  await deliverNotification(job.data);
}
