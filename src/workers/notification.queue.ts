import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { createScopedLogger } from '../utils/logger';

const log = createScopedLogger('notifications');

// ============================================
// Redis Connection for BullMQ
// ============================================

function getConnection(): ConnectionOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export const NOTIFICATION_QUEUE_NAME = 'debtor-notifications';

export interface NotificationJobData {
  externalId: string;
  message: string;
}

let notificationQueue: Queue<NotificationJobData> | null = null;

/**
 * Created on first use so nothing connects to Redis unless a notification is sent.
 */
export function getNotificationQueue(): Queue<NotificationJobData> {
  if (!notificationQueue) {
    notificationQueue = new Queue<NotificationJobData>(NOTIFICATION_QUEUE_NAME, {
      connection: getConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: true,
        removeOnFail: 100,
      },
    });
  }
  return notificationQueue;
}

export async function enqueueNotification(data: NotificationJobData): Promise<void> {
  const job = await getNotificationQueue().add('notify', data);
  log.debug(`[Job ${job.id ?? '?'}] Notification queued for ${data.externalId}`);
}

export async function closeNotificationQueue(): Promise<void> {
  if (notificationQueue) {
    const closing = notificationQueue;
    notificationQueue = null;
    await closing.close();
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupNotificationWorker(
  processor: (job: Job<NotificationJobData>) => Promise<void>
): Worker<NotificationJobData> {
  const worker = new Worker<NotificationJobData>(NOTIFICATION_QUEUE_NAME, processor, {
    connection: getConnection(),
    concurrency: 5,
  });

  worker.on('completed', (job) => {
    log.info(`[Job ${job.id ?? '?'}] Notification delivered`);
  });

  worker.on('failed', (job, err) => {
    log.error(`[Job ${job?.id ?? '?'}] Notification failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    log.error(`Worker error: ${err.message}`);
  });

  return worker;
}
