/**
 * Workers Module
 *
 * Background delivery of counterpart notifications.
 */

export {
  NOTIFICATION_QUEUE_NAME,
  getNotificationQueue,
  enqueueNotification,
  closeNotificationQueue,
  setupNotificationWorker,
  type NotificationJobData,
} from './notification.queue';

export { deliverNotification, processNotificationJob, type DeliveryOptions, type FetchLike } from './notificationWorker';
