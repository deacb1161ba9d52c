import type { Job } from 'bullmq';
import { deliverNotification, processNotificationJob, type FetchLike } from '../../src/workers/notificationWorker';
import type { NotificationJobData } from '../../src/workers/notification.queue';

describe('Notification Worker', () => {
  const data: NotificationJobData = { externalId: 'chat-99', message: '🔔 Lan recorded a debt for you: 50000' };

  describe('deliverNotification', () => {
    it('should post the message to the webhook', async () => {
      const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockResolvedValue({ ok: true, status: 200 });

      await deliverNotification(data, { webhookUrl: 'http://hooks.test/notify', fetchImpl });

      expect(fetchImpl).toHaveBeenCalledWith('http://hooks.test/notify', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ externalId: 'chat-99', message: data.message }),
      });
    });

    it('should fail the job on an error answer', async () => {
      const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockResolvedValue({ ok: false, status: 502 });

      await expect(deliverNotification(data, { webhookUrl: 'http://hooks.test/notify', fetchImpl })).rejects.toThrow(
        'Notification webhook answered 502'
      );
    });

    it('should only log without a webhook', async () => {
      const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();

      await expect(deliverNotification(data, { fetchImpl })).resolves.toBeUndefined();
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });

  describe('processNotificationJob', () => {
    it('should deliver the job payload', async () => {
      const job = { data } as Job<NotificationJobData>;

      await expect(processNotificationJob(job)).resolves.toBeUndefined();
    });
  });
});
