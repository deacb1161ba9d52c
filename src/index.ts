import type { Worker } from 'bullmq';
import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { closeLedgerStore, getLedgerStore, PostgresLedgerStore } from './store';
import { disconnectRedis, getRedisClient, isRedisEnabled } from './redis';
import {
  closeNotificationQueue,
  processNotificationJob,
  setupNotificationWorker,
  type NotificationJobData,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    const store = getLedgerStore();
    if (store instanceof PostgresLedgerStore) {
      await store.initSchema();
    }

    if (!(await store.checkHealth())) {
      throw new Error(`Ledger store (${store.driver}) is not reachable`);
    }
    logger.info(`📦 Ledger store ready (${store.driver})`);

    // Background delivery of counterpart notifications needs Redis
    let worker: Worker<NotificationJobData> | null = null;
    if (isRedisEnabled()) {
      getRedisClient();
      worker = setupNotificationWorker(processNotificationJob);
      logger.info('👷 Notification worker initialized');
    } else {
      logger.info('Redis disabled: notifications are logged only');
    }

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 TABKEEPER BACKEND', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    const shutdownResources = async (): Promise<void> => {
      if (worker) {
        await worker.close();
      }
      await closeNotificationQueue();
      await disconnectRedis();
      await closeLedgerStore();
    };

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        shutdownResources()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error while releasing resources:', error);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
