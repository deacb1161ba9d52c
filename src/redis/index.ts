/**
 * Redis Module
 *
 * Redis is OPTIONAL: it carries the notification queue only. The ledger store
 * remains the source of truth.
 */

export {
  getRedisClient,
  getRedisConfig,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  pingRedis,
} from './client';
