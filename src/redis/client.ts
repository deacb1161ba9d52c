/**
 * Redis Client Module
 *
 * Singleton Redis client with GRACEFUL DEGRADATION.
 *
 * - Redis is OPTIONAL and off unless REDIS_ENABLED=true
 * - It only carries the notification queue; the ledger never depends on it
 * - Redis errors are logged, never thrown to callers
 */

import Redis, { type RedisOptions } from 'ioredis';
import { env } from '../config';
import { createScopedLogger } from '../utils/logger';

const log = createScopedLogger('redis');

// ============================================
// Configuration
// ============================================

/**
 * Connection options of the shared client.
 */
export function getRedisConfig(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    maxRetriesPerRequest: 1,
    // Exponential backoff: 100ms, 200ms, 300ms, then give up
    retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 100, 400)),
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

function createRedisClient(): Redis | null {
  try {
    const client = new Redis(getRedisConfig());

    client.on('connect', () => {
      isConnected = true;
      log.info('📦 Redis connected successfully');
    });

    client.on('ready', () => {
      isConnected = true;
    });

    client.on('error', (error: Error) => {
      log.warn(`Redis error (non-fatal): ${error.message}`);
      isConnected = false;
    });

    client.on('close', () => {
      isConnected = false;
    });

    client.on('end', () => {
      isConnected = false;
      log.debug('Redis connection ended');
    });

    return client;
  } catch (error) {
    log.warn(
      `Failed to create Redis client (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return null;
  }
}

/**
 * Gets the Redis client, creating it on first use.
 *
 * @returns Redis client, or null when Redis is disabled or unavailable
 */
export function getRedisClient(): Redis | null {
  if (!env.REDIS_ENABLED) {
    return null;
  }

  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    if (redisClient) {
      redisClient.connect().catch((error: Error) => {
        log.warn(`Redis initial connection failed (non-fatal): ${error.message}`);
        isConnected = false;
      });
    }
  }

  return redisClient;
}

export function isRedisEnabled(): boolean {
  return env.REDIS_ENABLED;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Call during application shutdown.
 */
export async function disconnectRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit();
      log.info('Redis disconnected');
    } catch (error) {
      log.warn(`Redis disconnect error (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`);
    } finally {
      redisClient = null;
      isConnected = false;
      connectionAttempted = false;
    }
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis operation, returning `fallback` when Redis is off, down or the
 * operation throws.
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    log.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    log.warn(`${operationName} failed (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`);
    return fallback;
  }
}

/**
 * True when Redis answers PING.
 */
export async function pingRedis(): Promise<boolean> {
  return safeRedisOperation(async (client) => (await client.ping()) === 'PONG', false, 'Redis ping');
}

export default {
  getRedisClient,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  pingRedis,
};
