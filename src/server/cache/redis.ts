import { createClient } from 'redis';
import { config } from '../config';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;
let redisClient: RedisClient | null = null;

export const connectRedis = async (): Promise<RedisClient> => {
  try {
    const client = createClient({
      url: config.redis.url,
      password: config.redis.password,
      socket: {
        connectTimeout: 60000,
        reconnectStrategy: (retries: number) => {
          if (retries > 10) {
            logger.error('Redis reconnection failed after 10 attempts');
            return false;
          }
          return Math.min(retries * 50, 1000);
        },
      },
    });

    client.on('error', (error) => {
      logger.error('Redis Client Error:', error);
    });

    client.on('connect', () => {
      logger.info('Redis client connected');
    });

    client.on('ready', () => {
      logger.info('Redis client ready');
    });

    client.on('end', () => {
      logger.info('Redis client disconnected');
    });

    client.on('reconnecting', () => {
      logger.info('Redis client reconnecting...');
    });

    await client.connect();
    redisClient = client;
    return client;
  } catch (error) {
    logger.error('Failed to connect to Redis:', error);
    throw error;
  }
};

export const getRedisClient = (): RedisClient | null => {
  return redisClient;
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
    logger.info('Redis client disconnected');
  }
};

// ============================================================================
// Key-value store seam
// ============================================================================

export type StoreOperation =
  | { op: 'set'; key: string; value: string; ttlSeconds?: number }
  | { op: 'del'; key: string };

/** Stops an expiration subscription. */
export type Unsubscribe = () => Promise<void>;

/**
 * The slice of Redis the match layer uses. Store failures are not caught
 * here; they propagate to the caller.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  mGet(keys: string[]): Promise<Array<string | null>>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  /** Apply every operation in one MULTI/EXEC transaction. */
  atomic(operations: StoreOperation[]): Promise<void>;
  publish(channel: string, message: string): Promise<number>;
  hIncrBy(key: string, field: string, increment: number): Promise<number>;
  hGetAll(key: string): Promise<Record<string, string>>;
  /** Deliver the name of every key that expires from now on. */
  onKeyExpired(listener: (key: string) => void): Promise<Unsubscribe>;
}

export const EXPIRED_EVENTS_PATTERN = '__keyevent@*__:expired';

export class RedisKeyValueStore implements KeyValueStore {
  constructor(private readonly client: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async mGet(keys: string[]): Promise<Array<string | null>> {
    return this.client.mGet(keys);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined) {
      await this.client.set(key, value, { EX: ttlSeconds });
    } else {
      await this.client.set(key, value);
    }
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(keys);
  }

  async atomic(operations: StoreOperation[]): Promise<void> {
    const transaction = this.client.multi();
    for (const operation of operations) {
      if (operation.op === 'del') {
        transaction.del(operation.key);
      } else if (operation.ttlSeconds !== undefined) {
        transaction.set(operation.key, operation.value, { EX: operation.ttlSeconds });
      } else {
        transaction.set(operation.key, operation.value);
      }
    }
    await transaction.exec();
  }

  async publish(channel: string, message: string): Promise<number> {
    return this.client.publish(channel, message);
  }

  async hIncrBy(key: string, field: string, increment: number): Promise<number> {
    return this.client.hIncrBy(key, field, increment);
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    return this.client.hGetAll(key);
  }

  /**
   * Subscribe a duplicated connection to key-expiry events. Enabling
   * `notify-keyspace-events` is best effort: managed Redis often forbids
   * CONFIG SET and has to be configured out of band.
   */
  async onKeyExpired(listener: (key: string) => void): Promise<Unsubscribe> {
    try {
      await this.client.configSet('notify-keyspace-events', 'Ex');
    } catch (error) {
      logger.warn('Could not enable keyspace notifications; relying on server configuration', {
        error,
      });
    }

    const subscriber = this.client.duplicate();
    subscriber.on('error', (error) => {
      logger.error('Redis subscriber error:', error);
    });
    await subscriber.connect();
    await subscriber.pSubscribe(EXPIRED_EVENTS_PATTERN, (key) => listener(key));

    return async () => {
      await subscriber.pUnsubscribe(EXPIRED_EVENTS_PATTERN);
      await subscriber.quit();
    };
  }
}

// Key generators
export const MatchKeys = {
  config: (matchId: string) => `match:${matchId}:config`,
  state: (matchId: string) => `match:${matchId}:state`,
  kind: (matchId: string) => `match:${matchId}:kind`,
  timeout: (matchId: string) => `match:${matchId}:timeout`,
  events: (matchId: string) => `match:${matchId}:events`,
  participantMatch: (participantId: string) => `participant:${participantId}:match`,
  ratings: () => 'ratings:elo',
};

const TIMEOUT_KEY_PATTERN = /^match:(.+):timeout$/;

/** Match id encoded in a timeout key, or null for any other key. */
export function matchIdFromTimeoutKey(key: string): string | null {
  const match = TIMEOUT_KEY_PATTERN.exec(key);
  return match ? match[1] : null;
}
