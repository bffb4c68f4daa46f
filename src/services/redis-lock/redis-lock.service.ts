import {
  ConflictException,
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, RedisClientType } from 'redis';

export interface LockRetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * RedisLockService
 *
 * Subject-scoped mutual exclusion for every mutating operation.
 *
 * Two layers:
 * - in-process guard: a set of held keys; a nested or concurrent call on a
 *   held key (for example a callback re-entering closure of the same asset)
 *   is rejected with ConflictException
 * - Redis SET NX EX lock, when Redis is reachable, extending the exclusion
 *   across instances
 *
 * Keys:
 * - asset:{assetId} - offering bids, closure, cancellation, share transfers
 * - listing:{listingId} - listing bids, execution, cancellation
 * - user:{userId} - deposits and withdrawals
 * - token:{tokenId} - token registry transfers and approvals
 */
@Injectable()
export class RedisLockService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisLockService.name);
  private redisClient: RedisClientType | null = null;
  private readonly LOCK_PREFIX = 'lock:';
  private readonly defaultTtlSeconds: number;
  private readonly heldKeys = new Set<string>();
  private isEnabled = false;

  constructor(private configService: ConfigService) {
    this.defaultTtlSeconds = this.configService.get<number>('auction.lockTtlSeconds', 60);
  }

  async onModuleInit() {
    if (!this.configService.get<boolean>('redis.enabled', true)) {
      this.logger.log('Redis locks disabled, subject locks are enforced per process');
      return;
    }

    const redisHost = this.configService.get<string>('redis.host', 'localhost');
    const redisPort = this.configService.get<number>('redis.port', 6379);

    try {
      this.redisClient = createClient({
        socket: {
          host: redisHost,
          port: redisPort,
        },
      });

      this.redisClient.on('error', (err: Error) => {
        this.logger.error(`Redis client error: ${err.message}`);
        this.isEnabled = false;
      });

      this.redisClient.on('connect', () => {
        this.logger.log(`Redis lock client connected: ${redisHost}:${redisPort}`);
        this.isEnabled = true;
      });

      await this.redisClient.connect();
    } catch (error) {
      this.logger.warn(
        `Redis lock service not available, subject locks are enforced per process: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.isEnabled = false;
    }
  }

  async onModuleDestroy() {
    if (this.redisClient && this.redisClient.isOpen) {
      await this.redisClient.quit();
      this.logger.log('Redis lock client disconnected');
    }
  }

  /**
   * Acquire a distributed lock
   *
   * @returns Lock token if acquired, null if the key is held or Redis failed
   */
  async acquireLock(
    key: string,
    ttlSeconds: number = this.defaultTtlSeconds,
    retryOptions?: LockRetryOptions,
  ): Promise<string | null> {
    if (!this.isEnabled || !this.redisClient) {
      return null;
    }

    const lockKey = `${this.LOCK_PREFIX}${key}`;
    const lockToken = `${Date.now()}-${Math.random().toString(36).substring(7)}`;
    const maxRetries = retryOptions?.maxRetries ?? 0;
    const retryDelayMs = retryOptions?.retryDelayMs ?? 100;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        // SET lock:key token NX EX ttl
        const result = await this.redisClient.set(lockKey, lockToken, {
          NX: true,
          EX: ttlSeconds,
        });

        if (result === 'OK') {
          this.logger.debug(`Acquired lock: ${lockKey}, token: ${lockToken}`);
          return lockToken;
        }

        if (attempt < maxRetries) {
          await this.sleep(retryDelayMs * (attempt + 1));
          continue;
        }

        return null;
      } catch (error) {
        this.logger.error(`Error acquiring lock ${lockKey}:`, error);
        return null;
      }
    }

    return null;
  }

  /**
   * Release a distributed lock
   * Lua check-and-delete: only the holder's token releases the key
   */
  async releaseLock(key: string, lockToken: string): Promise<boolean> {
    if (!this.isEnabled || !this.redisClient) {
      return false;
    }

    const lockKey = `${this.LOCK_PREFIX}${key}`;

    try {
      const luaScript = `
        if redis.call("get", KEYS[1]) == ARGV[1] then
          return redis.call("del", KEYS[1])
        else
          return 0
        end
      `;

      const result = await this.redisClient.eval(luaScript, {
        keys: [lockKey],
        arguments: [lockToken],
      });

      const released = result === 1;
      if (released) {
        this.logger.debug(`Released lock: ${lockKey}, token: ${lockToken}`);
      } else {
        this.logger.warn(`Failed to release lock ${lockKey} - token mismatch or lock expired`);
      }

      return released;
    } catch (error) {
      this.logger.error(`Error releasing lock ${lockKey}:`, error);
      return false;
    }
  }

  /**
   * Execute `fn` holding the subject lock for `key`
   *
   * @throws ConflictException if the key stays held after the retries
   */
  async withLock<T>(
    key: string,
    fn: () => Promise<T>,
    ttlSeconds: number = this.defaultTtlSeconds,
    retryOptions?: LockRetryOptions,
  ): Promise<T> {
    await this.acquireLocal(key, retryOptions);

    try {
      const lockToken = await this.acquireLock(key, ttlSeconds, retryOptions);

      if (!lockToken && this.isEnabled) {
        throw new ConflictException(`${key} is busy, try again`);
      }

      try {
        return await fn();
      } finally {
        if (lockToken) {
          await this.releaseLock(key, lockToken);
        }
      }
    } finally {
      this.heldKeys.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this.heldKeys.has(key);
  }

  isLockServiceAvailable(): boolean {
    return this.isEnabled && this.redisClient !== null;
  }

  private async acquireLocal(key: string, retryOptions?: LockRetryOptions): Promise<void> {
    const maxRetries = retryOptions?.maxRetries ?? 0;
    const retryDelayMs = retryOptions?.retryDelayMs ?? 100;

    for (let attempt = 0; this.heldKeys.has(key); attempt++) {
      if (attempt >= maxRetries) {
        this.logger.warn(`Rejected call on held subject ${key}`);
        throw new ConflictException(`${key} is busy, try again`);
      }
      await this.sleep(retryDelayMs * (attempt + 1));
    }

    this.heldKeys.add(key);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
