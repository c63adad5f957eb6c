import { Injectable, Logger, OnModuleInit, OnModuleDestroy, ConflictException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { createClient } from 'redis';

type RedisClient = ReturnType<typeof createClient>;

export interface LockRetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

interface LockLease {
  redisKey: string;
  token: string;
}

/**
 * Marketplace lock keys
 * - asset: listing, bidding and settlement of one asset
 * - credits: credit ledger withdrawal of one account
 */
export const lockKeys = {
  asset: (tokenId: number) => `asset:${tokenId}`,
  credits: (account: string) => `credits:${account}`,
};

// DEL only while the key still holds our token
const RELEASE_IF_OWNER = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  end
  return 0
`;

/**
 * RedisLockService
 *
 * Optional cross-instance lock (SET NX EX). When Redis is disabled or
 * unreachable the work runs unlocked and MongoDB transactions alone keep
 * each marketplace operation atomic.
 */
@Injectable()
export class RedisLockService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisLockService.name);
  private readonly ttlSeconds = 10;
  private client: RedisClient | null = null;
  private ready = false;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    if (!this.configService.get<boolean>('redis.enabled', true)) {
      this.logger.log('Redis locks disabled, using MongoDB transactions only');
      return;
    }

    const host = this.configService.get<string>('redis.host', 'localhost');
    const port = this.configService.get<number>('redis.port', 6379);
    const client = createClient({ socket: { host, port } });

    client.on('error', (err: Error) => {
      this.logger.error(`Redis lock client error: ${err.message}`);
      this.ready = false;
    });
    client.on('ready', () => {
      this.logger.log(`Redis lock client ready on ${host}:${port}`);
      this.ready = true;
    });

    try {
      await client.connect();
      this.client = client;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Redis unreachable, marketplace locks off: ${message}`);
      this.ready = false;
    }
  }

  async onModuleDestroy() {
    if (this.client?.isOpen) {
      await this.client.quit();
    }
  }

  /**
   * Run `fn` while holding the lock for `key` (see `lockKeys`)
   *
   * @throws ConflictException when Redis is up and the lock stays taken
   */
  async withLock<T>(
    key: string,
    fn: () => Promise<T>,
    ttlSeconds: number = this.ttlSeconds,
    retry: LockRetryOptions = { maxRetries: 3, retryDelayMs: 50 },
  ): Promise<T> {
    if (!this.isLockServiceAvailable()) {
      return fn();
    }

    const lease = await this.acquire(key, ttlSeconds, retry);
    if (!lease) {
      // редис отвалился во время захвата
      if (!this.isLockServiceAvailable()) {
        return fn();
      }
      throw new ConflictException(`Resource ${key} is busy, retry later`);
    }

    try {
      return await fn();
    } finally {
      await this.release(lease);
    }
  }

  isLockServiceAvailable(): boolean {
    return this.ready && this.client !== null;
  }

  private async acquire(
    key: string,
    ttlSeconds: number,
    retry: LockRetryOptions,
  ): Promise<LockLease | null> {
    const lease: LockLease = { redisKey: `lock:${key}`, token: randomUUID() };
    const attempts = (retry.maxRetries ?? 0) + 1;
    const delayMs = retry.retryDelayMs ?? 50;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (await this.trySet(lease, ttlSeconds)) {
        return lease;
      }
      if (attempt < attempts) {
        await new Promise((resolve) => setTimeout(resolve, delayMs * attempt));
      }
    }

    this.logger.debug(`Lock ${lease.redisKey} still taken after ${attempts} attempts`);
    return null;
  }

  private async trySet(lease: LockLease, ttlSeconds: number): Promise<boolean> {
    if (!this.client) {
      return false;
    }
    try {
      const result = await this.client.set(lease.redisKey, lease.token, {
        NX: true,
        EX: ttlSeconds,
      });
      return result === 'OK';
    } catch (error) {
      this.logger.error(`Failed to acquire lock ${lease.redisKey}:`, error);
      return false;
    }
  }

  // лок мог истечь, тогда чужой не трогаем
  private async release(lease: LockLease): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      const deleted = await this.client.eval(RELEASE_IF_OWNER, {
        keys: [lease.redisKey],
        arguments: [lease.token],
      });
      if (deleted !== 1) {
        this.logger.warn(`Lock ${lease.redisKey} expired before release`);
      }
    } catch (error) {
      this.logger.error(`Failed to release lock ${lease.redisKey}:`, error);
    }
  }
}
