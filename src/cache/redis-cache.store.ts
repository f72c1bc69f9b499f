import { Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/errors/insights.errors';
import { RedisService } from '../redis/redis.service';
import { CacheStore } from './cache-store.interface';

/** Redis-backed cache. Redis errors are logged and read as misses. */
@Injectable()
export class RedisCacheStore implements CacheStore {
  private readonly logger = new Logger(RedisCacheStore.name);

  constructor(private readonly redis: RedisService) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (error) {
      this.logger.warn(`Cache read failed key=${key} err=${describeError(error)}`);
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(key, value, ttlSeconds);
    } catch (error) {
      this.logger.warn(`Cache write failed key=${key} err=${describeError(error)}`);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.redis.del(key);
    } catch (error) {
      this.logger.warn(`Cache delete failed key=${key} err=${describeError(error)}`);
    }
  }
}
