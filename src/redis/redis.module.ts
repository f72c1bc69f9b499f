import { Global, Logger, Module } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisService } from './redis.service';

/**
 * Connects lazily, so processes running with the in-memory cache and no
 * refresh queue never open a socket.
 */
export function createRedisClient(logger = new Logger('RedisModule')): Redis {
  const redisUrl = process.env.REDIS_URL;

  if (redisUrl) {
    logger.log(`Connecting to Redis at ${redisUrl.split('@').pop() ?? redisUrl}`);
    const isTls = redisUrl.startsWith('rediss://');
    return new Redis(redisUrl, {
      lazyConnect: true,
      ...(isTls ? { tls: { rejectUnauthorized: false } } : {}),
    });
  }

  logger.log('Connecting to local Redis');
  return new Redis({
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
  });
}

@Global()
@Module({
  providers: [
    RedisService,
    {
      provide: REDIS_CLIENT,
      useFactory: () => createRedisClient(),
    },
  ],
  exports: [RedisService, REDIS_CLIENT],
})
export class RedisModule {}
