import { DynamicModule, Global, Module } from '@nestjs/common';
import { readDriver } from '../common/config/env.validation';
import { RedisModule } from '../redis/redis.module';
import { CACHE_STORE } from './cache-store.interface';
import { InMemoryCacheStore } from './in-memory-cache.store';
import { RedisCacheStore } from './redis-cache.store';

@Global()
@Module({})
export class CacheModule {
  static forRoot(): DynamicModule {
    const driver = readDriver('CACHE_DRIVER', ['redis', 'memory'] as const, 'redis');

    if (driver === 'memory') {
      return {
        module: CacheModule,
        providers: [
          { provide: CACHE_STORE, useClass: InMemoryCacheStore },
        ],
        exports: [CACHE_STORE],
      };
    }

    return {
      module: CacheModule,
      imports: [RedisModule],
      providers: [
        { provide: CACHE_STORE, useClass: RedisCacheStore },
      ],
      exports: [CACHE_STORE],
    };
  }
}
