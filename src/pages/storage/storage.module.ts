import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { readDriver } from '../../common/config/env.validation';
import { PAGE_ENTITIES } from './entities';
import { InMemoryPageStore } from './in-memory-page.store';
import { PAGE_STORE } from './page-store.interface';
import { TypeOrmPageStore } from './typeorm-page.store';

@Global()
@Module({})
export class StorageModule {
  static forRoot(): DynamicModule {
    const driver = readDriver('STORAGE_DRIVER', ['postgres', 'memory'] as const, 'postgres');

    if (driver === 'memory') {
      return {
        module: StorageModule,
        providers: [{ provide: PAGE_STORE, useClass: InMemoryPageStore }],
        exports: [PAGE_STORE],
      };
    }

    return {
      module: StorageModule,
      imports: [
        TypeOrmModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (config: ConfigService) => ({
            type: 'postgres' as const,
            url: config.get<string>('DATABASE_URL'),
            entities: PAGE_ENTITIES,
            synchronize: config.get<boolean>('DATABASE_SYNCHRONIZE', false),
          }),
        }),
      ],
      providers: [{ provide: PAGE_STORE, useClass: TypeOrmPageStore }],
      exports: [PAGE_STORE],
    };
  }
}
