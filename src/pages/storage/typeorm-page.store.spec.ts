import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { StorageFailureError } from '../../common/errors/insights.errors';
import { TEST_NOW, pageWrite, postWrite } from '../../common/testing/page.fixtures';
import { hashIdentifier } from '../../common/utility/number.utils';
import { TypeOrmPageStore } from './typeorm-page.store';

describe('TypeOrmPageStore', () => {
  let store: TypeOrmPageStore;
  let statements: string[];
  const storedPage = { ...pageWrite('acme'), createdAt: TEST_NOW, updatedAt: TEST_NOW };

  const repository = (entity: string) => ({
    create: jest.fn((value: object) => value),
    save: jest.fn(async (value: object) => {
      statements.push(`save ${entity}`);
      return { ...value, id: 1 };
    }),
    insert: jest.fn(async () => {
      statements.push(`insert ${entity}`);
    }),
    findOneByOrFail: jest.fn(async () => storedPage),
  });

  const manager = {
    query: jest.fn(async (sql: string) => {
      statements.push(sql);
      return [];
    }),
    delete: jest.fn(async (entity: { name: string }) => {
      statements.push(`delete ${entity.name}`);
    }),
    getRepository: jest.fn((entity: { name: string }) => repository(entity.name)),
  };

  const dataSource = {
    transaction: jest.fn((work: (transactionManager: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };

  beforeEach(async () => {
    statements = [];
    manager.query.mockClear();

    const module: TestingModule = await Test.createTestingModule({
      providers: [TypeOrmPageStore, { provide: DataSource, useValue: dataSource }],
    }).compile();

    store = module.get<TypeOrmPageStore>(TypeOrmPageStore);
  });

  it('locks the page for the whole transaction before replacing its records', async () => {
    await expect(store.upsertPage(pageWrite('acme'), [postWrite('p1')], [])).resolves.toMatchObject({
      identifier: 'acme',
      lastDepth: 2,
    });

    expect(manager.query).toHaveBeenCalledWith('SELECT pg_advisory_xact_lock($1)', [
      hashIdentifier('acme'),
    ]);
    expect(statements).toEqual([
      'SELECT pg_advisory_xact_lock($1)',
      'save PageEntity',
      'delete PostEntity',
      'delete PersonProfileEntity',
      'save PostEntity',
      'insert FollowerSampleEntity',
    ]);
  });

  it('reports driver errors as storage failures', async () => {
    manager.query.mockRejectedValueOnce(new Error('integer out of range'));

    await expect(store.upsertPage(pageWrite('acme'), [], [])).rejects.toBeInstanceOf(
      StorageFailureError,
    );
    expect(statements).toEqual([]);
  });
});
