import { DataSource } from 'typeorm';
import {
  StoreError,
  TypeORMRecordStore,
  UserEntity,
  UserRecord,
  decodeUserRow,
} from '../../src';

describe('TypeORM Record Store Integration Tests', () => {
  let dataSource: DataSource;
  let clock: Date;
  let store: TypeORMRecordStore<UserRecord>;

  beforeAll(async () => {
    // In-process SQLite stands in for PostgreSQL
    dataSource = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: [UserEntity],
      synchronize: true,
      logging: false,
    });

    await dataSource.initialize();
  });

  afterAll(async () => {
    await dataSource.destroy();
  });

  beforeEach(async () => {
    await dataSource.getRepository(UserEntity).clear();
    clock = new Date('2024-03-01T12:00:00.000Z');
    store = new TypeORMRecordStore<UserRecord>(dataSource, UserEntity, decodeUserRow, {
      now: () => clock,
    });
  });

  it('should take the collection name from the entity', () => {
    expect(store.collection).toBe('users');
  });

  describe('insert', () => {
    it('should stamp equal timestamps and decode the stored row', async () => {
      const record = await store.insert({
        id: 'u1',
        email: 'ada@example.com',
        phone: undefined,
      });

      expect(record).toEqual({
        id: 'u1',
        email: 'ada@example.com',
        is_subscribed: false,
        created_at: '2024-03-01T12:00:00.000Z',
        updated_at: '2024-03-01T12:00:00.000Z',
      });
    });

    it('should reject a duplicate id as a StoreError', async () => {
      await store.insert({ id: 'u1' });

      const error = await store.insert({ id: 'u1' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StoreError);
      expect(error).toMatchObject({ collection: 'users', operation: 'insert into' });
    });
  });

  describe('update', () => {
    it('should patch fields without touching id or created_at', async () => {
      await store.insert({ id: 'u1', email: 'ada@example.com' });
      clock = new Date('2024-03-02T08:30:00.000Z');

      const patch = {
        id: 'u2',
        created_at: '1999-01-01T00:00:00.000Z',
        is_subscribed: true,
        stripe_plan_id: 'plan_pro',
      };
      const record = await store.update('u1', patch);

      expect(record).toEqual({
        id: 'u1',
        email: 'ada@example.com',
        is_subscribed: true,
        stripe_plan_id: 'plan_pro',
        created_at: '2024-03-01T12:00:00.000Z',
        updated_at: '2024-03-02T08:30:00.000Z',
      });
      expect(await store.getById('u2')).toBeNull();
    });

    it('should return null when no row matches', async () => {
      expect(await store.update('missing', { username: 'ada' })).toBeNull();
    });
  });

  describe('reads and deletes', () => {
    beforeEach(async () => {
      await store.insert({ id: 'u1', email: 'ada@example.com' });
      await store.insert({ id: 'u2', stripe_customer_id: 'cus_42', is_subscribed: true });
    });

    it('should look up by a single column', async () => {
      expect((await store.findFirstBy('stripe_customer_id', 'cus_42'))?.id).toBe('u2');
      expect((await store.findFirstBy('email', 'ada@example.com'))?.id).toBe('u1');
      expect(await store.findFirstBy('email', 'nobody@example.com')).toBeNull();
    });

    it('should list every record', async () => {
      const ids = (await store.getAll()).map((record) => record.id).sort();

      expect(ids).toEqual(['u1', 'u2']);
    });

    it('should report whether a delete removed a row', async () => {
      expect(await store.delete('u1')).toBe(true);
      expect(await store.delete('u1')).toBe(false);
      expect(await store.getById('u1')).toBeNull();
    });
  });

  it('should wrap lookups on unknown fields in a StoreError', async () => {
    const loose = new TypeORMRecordStore<UserRecord & { nickname?: string }>(
      dataSource,
      UserEntity,
      decodeUserRow,
    );

    const error = await loose.findFirstBy('nickname', 'ada').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      collection: 'users',
      operation: 'fetch by nickname from',
    });
  });

  it('should report health from a trivial query', async () => {
    expect(await store.isHealthy()).toBe(true);
  });
});
