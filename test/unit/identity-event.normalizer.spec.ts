import {
  IdentityEventNormalizer,
  MockRecordStore,
  NotFoundError,
  OutcomeStatus,
  SkipReason,
  StoreError,
  UserRecord,
  UserRecordAccessor,
  ValidationError,
} from '../../src';
import { FIXED_NOW, createUserStore } from '../support/users';

const NOW = FIXED_NOW.toISOString();

describe('IdentityEventNormalizer', () => {
  let store: MockRecordStore<UserRecord>;
  let normalizer: IdentityEventNormalizer;

  const userPayload = {
    id: 'user_1',
    username: 'ada',
    first_name: 'Ada',
    last_name: 'Lovelace',
    primary_email_address_id: 'e1',
    email_addresses: [{ id: 'e1', email_address: 'ada@example.com' }],
    phone_numbers: [],
  };

  beforeEach(() => {
    store = createUserStore();
    normalizer = new IdentityEventNormalizer(new UserRecordAccessor(store));
  });

  const handle = (eventType: string, data: unknown) =>
    normalizer.handle(eventType, normalizer.extract(data));

  describe('user.created', () => {
    it('should insert the extracted details', async () => {
      const outcome = await handle('user.created', userPayload);

      const expected: UserRecord = {
        id: 'user_1',
        email: 'ada@example.com',
        username: 'ada',
        first_name: 'Ada',
        last_name: 'Lovelace',
        full_name: 'Ada Lovelace',
        is_subscribed: false,
        created_at: NOW,
        updated_at: NOW,
      };
      expect(outcome).toEqual({
        status: OutcomeStatus.APPLIED,
        eventType: 'user.created',
        userId: 'user_1',
        record: expected,
      });
      expect(await store.getById('user_1')).toEqual(expected);
    });

    it('should return the existing record unchanged on a duplicate', async () => {
      await handle('user.created', userPayload);
      const first = await store.getById('user_1');

      const outcome = await handle('user.created', {
        ...userPayload,
        first_name: 'Changed',
      });

      expect(outcome).toEqual({
        status: OutcomeStatus.SKIPPED,
        eventType: 'user.created',
        reason: SkipReason.ALREADY_EXISTS,
        detail: 'User already exists with ID: user_1',
        record: first,
      });
      expect(store.size).toBe(1);
      expect((await store.getById('user_1'))?.first_name).toBe('Ada');
    });

    it('should reject a payload without an id', async () => {
      const { id: _id, ...withoutId } = userPayload;

      await expect(handle('user.created', withoutId)).rejects.toThrow(
        new ValidationError('User ID is required for creation', 'id'),
      );
      expect(store.size).toBe(0);
    });
  });

  describe('user.updated', () => {
    it('should overwrite supplied fields and keep the rest', async () => {
      store.seed({
        id: 'user_1',
        email: 'ada@example.com',
        stripe_customer_id: 'cus_1',
        is_subscribed: true,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '2024-01-01T00:00:00.000Z',
      });

      const outcome = await handle('user.updated', {
        id: 'user_1',
        first_name: 'Augusta',
        last_name: 'King',
      });

      expect(outcome.status).toBe(OutcomeStatus.APPLIED);
      expect(await store.getById('user_1')).toEqual({
        id: 'user_1',
        email: 'ada@example.com',
        first_name: 'Augusta',
        last_name: 'King',
        full_name: 'Augusta King',
        stripe_customer_id: 'cus_1',
        is_subscribed: true,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: NOW,
      });
    });

    it('should fail with NotFoundError for an unknown user', async () => {
      const result = handle('user.updated', { id: 'user_missing' });

      await expect(result).rejects.toBeInstanceOf(NotFoundError);
      await expect(handle('user.updated', { id: 'user_missing' })).rejects.toThrow(
        'Record not found in users with ID: user_missing',
      );
    });

    it('should fail with ValidationError without an id', async () => {
      await expect(handle('user.updated', { first_name: 'Ada' })).rejects.toThrow(
        'User ID is required for update',
      );
    });
  });

  describe('user.deleted', () => {
    it('should delete an existing user', async () => {
      store.seed({ id: 'user_1', is_subscribed: false });

      const outcome = await handle('user.deleted', { id: 'user_1', deleted: true });

      expect(outcome).toEqual({
        status: OutcomeStatus.APPLIED,
        eventType: 'user.deleted',
        userId: 'user_1',
        record: { id: 'user_1', is_subscribed: false },
      });
      expect(store.size).toBe(0);
    });

    it('should complete without error when the user is already gone', async () => {
      const outcome = await handle('user.deleted', { id: 'user_1' });

      expect(outcome).toEqual({
        status: OutcomeStatus.SKIPPED,
        eventType: 'user.deleted',
        reason: SkipReason.USER_NOT_FOUND,
        detail: 'User not found for deletion with ID: user_1',
      });
    });

    it('should skip when the row disappears between lookup and delete', async () => {
      store.seed({ id: 'user_1', is_subscribed: false });
      const deleteSpy = jest.spyOn(store, 'delete').mockResolvedValue(false);

      const outcome = await handle('user.deleted', { id: 'user_1' });

      expect(deleteSpy).toHaveBeenCalledWith('user_1');
      expect(outcome).toEqual({
        status: OutcomeStatus.SKIPPED,
        eventType: 'user.deleted',
        reason: SkipReason.USER_NOT_FOUND,
        detail: 'User not found for deletion with ID: user_1',
      });
    });
  });

  it('should ignore unhandled event types', async () => {
    const outcome = await handle('session.created', { id: 'sess_1' });

    expect(outcome).toEqual({
      status: OutcomeStatus.IGNORED,
      eventType: 'session.created',
    });
  });

  it('should propagate store failures', async () => {
    store.failNextWith(new Error('connection refused'));

    await expect(handle('user.created', userPayload)).rejects.toThrow(
      new StoreError('users', 'fetch from', new Error('connection refused')),
    );
  });
});
