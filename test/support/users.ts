import { MockRecordStore, UserRecord, decodeUserRow } from '../../src';

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

/**
 * Users store with a frozen clock
 */
export function createUserStore(now: () => Date = () => FIXED_NOW) {
  return new MockRecordStore<UserRecord>('users', decodeUserRow, { now });
}
