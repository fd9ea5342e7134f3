import type { StoreRecord } from '../../interfaces/record-store.interface';

/**
 * Row shape of the `users` collection
 *
 * Property names follow the column names so rows travel to and from the
 * store without a mapping layer.
 */
export interface UserRecord extends StoreRecord {
  email?: string;
  phone?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
  full_name?: string;
  stripe_customer_id?: string;
  is_subscribed: boolean;
  stripe_plan_id?: string;
}

/**
 * Canonical user details extracted from an identity provider payload.
 * Absent values are left out entirely so that updates never null a column.
 */
export interface UserDetails {
  id?: string;
  email?: string;
  phone?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
  full_name: string;
}

export const PAYMENT_FIELDS = [
  'stripe_customer_id',
  'is_subscribed',
  'stripe_plan_id',
] as const;

export type PaymentField = (typeof PAYMENT_FIELDS)[number];

/**
 * Payment linkage fields written by the payment normalizer
 */
export type PaymentInfo = Partial<Pick<UserRecord, PaymentField>>;

export const USERS_COLLECTION = 'users';

const TEXT_FIELDS = [
  'email',
  'phone',
  'username',
  'first_name',
  'last_name',
  'full_name',
  'stripe_customer_id',
  'stripe_plan_id',
  'created_at',
  'updated_at',
] as const;

/**
 * Decode a raw `users` row into a UserRecord.
 * NULL columns become absent properties; driver-specific booleans and dates
 * are normalized.
 */
export function decodeUserRow(row: Record<string, unknown>): UserRecord {
  const id = row.id;
  if (typeof id !== 'string' || id.length === 0) {
    throw new Error('users row is missing a string id');
  }

  const record: UserRecord = {
    id,
    is_subscribed: toBoolean(row.is_subscribed),
  };

  for (const field of TEXT_FIELDS) {
    const value = toText(row[field]);
    if (value !== undefined) {
      record[field] = value;
    }
  }

  return record;
}

function toText(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    return value === 'true' || value === 't' || value === '1';
  }
  return false;
}
