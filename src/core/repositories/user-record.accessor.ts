import {
  NewRecord,
  RecordPatch,
  RecordStore,
} from '../interfaces';
import {
  PAYMENT_FIELDS,
  PaymentField,
  PaymentInfo,
  UserRecord,
} from '../domain/models';

/**
 * User record accessor
 *
 * Wraps a RecordStore<UserRecord> with the lookups the normalizers need:
 * by email, by Stripe customer id, and a payment-only patch.
 */
export class UserRecordAccessor {
  constructor(private readonly store: RecordStore<UserRecord>) {}

  get collection(): string {
    return this.store.collection;
  }

  insert(fields: NewRecord<UserRecord>): Promise<UserRecord | null> {
    return this.store.insert(fields);
  }

  update(id: string, fields: RecordPatch<UserRecord>): Promise<UserRecord | null> {
    return this.store.update(id, fields);
  }

  getById(id: string): Promise<UserRecord | null> {
    return this.store.getById(id);
  }

  getAll(): Promise<UserRecord[]> {
    return this.store.getAll();
  }

  delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  /**
   * Auxiliary lookup, used only until a Stripe customer id is linked
   */
  getByEmail(email: string): Promise<UserRecord | null> {
    return this.store.findFirstBy('email', email);
  }

  getByExternalCustomerId(customerId: string): Promise<UserRecord | null> {
    return this.store.findFirstBy('stripe_customer_id', customerId);
  }

  /**
   * Update the payment linkage of a user.
   * Keys outside the payment fields are dropped before the write.
   */
  updatePaymentInfo(
    userId: string,
    fields: PaymentInfo,
  ): Promise<UserRecord | null> {
    const patch: PaymentInfo = {};
    for (const key of PAYMENT_FIELDS) {
      copyField(fields, patch, key);
    }
    return this.store.update(userId, patch);
  }
}

function copyField<K extends PaymentField>(
  from: PaymentInfo,
  to: PaymentInfo,
  key: K,
): void {
  if (from[key] !== undefined) {
    to[key] = from[key];
  }
}
