/**
 * Stripe event types the payment normalizer acts on
 */
export enum PaymentEventType {
  CUSTOMER_CREATED = 'customer.created',
  CHECKOUT_SESSION_COMPLETED = 'checkout.session.completed',
  SUBSCRIPTION_CREATED = 'customer.subscription.created',
  SUBSCRIPTION_UPDATED = 'customer.subscription.updated',
  SUBSCRIPTION_DELETED = 'customer.subscription.deleted',
}

/**
 * Subscription statuses that count as an active subscription
 */
export const ACTIVE_SUBSCRIPTION_STATUSES: readonly string[] = [
  'active',
  'trialing',
];
