import { Logger } from '@nestjs/common';
import {
  ACTIVE_SUBSCRIPTION_STATUSES,
  PaymentEventType,
  SkipReason,
} from '../domain/enums';
import { PaymentInfo } from '../domain/models';
import { UserRecordAccessor } from '../repositories';
import {
  Payload,
  isPayload,
  readArray,
  readObject,
  readReference,
  readString,
} from '../utils';
import {
  EventOutcome,
  SkippedOutcome,
  applied,
  ignored,
  skipped,
} from './types';

/**
 * Payment Event Normalizer
 *
 * Maps Stripe webhook events onto payment-field patches of a user record.
 * Events that cannot be correlated with a user are skipped rather than
 * failed, so the provider never retries something we cannot act on.
 */
export class PaymentEventNormalizer {
  private readonly logger = new Logger(PaymentEventNormalizer.name);

  constructor(private readonly users: UserRecordAccessor) {}

  async handle(eventType: string, eventData: unknown): Promise<EventOutcome> {
    this.logger.debug(`Received payment event: ${eventType}`);
    this.logger.debug(`Event data: ${JSON.stringify(eventData, null, 2)}`);

    const data: Payload = isPayload(eventData) ? eventData : {};

    try {
      switch (eventType) {
        case PaymentEventType.CUSTOMER_CREATED:
          return await this.handleCustomerCreated(eventType, data);
        case PaymentEventType.CHECKOUT_SESSION_COMPLETED:
          return await this.handleCheckoutCompleted(eventType, data);
        case PaymentEventType.SUBSCRIPTION_CREATED:
          return await this.handleSubscriptionCreated(eventType, data);
        case PaymentEventType.SUBSCRIPTION_UPDATED:
          return await this.handleSubscriptionUpdated(eventType, data);
        case PaymentEventType.SUBSCRIPTION_DELETED:
          return await this.handleSubscriptionDeleted(eventType, data);
        default:
          this.logger.debug(`Unhandled payment event type: ${eventType}`);
          return ignored(eventType);
      }
    } catch (error) {
      this.logger.error(
        `Error handling payment event ${eventType}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  private async handleCustomerCreated(
    eventType: string,
    customer: Payload,
  ): Promise<EventOutcome> {
    const customerId = readString(customer, 'id');
    const email = readString(customer, 'email');

    if (!email) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No email found in customer data');
    }
    if (!customerId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No customer ID found in customer data');
    }

    this.logger.log(`Processing customer creation for email: ${email}`);

    const user = await this.users.getByEmail(email);
    if (!user) {
      return this.skip(eventType, SkipReason.USER_NOT_FOUND, `No user found with email: ${email}`);
    }

    const updated = await this.users.updatePaymentInfo(user.id, {
      stripe_customer_id: customerId,
    });
    this.logger.log(`Updated user ${user.id} with stripe customer ID: ${customerId}`);

    return applied(eventType, user.id, updated);
  }

  private async handleCheckoutCompleted(
    eventType: string,
    session: Payload,
  ): Promise<EventOutcome> {
    const customerId = readReference(session, 'customer');
    const email = readString(readObject(session, 'customer_details'), 'email');

    if (!email) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No email found in checkout session data');
    }
    if (!customerId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No customer ID found in checkout session data');
    }

    this.logger.log(`Processing checkout completion for email: ${email}`);

    const user = await this.users.getByEmail(email);
    if (!user) {
      return this.skip(eventType, SkipReason.USER_NOT_FOUND, `No user found with email: ${email}`);
    }

    // An existing linkage wins over whatever customer the session carries
    if (user.stripe_customer_id) {
      return this.skip(
        eventType,
        SkipReason.ALREADY_LINKED,
        `User ${user.id} already linked to stripe customer ID: ${user.stripe_customer_id}`,
      );
    }

    const updated = await this.users.updatePaymentInfo(user.id, {
      stripe_customer_id: customerId,
    });
    this.logger.log(`Updated user ${user.id} with stripe customer ID: ${customerId}`);

    return applied(eventType, user.id, updated);
  }

  private async handleSubscriptionCreated(
    eventType: string,
    subscription: Payload,
  ): Promise<EventOutcome> {
    const customerId = readReference(subscription, 'customer');
    const planId = readPlanId(subscription);

    if (!customerId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No customer ID found in subscription data');
    }
    if (!planId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No plan ID found in subscription data');
    }

    this.logger.log(`Processing subscription creation for customer: ${customerId}`);

    return this.patchByCustomer(eventType, customerId, {
      is_subscribed: true,
      stripe_plan_id: planId,
    });
  }

  private async handleSubscriptionUpdated(
    eventType: string,
    subscription: Payload,
  ): Promise<EventOutcome> {
    const customerId = readReference(subscription, 'customer');
    if (!customerId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No customer ID found in subscription data');
    }

    const status = readString(subscription, 'status');
    const planId = readPlanId(subscription);
    const isSubscribed =
      status !== undefined && ACTIVE_SUBSCRIPTION_STATUSES.includes(status);

    const patch: PaymentInfo = { is_subscribed: isSubscribed };
    if (planId) {
      patch.stripe_plan_id = planId;
    }

    return this.patchByCustomer(eventType, customerId, patch);
  }

  private async handleSubscriptionDeleted(
    eventType: string,
    subscription: Payload,
  ): Promise<EventOutcome> {
    const customerId = readReference(subscription, 'customer');
    if (!customerId) {
      return this.skip(eventType, SkipReason.MISSING_FIELD, 'No customer ID found in subscription data');
    }

    return this.patchByCustomer(eventType, customerId, { is_subscribed: false });
  }

  private async patchByCustomer(
    eventType: string,
    customerId: string,
    patch: PaymentInfo,
  ): Promise<EventOutcome> {
    const user = await this.users.getByExternalCustomerId(customerId);
    if (!user) {
      return this.skip(
        eventType,
        SkipReason.USER_NOT_FOUND,
        `No user found with stripe customer ID: ${customerId}`,
      );
    }

    const updated = await this.users.updatePaymentInfo(user.id, patch);
    this.logger.log(
      `Updated user ${user.id} subscription: active=${patch.is_subscribed}, plan=${patch.stripe_plan_id ?? user.stripe_plan_id ?? 'none'}`,
    );

    return applied(eventType, user.id, updated);
  }

  private skip(
    eventType: string,
    reason: SkipReason,
    detail: string,
  ): SkippedOutcome {
    this.logger.warn(`Skipping ${eventType}: ${detail}`);
    return skipped(eventType, reason, detail);
  }
}

/**
 * Plan id from the legacy `plan` field, falling back to the first item's price
 */
function readPlanId(subscription: Payload): string | undefined {
  const legacyPlanId = readString(readObject(subscription, 'plan'), 'id');
  if (legacyPlanId) {
    return legacyPlanId;
  }

  const [firstItem] = readArray(readObject(subscription, 'items'), 'data');
  if (!isPayload(firstItem)) {
    return undefined;
  }
  return readString(readObject(firstItem, 'price'), 'id');
}
