import { Logger } from '@nestjs/common';
import Stripe from 'stripe';
import {
  VerificationFailure,
  VerifiedEvent,
  WebhookHeaders,
  WebhookVerificationError,
  WebhookVerifier,
  headerValue,
} from '../../../core';

export const STRIPE_SIGNATURE_HEADER = 'stripe-signature';

export interface StripeKeys {
  /**
   * Secret key for API operations (sk_test_xxx or sk_live_xxx)
   */
  secretKey: string;

  /**
   * Endpoint signing secret (whsec_xxx)
   */
  webhookSecret: string;
}

/**
 * Stripe webhook verifier
 *
 * Delegates signature checking and envelope parsing to the Stripe SDK.
 */
export class StripeWebhookVerifier implements WebhookVerifier {
  readonly providerName = 'stripe';

  private readonly logger = new Logger(StripeWebhookVerifier.name);
  private readonly stripe: Stripe;

  constructor(private readonly keys: StripeKeys) {
    this.stripe = new Stripe(keys.secretKey);
  }

  verify(rawBody: Buffer, headers: WebhookHeaders): VerifiedEvent {
    const signature = headerValue(headers, STRIPE_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.error('No Stripe signature header found in the request');
      throw new WebhookVerificationError(
        'No signature header found',
        this.providerName,
        VerificationFailure.MISSING_SIGNATURE,
      );
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(
        rawBody,
        signature,
        this.keys.webhookSecret,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        this.logger.error(`Invalid signature: ${message}`);
        throw new WebhookVerificationError(
          'Invalid signature',
          this.providerName,
          VerificationFailure.INVALID_SIGNATURE,
        );
      }

      this.logger.error(`Invalid payload: ${message}`);
      throw new WebhookVerificationError(
        'Invalid payload',
        this.providerName,
        VerificationFailure.INVALID_PAYLOAD,
      );
    }

    return {
      id: event.id,
      type: event.type,
      data: event.data.object,
    };
  }
}
