import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  EventOutcome,
  IdentityEventNormalizer,
  PaymentEventNormalizer,
  RecordStore,
  UserDetails,
  UserRecord,
  VerificationFailure,
  WebhookHeaders,
  WebhookVerificationError,
  WebhookVerifier,
  isPayload,
} from '../../../core';
import {
  RECORD_STORE,
  PAYMENT_NORMALIZER,
  IDENTITY_NORMALIZER,
  PAYMENT_VERIFIER,
  IDENTITY_VERIFIER,
} from '../constants';

export interface PaymentWebhookResult {
  eventType: string;
  outcome: EventOutcome;
}

export interface IdentityWebhookResult {
  eventType: string;
  details: UserDetails;
  outcome: EventOutcome;
}

/**
 * Identity payload as it arrives over HTTP
 */
export interface IdentityEnvelope {
  type?: string;
  data?: unknown;
}

/**
 * UserSyncService
 *
 * Authenticates deliveries and hands them to the matching normalizer
 */
@Injectable()
export class UserSyncService {
  private readonly logger = new Logger(UserSyncService.name);

  constructor(
    @Inject(RECORD_STORE)
    private readonly store: RecordStore<UserRecord>,
    @Inject(PAYMENT_NORMALIZER)
    private readonly paymentNormalizer: PaymentEventNormalizer,
    @Inject(IDENTITY_NORMALIZER)
    private readonly identityNormalizer: IdentityEventNormalizer,
    @Inject(PAYMENT_VERIFIER)
    private readonly paymentVerifier: WebhookVerifier,
    @Inject(IDENTITY_VERIFIER)
    private readonly identityVerifier: WebhookVerifier | null,
  ) {}

  /**
   * Verify a payment delivery and apply it
   */
  async processPaymentWebhook(
    rawBody: Buffer,
    headers: WebhookHeaders,
  ): Promise<PaymentWebhookResult> {
    const event = this.paymentVerifier.verify(rawBody, headers);
    this.logger.log(`Received payment event ${event.type} (${event.id ?? 'no id'})`);

    const outcome = await this.paymentNormalizer.handle(event.type, event.data);
    return { eventType: event.type, outcome };
  }

  /**
   * Apply an identity delivery, verifying it first when a signing secret is set
   */
  async processIdentityWebhook(
    body: IdentityEnvelope,
    rawBody: Buffer | undefined,
    headers: WebhookHeaders,
  ): Promise<IdentityWebhookResult> {
    let eventType = body.type ?? 'N/A';
    let userData = body.data;

    if (this.identityVerifier) {
      const event = this.identityVerifier.verify(
        rawBody ?? Buffer.from(JSON.stringify(body)),
        headers,
      );
      eventType = event.type;
      userData = event.data;
    }

    if (!isPayload(userData) || Object.keys(userData).length === 0) {
      throw new WebhookVerificationError(
        'Invalid webhook payload: missing user data',
        'identity',
        VerificationFailure.INVALID_PAYLOAD,
      );
    }

    this.logger.log(`Received identity event ${eventType}`);

    const details = this.identityNormalizer.extract(userData);
    const outcome = await this.identityNormalizer.handle(eventType, details);
    return { eventType, details, outcome };
  }

  /**
   * Storage reachability for the readiness check
   */
  isStorageHealthy(): Promise<boolean> {
    return this.store.isHealthy();
  }
}
