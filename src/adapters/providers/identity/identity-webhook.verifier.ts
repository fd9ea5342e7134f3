import { Logger } from '@nestjs/common';
import { Webhook } from 'svix';
import {
  VerificationFailure,
  VerifiedEvent,
  WebhookHeaders,
  WebhookVerificationError,
  WebhookVerifier,
  headerValue,
  isPayload,
  readString,
} from '../../../core';

export const SVIX_HEADERS = ['svix-id', 'svix-timestamp', 'svix-signature'] as const;

/**
 * Identity provider webhook verifier
 *
 * The identity provider signs deliveries through svix; the signing secret is
 * the base64 `whsec_` value from the provider dashboard.
 */
export class IdentityWebhookVerifier implements WebhookVerifier {
  readonly providerName = 'identity';

  private readonly logger = new Logger(IdentityWebhookVerifier.name);
  private readonly webhook: Webhook;

  constructor(signingSecret: string) {
    this.webhook = new Webhook(signingSecret);
  }

  verify(rawBody: Buffer, headers: WebhookHeaders): VerifiedEvent {
    const [id, timestamp, signature] = SVIX_HEADERS.map((name) =>
      headerValue(headers, name),
    );

    if (!id || !timestamp || !signature) {
      throw new WebhookVerificationError(
        'No signature header found',
        this.providerName,
        VerificationFailure.MISSING_SIGNATURE,
      );
    }

    let payload: unknown;
    try {
      payload = this.webhook.verify(rawBody.toString('utf8'), {
        'svix-id': id,
        'svix-timestamp': timestamp,
        'svix-signature': signature,
      });
    } catch (error) {
      this.logger.error(
        `Invalid signature: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new WebhookVerificationError(
        'Invalid signature',
        this.providerName,
        VerificationFailure.INVALID_SIGNATURE,
      );
    }

    if (!isPayload(payload)) {
      throw new WebhookVerificationError(
        'Invalid payload',
        this.providerName,
        VerificationFailure.INVALID_PAYLOAD,
      );
    }

    return {
      id,
      type: readString(payload, 'type') ?? 'N/A',
      data: payload.data,
    };
  }
}
