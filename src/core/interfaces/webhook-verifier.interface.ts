import { UserSyncError } from '../domain/errors';

/**
 * Request headers as Node delivers them
 */
export type WebhookHeaders = Record<string, string | string[] | undefined>;

/**
 * Event envelope returned once a delivery has been authenticated
 */
export interface VerifiedEvent {
  id?: string;
  type: string;
  data: unknown;
}

/**
 * Webhook verifier interface - authenticates a raw delivery and parses it
 * Each provider implementation delegates to that provider's SDK
 */
export interface WebhookVerifier {
  /**
   * Unique identifier for this provider (e.g., 'stripe')
   */
  readonly providerName: string;

  /**
   * Verify the signature of a raw body and return the parsed envelope
   * @throws WebhookVerificationError when the delivery cannot be trusted
   */
  verify(rawBody: Buffer, headers: WebhookHeaders): VerifiedEvent;
}

export enum VerificationFailure {
  MISSING_SIGNATURE = 'missing_signature',
  INVALID_SIGNATURE = 'invalid_signature',
  INVALID_PAYLOAD = 'invalid_payload',
}

/**
 * Signature verification error
 */
export class WebhookVerificationError extends UserSyncError {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly failure: VerificationFailure,
  ) {
    super(message);
  }
}

/**
 * First value of a header, matched case-insensitively
 */
export function headerValue(
  headers: WebhookHeaders,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) {
      continue;
    }
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}
