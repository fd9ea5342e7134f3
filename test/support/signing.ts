import Stripe from 'stripe';
import { Webhook } from 'svix';

export const STRIPE_KEYS = {
  secretKey: 'sk_test_placeholder',
  webhookSecret: 'whsec_test_secret',
};

export const IDENTITY_SIGNING_SECRET = `whsec_${Buffer.from('test-secret').toString('base64')}`;

const stripe = new Stripe(STRIPE_KEYS.secretKey);

/**
 * Stripe event body and a matching stripe-signature header
 */
export function signStripeEvent(
  type: string,
  object: Record<string, unknown>,
  secret: string = STRIPE_KEYS.webhookSecret,
): { body: string; signature: string } {
  const body = JSON.stringify({
    id: 'evt_test_1',
    object: 'event',
    type,
    data: { object },
  });
  const signature = stripe.webhooks.generateTestHeaderString({
    payload: body,
    secret,
  });
  return { body, signature };
}

/**
 * svix headers for an identity delivery
 */
export function signIdentityEvent(
  body: string,
  secret: string = IDENTITY_SIGNING_SECRET,
): Record<string, string> {
  const id = 'msg_test_1';
  const timestamp = new Date();
  return {
    'svix-id': id,
    'svix-timestamp': Math.floor(timestamp.getTime() / 1000).toString(),
    'svix-signature': new Webhook(secret).sign(id, timestamp, body),
  };
}
