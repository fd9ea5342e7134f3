import {
  IdentityWebhookVerifier,
  StripeWebhookVerifier,
  VerificationFailure,
  WebhookVerificationError,
} from '../../src';
import {
  IDENTITY_SIGNING_SECRET,
  STRIPE_KEYS,
  signIdentityEvent,
  signStripeEvent,
} from '../support/signing';

describe('StripeWebhookVerifier', () => {
  const verifier = new StripeWebhookVerifier(STRIPE_KEYS);

  it('should return the event type and data object of a signed event', () => {
    const { body, signature } = signStripeEvent('customer.created', {
      id: 'cus_1',
      email: 'ada@example.com',
    });

    const event = verifier.verify(Buffer.from(body), {
      'Stripe-Signature': signature,
    });

    expect(event).toEqual({
      id: 'evt_test_1',
      type: 'customer.created',
      data: { id: 'cus_1', email: 'ada@example.com' },
    });
  });

  it('should reject a request without a signature header', () => {
    const { body } = signStripeEvent('customer.created', { id: 'cus_1' });

    expect(() => verifier.verify(Buffer.from(body), {})).toThrow(
      new WebhookVerificationError(
        'No signature header found',
        'stripe',
        VerificationFailure.MISSING_SIGNATURE,
      ),
    );
  });

  it('should reject a signature made with another secret', () => {
    const { body, signature } = signStripeEvent(
      'customer.created',
      { id: 'cus_1' },
      'whsec_other_secret',
    );

    expect(() =>
      verifier.verify(Buffer.from(body), { 'stripe-signature': signature }),
    ).toThrow('Invalid signature');
  });

  it('should reject a tampered body', () => {
    const { body, signature } = signStripeEvent('customer.created', { id: 'cus_1' });
    const tampered = body.replace('cus_1', 'cus_2');

    try {
      verifier.verify(Buffer.from(tampered), { 'stripe-signature': signature });
      throw new Error('expected verification to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(WebhookVerificationError);
      expect(error).toMatchObject({
        providerName: 'stripe',
        failure: VerificationFailure.INVALID_SIGNATURE,
      });
    }
  });
});

describe('IdentityWebhookVerifier', () => {
  const verifier = new IdentityWebhookVerifier(IDENTITY_SIGNING_SECRET);
  const body = JSON.stringify({ type: 'user.created', data: { id: 'user_1' } });

  it('should return the type and data of a signed delivery', () => {
    const event = verifier.verify(Buffer.from(body), signIdentityEvent(body));

    expect(event).toEqual({
      id: 'msg_test_1',
      type: 'user.created',
      data: { id: 'user_1' },
    });
  });

  it('should reject missing svix headers', () => {
    const { 'svix-signature': _signature, ...headers } = signIdentityEvent(body);

    expect(() => verifier.verify(Buffer.from(body), headers)).toThrow(
      'No signature header found',
    );
  });

  it('should reject a delivery signed with another secret', () => {
    const otherSecret = `whsec_${Buffer.from('other-secret').toString('base64')}`;

    expect(() =>
      verifier.verify(Buffer.from(body), signIdentityEvent(body, otherSecret)),
    ).toThrow('Invalid signature');
  });
});
