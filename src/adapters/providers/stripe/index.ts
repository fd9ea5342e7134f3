export * from './stripe-webhook.verifier';
