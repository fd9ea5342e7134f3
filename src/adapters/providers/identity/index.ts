export * from './identity-webhook.verifier';
