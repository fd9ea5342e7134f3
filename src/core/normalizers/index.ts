export * from './types';
export * from './identity-details.extractor';
export * from './identity-event.normalizer';
export * from './payment-event.normalizer';
