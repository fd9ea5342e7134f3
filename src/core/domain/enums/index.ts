export * from './outcome-status.enum';
export * from './skip-reason.enum';
export * from './payment-event-type.enum';
export * from './identity-event-type.enum';
