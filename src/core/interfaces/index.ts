// Interface and type exports
export * from './record-store.interface';
export * from './webhook-verifier.interface';
