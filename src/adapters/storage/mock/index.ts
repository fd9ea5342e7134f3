export * from './mock-record-store';
