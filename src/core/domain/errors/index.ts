export * from './user-sync.errors';
