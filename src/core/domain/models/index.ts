export * from './user-record.model';
