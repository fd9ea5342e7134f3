export * from './user-record.accessor';
