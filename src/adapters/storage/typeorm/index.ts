/**
 * TypeORM record store for PostgreSQL
 */

export { TypeORMRecordStore } from './typeorm-record-store';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
