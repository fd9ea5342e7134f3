import { DataSource } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { UserEntity } from './entities';

/**
 * TypeORM configuration for the users store
 */
export const createTypeORMConfig = (
  options: Partial<PostgresConnectionOptions> = {},
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: 'localhost',
    port: 5432,
    username: 'usersync',
    password: 'usersync',
    database: 'usersync',
    entities: [UserEntity],
    synchronize: false,
    logging: false,
    // Connection pool settings
    extra: {
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
    type: 'postgres',
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<PostgresConnectionOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
