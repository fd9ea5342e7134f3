import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { RecordStore, UserRecord } from '../../core';
import { StripeKeys } from '../../adapters/providers/stripe';
import { StorageType } from '../../config';

/**
 * Where user records live
 */
export type UserSyncStorageConfig =
  | { type: 'mock' }
  | { type: 'typeorm'; options?: Partial<PostgresConnectionOptions> }
  | { type: 'custom'; store: RecordStore<UserRecord> };

/**
 * User sync module configuration
 */
export interface UserSyncModuleConfig {
  storage: UserSyncStorageConfig;

  providers: {
    /**
     * Payment provider keys; the webhook secret verifies every delivery
     */
    stripe: StripeKeys;

    /**
     * Identity provider settings
     * Without a signing secret, identity payloads are accepted unsigned
     */
    identity?: {
      signingSecret?: string;
    };
  };
}

/**
 * Async configuration, e.g. built from ConfigService
 */
export interface UserSyncModuleAsyncConfig
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<UserSyncModuleConfig>, 'useFactory' | 'inject'> {}

/**
 * Build module configuration from the validated environment
 */
export function userSyncConfigFromEnvironment(
  config: ConfigService,
): UserSyncModuleConfig {
  const storageType = config.get<StorageType>('STORAGE_TYPE', StorageType.TYPEORM);
  const signingSecret = config.get<string>('IDENTITY_WEBHOOK_SECRET');

  return {
    storage:
      storageType === StorageType.MOCK
        ? { type: 'mock' }
        : {
            type: 'typeorm',
            options: {
              host: config.get<string>('DB_HOST', 'localhost'),
              port: config.get<number>('DB_PORT', 5432),
              username: config.get<string>('DB_USERNAME', 'usersync'),
              password: config.get<string>('DB_PASSWORD', 'usersync'),
              database: config.get<string>('DB_NAME', 'usersync'),
              synchronize: config.get<boolean>('DB_SYNCHRONIZE', false),
              logging: config.get<boolean>('DB_LOGGING', false),
            },
          },
    providers: {
      stripe: {
        secretKey: config.getOrThrow<string>('STRIPE_SECRET_KEY'),
        webhookSecret: config.getOrThrow<string>('STRIPE_WEBHOOK_SECRET'),
      },
      identity: signingSecret ? { signingSecret } : undefined,
    },
  };
}
