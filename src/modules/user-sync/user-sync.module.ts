import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  IdentityEventNormalizer,
  PaymentEventNormalizer,
  RecordStore,
  UserRecord,
  UserRecordAccessor,
  USERS_COLLECTION,
  decodeUserRow,
} from '../../core';
import { MockRecordStore } from '../../adapters/storage/mock';
import {
  TypeORMRecordStore,
  UserEntity,
  createDataSource,
} from '../../adapters/storage/typeorm';
import { StripeWebhookVerifier } from '../../adapters/providers/stripe';
import { IdentityWebhookVerifier } from '../../adapters/providers/identity';
import {
  UserSyncModuleConfig,
  UserSyncModuleAsyncConfig,
} from './user-sync.config';
import {
  USER_SYNC_CONFIG,
  RECORD_STORE,
  USER_RECORD_ACCESSOR,
  PAYMENT_NORMALIZER,
  IDENTITY_NORMALIZER,
  PAYMENT_VERIFIER,
  IDENTITY_VERIFIER,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { UserSyncService } from './services/user-sync.service';

/**
 * User Sync Module
 *
 * Wires one record store per process into the normalizers and exposes the
 * webhook and health endpoints
 */
@Global()
@Module({})
export class UserSyncModule {
  /**
   * Configure synchronously
   */
  static forRoot(config: UserSyncModuleConfig): DynamicModule {
    return this.build([
      {
        provide: USER_SYNC_CONFIG,
        useValue: config,
      },
    ]);
  }

  /**
   * Configure asynchronously, e.g. from ConfigService
   */
  static forRootAsync(options: UserSyncModuleAsyncConfig): DynamicModule {
    return {
      ...this.build([
        {
          provide: USER_SYNC_CONFIG,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
      ]),
      imports: options.imports || [],
    };
  }

  private static build(configProviders: Provider[]): DynamicModule {
    return {
      module: UserSyncModule,
      providers: [...configProviders, ...this.createProviders()],
      controllers: [WebhookController, HealthController],
      exports: [
        USER_SYNC_CONFIG,
        RECORD_STORE,
        USER_RECORD_ACCESSOR,
        UserSyncService,
      ],
    };
  }

  /**
   * Providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: RECORD_STORE,
        useFactory: (config: UserSyncModuleConfig) => createRecordStore(config),
        inject: [USER_SYNC_CONFIG],
      },
      {
        provide: USER_RECORD_ACCESSOR,
        useFactory: (store: RecordStore<UserRecord>) =>
          new UserRecordAccessor(store),
        inject: [RECORD_STORE],
      },
      {
        provide: PAYMENT_NORMALIZER,
        useFactory: (users: UserRecordAccessor) =>
          new PaymentEventNormalizer(users),
        inject: [USER_RECORD_ACCESSOR],
      },
      {
        provide: IDENTITY_NORMALIZER,
        useFactory: (users: UserRecordAccessor) =>
          new IdentityEventNormalizer(users),
        inject: [USER_RECORD_ACCESSOR],
      },
      {
        provide: PAYMENT_VERIFIER,
        useFactory: (config: UserSyncModuleConfig) =>
          new StripeWebhookVerifier(config.providers.stripe),
        inject: [USER_SYNC_CONFIG],
      },
      {
        provide: IDENTITY_VERIFIER,
        // Nest treats undefined as unresolved, so an unsigned setup yields null
        useFactory: (config: UserSyncModuleConfig) => {
          const signingSecret = config.providers.identity?.signingSecret;
          return signingSecret ? new IdentityWebhookVerifier(signingSecret) : null;
        },
        inject: [USER_SYNC_CONFIG],
      },
      UserSyncService,
    ];
  }
}

/**
 * Build the configured record store
 */
export async function createRecordStore(
  config: UserSyncModuleConfig,
): Promise<RecordStore<UserRecord>> {
  const storage = config.storage;

  switch (storage.type) {
    case 'mock':
      return new MockRecordStore<UserRecord>(USERS_COLLECTION, decodeUserRow);

    case 'typeorm': {
      const dataSource = createDataSource(storage.options);
      await dataSource.initialize();
      return new TypeORMRecordStore<UserRecord>(
        dataSource,
        UserEntity,
        decodeUserRow,
      );
    }

    case 'custom':
      return storage.store;

    default: {
      const unknownStorage: never = storage;
      throw new Error(`Unknown storage type: ${JSON.stringify(unknownStorage)}`);
    }
  }
}
