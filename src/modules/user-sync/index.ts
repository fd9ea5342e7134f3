export * from './user-sync.module';
export * from './user-sync.config';
export * from './constants';
export * from './services/user-sync.service';
export * from './controllers';
export * from './interceptors/raw-body.interceptor';
export * from './decorators/webhook.decorators';
