import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { UserSyncModule, userSyncConfigFromEnvironment } from './modules';
import { validateEnvironment } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    UserSyncModule.forRootAsync({
      inject: [ConfigService],
      useFactory: userSyncConfigFromEnvironment,
    }),
  ],
})
export class AppModule {}
