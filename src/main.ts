import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { logLevelsFor } from './config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    rawBody: true,
    logger: logLevelsFor(process.env.LOG_LEVEL),
  });
  app.enableCors();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('User Sync')
    .setDescription(
      'Keeps user records in step with payment and identity provider webhooks.',
    )
    .setVersion('0.1.0')
    .addTag('Webhooks', 'Receive and apply provider webhooks')
    .addTag('Health', 'Liveness and storage readiness')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const logger = new Logger('Bootstrap');
  const port = app.get(ConfigService).get<number>('PORT', 8001);
  await app.listen(port);
  logger.log(`User sync service is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
