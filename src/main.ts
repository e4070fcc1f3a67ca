import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { EnvironmentVariables, setupSwagger } from './infrastructure/config';
import { LoggerService } from './infrastructure/logger';

async function bootstrap() {
  const logger = new LoggerService('Main');

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { logger });

  configureApp(app);
  setupSwagger(app);

  const configService = app.get<ConfigService<EnvironmentVariables>>(ConfigService);
  const port = configService.get('PORT', 3000, { infer: true });
  await app.listen(port, '0.0.0.0');

  logger.log('Application started', {
    port,
    docs: '/api/docs',
    elevatedPath: configService.get('SERVICE_ROLE_KEY', { infer: true }) ? 'enabled' : 'disabled',
  });
}

bootstrap().catch((error: unknown) => {
  new LoggerService('Main').error('Application failed to start', {
    stack: error instanceof Error ? error.stack : String(error),
  });
  process.exit(1);
});
