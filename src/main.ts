import 'reflect-metadata';
import type { INestApplication } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import { buildCorsOriginHandler, resolveCorsMode } from './common/http/cors-policy';
import { configureHttpPipeline } from './common/http/http-pipeline';
import { REQUEST_ID_HEADER } from './common/middleware/request-id.middleware';
import { createLogger, logger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureHttpPipeline(app);
  configureCors(app, validatedEnv);
  app.enableShutdownHooks();

  // Module init (pool creation, schema bootstrap) completes before listen.
  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Review service listening on port ${validatedEnv.PORT}`, {
    event: 'service_listening',
    port: validatedEnv.PORT,
    node_env: validatedEnv.NODE_ENV,
  });
}

function configureCors(app: INestApplication, env: AppEnv): void {
  const corsMode = resolveCorsMode(env);
  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: corsMode,
    allowedOriginsCount: env.ALLOWED_ORIGINS.length,
  });

  app.enableCors({
    origin: buildCorsOriginHandler(env),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', REQUEST_ID_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER],
  });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap review service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
