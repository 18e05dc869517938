// apps/api/src/main.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp, getApiPrefix } from './app.bootstrap';
import { AppLogger } from './common/app-logger';
import type { Env } from './config/env';

async function bootstrap(): Promise<void> {
  const logger = new AppLogger('Bootstrap');
  const app = await NestFactory.create(AppModule, { cors: true });
  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get<ConfigService<Env, true>>(ConfigService);
  const port = config.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`API listening on http://localhost:${port}/${getApiPrefix()}`);
}

bootstrap().catch((err: unknown) => {
  new AppLogger('Bootstrap').error(
    'API failed to start',
    err instanceof Error ? err.stack : String(err),
  );
  process.exitCode = 1;
});
