import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { HatcheryConfigService } from './config/hatchery-config.service.js';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get(HatcheryConfigService).get();
  app.useLogger(config.logLevels);
  app.enableShutdownHooks();
  await app.listen(config.port);
  new Logger('Bootstrap').log(`Hatchery server listening on :${config.port}`);
}

bootstrap().catch((err) => {
  new Logger('Bootstrap').error('Failed to start', err);
  process.exit(1);
});
