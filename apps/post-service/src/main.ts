import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
  new Logger('Bootstrap').log('Post service running');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Post service failed to start', error);
  process.exitCode = 1;
});
