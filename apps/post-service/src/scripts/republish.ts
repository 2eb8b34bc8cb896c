import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { EventRepublisher } from '@postboard/application';
import { RepublishModule } from '../app.module';

const logger = new Logger('Republish');

/**
 * Publishes every stored post stream again so a fresh projection group (or a
 * rebuilt read model) can catch up from the event store.
 */
async function republish(): Promise<void> {
  const app = await NestFactory.createApplicationContext(RepublishModule);
  try {
    const republisher = app.get(EventRepublisher);
    const summary = await republisher.republishAll();
    logger.log(
      `Republished ${summary.events} event(s) from ${summary.aggregates} post(s)`
    );
  } finally {
    await app.close();
  }
}

republish().catch((error: unknown) => {
  logger.error('Republish failed', error);
  process.exitCode = 1;
});
