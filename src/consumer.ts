#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'util';
import { createAppLogger } from './config/logger.config';
import { ConsumerModule } from './consumer.module';
import { OrderEventsConsumer } from './order-events/order-events.consumer';
import { errorMessage } from './utils/error-message.utils';

/**
 * Order events worker.
 *
 *   consume-order-events [--queue shipping_queue]
 */
async function bootstrap() {
  process.env.TZ = 'UTC';

  const { values } = parseArgs({
    options: {
      queue: { type: 'string', short: 'q' },
    },
  });

  const app = await NestFactory.createApplicationContext(ConsumerModule, {
    logger: createAppLogger('consumer'),
  });
  const logger = new Logger('OrderEventsWorker');
  const consumer = app.get(OrderEventsConsumer);
  const queue = values.queue ?? consumer.defaultQueue;

  const shutdown = async (signal: string) => {
    logger.warn(`${signal} received, stopping consumer...`);
    await consumer.stop();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => logger.error(`Shutdown failed: ${errorMessage(error)}`));
    });
  }

  logger.log(`Starting RabbitMQ consumer for queue: ${queue}`);
  try {
    await consumer.start(queue);
  } catch (error) {
    logger.error(`Failed to start consumer: ${errorMessage(error)}`);
    await app.close();
    process.exitCode = 1;
    return;
  }

  await consumer.closed;
  await app.close();
  if (!consumer.stopRequested) {
    logger.error('Broker connection lost, exiting');
    process.exitCode = 1;
    return;
  }
  logger.log('Consumer exited');
}

bootstrap().catch((error: unknown) => {
  new Logger('OrderEventsWorker').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
