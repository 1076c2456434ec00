import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { err, ok, Result } from '../common/result';
import { AppConfig, RabbitMqConfig } from '../config/config';
import { errorMessage } from '../utils/error-message.utils';
import { BrokerConnectionError, PublishError, PublishFailure } from './broker.errors';
import {
  BROKER_CONNECTOR,
  BrokerConfirmChannel,
  BrokerConnection,
  BrokerConnector,
  EXCHANGE_TYPE,
  toConnectOptions,
} from './broker.types';

export interface OutboundEvent {
  routingKey: string;
  payload: unknown;
}

export interface PublishReceipt {
  delivered: number;
  /** Set when broker integration is switched off and nothing was sent. */
  disabled: boolean;
}

const noop = () => undefined;

/**
 * Publishes to the topic exchange over one lazily opened connection. The connection is
 * (re)established on demand; any failure tears it down and comes back as an error value,
 * never as a throw. Calls are serialized, the amqplib channel is not shared concurrently.
 */
@Injectable()
export class EventPublisher implements OnModuleDestroy {
  private readonly logger = new Logger(EventPublisher.name);
  private readonly settings: RabbitMqConfig;

  private connection: BrokerConnection | null = null;
  private channel: BrokerConfirmChannel | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    @Inject(BROKER_CONNECTOR)
    private readonly connector: BrokerConnector,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.settings = configService.get('rabbitmq', { infer: true });
  }

  get isConnected(): boolean {
    return this.connection !== null && this.channel !== null;
  }

  publish(routingKey: string, payload: unknown): Promise<Result<PublishReceipt, PublishFailure>> {
    return this.publishAll([{ routingKey, payload }]);
  }

  /** Sends the batch under one hold of the channel and waits for the broker confirms. */
  publishAll(events: readonly OutboundEvent[]): Promise<Result<PublishReceipt, PublishFailure>> {
    const routingKeys = events.map((event) => event.routingKey);

    if (!this.settings.enabled) {
      this.logger.log(`RabbitMQ disabled, skipping events: ${routingKeys.join(', ')}`);
      return Promise.resolve(ok({ delivered: 0, disabled: true }));
    }

    return this.exclusive(() => this.deliver(events, routingKeys));
  }

  async close(): Promise<void> {
    await this.exclusive(() => this.teardown());
  }

  async onModuleDestroy() {
    await this.close();
  }

  private async deliver(
    events: readonly OutboundEvent[],
    routingKeys: string[],
  ): Promise<Result<PublishReceipt, PublishFailure>> {
    const acquired = await this.acquireChannel();
    if (!acquired.ok) {
      return acquired;
    }

    const channel = acquired.value;
    try {
      for (const event of events) {
        channel.publish(this.settings.exchange, event.routingKey, Buffer.from(JSON.stringify(event.payload), 'utf8'), {
          persistent: true,
          contentType: 'application/json',
          contentEncoding: 'utf-8',
        });
      }
      await channel.waitForConfirms();
    } catch (error) {
      this.logger.error(`Failed to publish ${routingKeys.join(', ')}: ${errorMessage(error)}`);
      await this.teardown();
      return err(new PublishError(`Failed to publish ${routingKeys.join(', ')}`, routingKeys, error));
    }

    routingKeys.forEach((routingKey) => this.logger.log(`Published event: ${routingKey}`));
    return ok({ delivered: events.length, disabled: false });
  }

  private async acquireChannel(): Promise<Result<BrokerConfirmChannel, BrokerConnectionError>> {
    if (this.connection && this.channel) {
      return ok(this.channel);
    }

    await this.teardown();

    const { host, port, exchange } = this.settings;
    try {
      const connection = await this.connector(toConnectOptions(this.settings));
      this.connection = connection;
      connection.on('error', (error) => this.logger.warn(`RabbitMQ connection error: ${errorMessage(error)}`));
      connection.on('close', () => {
        if (this.connection === connection) {
          this.logger.warn('RabbitMQ connection closed, will reconnect on next publish');
          this.connection = null;
          this.channel = null;
        }
      });

      const channel = await connection.createConfirmChannel();
      channel.on('error', (error) => this.logger.warn(`RabbitMQ channel error: ${errorMessage(error)}`));
      channel.on('close', () => {
        if (this.channel === channel) {
          this.channel = null;
        }
      });
      await channel.assertExchange(exchange, EXCHANGE_TYPE, { durable: true });

      this.channel = channel;
      this.logger.log(`Connected to RabbitMQ at ${host}:${port}`);
      return ok(channel);
    } catch (error) {
      this.logger.error(`Failed to connect to RabbitMQ at ${host}:${port}: ${errorMessage(error)}`);
      await this.teardown();
      return err(new BrokerConnectionError(`RabbitMQ unreachable at ${host}:${port}`, error));
    }
  }

  private async teardown(): Promise<void> {
    const { connection, channel } = this;
    this.connection = null;
    this.channel = null;

    if (channel) {
      await channel.close().catch((error: unknown) => this.logger.debug(`Channel close: ${errorMessage(error)}`));
    }
    if (connection) {
      await connection.close().catch((error: unknown) => this.logger.debug(`Connection close: ${errorMessage(error)}`));
      this.logger.log('RabbitMQ connection closed');
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(noop, noop);
    return run;
  }
}
