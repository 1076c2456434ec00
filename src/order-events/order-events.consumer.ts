import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BROKER_CONNECTOR,
  BrokerConnection,
  BrokerConnector,
  BrokerConsumerChannel,
  BrokerDelivery,
  EXCHANGE_TYPE,
  toConnectOptions,
} from '../broker/broker.types';
import { AppConfig, RabbitMqConfig } from '../config/config';
import { errorMessage } from '../utils/error-message.utils';
import { INBOUND_ROUTING_KEYS } from './inbound-event';
import { InboundEventRouter } from './inbound-event.router';

/**
 * Long-lived worker on the order events queue. Prefetch is 1, so at most one delivery is
 * in flight; `stop()` waits for it to be acked or nacked before closing the channel.
 */
@Injectable()
export class OrderEventsConsumer {
  private readonly logger = new Logger(OrderEventsConsumer.name);
  private readonly settings: RabbitMqConfig;

  private connection: BrokerConnection | null = null;
  private channel: BrokerConsumerChannel | null = null;
  private consumerTag: string | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private stopping = false;
  private resolveClosed: () => void = () => undefined;

  /** Settles once the consumer has stopped or the broker dropped the connection. */
  readonly closed: Promise<void>;

  constructor(
    @Inject(BROKER_CONNECTOR)
    private readonly connector: BrokerConnector,
    private readonly router: InboundEventRouter,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.settings = configService.get('rabbitmq', { infer: true });
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get defaultQueue(): string {
    return this.settings.queue;
  }

  /** False when `closed` settled because the broker went away. */
  get stopRequested(): boolean {
    return this.stopping;
  }

  async start(queue: string = this.settings.queue): Promise<void> {
    const { host, port, exchange, enabled } = this.settings;
    if (!enabled) {
      throw new Error('RabbitMQ integration is disabled (RABBITMQ_ENABLED=false)');
    }

    const connection = await this.connector(toConnectOptions(this.settings));
    this.connection = connection;
    connection.on('error', (error) => this.logger.error(`RabbitMQ connection error: ${errorMessage(error)}`));
    connection.on('close', () => {
      this.logger.warn('Consumer connection closed');
      this.connection = null;
      this.channel = null;
      this.resolveClosed();
    });
    this.logger.log(`Consumer connected to RabbitMQ at ${host}:${port}`);

    try {
      const channel = await connection.createChannel();
      this.channel = channel;
      channel.on('error', (error) => this.logger.error(`RabbitMQ channel error: ${errorMessage(error)}`));
      channel.on('close', () => this.onChannelClosed(channel, queue));

      await channel.assertExchange(exchange, EXCHANGE_TYPE, { durable: true });
      await channel.assertQueue(queue, { durable: true });
      for (const routingKey of INBOUND_ROUTING_KEYS) {
        await channel.bindQueue(queue, exchange, routingKey);
        this.logger.log(`Queue ${queue} bound to ${routingKey}`);
      }
      await channel.prefetch(1);

      const { consumerTag } = await channel.consume(
        queue,
        (message) => {
          if (!message) {
            this.logger.warn(`Consumer for ${queue} was cancelled by the broker`);
            return;
          }
          this.inFlight = this.handleDelivery(channel, message);
        },
        { noAck: false },
      );
      this.consumerTag = consumerTag;
    } catch (error) {
      this.logger.error(`Could not set up consumer on ${queue}: ${errorMessage(error)}`);
      await this.release();
      throw error;
    }
    this.logger.log(`Started consuming from queue: ${queue}`);
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return this.closed;
    }
    this.stopping = true;

    const { channel, consumerTag } = this;
    if (channel && consumerTag) {
      await channel
        .cancel(consumerTag)
        .catch((error: unknown) => this.logger.warn(`Could not cancel consumer: ${errorMessage(error)}`));
    }

    await this.inFlight;
    await this.release();

    this.logger.log('Consumer stopped');
    this.resolveClosed();
  }

  /** A channel the broker closed on its own (queue deleted, precondition failed) ends the consumer. */
  private onChannelClosed(channel: BrokerConsumerChannel, queue: string): void {
    if (this.stopping || this.channel !== channel) {
      return;
    }
    this.logger.warn(`Consumer channel for ${queue} was closed by the broker`);
    this.channel = null;
    this.release().then(
      () => this.resolveClosed(),
      (error: unknown) => this.logger.error(`Could not release consumer connection: ${errorMessage(error)}`),
    );
  }

  private async release(): Promise<void> {
    const { channel, connection } = this;
    this.channel = null;
    this.connection = null;

    if (channel) {
      await channel.close().catch((error: unknown) => this.logger.debug(`Channel close: ${errorMessage(error)}`));
    }
    if (connection) {
      await connection.close().catch((error: unknown) => this.logger.debug(`Connection close: ${errorMessage(error)}`));
    }
  }

  private async handleDelivery(channel: BrokerConsumerChannel, message: BrokerDelivery): Promise<void> {
    const { routingKey, deliveryTag, redelivered } = message.fields;
    this.logger.debug(`Delivery ${deliveryTag} on ${routingKey}${redelivered ? ' (redelivered)' : ''}`);

    const decision = await this.router.route(routingKey, message.content);
    try {
      if (decision.action === 'ack') {
        channel.ack(message);
      } else {
        channel.nack(message, false, decision.requeue);
      }
    } catch (error) {
      this.logger.error(`Could not ${decision.action} delivery ${deliveryTag}: ${errorMessage(error)}`);
    }
  }
}
