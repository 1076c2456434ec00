import { connect, Options } from 'amqplib';
import { RabbitMqConfig } from '../config/config';

export const BROKER_CONNECTOR = Symbol('BROKER_CONNECTOR');

export const EXCHANGE_TYPE = 'topic';

/** The slice of an amqplib delivery the consumer reads and hands back on ack/nack. */
export interface BrokerDelivery {
  content: Buffer;
  fields: {
    routingKey: string;
    deliveryTag: number;
    redelivered: boolean;
  };
}

export interface BrokerChannel {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: Error) => void): unknown;
}

export interface BrokerConfirmChannel extends BrokerChannel {
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
}

export interface BrokerConsumerChannel extends BrokerChannel {
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: BrokerDelivery | null) => void,
    options?: Options.Consume,
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: BrokerDelivery): void;
  nack(message: BrokerDelivery, allUpTo?: boolean, requeue?: boolean): void;
}

export interface BrokerConnection {
  createChannel(): Promise<BrokerConsumerChannel>;
  createConfirmChannel(): Promise<BrokerConfirmChannel>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: Error) => void): unknown;
}

export type BrokerConnector = (options: Options.Connect) => Promise<BrokerConnection>;

export const amqpConnector: BrokerConnector = (options) => connect(options);

export function toConnectOptions(settings: RabbitMqConfig): Options.Connect {
  return {
    protocol: 'amqp',
    hostname: settings.host,
    port: settings.port,
    vhost: settings.vhost,
    username: settings.username,
    password: settings.password,
    heartbeat: settings.heartbeat,
  };
}
