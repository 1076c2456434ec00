import { Options } from 'amqplib';
import { EventEmitter } from 'events';
import {
  BrokerConfirmChannel,
  BrokerConnection,
  BrokerConnector,
  BrokerConsumerChannel,
  BrokerDelivery,
} from '../broker/broker.types';

export interface PublishedMessage {
  exchange: string;
  routingKey: string;
  body: unknown;
  options?: Options.Publish;
}

type Listener = (error?: Error) => void;

class FakeEmitter {
  private readonly emitter = new EventEmitter();

  on(event: 'close' | 'error', listener: Listener): this {
    this.emitter.on(event, listener);
    return this;
  }

  protected emit(event: 'close' | 'error', error?: Error): void {
    this.emitter.emit(event, error);
  }
}

/** Stand-in for a RabbitMQ server: records what is published and lets tests push deliveries. */
export class InMemoryBroker {
  readonly published: PublishedMessage[] = [];
  readonly exchanges = new Map<string, string>();
  readonly bindings: { queue: string; exchange: string; pattern: string }[] = [];
  readonly connections: FakeConnection[] = [];
  connectAttempts = 0;
  /** Connect attempts fail with this error while set. */
  unreachable: Error | null = null;
  /** The next confirm wait rejects with this error. */
  nackNextConfirm: Error | null = null;

  readonly connector: BrokerConnector = async (options) => {
    this.connectAttempts++;
    if (this.unreachable) {
      throw this.unreachable;
    }
    const connection = new FakeConnection(this, options);
    this.connections.push(connection);
    return connection;
  };

  routingKeys(): string[] {
    return this.published.map((message) => message.routingKey);
  }

  get lastConnection(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) {
      throw new Error('No connection was opened');
    }
    return connection;
  }
}

export class FakeConnection extends FakeEmitter implements BrokerConnection {
  closed = false;
  readonly confirmChannels: FakeConfirmChannel[] = [];
  readonly consumerChannels: FakeConsumerChannel[] = [];

  constructor(
    private readonly broker: InMemoryBroker,
    readonly options: Options.Connect,
  ) {
    super();
  }

  async createConfirmChannel(): Promise<FakeConfirmChannel> {
    const channel = new FakeConfirmChannel(this.broker);
    this.confirmChannels.push(channel);
    return channel;
  }

  async createChannel(): Promise<FakeConsumerChannel> {
    const channel = new FakeConsumerChannel(this.broker);
    this.consumerChannels.push(channel);
    return channel;
  }

  async close(): Promise<void> {
    if (this.closed) {
      throw new Error('Connection closed');
    }
    this.closed = true;
    this.emit('close');
  }

  /** The broker going away underneath the client. */
  drop(): void {
    this.closed = true;
    this.emit('error', new Error('Connection lost'));
    this.emit('close');
  }
}

abstract class FakeChannel extends FakeEmitter {
  closed = false;

  constructor(protected readonly broker: InMemoryBroker) {
    super();
  }

  async assertExchange(exchange: string, type: string): Promise<{ exchange: string }> {
    this.broker.exchanges.set(exchange, type);
    return { exchange };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.emit('close');
  }
}

export class FakeConfirmChannel extends FakeChannel implements BrokerConfirmChannel {
  private pending: PublishedMessage[] = [];

  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean {
    if (this.closed) {
      throw new Error('Channel closed');
    }
    this.pending.push({ exchange, routingKey, body: JSON.parse(content.toString('utf8')), options });
    return true;
  }

  async waitForConfirms(): Promise<void> {
    const batch = this.pending;
    this.pending = [];

    const failure = this.broker.nackNextConfirm;
    if (failure) {
      this.broker.nackNextConfirm = null;
      throw failure;
    }
    this.broker.published.push(...batch);
  }
}

export class FakeConsumerChannel extends FakeChannel implements BrokerConsumerChannel {
  readonly queues: { queue: string; options?: Options.AssertQueue }[] = [];
  readonly acked: BrokerDelivery[] = [];
  readonly nacked: { message: BrokerDelivery; requeue: boolean }[] = [];
  readonly cancelled: string[] = [];
  prefetchCount = 0;

  private readonly consumers = new Map<string, (message: BrokerDelivery | null) => void>();
  private nextDeliveryTag = 0;

  async assertQueue(queue: string, options?: Options.AssertQueue): Promise<{ queue: string }> {
    this.queues.push({ queue, options });
    return { queue };
  }

  async bindQueue(queue: string, exchange: string, pattern: string): Promise<void> {
    this.broker.bindings.push({ queue, exchange, pattern });
  }

  async prefetch(count: number): Promise<void> {
    this.prefetchCount = count;
  }

  async consume(
    queue: string,
    onMessage: (message: BrokerDelivery | null) => void,
  ): Promise<{ consumerTag: string }> {
    const consumerTag = `ctag-${queue}-${this.consumers.size + 1}`;
    this.consumers.set(consumerTag, onMessage);
    return { consumerTag };
  }

  async cancel(consumerTag: string): Promise<void> {
    this.consumers.delete(consumerTag);
    this.cancelled.push(consumerTag);
  }

  ack(message: BrokerDelivery): void {
    this.acked.push(message);
  }

  nack(message: BrokerDelivery, _allUpTo?: boolean, requeue = true): void {
    this.nacked.push({ message, requeue });
  }

  /** Pushes a message to every active consumer, the way the broker would deliver it. */
  deliver(routingKey: string, body: unknown): BrokerDelivery {
    const message: BrokerDelivery = {
      content: Buffer.from(typeof body === 'string' ? body : JSON.stringify(body), 'utf8'),
      fields: { routingKey, deliveryTag: ++this.nextDeliveryTag, redelivered: false },
    };
    this.consumers.forEach((onMessage) => onMessage(message));
    return message;
  }

  get consumerCount(): number {
    return this.consumers.size;
  }

  get settled(): number {
    return this.acked.length + this.nacked.length;
  }
}
