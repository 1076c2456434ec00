import { Module } from '@nestjs/common';
import { amqpConnector, BROKER_CONNECTOR } from './broker.types';
import { EventPublisher } from './event-publisher.service';

@Module({
  providers: [{ provide: BROKER_CONNECTOR, useValue: amqpConnector }, EventPublisher],
  exports: [BROKER_CONNECTOR, EventPublisher],
})
export class BrokerModule {}
