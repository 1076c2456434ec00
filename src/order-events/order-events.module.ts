import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { ShipmentsModule } from '../shipments/shipments.module';
import { OrderCancelledHandler } from './handlers/order-cancelled.handler';
import { OrderConfirmedHandler } from './handlers/order-confirmed.handler';
import { InboundEventRouter } from './inbound-event.router';
import { OrderEventsConsumer } from './order-events.consumer';

@Module({
  imports: [ShipmentsModule, BrokerModule],
  providers: [OrderConfirmedHandler, OrderCancelledHandler, InboundEventRouter, OrderEventsConsumer],
  exports: [InboundEventRouter, OrderEventsConsumer],
})
export class OrderEventsModule {}
