import { Injectable, Logger } from '@nestjs/common';
import { ShipmentLifecycleService } from '../../shipments/shipment-lifecycle.service';
import { OrderCancelledEventDto } from '../dto/order-event.dto';
import { InboundEventKind } from '../inbound-event';
import { InboundEventHandler, toValidatedPayload } from './inbound-event.handler';

@Injectable()
export class OrderCancelledHandler implements InboundEventHandler {
  readonly kind = InboundEventKind.ORDER_CANCELLED;
  private readonly logger = new Logger(OrderCancelledHandler.name);

  constructor(private readonly lifecycleService: ShipmentLifecycleService) {}

  async handle(payload: unknown): Promise<void> {
    const event = await toValidatedPayload(this.kind, OrderCancelledEventDto, payload);
    this.logger.log(`Received order.cancelled for order ${event.order_id}`);

    const cancelled = await this.lifecycleService.cancelForOrder(event.order_id);
    this.logger.log(`Order ${event.order_id}: ${cancelled.length} shipment(s) cancelled`);
  }
}
