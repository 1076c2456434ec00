import { Injectable, Logger } from '@nestjs/common';
import { ShipmentLifecycleService } from '../../shipments/shipment-lifecycle.service';
import { OrderConfirmedEventDto } from '../dto/order-event.dto';
import { InboundEventKind } from '../inbound-event';
import { InboundEventHandler, toValidatedPayload } from './inbound-event.handler';

@Injectable()
export class OrderConfirmedHandler implements InboundEventHandler {
  readonly kind = InboundEventKind.ORDER_CONFIRMED;
  private readonly logger = new Logger(OrderConfirmedHandler.name);

  constructor(private readonly lifecycleService: ShipmentLifecycleService) {}

  async handle(payload: unknown): Promise<void> {
    const event = await toValidatedPayload(this.kind, OrderConfirmedEventDto, payload);
    this.logger.log(`Received order.confirmed for order ${event.order_id}`);

    const { created, shipment } = await this.lifecycleService.createFromOrder(event.order_id, event.shipping_address);
    if (!created) {
      this.logger.log(`Order ${event.order_id} already has shipment ${shipment.id}, nothing to do`);
    }
  }
}
