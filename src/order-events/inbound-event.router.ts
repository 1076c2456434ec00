import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../utils/error-message.utils';
import { InboundEventHandler } from './handlers/inbound-event.handler';
import { OrderCancelledHandler } from './handlers/order-cancelled.handler';
import { OrderConfirmedHandler } from './handlers/order-confirmed.handler';
import { ACK, InboundEventKind, NACK_REQUEUE, parseInboundEvent, RouteDecision } from './inbound-event';

/**
 * Turns a delivery into an ack/nack decision. Unknown routing keys are acked so they
 * cannot block the queue; bad JSON, invalid payloads and handler failures are nacked
 * with requeue and left to the broker's redelivery policy.
 */
@Injectable()
export class InboundEventRouter {
  private readonly logger = new Logger(InboundEventRouter.name);
  private readonly handlers: Readonly<Record<InboundEventKind, InboundEventHandler>>;

  constructor(orderConfirmed: OrderConfirmedHandler, orderCancelled: OrderCancelledHandler) {
    this.handlers = {
      [InboundEventKind.ORDER_CONFIRMED]: orderConfirmed,
      [InboundEventKind.ORDER_CANCELLED]: orderCancelled,
    };
  }

  async route(routingKey: string, body: Buffer | string): Promise<RouteDecision> {
    const event = parseInboundEvent(routingKey);
    if (event.kind === 'unknown') {
      this.logger.warn(`No handler for routing key: ${routingKey}`);
      return ACK;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(typeof body === 'string' ? body : body.toString('utf8'));
    } catch (error) {
      this.logger.error(`Unparseable ${routingKey} message: ${errorMessage(error)}`);
      return NACK_REQUEUE;
    }

    try {
      await this.handlers[event.kind].handle(payload);
      return ACK;
    } catch (error) {
      this.logger.error(`Error handling ${routingKey}: ${errorMessage(error)}`);
      return NACK_REQUEUE;
    }
  }
}
