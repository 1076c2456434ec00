export enum InboundEventKind {
  ORDER_CONFIRMED = 'order.confirmed',
  ORDER_CANCELLED = 'order.cancelled',
}

export const INBOUND_ROUTING_KEYS: readonly InboundEventKind[] = Object.values(InboundEventKind);

export type InboundEvent =
  | { kind: InboundEventKind; routingKey: string }
  | { kind: 'unknown'; routingKey: string };

export type RouteDecision = { action: 'ack' } | { action: 'nack'; requeue: boolean };

export const ACK: RouteDecision = { action: 'ack' };
export const NACK_REQUEUE: RouteDecision = { action: 'nack', requeue: true };

export function parseInboundEvent(routingKey: string): InboundEvent {
  switch (routingKey) {
    case InboundEventKind.ORDER_CONFIRMED:
      return { kind: InboundEventKind.ORDER_CONFIRMED, routingKey };
    case InboundEventKind.ORDER_CANCELLED:
      return { kind: InboundEventKind.ORDER_CANCELLED, routingKey };
    default:
      return { kind: 'unknown', routingKey };
  }
}
