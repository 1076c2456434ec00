import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { OutboundEvent } from '../broker/event-publisher.service';
import { Shipment } from '../entities/shipment.entity';

export enum ShipmentEventType {
  CREATED = 'shipment.created',
  PICKED_UP = 'shipment.picked_up',
  IN_TRANSIT = 'shipment.in_transit',
  OUT_FOR_DELIVERY = 'shipment.out_for_delivery',
  DELIVERED = 'shipment.delivered',
  CANCELLED = 'shipment.cancelled',
  FAILED = 'shipment.failed',
  STATUS_UPDATED = 'shipment.status_updated',
}

/** PENDING is only ever an initial status, no transition leads into it. */
const TRANSITION_EVENTS: Readonly<Record<ShipmentStatusType, ShipmentEventType | null>> = {
  [ShipmentStatusType.PENDING]: null,
  [ShipmentStatusType.PICKED_UP]: ShipmentEventType.PICKED_UP,
  [ShipmentStatusType.IN_TRANSIT]: ShipmentEventType.IN_TRANSIT,
  [ShipmentStatusType.OUT_FOR_DELIVERY]: ShipmentEventType.OUT_FOR_DELIVERY,
  [ShipmentStatusType.DELIVERED]: ShipmentEventType.DELIVERED,
  [ShipmentStatusType.CANCELLED]: ShipmentEventType.CANCELLED,
  [ShipmentStatusType.FAILED]: ShipmentEventType.FAILED,
};

export interface ShipmentCreatedPayload {
  shipment_id: number;
  order_id: number;
  tracking_no: string;
  carrier: string;
  status: ShipmentStatusType;
  created_at: string;
}

export interface ShipmentTransitionPayload {
  shipment_id: number;
  order_id: number;
  tracking_no: string;
  carrier: string;
  old_status: ShipmentStatusType;
  new_status: ShipmentStatusType;
  updated_at: string;
  shipped_at?: string | null;
  delivered_at?: string | null;
  reason?: string;
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function shipmentCreatedEvent(shipment: Shipment): OutboundEvent {
  const payload: ShipmentCreatedPayload = {
    shipment_id: shipment.id,
    order_id: shipment.orderId,
    tracking_no: shipment.trackingNo,
    carrier: shipment.carrier,
    status: shipment.status,
    created_at: shipment.createdAt.toISOString(),
  };
  return { routingKey: ShipmentEventType.CREATED, payload };
}

export function transitionPayload(
  shipment: Shipment,
  oldStatus: ShipmentStatusType,
  occurredAt: Date,
  reason?: string,
): ShipmentTransitionPayload {
  const payload: ShipmentTransitionPayload = {
    shipment_id: shipment.id,
    order_id: shipment.orderId,
    tracking_no: shipment.trackingNo,
    carrier: shipment.carrier,
    old_status: oldStatus,
    new_status: shipment.status,
    updated_at: occurredAt.toISOString(),
  };

  switch (shipment.status) {
    case ShipmentStatusType.PICKED_UP:
    case ShipmentStatusType.IN_TRANSIT:
      payload.shipped_at = iso(shipment.shippedAt);
      break;
    case ShipmentStatusType.DELIVERED:
      payload.delivered_at = iso(shipment.deliveredAt);
      break;
  }

  if (reason) {
    payload.reason = reason;
  }

  return payload;
}

/** The status-specific event followed by the generic `shipment.status_updated`. */
export function shipmentTransitionEvents(
  shipment: Shipment,
  oldStatus: ShipmentStatusType,
  occurredAt: Date,
  reason?: string,
): OutboundEvent[] {
  const payload = transitionPayload(shipment, oldStatus, occurredAt, reason);
  const specific = TRANSITION_EVENTS[shipment.status];

  const events: OutboundEvent[] = [];
  if (specific) {
    events.push({ routingKey: specific, payload });
  }
  events.push({ routingKey: ShipmentEventType.STATUS_UPDATED, payload });
  return events;
}
