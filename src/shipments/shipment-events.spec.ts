import { CarrierType } from '../common/enums/carrier-type.enum';
import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { Shipment } from '../entities/shipment.entity';
import { shipmentCreatedEvent, shipmentTransitionEvents, transitionPayload } from './shipment-events';

const createdAt = new Date('2026-05-01T08:00:00.000Z');
const shippedAt = new Date('2026-05-01T09:30:00.000Z');
const deliveredAt = new Date('2026-05-03T14:15:00.000Z');

const shipment = (status: ShipmentStatusType, dates: Partial<Pick<Shipment, 'shippedAt' | 'deliveredAt'>> = {}) =>
  Object.assign(new Shipment(), {
    id: 3,
    orderId: 42,
    trackingNo: 'TRK4821',
    carrier: CarrierType.FEDEX,
    status,
    createdAt,
    shippedAt: dates.shippedAt ?? null,
    deliveredAt: dates.deliveredAt ?? null,
  });

describe('shipment events', () => {
  it('describes a new shipment', () => {
    expect(shipmentCreatedEvent(shipment(ShipmentStatusType.PENDING))).toEqual({
      routingKey: 'shipment.created',
      payload: {
        shipment_id: 3,
        order_id: 42,
        tracking_no: 'TRK4821',
        carrier: 'FedEx',
        status: 'PENDING',
        created_at: '2026-05-01T08:00:00.000Z',
      },
    });
  });

  it('adds shipped_at to pick-up and in-transit payloads', () => {
    const payload = transitionPayload(
      shipment(ShipmentStatusType.PICKED_UP, { shippedAt }),
      ShipmentStatusType.PENDING,
      shippedAt,
    );

    expect(payload).toEqual({
      shipment_id: 3,
      order_id: 42,
      tracking_no: 'TRK4821',
      carrier: 'FedEx',
      old_status: 'PENDING',
      new_status: 'PICKED_UP',
      updated_at: '2026-05-01T09:30:00.000Z',
      shipped_at: '2026-05-01T09:30:00.000Z',
    });
  });

  it('adds delivered_at to delivery payloads', () => {
    const payload = transitionPayload(
      shipment(ShipmentStatusType.DELIVERED, { shippedAt, deliveredAt }),
      ShipmentStatusType.OUT_FOR_DELIVERY,
      deliveredAt,
    );

    expect(payload.delivered_at).toBe('2026-05-03T14:15:00.000Z');
    expect(payload).not.toHaveProperty('shipped_at');
  });

  it('carries the cancellation reason', () => {
    const payload = transitionPayload(shipment(ShipmentStatusType.CANCELLED), ShipmentStatusType.PENDING, createdAt, 'order_cancelled');

    expect(payload.reason).toBe('order_cancelled');
    expect(payload).not.toHaveProperty('shipped_at');
    expect(payload).not.toHaveProperty('delivered_at');
  });

  it('emits the specific event before shipment.status_updated', () => {
    const events = shipmentTransitionEvents(
      shipment(ShipmentStatusType.IN_TRANSIT, { shippedAt }),
      ShipmentStatusType.PICKED_UP,
      shippedAt,
    );

    expect(events.map((event) => event.routingKey)).toEqual(['shipment.in_transit', 'shipment.status_updated']);
    expect(events[0].payload).toBe(events[1].payload);
  });

  it.each<[ShipmentStatusType, string]>([
    [ShipmentStatusType.OUT_FOR_DELIVERY, 'shipment.out_for_delivery'],
    [ShipmentStatusType.FAILED, 'shipment.failed'],
    [ShipmentStatusType.CANCELLED, 'shipment.cancelled'],
  ])('routes %s to %s', (status, routingKey) => {
    const [specific] = shipmentTransitionEvents(shipment(status), ShipmentStatusType.IN_TRANSIT, createdAt);

    expect(specific.routingKey).toBe(routingKey);
  });
});
