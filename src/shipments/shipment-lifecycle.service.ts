import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { EventPublisher, OutboundEvent } from '../broker/event-publisher.service';
import { CarrierType } from '../common/enums/carrier-type.enum';
import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { AppConfig } from '../config/config';
import { Shipment } from '../entities/shipment.entity';
import { UpdateShipmentDto } from './dto/update-shipment.dto';
import { CreateShipmentDto } from './dto/create-shipment.dto';
import { HistoryContext, ShipmentHistoryRecorder } from './shipment-history.recorder';
import { shipmentCreatedEvent, shipmentTransitionEvents } from './shipment-events';
import { InvalidOrderIdException, InvalidTransitionException, ShipmentNotFoundException } from './shipment.exceptions';
import { ACTIVE_STATUSES, INITIAL_STATUS, Transition, validateTransition } from './status-state-machine';
import { TrackingNumberAllocator } from './tracking-number.allocator';

export interface CreateFromOrderResult {
  /** False when an active shipment already existed for the order and was returned as is. */
  created: boolean;
  shipment: Shipment;
}

type NewShipment = Pick<Shipment, 'orderId' | 'carrier' | 'shippingAddress' | 'estimatedDelivery' | 'actualWeight' | 'notes'>;

export const ORDER_CANCELLED_REASON = 'order_cancelled';

/**
 * Every write that can move a shipment's status goes through here, whether it comes
 * from an order event or from the REST API.
 *
 * Ordering per mutation: shipment row saved, then history row, then events. A failed
 * publication is logged and does not undo or fail the mutation.
 */
@Injectable()
export class ShipmentLifecycleService {
  private readonly logger = new Logger(ShipmentLifecycleService.name);
  private readonly defaultCarrier: CarrierType;

  constructor(
    @InjectRepository(Shipment)
    private readonly shipmentRepository: Repository<Shipment>,
    private readonly trackingNumberAllocator: TrackingNumberAllocator,
    private readonly historyRecorder: ShipmentHistoryRecorder,
    private readonly eventPublisher: EventPublisher,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.defaultCarrier = configService.get('shipping.defaultCarrier', { infer: true });
  }

  /** Safe to replay: an order with a live shipment gets that shipment back. */
  async createFromOrder(orderId: number, shippingAddress?: string | null): Promise<CreateFromOrderResult> {
    this.assertOrderId(orderId);

    const existing = await this.shipmentRepository.findOne({
      where: { orderId, status: In([...ACTIVE_STATUSES]) },
      order: { id: 'ASC' },
    });
    if (existing) {
      this.logger.log(`Shipment already exists for order ${orderId} (${existing.trackingNo})`);
      return { created: false, shipment: existing };
    }

    const shipment = await this.register({
      orderId,
      carrier: this.defaultCarrier,
      shippingAddress: shippingAddress || null,
      estimatedDelivery: null,
      actualWeight: null,
      notes: null,
    });
    return { created: true, shipment };
  }

  async createShipment(dto: CreateShipmentDto): Promise<Shipment> {
    this.assertOrderId(dto.orderId);

    return this.register({
      orderId: dto.orderId,
      carrier: dto.carrier ?? this.defaultCarrier,
      shippingAddress: dto.shippingAddress ?? null,
      estimatedDelivery: dto.estimatedDelivery ? new Date(dto.estimatedDelivery) : null,
      actualWeight: dto.actualWeight ?? null,
      notes: dto.notes ?? null,
    });
  }

  /**
   * Cancels the order's live shipments. Each one still has to pass the state machine,
   * so an IN_TRANSIT shipment is logged and left alone. Replays find nothing to do.
   */
  async cancelForOrder(orderId: number, reason = ORDER_CANCELLED_REASON): Promise<Shipment[]> {
    const shipments = await this.shipmentRepository.find({
      where: { orderId, status: In([...ACTIVE_STATUSES]) },
      order: { id: 'ASC' },
    });

    const cancelled: Shipment[] = [];
    for (const shipment of shipments) {
      const verdict = validateTransition(shipment.status, ShipmentStatusType.CANCELLED);
      if (!verdict.ok) {
        this.logger.warn(
          `Shipment ${shipment.id} for order ${orderId} is ${shipment.status} and cannot be cancelled, leaving it untouched`,
        );
        continue;
      }

      const at = new Date();
      shipment.applyStatus(ShipmentStatusType.CANCELLED, at);
      const saved = await this.shipmentRepository.save(shipment);
      this.logger.log(`Cancelled shipment ${saved.id} for order ${orderId}`);

      await this.afterTransition(saved, verdict.value, { description: 'Cancelled: order cancelled', at }, reason);
      cancelled.push(saved);
    }

    return cancelled;
  }

  applyStatusUpdate(
    shipmentId: number,
    requestedStatus: ShipmentStatusType,
    location?: string,
    description?: string,
  ): Promise<Shipment> {
    return this.updateShipment(shipmentId, { status: requestedStatus, location, description });
  }

  /**
   * Applies auxiliary fields and, when present, a status change in one save. The status
   * is validated before anything is touched, a rejected transition leaves the row as it was.
   */
  async updateShipment(shipmentId: number, changes: UpdateShipmentDto): Promise<Shipment> {
    const shipment = await this.shipmentRepository.findOneBy({ id: shipmentId });
    if (!shipment) {
      throw new ShipmentNotFoundException(`id ${shipmentId}`);
    }

    const transition = changes.status === undefined ? null : this.validate(shipment, changes.status);
    const statusChanged = transition !== null && transition.changed;

    let fieldsChanged = false;
    if (changes.notes !== undefined) {
      shipment.notes = changes.notes;
      fieldsChanged = true;
    }
    if (changes.actualWeight !== undefined) {
      shipment.actualWeight = changes.actualWeight;
      fieldsChanged = true;
    }
    if (changes.estimatedDelivery !== undefined) {
      shipment.estimatedDelivery = new Date(changes.estimatedDelivery);
      fieldsChanged = true;
    }

    if (!statusChanged && !fieldsChanged) {
      return shipment;
    }

    const at = new Date();
    if (statusChanged) {
      shipment.applyStatus(transition.to, at);
    }
    const saved = await this.shipmentRepository.save(shipment);

    if (statusChanged) {
      await this.afterTransition(saved, transition, {
        location: changes.location,
        description: changes.description,
        at,
      });
    }

    return saved;
  }

  private validate(shipment: Shipment, requested: ShipmentStatusType): Transition {
    const verdict = validateTransition(shipment.status, requested);
    if (!verdict.ok) {
      this.logger.warn(`Rejected transition for shipment ${shipment.id}: ${verdict.error.from} -> ${verdict.error.to}`);
      throw new InvalidTransitionException(verdict.error.from, verdict.error.to);
    }
    return verdict.value;
  }

  private async register(attributes: NewShipment): Promise<Shipment> {
    const shipment = await this.trackingNumberAllocator.allocate((trackingNo) =>
      this.shipmentRepository.save(
        this.shipmentRepository.create({
          ...attributes,
          trackingNo,
          status: INITIAL_STATUS,
          shippedAt: null,
          deliveredAt: null,
        }),
      ),
    );

    this.logger.log(`Created shipment ${shipment.id} (${shipment.trackingNo}) for order ${shipment.orderId}`);
    await this.announce(shipment, [shipmentCreatedEvent(shipment)]);
    return shipment;
  }

  private async afterTransition(
    shipment: Shipment,
    transition: Transition,
    context: HistoryContext & { at: Date },
    reason?: string,
  ): Promise<void> {
    await this.historyRecorder.recordTransition(shipment, transition, context);
    await this.announce(shipment, shipmentTransitionEvents(shipment, transition.from, context.at, reason));
  }

  private async announce(shipment: Shipment, events: OutboundEvent[]): Promise<void> {
    const result = await this.eventPublisher.publishAll(events);
    if (!result.ok) {
      const routingKeys = events.map((event) => event.routingKey).join(', ');
      this.logger.error(
        `Shipment ${shipment.id} is saved but ${routingKeys} was not published (${result.error.kind}): ${result.error.message}`,
      );
    }
  }

  private assertOrderId(orderId: number): void {
    if (!Number.isInteger(orderId) || orderId <= 0) {
      throw new InvalidOrderIdException(orderId);
    }
  }
}
