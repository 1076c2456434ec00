import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Shipment } from '../entities/shipment.entity';
import { ShipmentHistory } from '../entities/shipment-history.entity';
import { Transition } from './status-state-machine';

export interface HistoryContext {
  location?: string | null;
  description?: string | null;
  at?: Date;
}

/**
 * Append-only audit trail. Rows are only ever inserted; there is no update or delete
 * path here, history goes away with its shipment through the cascading foreign key.
 */
@Injectable()
export class ShipmentHistoryRecorder {
  private readonly logger = new Logger(ShipmentHistoryRecorder.name);

  constructor(
    @InjectRepository(ShipmentHistory)
    private readonly historyRepository: Repository<ShipmentHistory>,
  ) {}

  /** Returns null for a no-op transition, nothing is written then. */
  async recordTransition(
    shipment: Shipment,
    transition: Transition,
    context: HistoryContext = {},
  ): Promise<ShipmentHistory | null> {
    if (!transition.changed) {
      return null;
    }

    const entry = this.historyRepository.create({
      shipmentId: shipment.id,
      status: transition.to,
      location: context.location || null,
      description: context.description || `Status updated to ${transition.to}`,
      timestamp: context.at ?? new Date(),
    });

    const saved = await this.historyRepository.save(entry);
    this.logger.debug(`History #${saved.id}: shipment ${shipment.id} ${transition.from} -> ${transition.to}`);
    return saved;
  }

  findByShipment(shipmentId: number): Promise<ShipmentHistory[]> {
    return this.historyRepository.find({
      where: { shipmentId },
      order: { timestamp: 'DESC', id: 'DESC' },
    });
  }
}
