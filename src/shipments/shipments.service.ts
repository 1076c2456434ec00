import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Shipment } from '../entities/shipment.entity';
import { ShipmentHistory } from '../entities/shipment-history.entity';
import { ShipmentStatisticsDto } from './dto/shipment-statistics.dto';
import { ShipmentHistoryRecorder } from './shipment-history.recorder';
import { ShipmentNotFoundException } from './shipment.exceptions';

@Injectable()
export class ShipmentsService {
  private readonly logger = new Logger(ShipmentsService.name);

  constructor(
    @InjectRepository(Shipment)
    private readonly shipmentRepository: Repository<Shipment>,
    private readonly historyRecorder: ShipmentHistoryRecorder,
  ) {}

  async findOne(id: number): Promise<Shipment> {
    const shipment = await this.shipmentRepository.findOneBy({ id });
    if (!shipment) {
      throw new ShipmentNotFoundException(`id ${id}`);
    }
    return shipment;
  }

  async findByTrackingNo(trackingNo: string): Promise<Shipment> {
    const shipment = await this.shipmentRepository.findOneBy({ trackingNo });
    if (!shipment) {
      throw new ShipmentNotFoundException(`tracking number ${trackingNo}`);
    }
    return shipment;
  }

  findByOrder(orderId: number): Promise<Shipment[]> {
    return this.shipmentRepository.find({
      where: { orderId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async findHistory(id: number): Promise<ShipmentHistory[]> {
    const shipment = await this.findOne(id);
    return this.historyRecorder.findByShipment(shipment.id);
  }

  async getStatistics(): Promise<ShipmentStatisticsDto> {
    const byStatus = await this.shipmentRepository
      .createQueryBuilder('shipment')
      .select('shipment.status', 'status')
      .addSelect('COUNT(shipment.id)', 'count')
      .groupBy('shipment.status')
      .orderBy('shipment.status', 'ASC')
      .getRawMany<{ status: string; count: string | number }>();

    const byCarrier = await this.shipmentRepository
      .createQueryBuilder('shipment')
      .select('shipment.carrier', 'carrier')
      .addSelect('COUNT(shipment.id)', 'count')
      .groupBy('shipment.carrier')
      .orderBy('shipment.carrier', 'ASC')
      .getRawMany<{ carrier: string; count: string | number }>();

    return {
      statusDistribution: byStatus.map(({ status, count }) => ({ status, count: Number(count) })),
      carrierDistribution: byCarrier.map(({ carrier, count }) => ({ carrier, count: Number(count) })),
      totalShipments: await this.shipmentRepository.count(),
    };
  }

  /** Administrative removal; the history rows go with it. */
  async remove(id: number): Promise<void> {
    const shipment = await this.findOne(id);
    await this.shipmentRepository.remove(shipment);
    this.logger.log(`Deleted shipment ${id} (${shipment.trackingNo})`);
  }
}
