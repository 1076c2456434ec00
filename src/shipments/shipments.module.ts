import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BrokerModule } from '../broker/broker.module';
import { Shipment, ShipmentHistory } from '../entities';
import { ShipmentHistoryRecorder } from './shipment-history.recorder';
import { ShipmentLifecycleService } from './shipment-lifecycle.service';
import { ShipmentsController } from './shipments.controller';
import { ShipmentsService } from './shipments.service';
import { TrackingNumberAllocator } from './tracking-number.allocator';

@Module({
  controllers: [ShipmentsController],
  imports: [TypeOrmModule.forFeature([Shipment, ShipmentHistory]), BrokerModule],
  providers: [ShipmentsService, ShipmentLifecycleService, ShipmentHistoryRecorder, TrackingNumberAllocator],
  exports: [ShipmentsService, ShipmentLifecycleService],
})
export class ShipmentsModule {}
