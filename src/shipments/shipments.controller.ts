import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { CreateShipmentDto } from './dto/create-shipment.dto';
import { UpdateShipmentDto } from './dto/update-shipment.dto';
import { ShipmentLifecycleService } from './shipment-lifecycle.service';
import { ShipmentsService } from './shipments.service';

@ApiTags('shipments')
@Controller('v1/shipments')
export class ShipmentsController {
  constructor(
    private readonly shipmentsService: ShipmentsService,
    private readonly lifecycleService: ShipmentLifecycleService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create a shipment with a generated tracking number' })
  create(@Body() dto: CreateShipmentDto) {
    return this.lifecycleService.createShipment(dto);
  }

  @Get('by-tracking')
  @ApiOperation({ summary: 'Find a shipment by tracking number' })
  @ApiQuery({ name: 'tracking_no', required: true })
  findByTracking(@Query('tracking_no') trackingNo?: string) {
    if (!trackingNo) {
      throw new BadRequestException('tracking_no parameter is required');
    }
    return this.shipmentsService.findByTrackingNo(trackingNo);
  }

  @Get('by-order')
  @ApiOperation({ summary: 'List the shipments of an order' })
  @ApiQuery({ name: 'order_id', required: true })
  findByOrder(
    @Query(
      'order_id',
      new ParseIntPipe({
        exceptionFactory: () => new BadRequestException('order_id must be an integer'),
      }),
    )
    orderId: number,
  ) {
    return this.shipmentsService.findByOrder(orderId);
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Shipment counts by status and carrier' })
  statistics() {
    return this.shipmentsService.getStatistics();
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.shipmentsService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update shipment status and details' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateShipmentDto) {
    return this.lifecycleService.updateShipment(id, dto);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Status history of a shipment' })
  history(@Param('id', ParseIntPipe) id: number) {
    return this.shipmentsService.findHistory(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.shipmentsService.remove(id);
  }
}
