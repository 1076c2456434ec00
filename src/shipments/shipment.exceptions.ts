import { HttpStatus } from '@nestjs/common';
import { BusinessException } from '../common/business.exception';
import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';

export class InvalidTransitionException extends BusinessException {
  constructor(
    public readonly from: ShipmentStatusType,
    public readonly to: ShipmentStatusType,
  ) {
    super(
      'shipping-api',
      `Invalid status transition from ${from} to ${to}`,
      `Invalid status transition from ${from} to ${to}`,
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class ShipmentNotFoundException extends BusinessException {
  constructor(lookup: string) {
    super('shipping-api', `Shipment not found: ${lookup}`, 'Shipment not found', HttpStatus.NOT_FOUND);
  }
}

export class AllocationExhaustedException extends BusinessException {
  constructor(public readonly attempts: number) {
    super(
      'shipping-api',
      `Could not allocate a free tracking number after ${attempts} attempts`,
      'Could not allocate a tracking number',
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}

export class InvalidOrderIdException extends BusinessException {
  constructor(orderId: number) {
    super('shipping-api', `Order ID must be a positive integer, got ${orderId}`, 'Order ID must be positive', HttpStatus.BAD_REQUEST);
  }
}
