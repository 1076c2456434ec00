import { IsInt, IsOptional, IsPositive, IsString } from 'class-validator';

/** Body of `order.confirmed`; field names follow the order service's wire format. */
export class OrderConfirmedEventDto {
  @IsInt()
  @IsPositive()
  order_id!: number;

  @IsOptional()
  @IsString()
  shipping_address?: string;
}

/** Body of `order.cancelled`. */
export class OrderCancelledEventDto {
  @IsInt()
  @IsPositive()
  order_id!: number;
}
