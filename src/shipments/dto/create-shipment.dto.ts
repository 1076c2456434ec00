import { ApiProperty } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsInt, IsNumber, IsOptional, IsPositive, IsString, Min } from 'class-validator';
import { CarrierType } from '../../common/enums/carrier-type.enum';

export class CreateShipmentDto {
  @ApiProperty({ type: Number, required: true, description: 'Order this shipment fulfils' })
  @IsInt()
  @IsPositive()
  orderId!: number;

  @ApiProperty({ enum: CarrierType, required: false })
  @IsOptional()
  @IsEnum(CarrierType)
  carrier?: CarrierType;

  @ApiProperty({ type: String, required: false })
  @IsOptional()
  @IsString()
  shippingAddress?: string;

  @ApiProperty({ type: String, format: 'date-time', required: false })
  @IsOptional()
  @IsDateString()
  estimatedDelivery?: string;

  @ApiProperty({ type: Number, required: false, description: 'Weight in kg' })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  actualWeight?: number;

  @ApiProperty({ type: String, required: false })
  @IsOptional()
  @IsString()
  notes?: string;
}
