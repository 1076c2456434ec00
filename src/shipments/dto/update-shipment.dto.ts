import { ApiProperty } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { ShipmentStatusType } from '../../common/enums/shipment-status-type.enum';

export class UpdateShipmentDto {
  @ApiProperty({ enum: ShipmentStatusType, required: false })
  @IsOptional()
  @IsEnum(ShipmentStatusType)
  status?: ShipmentStatusType;

  /** Only recorded in the history row of a status change. */
  @ApiProperty({ type: String, required: false })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  location?: string;

  @ApiProperty({ type: String, required: false })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({ type: String, required: false })
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiProperty({ type: Number, required: false, description: 'Weight in kg' })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  actualWeight?: number;

  @ApiProperty({ type: String, format: 'date-time', required: false })
  @IsOptional()
  @IsDateString()
  estimatedDelivery?: string;
}
