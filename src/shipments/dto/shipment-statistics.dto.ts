export class ShipmentStatisticsDto {
  statusDistribution!: { status: string; count: number }[];
  carrierDistribution!: { carrier: string; count: number }[];
  totalShipments!: number;
}
