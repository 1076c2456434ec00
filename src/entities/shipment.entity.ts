import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { CarrierType } from '../common/enums/carrier-type.enum';
import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { decimalTransformer } from '../common/transformers/decimal.transformer';
import { ShipmentHistory } from './shipment-history.entity';

const SHIPPED_STATUSES: readonly ShipmentStatusType[] = [ShipmentStatusType.PICKED_UP, ShipmentStatusType.IN_TRANSIT];

@Entity('shipments')
@Index(['orderId', 'status'])
export class Shipment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'order_id', type: 'int' })
  orderId!: number;

  @Index({ unique: true })
  @Column({ name: 'tracking_no', type: 'varchar', length: 50 })
  trackingNo!: string;

  @Column({ type: 'simple-enum', enum: CarrierType })
  carrier!: CarrierType;

  @Index()
  @Column({
    type: 'simple-enum',
    enum: ShipmentStatusType,
    default: ShipmentStatusType.PENDING,
  })
  status!: ShipmentStatusType;

  @Column({ name: 'shipped_at', type: 'datetime', nullable: true })
  shippedAt!: Date | null;

  @Column({ name: 'delivered_at', type: 'datetime', nullable: true })
  deliveredAt!: Date | null;

  @Index()
  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'datetime' })
  updatedAt!: Date;

  @Column({ name: 'shipping_address', type: 'text', nullable: true })
  shippingAddress!: string | null;

  @Column({ name: 'estimated_delivery', type: 'datetime', nullable: true })
  estimatedDelivery!: Date | null;

  /** Kilograms. */
  @Column({
    name: 'actual_weight',
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  actualWeight!: number | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @OneToMany(() => ShipmentHistory, (history) => history.shipment)
  history?: ShipmentHistory[];

  /**
   * Moves the shipment to `status` and stamps the milestone dates on first arrival.
   * `shippedAt` and `deliveredAt` are never cleared once populated.
   */
  applyStatus(status: ShipmentStatusType, at: Date = new Date()): void {
    this.status = status;

    if (SHIPPED_STATUSES.includes(status) && !this.shippedAt) {
      this.shippedAt = at;
    }

    if (status === ShipmentStatusType.DELIVERED && !this.deliveredAt) {
      this.deliveredAt = at;
    }
  }
}
