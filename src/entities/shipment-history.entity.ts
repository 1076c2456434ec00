import { BeforeInsert, Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { Shipment } from './shipment.entity';

@Entity('shipment_history')
@Index(['shipmentId', 'timestamp'])
export class ShipmentHistory {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Shipment, (shipment) => shipment.history, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'shipment_id' })
  shipment?: Shipment;

  @Column({ name: 'shipment_id', type: 'int' })
  shipmentId!: number;

  @Column({ type: 'simple-enum', enum: ShipmentStatusType })
  status!: ShipmentStatusType;

  @Column({ type: 'varchar', length: 255, nullable: true })
  location!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'datetime' })
  timestamp!: Date;

  @BeforeInsert()
  setDefaults() {
    if (!this.timestamp) {
      this.timestamp = new Date();
    }
  }
}
