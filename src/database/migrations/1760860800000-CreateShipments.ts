import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

const STATUSES = ['PENDING', 'PICKED_UP', 'IN_TRANSIT', 'OUT_FOR_DELIVERY', 'DELIVERED', 'CANCELLED', 'FAILED'];
const CARRIERS = ['DHL', 'Bluedart', 'FedEx', 'DTDC'];

export class CreateShipments1760860800000 implements MigrationInterface {
  name = 'CreateShipments1760860800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'shipments',
        columns: [
          { name: 'id', type: 'int', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'order_id', type: 'int' },
          { name: 'tracking_no', type: 'varchar', length: '50', isUnique: true },
          { name: 'carrier', type: 'enum', enum: CARRIERS },
          { name: 'status', type: 'enum', enum: STATUSES, default: "'PENDING'" },
          { name: 'shipped_at', type: 'datetime', isNullable: true },
          { name: 'delivered_at', type: 'datetime', isNullable: true },
          { name: 'created_at', type: 'datetime', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'datetime', default: 'CURRENT_TIMESTAMP', onUpdate: 'CURRENT_TIMESTAMP' },
          { name: 'shipping_address', type: 'text', isNullable: true },
          { name: 'estimated_delivery', type: 'datetime', isNullable: true },
          { name: 'actual_weight', type: 'decimal', precision: 10, scale: 2, isNullable: true },
          { name: 'notes', type: 'text', isNullable: true },
        ],
        indices: [
          new TableIndex({ columnNames: ['order_id'] }),
          new TableIndex({ columnNames: ['status'] }),
          new TableIndex({ columnNames: ['created_at'] }),
          new TableIndex({ columnNames: ['order_id', 'status'] }),
        ],
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'shipment_history',
        columns: [
          { name: 'id', type: 'int', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'shipment_id', type: 'int' },
          { name: 'status', type: 'enum', enum: STATUSES },
          { name: 'location', type: 'varchar', length: '255', isNullable: true },
          { name: 'description', type: 'text', isNullable: true },
          { name: 'timestamp', type: 'datetime' },
        ],
        indices: [new TableIndex({ columnNames: ['shipment_id', 'timestamp'] })],
      }),
    );

    await queryRunner.createForeignKey(
      'shipment_history',
      new TableForeignKey({
        columnNames: ['shipment_id'],
        referencedTableName: 'shipments',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('shipment_history', true, true, true);
    await queryRunner.dropTable('shipments', true, true, true);
  }
}
