import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { config } from './config/config';
import { DatabaseConfig } from './config/db/database.config';
import { OrderEventsModule } from './order-events/order-events.module';

/** Root of the order events worker: same config and database as the API, no HTTP. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [config],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useClass: DatabaseConfig,
    }),
    OrderEventsModule,
  ],
})
export class ConsumerModule {}
