import { readFileSync } from 'fs';
import * as path from 'path';
import { DataSourceOptions } from 'typeorm';
import { CarrierType, isCarrier } from '../common/enums/carrier-type.enum';
import { Shipment } from '../entities/shipment.entity';
import { ShipmentHistory } from '../entities/shipment-history.entity';

export interface RabbitMqConfig {
  enabled: boolean;
  host: string;
  port: number;
  vhost: string;
  username: string;
  password: string;
  exchange: string;
  queue: string;
  heartbeat: number;
}

export interface AppConfig {
  port: number;
  database: DataSourceOptions;
  rabbitmq: RabbitMqConfig;
  shipping: {
    defaultCarrier: CarrierType;
    trackingNumberMaxAttempts: number;
  };
}

const flag = (name: string, fallback: boolean): boolean => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return ['true', '1', 'yes'].includes(raw.toLowerCase());
};

const integer = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const carrier = (name: string, fallback: CarrierType): CarrierType => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!isCarrier(raw)) {
    throw new Error(`Environment variable ${name} must be one of ${Object.values(CarrierType).join(', ')}, got "${raw}"`);
  }
  return raw;
};

export const config = (): AppConfig => {
  const caPath = process.env.DB_SSL_CA;

  return {
    port: integer('PORT', 3001),
    database: {
      type: 'mysql',
      host: process.env.DB_HOST ?? 'localhost',
      port: integer('DB_PORT', 3306),
      username: process.env.DB_USER ?? 'root',
      password: process.env.DB_PASSWORD ?? '',
      database: process.env.DB_NAME ?? 'shipping',
      synchronize: flag('DB_SYNC', false),
      logging: flag('DB_LOGGING', false),
      timezone: 'Z',
      entities: [Shipment, ShipmentHistory],
      ssl: caPath
        ? {
            ca: readFileSync(path.resolve(caPath)).toString(),
            rejectUnauthorized: true,
          }
        : undefined,
    } satisfies DataSourceOptions,
    rabbitmq: {
      enabled: flag('RABBITMQ_ENABLED', true),
      host: process.env.RABBITMQ_HOST ?? 'localhost',
      port: integer('RABBITMQ_PORT', 5672),
      vhost: process.env.RABBITMQ_VHOST ?? '/',
      username: process.env.RABBITMQ_USER ?? 'guest',
      password: process.env.RABBITMQ_PASSWORD ?? 'guest',
      exchange: process.env.RABBITMQ_EXCHANGE ?? 'ecommerce_events',
      queue: process.env.RABBITMQ_QUEUE ?? 'shipping_queue',
      heartbeat: integer('RABBITMQ_HEARTBEAT', 600),
    },
    shipping: {
      defaultCarrier: carrier('DEFAULT_CARRIER', CarrierType.DHL),
      trackingNumberMaxAttempts: integer('TRACKING_NO_MAX_ATTEMPTS', 50),
    },
  };
};
