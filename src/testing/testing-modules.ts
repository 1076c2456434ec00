import { DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppConfig, config, RabbitMqConfig } from '../config/config';
import { Shipment, ShipmentHistory } from '../entities';

export interface ConfigOverrides {
  rabbitmq?: Partial<RabbitMqConfig>;
  shipping?: Partial<AppConfig['shipping']>;
}

export function testingConfig(overrides: ConfigOverrides = {}): () => AppConfig {
  return () => {
    const base = config();
    return {
      ...base,
      rabbitmq: { ...base.rabbitmq, ...overrides.rabbitmq },
      shipping: { ...base.shipping, ...overrides.shipping },
    };
  };
}

export function testingConfigModule(overrides: ConfigOverrides = {}): ReturnType<typeof ConfigModule.forRoot> {
  return ConfigModule.forRoot({
    isGlobal: true,
    ignoreEnvFile: true,
    load: [testingConfig(overrides)],
  });
}

/** Fresh in-memory SQLite schema per testing module. */
export function testingDatabaseModule(): DynamicModule {
  return TypeOrmModule.forRoot({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: [Shipment, ShipmentHistory],
    synchronize: true,
    dropSchema: true,
  });
}

export async function eventually(assertion: () => boolean, attempts = 400): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    if (assertion()) return;
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error('Condition not met in time');
}
