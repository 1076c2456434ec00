import 'dotenv/config';
import 'reflect-metadata';
import * as path from 'path';
import { DataSource } from 'typeorm';
import { config } from './config/config';

const dbConfig = config().database;

export const AppDataSource = new DataSource({
  ...dbConfig,
  migrations: [path.join(__dirname, 'database/migrations/*.{ts,js}')],
});
