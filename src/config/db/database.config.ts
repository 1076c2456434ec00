import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AppConfig } from '../config';

@Injectable()
export class DatabaseConfig implements TypeOrmOptionsFactory {
  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return this.configService.get('database', { infer: true });
  }
}
